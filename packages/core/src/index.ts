export * from './errors.js';
export * from './logging.js';
export * from './simulation/types.js';
export * from './simulation/game-state.js';
export * from './simulation/roster.js';
export * from './simulation/narration.js';
export * from './simulation/heroes/hero-actions.js';
export * from './simulation/hazards/hazard-generator.js';
export * from './simulation/systems/round-lifecycle.js';
export * from './simulation/systems/turn-engine.js';
export {
  cellCode,
  coordinateKey,
  directions,
  formatCoordinate,
  isPassable,
  isWithinBounds,
  sameCoordinate,
  stepInDirection
} from './simulation/utils/grid.js';
export * from './simulation/utils/random.js';
export * from './persistence/snapshot.js';
export * from './persistence/session-store.js';
export * from './runner/game-runner.js';
export * from './runner/session-setup.js';
