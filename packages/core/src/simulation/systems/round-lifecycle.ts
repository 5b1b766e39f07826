import { regenerateHazards } from '../hazards/hazard-generator.js';
import type { GameEvent, GameSession, GridCoordinate } from '../types.js';
import type { RandomSource } from '../utils/random.js';

export interface RoundStatus {
  round: number;
  hazards: GridCoordinate[];
  heroes: Array<{ name: string; health: number; hasKey: boolean }>;
}

export function startRound(session: GameSession, random: RandomSource = Math.random): GameEvent {
  session.round += 1;
  session.labyrinth.hazards = regenerateHazards(session.labyrinth, {
    count: session.rules.hazardCount,
    random
  });

  const event: GameEvent = {
    kind: 'round:started',
    round: session.round,
    hazards: session.labyrinth.hazards.map((cell) => ({ ...cell }))
  };
  session.timeline.push(event);
  return event;
}

export function describeRound(session: GameSession): RoundStatus {
  return {
    round: session.round,
    hazards: session.labyrinth.hazards.map((cell) => ({ ...cell })),
    heroes: session.heroes.map((hero) => ({ name: hero.name, health: hero.health, hasKey: hero.hasKey }))
  };
}
