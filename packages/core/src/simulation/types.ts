import type { CellCode, GameRules, GridCoordinate } from '@labyrinth/data';

export type { CellCode, GameRules, GridCoordinate };

export type Direction = 'up' | 'down' | 'left' | 'right';

export interface HeroState {
  name: string;
  health: number;
  hasKey: boolean;
  position: GridCoordinate;
  previousPosition: GridCoordinate;
  remainingSelfHeals: number;
}

export interface LabyrinthState {
  width: number;
  height: number;
  grid: ReadonlyArray<ReadonlyArray<CellCode>>;
  keyPresent: boolean;
  keyCoordinate: GridCoordinate;
  heartCoordinates: ReadonlyArray<GridCoordinate>;
  golemCoordinate: GridCoordinate;
  // Replaced wholesale at every round start
  hazards: GridCoordinate[];
}

export interface GameSession {
  id: string;
  playerLogin: string;
  round: number;
  turnIndex: number;
  labyrinth: LabyrinthState;
  heroes: HeroState[];
  rules: GameRules;
  timeline: GameEvent[];
}

export type GameEvent =
  | {
      kind: 'round:started';
      round: number;
      hazards: GridCoordinate[];
    }
  | {
      kind: 'hero:moved';
      hero: string;
      from: GridCoordinate;
      to: GridCoordinate;
    }
  | {
      kind: 'hero:collided';
      hero: string;
      at: GridCoordinate;
      remainingHealth: number;
    }
  | {
      kind: 'hero:burned';
      hero: string;
      at: GridCoordinate;
      remainingHealth: number;
    }
  | {
      kind: 'hero:retreated';
      hero: string;
      at: GridCoordinate;
    }
  | {
      kind: 'hero:attacked';
      attacker: string;
      target: string;
      targetRemainingHealth: number;
    }
  | {
      kind: 'hero:key-picked';
      hero: string;
      at: GridCoordinate;
    }
  | {
      kind: 'hero:healed';
      hero: string;
      source: 'station' | 'self';
      health: number;
    }
  | {
      kind: 'hero:golem-slain';
      hero: string;
    }
  | {
      kind: 'hero:eliminated';
      hero: string;
      at: GridCoordinate;
    }
  | {
      kind: 'key:dropped';
      hero: string;
      at: GridCoordinate;
    }
  | {
      kind: 'turn:advanced';
      hero: string;
      turnIndex: number;
    }
  | {
      kind: 'game:victory';
      hero: string;
    }
  | {
      kind: 'game:all-dead';
    }
  | {
      kind: 'game:quit';
      hero: string;
    };

/**
 * Where the turn state machine currently rests. Transitional states (turn
 * complete, round complete, hero eliminated) surface as timeline events.
 */
export type TurnPhase =
  | { kind: 'not-started' }
  | { kind: 'awaiting-action'; hero: string }
  | { kind: 'victory'; hero: string }
  | { kind: 'all-heroes-dead' }
  | { kind: 'quit'; hero: string };

export type TerminalPhase = Extract<TurnPhase, { kind: 'victory' | 'all-heroes-dead' | 'quit' }>;

/** Menu entries offered to the active hero; a move picks its direction afterwards. */
export type ActionChoice =
  | { kind: 'attack'; target: string }
  | { kind: 'pick-up-key' }
  | { kind: 'heal-at-station' }
  | { kind: 'move' }
  | { kind: 'self-heal' }
  | { kind: 'save-game' }
  | { kind: 'quit' };

export type HeroAction =
  | Exclude<ActionChoice, { kind: 'move' }>
  | { kind: 'move'; direction: Direction; confirmRetreat?: boolean };
