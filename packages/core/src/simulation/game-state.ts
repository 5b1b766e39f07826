import { nanoid } from 'nanoid';

import { standardLayout, standardRules } from '@labyrinth/data';
import type { GameRules, LabyrinthLayout } from '@labyrinth/data';

import { createRoster } from './roster.js';
import type { GameSession, LabyrinthState } from './types.js';

export interface CreateGameSessionOptions {
  playerLogin: string;
  heroNames: string[];
  layout?: LabyrinthLayout;
  rules?: GameRules;
}

export function createLabyrinthState(layout: LabyrinthLayout): LabyrinthState {
  return {
    width: layout.width,
    height: layout.height,
    grid: layout.grid.map((row) => [...row]),
    keyPresent: true,
    keyCoordinate: { ...layout.keyCoordinate },
    heartCoordinates: layout.heartCoordinates.map((heart) => ({ ...heart })),
    golemCoordinate: { ...layout.golemCoordinate },
    hazards: []
  };
}

/**
 * Creates a fresh session at round 0. Round 1 starts when the turn engine begins.
 */
export function createGameSession(options: CreateGameSessionOptions): GameSession {
  const layout = options.layout ?? standardLayout;
  const rules = options.rules ?? standardRules;

  return {
    id: nanoid(10),
    playerLogin: options.playerLogin,
    round: 0,
    turnIndex: 0,
    labyrinth: createLabyrinthState(layout),
    heroes: createRoster(options.heroNames, layout, rules),
    rules,
    timeline: []
  };
}
