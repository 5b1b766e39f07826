import { nanoid } from 'nanoid';
import { z } from 'zod';

import { standardLayout, standardRules } from '@labyrinth/data';
import type { GameRules, LabyrinthLayout } from '@labyrinth/data';

import type { CellCode, GameSession, GridCoordinate, HeroState } from '../simulation/types.js';
import { sameCoordinate } from '../simulation/utils/grid.js';

export interface SerializedHero {
  name: string;
  health: number;
  position: GridCoordinate;
  previousPosition: GridCoordinate;
  hasKey: boolean;
  remainingSelfHeals: number;
}

export interface SerializedLabyrinth {
  grid: CellCode[][];
  hazards: GridCoordinate[];
  keyCoordinate: GridCoordinate;
  keyPresent: boolean;
  golemCoordinate: GridCoordinate;
}

export interface SessionSnapshot {
  round: number;
  turnIndex: number;
  hazards: GridCoordinate[];
  heroes: SerializedHero[];
  labyrinth: SerializedLabyrinth;
}

const gridCoordinateSchema = z.object({
  row: z.number().int().nonnegative(),
  col: z.number().int().nonnegative()
});

const heroSchema = z.object({
  name: z.string().min(1),
  health: z.number().int(),
  position: gridCoordinateSchema,
  previousPosition: gridCoordinateSchema,
  hasKey: z.boolean(),
  remainingSelfHeals: z.number().int().nonnegative()
});

const labyrinthSchema = z.object({
  grid: z.array(z.array(z.union([z.literal(0), z.literal(1), z.literal(2)]))).min(1),
  hazards: z.array(gridCoordinateSchema),
  keyCoordinate: gridCoordinateSchema,
  keyPresent: z.boolean(),
  golemCoordinate: gridCoordinateSchema
});

const sameCells = (a: GridCoordinate[], b: GridCoordinate[]) =>
  a.length === b.length && a.every((cell, index) => sameCoordinate(cell, b[index]));

export interface SnapshotExpectations {
  layout?: LabyrinthLayout;
  rules?: GameRules;
}

/**
 * Snapshot schema bound to the maze and rules a session will be resumed
 * with: the grid must have the layout's dimensions and enough floor for a
 * round's hazards, and every piece must sit where play could have put it.
 */
export function createSessionSnapshotSchema(expectations: SnapshotExpectations = {}) {
  const layout = expectations.layout ?? standardLayout;
  const rules = expectations.rules ?? standardRules;

  return z
    .object({
      round: z.number().int().nonnegative(),
      turnIndex: z.number().int().nonnegative(),
      hazards: z.array(gridCoordinateSchema),
      heroes: z.array(heroSchema),
      labyrinth: labyrinthSchema
    })
    .superRefine((snapshot, ctx) => {
      const issue = (message: string, path: Array<string | number>) =>
        ctx.addIssue({ code: z.ZodIssueCode.custom, message, path });

      const { grid } = snapshot.labyrinth;
      if (grid.length !== layout.height || grid.some((row) => row.length !== layout.width)) {
        issue(`Grid must be ${layout.height} rows of ${layout.width} cells`, ['labyrinth', 'grid']);
        return;
      }
      const inside = (cell: GridCoordinate) => cell.row < layout.height && cell.col < layout.width;
      const codeAt = (cell: GridCoordinate) => grid[cell.row][cell.col];
      const passable = (cell: GridCoordinate) => inside(cell) && codeAt(cell) !== 0;

      const floorCells = grid.flat().filter((code) => code === 1).length;
      if (floorCells < rules.hazardCount) {
        issue(`Grid has ${floorCells} floor cells, fewer than the ${rules.hazardCount} hazards a round needs`, [
          'labyrinth',
          'grid'
        ]);
      }

      for (const [index, hero] of snapshot.heroes.entries()) {
        if (!passable(hero.position)) {
          issue(`Hero ${hero.name} does not stand on a passable cell`, ['heroes', index, 'position']);
        }
        if (!inside(hero.previousPosition)) {
          issue(`Hero ${hero.name} came from outside the grid`, ['heroes', index, 'previousPosition']);
        }
        if (hero.health > rules.maxHealth) {
          issue(`Hero ${hero.name} has more than ${rules.maxHealth} health`, ['heroes', index, 'health']);
        }
        if (hero.remainingSelfHeals > rules.selfHeals) {
          issue(`Hero ${hero.name} has more than ${rules.selfHeals} self-heals`, ['heroes', index, 'remainingSelfHeals']);
        }
      }
      if (!passable(snapshot.labyrinth.golemCoordinate) || !passable(snapshot.labyrinth.keyCoordinate)) {
        issue('Key or golem is not on a passable cell', ['labyrinth']);
      }
      for (const [index, hazard] of snapshot.labyrinth.hazards.entries()) {
        if (!inside(hazard) || codeAt(hazard) !== 1) {
          issue('Hazards burn only on plain floor', ['labyrinth', 'hazards', index]);
        }
      }
      if (new Set(snapshot.heroes.map((hero) => hero.name)).size !== snapshot.heroes.length) {
        issue('Hero names must be unique', ['heroes']);
      }
      if (snapshot.heroes.length > 0 && snapshot.turnIndex >= snapshot.heroes.length) {
        issue('Turn index points past the roster', ['turnIndex']);
      }
      if (!sameCells(snapshot.hazards, snapshot.labyrinth.hazards)) {
        issue('Session and labyrinth hazard lists disagree', ['hazards']);
      }
    });
}

export const sessionSnapshotSchema = createSessionSnapshotSchema();

export function parseSessionSnapshot(raw: unknown, expectations?: SnapshotExpectations): SessionSnapshot | undefined {
  const schema = expectations ? createSessionSnapshotSchema(expectations) : sessionSnapshotSchema;
  const result = schema.safeParse(raw);
  return result.success ? result.data : undefined;
}

const copyHero = (hero: HeroState | SerializedHero): HeroState => ({
  name: hero.name,
  health: hero.health,
  position: { ...hero.position },
  previousPosition: { ...hero.previousPosition },
  hasKey: hero.hasKey,
  remainingSelfHeals: hero.remainingSelfHeals
});

export function serializeSession(session: GameSession): SessionSnapshot {
  const { labyrinth } = session;
  return {
    round: session.round,
    turnIndex: session.turnIndex,
    hazards: labyrinth.hazards.map((cell) => ({ ...cell })),
    heroes: session.heroes.map(copyHero),
    labyrinth: {
      grid: labyrinth.grid.map((row) => [...row]),
      hazards: labyrinth.hazards.map((cell) => ({ ...cell })),
      keyCoordinate: { ...labyrinth.keyCoordinate },
      keyPresent: labyrinth.keyPresent,
      golemCoordinate: { ...labyrinth.golemCoordinate }
    }
  };
}

export interface HydrateSessionOptions {
  playerLogin: string;
  layout?: LabyrinthLayout;
  rules?: GameRules;
}

/**
 * Rebuilds a live session from a snapshot. Heart cells are not persisted and
 * come from the layout.
 */
export function hydrateSession(snapshot: SessionSnapshot, options: HydrateSessionOptions): GameSession {
  const layout = options.layout ?? standardLayout;
  const { labyrinth } = snapshot;

  return {
    id: nanoid(10),
    playerLogin: options.playerLogin,
    round: snapshot.round,
    turnIndex: snapshot.turnIndex,
    labyrinth: {
      width: labyrinth.grid[0].length,
      height: labyrinth.grid.length,
      grid: labyrinth.grid.map((row) => [...row]),
      keyPresent: labyrinth.keyPresent,
      keyCoordinate: { ...labyrinth.keyCoordinate },
      heartCoordinates: layout.heartCoordinates.map((heart) => ({ ...heart })),
      golemCoordinate: { ...labyrinth.golemCoordinate },
      hazards: labyrinth.hazards.map((cell) => ({ ...cell }))
    },
    heroes: snapshot.heroes.map(copyHero),
    rules: options.rules ?? standardRules,
    timeline: []
  };
}
