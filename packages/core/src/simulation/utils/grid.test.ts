import { describe, expect, it } from 'vitest';

import { standardLayout } from '@labyrinth/data';

import { OutOfBoundsError } from '../../errors.js';
import { createLabyrinthState } from '../game-state.js';
import { cellCode, cellsWithCode, isPassable, stepInDirection } from './grid.js';

const labyrinth = createLabyrinthState(standardLayout);

describe('grid map', () => {
  it('reads terrain codes by row and column', () => {
    expect(cellCode(labyrinth, { row: 3, col: 0 })).toBe(1);
    expect(cellCode(labyrinth, { row: 2, col: 0 })).toBe(0);
    expect(cellCode(labyrinth, { row: 1, col: 2 })).toBe(2);
  });

  it('fails loudly outside the grid', () => {
    expect(() => cellCode(labyrinth, { row: 4, col: 0 })).toThrow(OutOfBoundsError);
    expect(() => cellCode(labyrinth, { row: 0, col: -1 })).toThrow('Cell (0,-1) is outside the 4x8 grid');
  });

  it('treats floor and special floor as passable', () => {
    expect(isPassable(labyrinth, { row: 3, col: 1 })).toBe(true);
    expect(isPassable(labyrinth, { row: 0, col: 4 })).toBe(true);
    expect(isPassable(labyrinth, { row: 2, col: 0 })).toBe(false);
    expect(isPassable(labyrinth, { row: -1, col: 0 })).toBe(false);
    expect(isPassable(labyrinth, { row: 0, col: 8 })).toBe(false);
  });

  it('steps one cell per direction', () => {
    const origin = { row: 3, col: 0 };
    expect(stepInDirection(origin, 'up')).toEqual({ row: 2, col: 0 });
    expect(stepInDirection(origin, 'down')).toEqual({ row: 4, col: 0 });
    expect(stepInDirection(origin, 'left')).toEqual({ row: 3, col: -1 });
    expect(stepInDirection(origin, 'right')).toEqual({ row: 3, col: 1 });
  });

  it('lists plain floor cells in row-major order', () => {
    const floor = cellsWithCode(labyrinth, 1);
    expect(floor).toHaveLength(13);
    expect(floor[0]).toEqual({ row: 0, col: 5 });
    expect(floor[12]).toEqual({ row: 3, col: 5 });
  });
});
