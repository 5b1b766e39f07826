import { describe, expect, it } from 'vitest';

import { standardLayout } from '@labyrinth/data';

import { ConfigurationError } from '../../errors.js';
import { createLabyrinthState } from '../game-state.js';
import { cellCode, coordinateKey } from '../utils/grid.js';
import { createSeededRandom } from '../utils/random.js';
import { regenerateHazards } from './hazard-generator.js';

const labyrinth = createLabyrinthState(standardLayout);

describe('regenerateHazards', () => {
  it('always yields four distinct plain-floor cells', () => {
    for (let seed = 1; seed <= 25; seed++) {
      const hazards = regenerateHazards(labyrinth, { count: 4, random: createSeededRandom(seed) });
      expect(hazards).toHaveLength(4);
      expect(new Set(hazards.map(coordinateKey)).size).toBe(4);
      for (const cell of hazards) {
        expect(cellCode(labyrinth, cell)).toBe(1);
      }
    }
  });

  it('is deterministic for a given random source', () => {
    const first = regenerateHazards(labyrinth, { count: 4, random: createSeededRandom(42) });
    const second = regenerateHazards(labyrinth, { count: 4, random: createSeededRandom(42) });
    expect(second).toEqual(first);
  });

  it('draws without replacement from the remaining pool', () => {
    expect(regenerateHazards(labyrinth, { count: 4, random: () => 0 })).toEqual([
      { row: 0, col: 5 },
      { row: 0, col: 6 },
      { row: 0, col: 7 },
      { row: 1, col: 5 }
    ]);
    expect(regenerateHazards(labyrinth, { count: 4, random: () => 0.999 })).toEqual([
      { row: 3, col: 5 },
      { row: 3, col: 4 },
      { row: 3, col: 3 },
      { row: 3, col: 1 }
    ]);
  });

  it('refuses a grid with too few floor cells', () => {
    const cramped = () => regenerateHazards({ width: 3, height: 1, grid: [[1, 2, 1]] }, { count: 4 });
    expect(cramped).toThrow(ConfigurationError);
    expect(cramped).toThrow('Cannot place 4 hazards: the grid only has 2 floor cells');
  });
});
