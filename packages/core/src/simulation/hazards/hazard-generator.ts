import { ConfigurationError } from '../../errors.js';
import type { GridCoordinate, LabyrinthState } from '../types.js';
import { cellsWithCode } from '../utils/grid.js';
import { randomInt, type RandomSource } from '../utils/random.js';

export interface HazardGeneratorOptions {
  count: number;
  random?: RandomSource;
}

/**
 * Picks `count` distinct plain-floor cells, uniformly and without replacement.
 * Special-floor cells (item and heart cells) never catch fire.
 */
export function regenerateHazards(
  labyrinth: Pick<LabyrinthState, 'width' | 'height' | 'grid'>,
  options: HazardGeneratorOptions
): GridCoordinate[] {
  const random = options.random ?? Math.random;
  const pool = cellsWithCode(labyrinth, 1);
  if (pool.length < options.count) {
    throw new ConfigurationError(
      `Cannot place ${options.count} hazards: the grid only has ${pool.length} floor cells`
    );
  }

  const hazards: GridCoordinate[] = [];
  while (hazards.length < options.count) {
    const [picked] = pool.splice(randomInt(random, 0, pool.length - 1), 1);
    hazards.push(picked);
  }
  return hazards;
}
