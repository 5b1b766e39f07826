import { OutOfBoundsError } from '../../errors.js';
import type { CellCode, Direction, GridCoordinate, LabyrinthState } from '../types.js';

type GridShape = Pick<LabyrinthState, 'width' | 'height' | 'grid'>;

export const directionOffsets: Readonly<Record<Direction, GridCoordinate>> = {
  up: { row: -1, col: 0 },
  down: { row: 1, col: 0 },
  left: { row: 0, col: -1 },
  right: { row: 0, col: 1 }
};

export const directions: ReadonlyArray<Direction> = ['up', 'down', 'left', 'right'];

export const coordinateKey = (coordinate: GridCoordinate) => `${coordinate.row},${coordinate.col}`;

export function sameCoordinate(a: GridCoordinate, b: GridCoordinate): boolean {
  return a.row === b.row && a.col === b.col;
}

export function containsCoordinate(list: ReadonlyArray<GridCoordinate>, coordinate: GridCoordinate): boolean {
  return list.some((entry) => sameCoordinate(entry, coordinate));
}

export function addCoordinates(a: GridCoordinate, b: GridCoordinate): GridCoordinate {
  return { row: a.row + b.row, col: a.col + b.col };
}

export function stepInDirection(from: GridCoordinate, direction: Direction): GridCoordinate {
  return addCoordinates(from, directionOffsets[direction]);
}

export function isWithinBounds(grid: GridShape, coordinate: GridCoordinate): boolean {
  return coordinate.row >= 0 && coordinate.row < grid.height && coordinate.col >= 0 && coordinate.col < grid.width;
}

export function cellCode(grid: GridShape, coordinate: GridCoordinate): CellCode {
  if (!isWithinBounds(grid, coordinate)) {
    throw new OutOfBoundsError(coordinate, grid.width, grid.height);
  }
  return grid.grid[coordinate.row][coordinate.col];
}

export function isPassable(grid: GridShape, coordinate: GridCoordinate): boolean {
  if (!isWithinBounds(grid, coordinate)) {
    return false;
  }
  const code = cellCode(grid, coordinate);
  return code === 1 || code === 2;
}

export function cellsWithCode(grid: GridShape, code: CellCode): GridCoordinate[] {
  const cells: GridCoordinate[] = [];
  for (let row = 0; row < grid.height; row++) {
    for (let col = 0; col < grid.width; col++) {
      if (grid.grid[row][col] === code) {
        cells.push({ row, col });
      }
    }
  }
  return cells;
}

export const formatCoordinate = (coordinate: GridCoordinate) => `(${coordinate.row},${coordinate.col})`;
