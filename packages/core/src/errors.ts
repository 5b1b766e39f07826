import type { GridCoordinate } from './simulation/types.js';

export class OutOfBoundsError extends Error {
  readonly coordinate: GridCoordinate;

  constructor(coordinate: GridCoordinate, width: number, height: number) {
    super(`Cell (${coordinate.row},${coordinate.col}) is outside the ${height}x${width} grid`);
    this.name = 'OutOfBoundsError';
    this.coordinate = coordinate;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class PersistenceUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceUnavailableError';
  }
}
