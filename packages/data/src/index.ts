import { z } from 'zod';

/** 0 = wall, 1 = floor, 2 = special floor (item cells, no retreat rule). */
export type CellCode = 0 | 1 | 2;

export interface GridCoordinate {
  row: number;
  col: number;
}

export interface LabyrinthLayout {
  id: string;
  name: string;
  width: number;
  height: number;
  grid: CellCode[][];
  keyCoordinate: GridCoordinate;
  heartCoordinates: GridCoordinate[];
  golemCoordinate: GridCoordinate;
  heroStart: GridCoordinate;
  /** Recorded as a fresh hero's previous cell; a wall so the retreat rule never fires on the first step. */
  heroPreviousStart: GridCoordinate;
}

export interface GameRules {
  maxHeroes: number;
  maxHealth: number;
  selfHeals: number;
  hazardCount: number;
  attackDamage: number;
  hazardDamage: number;
  collisionDamage: number;
}

export interface ContentBundle {
  layouts: LabyrinthLayout[];
  rules: GameRules;
}

const gridCoordinateSchema = z.object({
  row: z.number().int().nonnegative(),
  col: z.number().int().nonnegative()
});

const cellCodeSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

const withinLayout = (layout: { width: number; height: number }, coordinate: GridCoordinate) =>
  coordinate.row < layout.height && coordinate.col < layout.width;

const layoutSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    grid: z.array(z.array(cellCodeSchema)),
    keyCoordinate: gridCoordinateSchema,
    heartCoordinates: z.array(gridCoordinateSchema),
    golemCoordinate: gridCoordinateSchema,
    heroStart: gridCoordinateSchema,
    heroPreviousStart: gridCoordinateSchema
  })
  .superRefine((layout, ctx) => {
    if (layout.grid.length !== layout.height || layout.grid.some((row) => row.length !== layout.width)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Grid must be ${layout.height} rows of ${layout.width} cells`,
        path: ['grid']
      });
      return;
    }
    const placed: Array<[string, GridCoordinate]> = [
      ['keyCoordinate', layout.keyCoordinate],
      ['golemCoordinate', layout.golemCoordinate],
      ['heroStart', layout.heroStart],
      ...layout.heartCoordinates.map((heart, index): [string, GridCoordinate] => [`heartCoordinates.${index}`, heart])
    ];
    for (const [path, coordinate] of placed) {
      if (!withinLayout(layout, coordinate) || layout.grid[coordinate.row][coordinate.col] === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${path} must sit on a passable cell`,
          path: path.split('.')
        });
      }
    }
  });

const rulesSchema = z.object({
  maxHeroes: z.number().int().positive(),
  maxHealth: z.number().int().positive(),
  selfHeals: z.number().int().nonnegative(),
  hazardCount: z.number().int().nonnegative(),
  attackDamage: z.number().int().positive(),
  hazardDamage: z.number().int().positive(),
  collisionDamage: z.number().int().positive()
});

const bundleSchema = z.object({
  layouts: z.array(layoutSchema).min(1),
  rules: rulesSchema
});

export function loadLabyrinthLayout(raw: unknown): LabyrinthLayout {
  return layoutSchema.parse(raw);
}

export function loadContentBundle(raw: unknown): ContentBundle {
  return bundleSchema.parse(raw);
}

export const standardLayout: LabyrinthLayout = {
  id: 'standard',
  name: 'The Labyrinth',
  width: 8,
  height: 4,
  grid: [
    [0, 0, 0, 0, 2, 1, 1, 1],
    [0, 0, 2, 0, 0, 1, 0, 0],
    [0, 1, 1, 1, 0, 1, 2, 0],
    [1, 1, 0, 1, 1, 1, 0, 0]
  ],
  keyCoordinate: { row: 1, col: 2 },
  heartCoordinates: [
    { row: 0, col: 4 },
    { row: 2, col: 6 }
  ],
  golemCoordinate: { row: 0, col: 7 },
  heroStart: { row: 3, col: 0 },
  heroPreviousStart: { row: 0, col: 0 }
};

export const standardRules: GameRules = {
  maxHeroes: 5,
  maxHealth: 5,
  selfHeals: 3,
  hazardCount: 4,
  attackDamage: 1,
  hazardDamage: 1,
  collisionDamage: 1
};

export const starterBundle: ContentBundle = {
  layouts: [standardLayout],
  rules: standardRules
};

export const validatedStarterBundle = loadContentBundle(starterBundle);
