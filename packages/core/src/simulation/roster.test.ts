import { describe, expect, it } from 'vitest';

import { standardLayout, standardRules } from '@labyrinth/data';

import { addHeroToRoster, createRoster, validateHeroCount } from './roster.js';
import type { HeroState } from './types.js';

describe('roster setup', () => {
  it('accepts one to five uniquely named heroes', () => {
    for (let size = 1; size <= 5; size++) {
      const names = Array.from({ length: size }, (_, index) => `Hero ${index + 1}`);
      expect(createRoster(names, standardLayout, standardRules)).toHaveLength(size);
    }
  });

  it('creates heroes at the start cell with full health and three self-heals', () => {
    const [hero] = createRoster(['Ayla'], standardLayout, standardRules);
    expect(hero).toEqual({
      name: 'Ayla',
      health: 5,
      hasKey: false,
      position: { row: 3, col: 0 },
      previousPosition: { row: 0, col: 0 },
      remainingSelfHeals: 3
    });
  });

  it('rejects a sixth hero without touching the roster', () => {
    const roster = createRoster(['A', 'B', 'C', 'D', 'E'], standardLayout, standardRules);
    const result = addHeroToRoster(roster, 'F', standardLayout, standardRules);
    expect(result).toEqual({ success: false, error: 'A roster holds at most 5 heroes' });
    expect(roster.map((hero) => hero.name)).toEqual(['A', 'B', 'C', 'D', 'E']);
  });

  it('rejects duplicate and empty names', () => {
    const roster: HeroState[] = [];
    expect(addHeroToRoster(roster, 'Ayla', standardLayout, standardRules).success).toBe(true);
    expect(addHeroToRoster(roster, ' Ayla ', standardLayout, standardRules).error).toBe(
      'Hero name "Ayla" is already taken'
    );
    expect(addHeroToRoster(roster, '   ', standardLayout, standardRules).error).toBe('Hero name must not be empty');
    expect(roster).toHaveLength(1);
  });

  it('validates the requested hero count', () => {
    expect(validateHeroCount(0, standardRules).success).toBe(false);
    expect(validateHeroCount(6, standardRules).error).toBe('Choose between 1 and 5 heroes');
    expect(validateHeroCount(Number.NaN, standardRules).success).toBe(false);
    expect(validateHeroCount(3, standardRules).success).toBe(true);
  });

  it('throws when building a roster from invalid names', () => {
    expect(() => createRoster(['Ayla', 'Ayla'], standardLayout, standardRules)).toThrow('already taken');
    expect(() => createRoster([], standardLayout, standardRules)).toThrow('Choose between 1 and 5 heroes');
  });
});
