import type { GameRules, LabyrinthLayout } from '@labyrinth/data';

import type { HeroState } from './types.js';

export interface RosterResult {
  success: boolean;
  hero?: HeroState;
  error?: string;
}

export function createHero(name: string, layout: LabyrinthLayout, rules: GameRules): HeroState {
  return {
    name,
    health: rules.maxHealth,
    hasKey: false,
    position: { ...layout.heroStart },
    previousPosition: { ...layout.heroPreviousStart },
    remainingSelfHeals: rules.selfHeals
  };
}

export function validateHeroCount(count: number, rules: GameRules): RosterResult {
  if (!Number.isInteger(count) || count < 1 || count > rules.maxHeroes) {
    return { success: false, error: `Choose between 1 and ${rules.maxHeroes} heroes` };
  }
  return { success: true };
}

/**
 * Appends a fresh hero unless the name is blank, taken, or the roster is full.
 * On failure the roster is left untouched.
 */
export function addHeroToRoster(
  roster: HeroState[],
  rawName: string,
  layout: LabyrinthLayout,
  rules: GameRules
): RosterResult {
  const name = rawName.trim();
  if (roster.length >= rules.maxHeroes) {
    return { success: false, error: `A roster holds at most ${rules.maxHeroes} heroes` };
  }
  if (!name) {
    return { success: false, error: 'Hero name must not be empty' };
  }
  if (roster.some((hero) => hero.name === name)) {
    return { success: false, error: `Hero name "${name}" is already taken` };
  }

  const hero = createHero(name, layout, rules);
  roster.push(hero);
  return { success: true, hero };
}

export function createRoster(names: string[], layout: LabyrinthLayout, rules: GameRules): HeroState[] {
  const sizeCheck = validateHeroCount(names.length, rules);
  if (!sizeCheck.success) {
    throw new Error(sizeCheck.error);
  }
  const roster: HeroState[] = [];
  for (const name of names) {
    const result = addHeroToRoster(roster, name, layout, rules);
    if (!result.success) {
      throw new Error(result.error);
    }
  }
  return roster;
}
