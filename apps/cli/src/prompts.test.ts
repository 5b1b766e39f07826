import { describe, expect, it } from 'vitest';

import type { HeroState } from '@labyrinth/core';

import {
  formatHeroStatus,
  parseDirection,
  parseHeroCount,
  parseMenuIndex,
  parseYesNo
} from './prompts.js';
import { scriptedPrompts as scripted } from './testing.js';

const ayla: HeroState = {
  name: 'Ayla',
  health: 5,
  hasKey: false,
  position: { row: 3, col: 0 },
  previousPosition: { row: 0, col: 0 },
  remainingSelfHeals: 3
};

describe('answer parsing', () => {
  it('reads 1-based menu numbers', () => {
    expect(parseMenuIndex('2', 3)).toBe(1);
    expect(parseMenuIndex(' 3 ', 3)).toBe(2);
    expect(parseMenuIndex('0', 3)).toBeUndefined();
    expect(parseMenuIndex('4', 3)).toBeUndefined();
    expect(parseMenuIndex('two', 3)).toBeUndefined();
    expect(parseMenuIndex('1.5', 3)).toBeUndefined();
  });

  it('reads yes and no in any case', () => {
    expect(parseYesNo('YES')).toBe(true);
    expect(parseYesNo(' n ')).toBe(false);
    expect(parseYesNo('maybe')).toBeUndefined();
  });

  it('reads hero counts, NaN for anything else', () => {
    expect(parseHeroCount('3')).toBe(3);
    expect(parseHeroCount('x')).toBeNaN();
    expect(parseHeroCount('-1')).toBeNaN();
  });

  it('reads directions by number or name, and NO to stay', () => {
    expect(parseDirection('2')).toBe('down');
    expect(parseDirection('Left')).toBe('left');
    expect(parseDirection('NO')).toBe('declined');
    expect(parseDirection('no')).toBe('declined');
    expect(parseDirection('5')).toBeUndefined();
  });

  it('summarises a hero', () => {
    expect(formatHeroStatus(ayla)).toBe('Ayla at (3,0): 5 health, 3 self-heals');
    expect(formatHeroStatus({ ...ayla, hasKey: true, health: 2 })).toBe(
      'Ayla at (3,0): 2 health, 3 self-heals, carrying the key'
    );
  });
});

describe('TerminalPrompts', () => {
  it('re-asks until the action number is valid', async () => {
    const { prompts, questions, lines } = scripted(['9', 'x', '2']);
    const choice = await prompts.chooseAction(ayla, [{ kind: 'move' }, { kind: 'quit' }]);

    expect(choice).toEqual({ kind: 'quit' });
    expect(questions[0]).toBe('1. Move hero\n2. Quit game\nAyla, choose an action: ');
    expect(lines).toEqual([
      'Ayla at (3,0): 5 health, 3 self-heals',
      'Enter a number between 1 and 2',
      'Enter a number between 1 and 2'
    ]);
  });

  it('returns the chosen direction, or undefined when declined', async () => {
    await expect(scripted(['left']).prompts.chooseDirection(ayla)).resolves.toBe('left');
    await expect(scripted(['NO']).prompts.chooseDirection(ayla)).resolves.toBeUndefined();

    const retry = scripted(['7', '3']);
    await expect(retry.prompts.chooseDirection(ayla)).resolves.toBe('left');
    expect(retry.lines).toEqual(['Enter a number between 1 and 4, or NO']);
  });

  it('insists on yes or no', async () => {
    const { prompts, lines } = scripted(['maybe', 'yes']);
    await expect(prompts.confirmResume('mira')).resolves.toBe(true);
    expect(lines).toEqual(['Please answer yes or no']);
    await expect(scripted(['no']).prompts.confirmRetreat(ayla)).resolves.toBe(false);
  });

  it('trims the login and refuses a blank one', async () => {
    const { prompts, lines } = scripted(['  ', ' mira ']);
    await expect(prompts.askLogin()).resolves.toBe('mira');
    expect(lines).toEqual(['Login must not be empty']);
  });
});
