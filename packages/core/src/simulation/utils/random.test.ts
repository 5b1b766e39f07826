import { describe, expect, it } from 'vitest';

import { createSeededRandom, randomInt } from './random.js';

describe('random', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = createSeededRandom(7);
    const b = createSeededRandom(7);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
    expect(first.every((value) => value >= 0 && value < 1)).toBe(true);
  });

  it('maps a source onto an inclusive integer range', () => {
    expect(randomInt(() => 0, 2, 5)).toBe(2);
    expect(randomInt(() => 0.999, 2, 5)).toBe(5);
    expect(randomInt(() => 0.5, 0, 3)).toBe(2);
  });
});
