import * as readline from 'node:readline';

import { describeChoice, directionLabels, directions, formatCoordinate } from '@labyrinth/core';
import type { ActionChoice, Direction, HeroState, PlayerInterface, SetupInterface } from '@labyrinth/core';

export type AskLine = (question: string) => Promise<string>;
export type WriteLine = (line: string) => void;

/** Turns a 1-based menu answer into a 0-based index, or undefined when out of range or not a number. */
export function parseMenuIndex(answer: string, size: number): number | undefined {
  const trimmed = answer.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  const index = Number(trimmed) - 1;
  return index >= 0 && index < size ? index : undefined;
}

export function parseYesNo(answer: string): boolean | undefined {
  switch (answer.trim().toLowerCase()) {
    case 'yes':
    case 'y':
      return true;
    case 'no':
    case 'n':
      return false;
    default:
      return undefined;
  }
}

export function parseHeroCount(answer: string): number {
  const trimmed = answer.trim();
  return /^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
}

export type DirectionAnswer = Direction | 'declined';

export function parseDirection(answer: string): DirectionAnswer | undefined {
  const trimmed = answer.trim();
  if (trimmed.toUpperCase() === 'NO') return 'declined';
  const index = parseMenuIndex(trimmed, directions.length);
  if (index !== undefined) return directions[index];
  return directions.find((direction) => direction === trimmed.toLowerCase());
}

export function formatHeroStatus(hero: HeroState): string {
  const key = hero.hasKey ? ', carrying the key' : '';
  return `${hero.name} at ${formatCoordinate(hero.position)}: ${hero.health} health, ${hero.remainingSelfHeals} self-heals${key}`;
}

/**
 * Numbered-menu terminal dialogue over an injected line reader. Invalid
 * answers are reported and asked again.
 */
export class TerminalPrompts implements PlayerInterface, SetupInterface {
  readonly #ask: AskLine;
  readonly #write: WriteLine;

  constructor(ask: AskLine, write: WriteLine) {
    this.#ask = ask;
    this.#write = write;
  }

  announce(message: string): void {
    this.#write(message);
  }

  async askLogin(): Promise<string> {
    let login = (await this.#ask('Login: ')).trim();
    while (login.length === 0) {
      this.#write('Login must not be empty');
      login = (await this.#ask('Login: ')).trim();
    }
    return login;
  }

  async confirmResume(loginId: string): Promise<boolean> {
    return this.#askYesNo(`${loginId}, a saved game was found. Resume it? (yes/no) `);
  }

  async askHeroCount(maxHeroes: number): Promise<number> {
    return parseHeroCount(await this.#ask(`How many heroes will play (1-${maxHeroes})? `));
  }

  async askHeroName(position: number): Promise<string> {
    return this.#ask(`Name of hero ${position}: `);
  }

  async chooseAction(hero: HeroState, choices: ReadonlyArray<ActionChoice>): Promise<ActionChoice> {
    this.#write(formatHeroStatus(hero));
    const menu = choices.map((choice, index) => `${index + 1}. ${describeChoice(choice)}`).join('\n');
    while (true) {
      const index = parseMenuIndex(await this.#ask(`${menu}\n${hero.name}, choose an action: `), choices.length);
      if (index !== undefined) return choices[index];
      this.#write(`Enter a number between 1 and ${choices.length}`);
    }
  }

  async chooseDirection(hero: HeroState): Promise<Direction | undefined> {
    const menu = directions.map((direction, index) => `${index + 1}. ${directionLabels[direction]}`).join('\n');
    while (true) {
      const answer = parseDirection(await this.#ask(`${menu}\n${hero.name}, which way? (NO to stay) `));
      if (answer === 'declined') return undefined;
      if (answer) return answer;
      this.#write(`Enter a number between 1 and ${directions.length}, or NO`);
    }
  }

  async confirmRetreat(hero: HeroState): Promise<boolean> {
    return this.#askYesNo(`Stepping back scares ${hero.name} to death. Go anyway? (yes/no) `);
  }

  async #askYesNo(question: string): Promise<boolean> {
    while (true) {
      const answer = parseYesNo(await this.#ask(question));
      if (answer !== undefined) return answer;
      this.#write('Please answer yes or no');
    }
  }
}

export interface ReadlineSession {
  ask: AskLine;
  close(): void;
}

/** Pending questions reject once input ends, so the game loop can unwind. */
export function openReadline(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): ReadlineSession {
  const rl = readline.createInterface({ input, output });
  let closed = false;
  const pending = new Set<(error: Error) => void>();
  rl.on('close', () => {
    closed = true;
    for (const reject of pending) reject(new Error('Input closed'));
    pending.clear();
  });

  const ask: AskLine = (question) =>
    new Promise((resolve, reject) => {
      if (closed) {
        reject(new Error('Input closed'));
        return;
      }
      pending.add(reject);
      rl.question(question, (answer) => {
        pending.delete(reject);
        resolve(answer);
      });
    });

  return { ask, close: () => rl.close() };
}
