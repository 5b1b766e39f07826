import { destination } from 'pino';

import {
  createLogger,
  createSeededRandom,
  prepareSession,
  runGame,
  silentLogger,
  TurnEngine
} from '@labyrinth/core';
import type { Logger, RandomSource, SessionStore, TerminalPhase } from '@labyrinth/core';
import { FileSessionStore } from '@labyrinth/services';

import { loadCliConfig } from './config.js';
import { openReadline, TerminalPrompts } from './prompts.js';

export { loadCliConfig } from './config.js';
export type { CliConfig } from './config.js';
export * from './prompts.js';

export interface PlayOptions {
  prompts: TerminalPrompts;
  store: SessionStore;
  random?: RandomSource;
  logger?: Logger;
}

/** Login, resume-or-new, then the turn loop until the game ends. */
export async function play(options: PlayOptions): Promise<TerminalPhase> {
  const { prompts, store } = options;
  const logger = options.logger ?? silentLogger;

  const loginId = await prompts.askLogin();
  const session = await prepareSession({ loginId, store, prompts, logger });
  const engine = new TurnEngine(session, { random: options.random, logger });
  const outcome = await runGame({ engine, player: prompts, store, logger });
  logger.info({ login: loginId, outcome }, 'game finished');
  return outcome;
}

export async function main(env: NodeJS.ProcessEnv = process.env): Promise<TerminalPhase> {
  const config = loadCliConfig(env);
  const logger = createLogger({ level: config.LOG_LEVEL }, destination(2));
  const io = openReadline();
  const prompts = new TerminalPrompts(io.ask, (line) => {
    process.stdout.write(`${line}\n`);
  });

  try {
    return await play({
      prompts,
      store: new FileSessionStore(config.LABYRINTH_SAVE_FILE, { logger }),
      random: config.LABYRINTH_SEED === undefined ? undefined : createSeededRandom(config.LABYRINTH_SEED),
      logger
    });
  } finally {
    io.close();
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
}
