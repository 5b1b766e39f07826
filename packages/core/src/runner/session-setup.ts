import { standardLayout, standardRules } from '@labyrinth/data';
import type { GameRules, LabyrinthLayout } from '@labyrinth/data';

import type { Logger } from '../logging.js';
import { silentLogger } from '../logging.js';
import type { SessionStore } from '../persistence/session-store.js';
import { hydrateSession, parseSessionSnapshot } from '../persistence/snapshot.js';
import type { SessionSnapshot } from '../persistence/snapshot.js';
import { createGameSession } from '../simulation/game-state.js';
import { addHeroToRoster, validateHeroCount } from '../simulation/roster.js';
import type { GameSession, HeroState } from '../simulation/types.js';

/** Answers are pre-parsed by the front end; an unparseable count arrives as NaN. */
export interface SetupInterface {
  confirmResume(loginId: string): Promise<boolean>;
  askHeroCount(maxHeroes: number): Promise<number>;
  askHeroName(position: number): Promise<string>;
  announce(message: string): void;
}

export interface PrepareSessionOptions {
  loginId: string;
  store: SessionStore;
  prompts: SetupInterface;
  layout?: LabyrinthLayout;
  rules?: GameRules;
  logger?: Logger;
}

export async function collectRoster(
  prompts: SetupInterface,
  layout: LabyrinthLayout = standardLayout,
  rules: GameRules = standardRules
): Promise<string[]> {
  let count = await prompts.askHeroCount(rules.maxHeroes);
  let check = validateHeroCount(count, rules);
  while (!check.success) {
    prompts.announce(check.error ?? 'Invalid hero count');
    count = await prompts.askHeroCount(rules.maxHeroes);
    check = validateHeroCount(count, rules);
  }

  const roster: HeroState[] = [];
  while (roster.length < count) {
    const result = addHeroToRoster(roster, await prompts.askHeroName(roster.length + 1), layout, rules);
    if (!result.success) {
      prompts.announce(result.error ?? 'Invalid hero name');
    }
  }
  return roster.map((hero) => hero.name);
}

async function loadSave(loginId: string, store: SessionStore, logger: Logger): Promise<SessionSnapshot | undefined> {
  try {
    return await store.loadSessionFor(loginId);
  } catch (error) {
    logger.warn({ err: error, login: loginId }, 'loading the saved session failed');
    return undefined;
  }
}

async function discardSave(loginId: string, store: SessionStore, prompts: SetupInterface, logger: Logger) {
  try {
    await store.deleteSessionFor(loginId);
    logger.info({ login: loginId }, 'saved session discarded');
  } catch (error) {
    logger.warn({ err: error, login: loginId }, 'discarding the saved session failed');
    prompts.announce('The old save could not be deleted');
  }
}

/**
 * Offers to resume a stored session; declining deletes it. Without a usable
 * save a new roster is collected.
 */
export async function prepareSession(options: PrepareSessionOptions): Promise<GameSession> {
  const { loginId, store, prompts } = options;
  const layout = options.layout ?? standardLayout;
  const rules = options.rules ?? standardRules;
  const logger = options.logger ?? silentLogger;

  const stored = await loadSave(loginId, store, logger);
  const snapshot = stored ? parseSessionSnapshot(stored, { layout, rules }) : undefined;
  if (snapshot) {
    if (await prompts.confirmResume(loginId)) {
      logger.info({ login: loginId, round: snapshot.round }, 'resuming saved session');
      return hydrateSession(snapshot, { playerLogin: loginId, layout, rules });
    }
    await discardSave(loginId, store, prompts, logger);
  } else if (stored) {
    logger.warn({ login: loginId }, 'saved session does not fit this labyrinth; starting a new game');
  } else {
    logger.info({ login: loginId }, 'no saved session');
  }

  const heroNames = await collectRoster(prompts, layout, rules);
  logger.info({ login: loginId, heroes: heroNames }, 'new session created');
  return createGameSession({ playerLogin: loginId, heroNames, layout, rules });
}
