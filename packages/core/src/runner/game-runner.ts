import type { Logger } from '../logging.js';
import { silentLogger } from '../logging.js';
import type { SessionStore } from '../persistence/session-store.js';
import { describeEvent } from '../simulation/narration.js';
import { isTerminalPhase, TurnEngine } from '../simulation/systems/turn-engine.js';
import type { ActionResult } from '../simulation/systems/turn-engine.js';
import type { ActionChoice, Direction, HeroState, TerminalPhase } from '../simulation/types.js';

/**
 * Decisions the turn loop suspends on. `chooseDirection` resolves undefined
 * when the player backs out of moving.
 */
export interface PlayerInterface {
  chooseAction(hero: HeroState, choices: ReadonlyArray<ActionChoice>): Promise<ActionChoice>;
  chooseDirection(hero: HeroState): Promise<Direction | undefined>;
  confirmRetreat(hero: HeroState): Promise<boolean>;
  announce(message: string): void;
}

export interface RunGameOptions {
  engine: TurnEngine;
  player: PlayerInterface;
  store: SessionStore;
  logger?: Logger;
}

function report(player: PlayerInterface, result: ActionResult) {
  for (const event of result.events) {
    player.announce(describeEvent(event));
  }
  if (!result.success && result.error && !result.confirmationRequired) {
    player.announce(result.error);
  }
}

async function takeMove(engine: TurnEngine, player: PlayerInterface, hero: HeroState): Promise<ActionResult | undefined> {
  const direction = await player.chooseDirection(hero);
  if (!direction) {
    player.announce(`${hero.name} stays put`);
    return undefined;
  }
  const attempt = engine.perform({ kind: 'move', direction });
  if (attempt.confirmationRequired !== 'retreat') {
    return attempt;
  }
  const confirmed = await player.confirmRetreat(hero);
  return engine.perform({ kind: 'move', direction, confirmRetreat: confirmed });
}

/**
 * Drives the engine until it reaches a terminal phase. Save failures are
 * reported to the player and play continues.
 */
export async function runGame(options: RunGameOptions): Promise<TerminalPhase> {
  const { engine, player, store } = options;
  const logger = options.logger ?? silentLogger;

  if (engine.phase.kind === 'not-started') {
    report(player, engine.begin());
  }

  while (true) {
    const phase = engine.phase;
    if (isTerminalPhase(phase)) {
      return phase;
    }
    const hero = engine.activeHero;
    if (!hero) {
      throw new Error(`Turn engine stalled in phase ${phase.kind}`);
    }

    const choice = await player.chooseAction(hero, engine.availableActions());
    const result = choice.kind === 'move' ? await takeMove(engine, player, hero) : engine.perform(choice);
    if (!result) continue;
    report(player, result);

    if (result.snapshot) {
      const { playerLogin } = engine.session;
      try {
        await store.saveSessionFor(playerLogin, result.snapshot);
        player.announce('Game saved');
      } catch (error) {
        logger.error({ err: error, login: playerLogin }, 'saving the session failed');
        player.announce('The game could not be saved');
      }
    }
  }
}
