import type { Logger } from '../../logging.js';
import { silentLogger } from '../../logging.js';
import { serializeSession } from '../../persistence/snapshot.js';
import type { SessionSnapshot } from '../../persistence/snapshot.js';
import {
  attack,
  healAtStation,
  isAtHeart,
  isAtKey,
  move,
  pickUpKey,
  selfHeal
} from '../heroes/hero-actions.js';
import type {
  ActionChoice,
  GameEvent,
  GameSession,
  HeroAction,
  HeroState,
  TerminalPhase,
  TurnPhase
} from '../types.js';
import { sameCoordinate } from '../utils/grid.js';
import type { RandomSource } from '../utils/random.js';
import { describeRound, startRound } from './round-lifecycle.js';

export interface TurnEngineOptions {
  random?: RandomSource;
  logger?: Logger;
}

export interface ActionResult {
  success: boolean;
  turnConsumed: boolean;
  events: GameEvent[];
  phase: TurnPhase;
  error?: string;
  confirmationRequired?: 'retreat';
  snapshot?: SessionSnapshot;
}

const staticChoices: ReadonlyArray<ActionChoice> = [
  { kind: 'move' },
  { kind: 'self-heal' },
  { kind: 'save-game' },
  { kind: 'quit' }
];

export function isTerminalPhase(phase: TurnPhase): phase is TerminalPhase {
  return phase.kind === 'victory' || phase.kind === 'all-heroes-dead' || phase.kind === 'quit';
}

/**
 * Single authority over whose turn it is, which actions are legal and what
 * they do to the session. Never performs I/O: saving hands back a snapshot.
 */
export class TurnEngine {
  #session: GameSession;
  #random: RandomSource;
  #logger: Logger;
  #phase: TurnPhase = { kind: 'not-started' };

  constructor(session: GameSession, options: TurnEngineOptions = {}) {
    this.#session = session;
    this.#random = options.random ?? Math.random;
    this.#logger = (options.logger ?? silentLogger).child({ session: session.id });
  }

  get session(): GameSession {
    return this.#session;
  }

  get phase(): TurnPhase {
    return this.#phase;
  }

  get activeHero(): HeroState | undefined {
    if (this.#phase.kind !== 'awaiting-action') return undefined;
    return this.#session.heroes[this.#session.turnIndex];
  }

  isFinished(): boolean {
    return isTerminalPhase(this.#phase);
  }

  /**
   * Enters the turn loop. A session that has never started a round gets
   * round 1 (and its hazards) before anyone acts.
   */
  begin(): ActionResult {
    if (this.#phase.kind !== 'not-started') {
      return this.#reject('Turn engine already started');
    }
    const events: GameEvent[] = [];
    const session = this.#session;
    if (session.turnIndex >= session.heroes.length) {
      session.turnIndex = 0;
    }
    if (session.round === 0 && session.heroes.length > 0) {
      events.push(this.#startRound());
    }
    events.push(...this.#settleTurnStart());
    return this.#record({ success: true, turnConsumed: false, events });
  }

  availableActions(): ActionChoice[] {
    const hero = this.activeHero;
    if (!hero) return [];
    const { labyrinth } = this.#session;

    const contextual: ActionChoice[] = this.#colocatedRivals(hero).map((rival) => ({
      kind: 'attack',
      target: rival.name
    }));
    if (isAtKey(hero, labyrinth)) {
      contextual.push({ kind: 'pick-up-key' });
    }
    if (isAtHeart(hero, labyrinth)) {
      contextual.push({ kind: 'heal-at-station' });
    }
    return [...contextual, ...staticChoices];
  }

  perform(action: HeroAction): ActionResult {
    const hero = this.activeHero;
    if (!hero) {
      return this.#reject(`No hero is awaiting an action (phase: ${this.#phase.kind})`);
    }
    const session = this.#session;
    const context = { labyrinth: session.labyrinth, rules: session.rules };

    switch (action.kind) {
      case 'quit': {
        this.#phase = { kind: 'quit', hero: hero.name };
        return this.#record({ success: true, turnConsumed: false, events: [{ kind: 'game:quit', hero: hero.name }] });
      }
      case 'save-game': {
        this.#logger.info({ round: session.round, turnIndex: session.turnIndex }, 'session snapshot taken');
        return { success: true, turnConsumed: false, events: [], phase: this.#phase, snapshot: serializeSession(session) };
      }
      case 'attack': {
        const target = this.#colocatedRivals(hero).find((rival) => rival.name === action.target);
        if (!target) {
          return this.#reject(`${action.target} is not here to attack`);
        }
        return this.#completeTurn(hero, attack(hero, target, session.rules).events);
      }
      case 'pick-up-key': {
        const outcome = pickUpKey(hero, session.labyrinth);
        return outcome.applied ? this.#completeTurn(hero, outcome.events) : this.#reject(outcome.reason);
      }
      case 'heal-at-station': {
        const outcome = healAtStation(hero, context);
        return outcome.applied ? this.#completeTurn(hero, outcome.events) : this.#reject(outcome.reason);
      }
      case 'self-heal': {
        const outcome = selfHeal(hero, session.rules);
        return outcome.applied ? this.#completeTurn(hero, outcome.events) : this.#reject(outcome.reason);
      }
      case 'move': {
        const resolution = move(hero, action.direction, context, action.confirmRetreat);
        if (resolution.outcome === 'retreat-pending') {
          return { ...this.#reject(`${hero.name} would retreat to the previous cell`), confirmationRequired: 'retreat' };
        }
        if (resolution.outcome === 'retreat-declined') {
          return this.#reject('Retreat declined');
        }
        if (resolution.golem === 'passed') {
          this.#phase = { kind: 'victory', hero: hero.name };
          return this.#record({ success: true, turnConsumed: true, events: resolution.events });
        }
        return this.#completeTurn(hero, resolution.events);
      }
    }
  }

  #colocatedRivals(hero: HeroState): HeroState[] {
    return this.#session.heroes.filter(
      (other) => other.name !== hero.name && other.health > 0 && sameCoordinate(other.position, hero.position)
    );
  }

  #startRound(): GameEvent {
    const event = startRound(this.#session, this.#random);
    this.#logger.info(describeRound(this.#session), 'round started');
    return event;
  }

  /** Removes a dead hero, drops its key where it fell and keeps the turn index on the same upcoming hero. */
  #eliminate(hero: HeroState): GameEvent[] {
    const session = this.#session;
    const index = session.heroes.indexOf(hero);
    if (index < 0) return [];
    session.heroes.splice(index, 1);
    if (index < session.turnIndex) {
      session.turnIndex -= 1;
    }

    const events: GameEvent[] = [{ kind: 'hero:eliminated', hero: hero.name, at: { ...hero.position } }];
    if (hero.hasKey) {
      hero.hasKey = false;
      session.labyrinth.keyPresent = true;
      session.labyrinth.keyCoordinate = { ...hero.position };
      events.push({ kind: 'key:dropped', hero: hero.name, at: { ...hero.position } });
    }
    return events;
  }

  #completeTurn(hero: HeroState, actionEvents: GameEvent[]): ActionResult {
    const session = this.#session;
    const events = [...actionEvents];

    for (const other of session.heroes.filter((candidate) => candidate !== hero && candidate.health <= 0)) {
      events.push(...this.#eliminate(other));
    }

    let wrapped: boolean;
    if (hero.health <= 0) {
      events.push(...this.#eliminate(hero));
      wrapped = session.turnIndex >= session.heroes.length;
    } else {
      session.turnIndex = (session.turnIndex + 1) % session.heroes.length;
      wrapped = session.turnIndex === 0;
    }

    if (wrapped) {
      session.turnIndex = 0;
      if (session.heroes.length > 0) {
        events.push(this.#startRound());
      }
    }

    events.push(...this.#settleTurnStart());
    return this.#record({ success: true, turnConsumed: true, events });
  }

  /**
   * Resolves the next live hero to act, sweeping out anyone who starts their
   * turn already dead, or ends the game when nobody is left.
   */
  #settleTurnStart(): GameEvent[] {
    const session = this.#session;
    const events: GameEvent[] = [];

    while (session.heroes.length > 0) {
      const candidate = session.heroes[session.turnIndex];
      if (candidate.health > 0) {
        this.#phase = { kind: 'awaiting-action', hero: candidate.name };
        events.push({ kind: 'turn:advanced', hero: candidate.name, turnIndex: session.turnIndex });
        return events;
      }
      events.push(...this.#eliminate(candidate));
      if (session.turnIndex >= session.heroes.length) {
        session.turnIndex = 0;
        if (session.heroes.length > 0) {
          events.push(this.#startRound());
        }
      }
    }

    session.turnIndex = 0;
    this.#phase = { kind: 'all-heroes-dead' };
    events.push({ kind: 'game:all-dead' });
    return events;
  }

  // Round starts are already on the timeline and logged by #startRound
  #record(result: Omit<ActionResult, 'phase'>): ActionResult {
    for (const event of result.events) {
      if (event.kind === 'round:started') continue;
      this.#session.timeline.push(event);
      this.#logger.info({ event }, event.kind);
    }
    return { ...result, phase: this.#phase };
  }

  #reject(error = 'Action not applicable'): ActionResult {
    this.#logger.debug({ error }, 'action rejected');
    return { success: false, turnConsumed: false, events: [], phase: this.#phase, error };
  }
}
