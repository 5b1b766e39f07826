import type { Direction, GameEvent, GameRules, HeroState, LabyrinthState } from '../types.js';
import { cellCode, containsCoordinate, isPassable, sameCoordinate, stepInDirection } from '../utils/grid.js';

export interface HeroActionContext {
  labyrinth: LabyrinthState;
  rules: GameRules;
}

export interface ActionApplication {
  applied: boolean;
  events: GameEvent[];
  reason?: string;
}

export type MoveOutcome = 'collided' | 'retreat-pending' | 'retreat-declined' | 'retreated' | 'moved';

export interface MoveResolution {
  outcome: MoveOutcome;
  events: GameEvent[];
  golem?: 'passed' | 'slain';
}

const notApplied = (reason: string): ActionApplication => ({ applied: false, events: [], reason });

export function isAtKey(hero: HeroState, labyrinth: LabyrinthState): boolean {
  return labyrinth.keyPresent && sameCoordinate(hero.position, labyrinth.keyCoordinate);
}

export function isAtHeart(hero: HeroState, labyrinth: LabyrinthState): boolean {
  return containsCoordinate(labyrinth.heartCoordinates, hero.position);
}

export function attack(attacker: HeroState, target: HeroState, rules: GameRules): ActionApplication {
  target.health -= rules.attackDamage;
  return {
    applied: true,
    events: [
      {
        kind: 'hero:attacked',
        attacker: attacker.name,
        target: target.name,
        targetRemainingHealth: target.health
      }
    ]
  };
}

export function pickUpKey(hero: HeroState, labyrinth: LabyrinthState): ActionApplication {
  if (!isAtKey(hero, labyrinth)) {
    return notApplied('There is no key here');
  }
  hero.hasKey = true;
  labyrinth.keyPresent = false;
  return { applied: true, events: [{ kind: 'hero:key-picked', hero: hero.name, at: { ...hero.position } }] };
}

export function healAtStation(hero: HeroState, context: HeroActionContext): ActionApplication {
  if (!isAtHeart(hero, context.labyrinth)) {
    return notApplied('There is no heart here');
  }
  if (hero.health >= context.rules.maxHealth) {
    return notApplied(`${hero.name} is already at full health`);
  }
  hero.health = context.rules.maxHealth;
  return {
    applied: true,
    events: [{ kind: 'hero:healed', hero: hero.name, source: 'station', health: hero.health }]
  };
}

export function selfHeal(hero: HeroState, rules: GameRules): ActionApplication {
  if (hero.remainingSelfHeals <= 0) {
    return notApplied(`${hero.name} has no self-heals left`);
  }
  if (hero.health >= rules.maxHealth) {
    return notApplied(`${hero.name} is already at full health`);
  }
  hero.health += 1;
  hero.remainingSelfHeals -= 1;
  return {
    applied: true,
    events: [{ kind: 'hero:healed', hero: hero.name, source: 'self', health: hero.health }]
  };
}

/**
 * Steps the hero one cell. Stepping back onto the recorded previous cell while
 * standing on plain floor is a retreat and needs `confirmRetreat`; leaving it
 * undefined reports `retreat-pending` without touching the hero.
 */
export function move(
  hero: HeroState,
  direction: Direction,
  context: HeroActionContext,
  confirmRetreat?: boolean
): MoveResolution {
  const { labyrinth, rules } = context;
  const from = { ...hero.position };
  const target = stepInDirection(from, direction);

  if (!isPassable(labyrinth, target)) {
    hero.health -= rules.collisionDamage;
    return {
      outcome: 'collided',
      events: [{ kind: 'hero:collided', hero: hero.name, at: from, remainingHealth: hero.health }]
    };
  }

  const departsPlainFloor = cellCode(labyrinth, from) === 1;
  if (departsPlainFloor && sameCoordinate(target, hero.previousPosition)) {
    if (confirmRetreat === undefined) {
      return { outcome: 'retreat-pending', events: [] };
    }
    if (!confirmRetreat) {
      return { outcome: 'retreat-declined', events: [] };
    }
    hero.health = 0;
    return { outcome: 'retreated', events: [{ kind: 'hero:retreated', hero: hero.name, at: from }] };
  }

  if (departsPlainFloor) {
    hero.previousPosition = from;
  }
  hero.position = target;
  const events: GameEvent[] = [{ kind: 'hero:moved', hero: hero.name, from, to: { ...target } }];

  if (containsCoordinate(labyrinth.hazards, target)) {
    hero.health -= rules.hazardDamage;
    events.push({ kind: 'hero:burned', hero: hero.name, at: { ...target }, remainingHealth: hero.health });
  }

  if (sameCoordinate(target, labyrinth.golemCoordinate)) {
    if (hero.hasKey) {
      events.push({ kind: 'game:victory', hero: hero.name });
      return { outcome: 'moved', events, golem: 'passed' };
    }
    hero.health = 0;
    events.push({ kind: 'hero:golem-slain', hero: hero.name });
    return { outcome: 'moved', events, golem: 'slain' };
  }

  return { outcome: 'moved', events };
}
