import type { ActionChoice, Direction, GameEvent } from './types.js';
import { formatCoordinate } from './utils/grid.js';

export const directionLabels: Readonly<Record<Direction, string>> = {
  up: 'Up',
  down: 'Down',
  left: 'Left',
  right: 'Right'
};

export function describeChoice(choice: ActionChoice): string {
  switch (choice.kind) {
    case 'attack':
      return `Attack ${choice.target} with the sword`;
    case 'pick-up-key':
      return 'Pick up the key';
    case 'heal-at-station':
      return 'Restore health at the heart';
    case 'move':
      return 'Move hero';
    case 'self-heal':
      return 'Self-heal';
    case 'save-game':
      return 'Save game';
    case 'quit':
      return 'Quit game';
  }
}

export function describeEvent(event: GameEvent): string {
  switch (event.kind) {
    case 'round:started':
      return `Round ${event.round} begins. Fire in cells: ${event.hazards.map(formatCoordinate).join(', ')}`;
    case 'hero:moved':
      return `${event.hero} moved to ${formatCoordinate(event.to)}`;
    case 'hero:collided':
      return `${event.hero} ran into a wall and lost a life (${event.remainingHealth} left)`;
    case 'hero:burned':
      return `${event.hero} stepped into fire at ${formatCoordinate(event.at)} (${event.remainingHealth} left)`;
    case 'hero:retreated':
      return `${event.hero} turned back in fear and perished`;
    case 'hero:attacked':
      return `${event.attacker} struck ${event.target} with the sword (${event.targetRemainingHealth} left)`;
    case 'hero:key-picked':
      return `${event.hero} picked up the key`;
    case 'hero:healed':
      return event.source === 'station'
        ? `${event.hero} restored full health at the heart (${event.health})`
        : `${event.hero} patched up their wounds (${event.health})`;
    case 'hero:golem-slain':
      return `${event.hero} had no key for the golem and was slain`;
    case 'hero:eliminated':
      return `${event.hero} has fallen at ${formatCoordinate(event.at)}`;
    case 'key:dropped':
      return `The key fell from ${event.hero} at ${formatCoordinate(event.at)}`;
    case 'turn:advanced':
      return `${event.hero}'s turn`;
    case 'game:victory':
      return `${event.hero} handed the key to the golem and escaped the labyrinth. Victory!`;
    case 'game:all-dead':
      return 'All heroes have died. Nobody won.';
    case 'game:quit':
      return 'Game ended by the player';
  }
}
