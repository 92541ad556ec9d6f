/**
 * Text, entity and menu matchers for the three encounter grammars
 *
 * Each matcher is a pure function from a signal to an optional transition.
 * Text matchers are tried in a fixed order and the first hit wins.
 */
import { PhaseTransition, Position } from '../spec/types';
import {
  DEATH_CHARGE_RESTORE,
  DELVE_BOSS_NAME_MARKER,
  SURGE_POTION_RESTORE,
  VERZIK_FIGHT_START_NPC_ID,
  VERZIK_ZONE,
} from '../spec/constants';

// ============================================================================
// Patterns
// ============================================================================

export const WAVE_COMPLETED_PATTERN = /^Wave (1[0-2]|[1-9]) completed!.*/;
export const WAVE_START_PATTERN = /^Wave: (1[0-2]|[1-9])$/;
export const CLAIM_REWARDS_MESSAGE = 'Search the chest nearby';

export const DELVE_COMPLETED_PATTERN = /^Delve level: (\d+) duration:.*/;

export const ROOM_COMPLETED_PATTERN = /^Wave '(.*)' \(.*\) complete!.*/;
export const RAID_COMPLETED_PATTERN = /^Theatre of Blood total completion time:.*/;

export const SURGE_POTION_MESSAGE = 'You drink some of your surge potion.';
export const DEATH_CHARGE_MESSAGE = 'Some of your special attack energy has been restored';
export const SURGE_COOLDOWN_EXPIRED_MESSAGE =
  'You now feel capable of drinking another dose of surge potion.';

export const BEGIN_ROOM_OPTION = "Yes, let's begin";
export const CONTINUE_OPTION = 'Continue';

const TAG_PATTERN = /<[^>]*>/g;

/**
 * Remove client markup such as `<col=ff3045>` from a chat line
 */
export function stripTags(message: string): string {
  return message.replace(TAG_PATTERN, '');
}

// ============================================================================
// Text Matchers
// ============================================================================

export type TextMatcher = (message: string) => PhaseTransition | null;

export interface NamedTextMatcher {
  name: string;
  match: TextMatcher;
}

export const TEXT_MATCHERS: readonly NamedTextMatcher[] = [
  // Colosseum
  {
    name: 'wave_completed',
    match: (message) => {
      const m = WAVE_COMPLETED_PATTERN.exec(message);
      return m ? { kind: 'wave_completed', wave: parseInt(m[1], 10) } : null;
    },
  },
  {
    name: 'wave_started',
    match: (message) => {
      const m = WAVE_START_PATTERN.exec(message);
      return m ? { kind: 'wave_started', wave: parseInt(m[1], 10) } : null;
    },
  },
  {
    name: 'rewards_claimed',
    match: (message) => (message.includes(CLAIM_REWARDS_MESSAGE) ? { kind: 'rewards_claimed' } : null),
  },
  // Delves
  {
    name: 'delve_completed',
    match: (message) => {
      const m = DELVE_COMPLETED_PATTERN.exec(message);
      return m ? { kind: 'delve_completed', level: parseInt(m[1], 10) } : null;
    },
  },
  // Raid
  {
    name: 'room_completed',
    match: (message) => {
      const m = ROOM_COMPLETED_PATTERN.exec(message);
      return m ? { kind: 'room_completed', room: m[1] } : null;
    },
  },
  {
    name: 'raid_completed',
    match: (message) => (RAID_COMPLETED_PATTERN.test(message) ? { kind: 'raid_completed' } : null),
  },
  // Restores
  {
    name: 'surge_potion',
    match: (message) =>
      message === SURGE_POTION_MESSAGE
        ? { kind: 'energy_restored', source: 'surge_potion', expectedDelta: SURGE_POTION_RESTORE }
        : null,
  },
  {
    name: 'death_charge',
    match: (message) =>
      message.includes(DEATH_CHARGE_MESSAGE)
        ? { kind: 'energy_restored', source: 'death_charge', expectedDelta: DEATH_CHARGE_RESTORE }
        : null,
  },
  {
    name: 'cooldown_expired',
    match: (message) => (message === SURGE_COOLDOWN_EXPIRED_MESSAGE ? { kind: 'cooldown_expired' } : null),
  },
];

/**
 * Classify a chat line. Unrecognised text yields null.
 */
export function matchText(rawMessage: string): PhaseTransition | null {
  const message = stripTags(rawMessage);
  for (const matcher of TEXT_MATCHERS) {
    const transition = matcher.match(message);
    if (transition) {
      return transition;
    }
  }
  return null;
}

// ============================================================================
// Entity Matchers
// ============================================================================

export function matchDelveBossSpawn(name: string | null): PhaseTransition | null {
  if (name !== null && name.includes(DELVE_BOSS_NAME_MARKER)) {
    return { kind: 'delve_boss_spawned' };
  }
  return null;
}

export function matchFightStartSpawn(id: number): PhaseTransition | null {
  return id === VERZIK_FIGHT_START_NPC_ID ? { kind: 'room_entered', via: 'npc' } : null;
}

// ============================================================================
// Menu Matchers
// ============================================================================

/**
 * Dialogue confirmations that start a raid room fight. Barrier rooms ask
 * "Yes, let's begin."; the last room only has "Continue" after the boss
 * dialogue.
 */
export function matchMenuOption(
  option: string | null,
  currentZoneId: Position['zoneId'] | null,
): PhaseTransition | null {
  if (option === null) {
    return null;
  }
  if (option.includes(BEGIN_ROOM_OPTION)) {
    return { kind: 'room_entered', via: 'dialogue' };
  }
  if (option === CONTINUE_OPTION && currentZoneId === VERZIK_ZONE) {
    return { kind: 'room_entered', via: 'dialogue' };
  }
  return null;
}
