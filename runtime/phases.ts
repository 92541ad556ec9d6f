/**
 * Encounter phase tracking
 *
 * Colosseum waves and delves freeze the regen timer between segments. Raid
 * rooms only freeze the surge cooldown, via `secondaryZonePaused`. Every
 * change to either pause flag goes through `withPhase`, which re-syncs the
 * cooldown.
 */
import { PhaseState, PhaseTransition, Position, RaidStatusEvent, SessionState } from '../spec/types';
import {
  DELVE_RESEED_OFFSET_TICKS,
  RAID_INSIDE_VARBIT_VALUES,
  SURGE_COOLDOWN_MS,
} from '../spec/constants';
import { clearCooldown, startCooldown, syncPauseState } from './cooldown';
import { openIgnoreWindow, reseed } from './timers';
import { isBossRoomZone, isOnBarrier, isZoneEntryRoom } from './zones';

export function createPhaseState(): PhaseState {
  return {
    encounterPaused: false,
    secondaryZonePaused: false,
    insideRaid: false,
    currentZoneId: null,
    segmentEntryArmed: false,
  };
}

export function shouldPauseCooldown(phase: PhaseState): boolean {
  return phase.encounterPaused || phase.secondaryZonePaused;
}

/**
 * Replace the phase and bring the cooldown in line with it
 */
export function withPhase(state: SessionState, phase: PhaseState, nowMs: number): SessionState {
  return {
    ...state,
    phase,
    cooldown: syncPauseState(state.cooldown, shouldPauseCooldown(phase), nowMs),
  };
}

// ============================================================================
// Transitions
// ============================================================================

export function applyPhaseTransition(
  state: SessionState,
  transition: PhaseTransition,
  nowMs: number,
): SessionState {
  const { phase, timer } = state;

  switch (transition.kind) {
    case 'wave_completed':
    case 'delve_completed':
      return withPhase(state, { ...phase, encounterPaused: true }, nowMs);

    case 'wave_started':
      return withPhase(
        { ...state, timer: reseed(timer) },
        { ...phase, encounterPaused: false },
        nowMs,
      );

    case 'rewards_claimed':
      return withPhase(state, { ...phase, encounterPaused: false }, nowMs);

    case 'delve_boss_spawned':
      return withPhase(
        { ...state, timer: reseed(timer, DELVE_RESEED_OFFSET_TICKS) },
        { ...phase, encounterPaused: false },
        nowMs,
      );

    case 'room_completed':
      // Entry stays disarmed until a new zone shows up, so standing past
      // this room's barrier doesn't resume the cooldown again
      return withPhase(state, { ...phase, insideRaid: true, secondaryZonePaused: true }, nowMs);

    case 'raid_completed':
      return withPhase(state, { ...phase, secondaryZonePaused: false }, nowMs);

    case 'room_entered':
      return withPhase(
        state,
        { ...phase, secondaryZonePaused: false, segmentEntryArmed: false },
        nowMs,
      );

    case 'energy_restored': {
      const withWindow: SessionState = {
        ...state,
        timer: openIgnoreWindow(timer, state.lastTickIndex ?? 0, transition.expectedDelta),
      };
      if (transition.source !== 'surge_potion') {
        return withWindow;
      }
      return {
        ...withWindow,
        cooldown: startCooldown(SURGE_COOLDOWN_MS, shouldPauseCooldown(phase), nowMs),
      };
    }

    case 'cooldown_expired':
      return { ...state, cooldown: clearCooldown() };
  }
}

// ============================================================================
// Raid Status
// ============================================================================

/**
 * Build a raid status signal from the client's raid varbit
 */
export function raidStatusFromVarbit(value: number, zoneId?: number | null): RaidStatusEvent {
  return { type: 'raid_status', inside: RAID_INSIDE_VARBIT_VALUES.has(value), zoneId };
}

/**
 * React to the raid mode flag. Only edges matter; repeating the current
 * value changes nothing.
 */
export function applyRaidStatus(
  state: SessionState,
  inside: boolean,
  zoneId: number | null,
  nowMs: number,
): SessionState {
  const { phase } = state;
  if (inside === phase.insideRaid) {
    return state;
  }

  if (!inside) {
    return withPhase(state, { ...phase, insideRaid: false, secondaryZonePaused: false }, nowMs);
  }

  // Joining mid-fight keeps the cooldown running; the lobby and hallways pause it
  const zone = zoneId ?? phase.currentZoneId;
  return withPhase(
    state,
    { ...phase, insideRaid: true, secondaryZonePaused: !isBossRoomZone(zone) },
    nowMs,
  );
}

// ============================================================================
// Room Entry
// ============================================================================

export type RoomEntry = 'zone' | 'barrier' | null;

/**
 * Per-tick zone bookkeeping. Returns the updated phase and how a room was
 * entered this tick, if it was.
 */
export function detectRoomEntry(
  phase: PhaseState,
  position: Position | null,
): { phase: PhaseState; entry: RoomEntry } {
  if (position === null) {
    return { phase, entry: null };
  }

  let next = phase;

  if (position.zoneId !== phase.currentZoneId) {
    next = { ...next, currentZoneId: position.zoneId, segmentEntryArmed: true };

    if (next.secondaryZonePaused && isZoneEntryRoom(position.zoneId)) {
      return {
        phase: { ...next, secondaryZonePaused: false, segmentEntryArmed: false },
        entry: 'zone',
      };
    }
  }

  if (next.secondaryZonePaused && next.segmentEntryArmed && isOnBarrier(position)) {
    return {
      phase: { ...next, secondaryZonePaused: false, segmentEntryArmed: false },
      entry: 'barrier',
    };
  }

  return { phase: next, entry: null };
}
