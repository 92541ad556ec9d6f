/**
 * Surge potion cooldown: wall-clock countdown that freezes while the
 * encounter is between segments
 */
import { CooldownState } from '../spec/types';

export function createCooldownState(): CooldownState {
  return { endTimestamp: null, pausedRemaining: null };
}

/**
 * Begin a new cooldown. Overwrites any cooldown already running.
 */
export function startCooldown(
  durationMs: number,
  pausedAtStart: boolean,
  nowMs: number,
): CooldownState {
  const duration = Math.max(0, durationMs);
  if (pausedAtStart) {
    return { endTimestamp: null, pausedRemaining: duration };
  }
  return { endTimestamp: nowMs + duration, pausedRemaining: null };
}

export function clearCooldown(): CooldownState {
  return createCooldownState();
}

export function cooldownRemaining(cooldown: CooldownState, nowMs: number): number {
  if (cooldown.pausedRemaining !== null) {
    return cooldown.pausedRemaining;
  }
  if (cooldown.endTimestamp !== null) {
    return Math.max(0, cooldown.endTimestamp - nowMs);
  }
  return 0;
}

export function isCooldownPaused(cooldown: CooldownState): boolean {
  return cooldown.pausedRemaining !== null;
}

export function isCooldownActive(cooldown: CooldownState): boolean {
  return cooldown.endTimestamp !== null || cooldown.pausedRemaining !== null;
}

/**
 * Move between running and paused. Pausing snapshots the time left;
 * resuming projects it forward from now.
 */
export function syncPauseState(
  cooldown: CooldownState,
  shouldBePaused: boolean,
  nowMs: number,
): CooldownState {
  if (shouldBePaused && !isCooldownPaused(cooldown) && cooldown.endTimestamp !== null) {
    return {
      endTimestamp: null,
      pausedRemaining: Math.max(0, cooldown.endTimestamp - nowMs),
    };
  }

  if (!shouldBePaused && cooldown.pausedRemaining !== null) {
    return {
      endTimestamp: nowMs + cooldown.pausedRemaining,
      pausedRemaining: null,
    };
  }

  return cooldown;
}
