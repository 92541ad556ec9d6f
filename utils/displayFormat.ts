/**
 * Display Format Utility
 * Text labels and visibility rules for the regen and cooldown timers
 */

import { TICK_MS } from '../spec/constants';
import type { DisplayConfig, DisplayFormat } from '../spec/schema';
import type { TrackerSnapshot } from '../spec/types';

export interface TimerLabel {
  text: string;
  visible: boolean;
  /** Cooldown only: shown in the paused colour */
  paused: boolean;
}

/**
 * A full cycle reads as 0 so the label never flashes the cadence length
 */
export function displayTicks(ticksUntilRegen: number, maxRegenCadence: number): number {
  return ticksUntilRegen === maxRegenCadence ? 0 : ticksUntilRegen;
}

export function formatRegen(
  ticksUntilRegen: number,
  maxRegenCadence: number,
  format: DisplayFormat
): string {
  const ticks = displayTicks(ticksUntilRegen, maxRegenCadence);
  const ms = ticks * TICK_MS;

  switch (format) {
    case 'seconds':
      // Rounded up so the number never hits 0 before the regen does
      return String(Math.ceil(ms / 1000));
    case 'decimals':
      return `${(ms / 1000).toFixed(1)}s`;
    case 'ticks':
    default:
      return String(ticks);
  }
}

export function formatCooldown(remainingMs: number, format: DisplayFormat): string {
  const ms = Math.max(0, remainingMs);

  switch (format) {
    case 'seconds': {
      const totalSeconds = Math.floor(ms / 1000);
      const minutes = Math.floor(totalSeconds / 60);
      const seconds = totalSeconds % 60;
      return `${minutes}:${String(seconds).padStart(2, '0')}`;
    }
    case 'decimals': {
      const totalSeconds = ms / 1000;
      const minutes = Math.floor(totalSeconds / 60);
      const seconds = totalSeconds % 60;
      return `${minutes}:${seconds.toFixed(1).padStart(4, '0')}`;
    }
    case 'ticks':
    default:
      return String(Math.floor(ms / TICK_MS));
  }
}

/**
 * Fraction of the current cycle already elapsed, for circular indicators
 */
export function regenProgress(ticksUntilRegen: number, maxRegenCadence: number): number {
  if (maxRegenCadence <= 0) {
    return 0;
  }
  const progress = 1 - ticksUntilRegen / maxRegenCadence;
  return Math.min(1, Math.max(0, progress));
}

export function regenLabel(snapshot: TrackerSnapshot, display: DisplayConfig): TimerLabel {
  return {
    text: formatRegen(snapshot.ticksUntilRegen, snapshot.maxRegenCadence, display.regenFormat),
    visible: display.showRegen && !snapshot.energyFull && !snapshot.encounterPaused,
    paused: false,
  };
}

export function cooldownLabel(snapshot: TrackerSnapshot, display: DisplayConfig): TimerLabel {
  return {
    text: formatCooldown(snapshot.cooldownRemainingMs, display.cooldownFormat),
    visible: display.showCooldown && snapshot.cooldownRemainingMs > 0,
    paused: snapshot.cooldownPaused,
  };
}
