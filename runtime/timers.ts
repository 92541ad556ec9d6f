/**
 * Regen timer: counts game ticks down to the next special attack regen
 */
import { TimerState } from '../spec/types';
import {
  ACCELERATED_REGEN_TICKS,
  IGNORE_WINDOW_TICKS,
  MAX_ENERGY,
  NORMAL_REGEN_TICKS,
  TICK_SECONDS,
} from '../spec/constants';

export function cadenceFor(accelerated: boolean): number {
  return accelerated ? ACCELERATED_REGEN_TICKS : NORMAL_REGEN_TICKS;
}

export function createTimerState(): TimerState {
  return {
    ticksUntilRegen: NORMAL_REGEN_TICKS,
    regenCadence: NORMAL_REGEN_TICKS,
    accelerated: false,
    lastObservedEnergy: null,
    energyIgnoreWindow: null,
  };
}

/**
 * Clamp a raw energy reading into [0, MAX_ENERGY]. Non-finite readings
 * count as empty.
 */
export function clampEnergy(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(MAX_ENERGY, Math.max(0, Math.trunc(value)));
}

/**
 * Whether an energy increase comes from natural regen rather than the
 * restore the ignore window was opened for.
 */
export function isNaturalRegen(
  timer: TimerState,
  previous: number,
  current: number,
  tickIndex: number,
): boolean {
  const window = timer.energyIgnoreWindow;
  if (window === null || tickIndex > window.expiresAtTick) {
    return true;
  }

  const actualIncrease = current - previous;
  const maxPossibleIncrease = MAX_ENERGY - previous;

  // An increase bigger than the restore means regen landed on the same tick,
  // unless it's only bigger because the restore was capped at full energy
  return actualIncrease > window.expectedDelta && actualIncrease <= maxPossibleIncrease;
}

/**
 * Advance the timer by one game tick.
 */
export function tickRegen(
  timer: TimerState,
  rawEnergy: number,
  tickIndex: number,
  paused: boolean,
): TimerState {
  const energy = clampEnergy(rawEnergy);
  let ticksUntilRegen = timer.ticksUntilRegen;

  const previous = timer.lastObservedEnergy;
  if (previous !== null && energy > previous && isNaturalRegen(timer, previous, energy, tickIndex)) {
    ticksUntilRegen = timer.regenCadence;
  }

  if (energy >= MAX_ENERGY) {
    ticksUntilRegen = timer.regenCadence;
  } else if (!paused) {
    ticksUntilRegen--;
    if (ticksUntilRegen <= 0) {
      // Regen lands next tick; the new cycle starts now
      ticksUntilRegen = timer.regenCadence;
    }
  }

  const window = timer.energyIgnoreWindow;
  return {
    ...timer,
    ticksUntilRegen,
    lastObservedEnergy: energy,
    energyIgnoreWindow: window !== null && tickIndex > window.expiresAtTick ? null : window,
  };
}

/**
 * Equipping the accelerant keeps progress if it's already inside the short
 * cycle; removing it restarts the full cycle.
 */
export function setAccelerated(timer: TimerState, accelerated: boolean): TimerState {
  if (accelerated === timer.accelerated) {
    return timer;
  }

  const regenCadence = cadenceFor(accelerated);
  const ticksUntilRegen = accelerated
    ? Math.min(timer.ticksUntilRegen, regenCadence)
    : regenCadence;

  return { ...timer, accelerated, regenCadence, ticksUntilRegen };
}

/**
 * Restart the cycle at `offset` ticks short of a full cadence.
 */
export function reseed(timer: TimerState, offset: number = 0): TimerState {
  const ticksUntilRegen = Math.min(timer.regenCadence, Math.max(0, timer.regenCadence - offset));
  return { ...timer, ticksUntilRegen };
}

export function openIgnoreWindow(
  timer: TimerState,
  tickIndex: number,
  expectedDelta: number,
): TimerState {
  return {
    ...timer,
    energyIgnoreWindow: {
      expiresAtTick: tickIndex + IGNORE_WINDOW_TICKS,
      expectedDelta,
    },
  };
}

export function secondsUntilRegen(timer: TimerState): number {
  return timer.ticksUntilRegen * TICK_SECONDS;
}
