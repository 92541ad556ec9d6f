/**
 * Special Attack Timer Runtime Engine
 * Event reducer and session tracker for regen / cooldown timing
 */
import {
  Clock,
  PhaseTransition,
  SessionState,
  SignalEvent,
  TickEvent,
  TrackerSnapshot,
} from "../spec/types";
import { MAX_ENERGY, TICK_MS } from "../spec/constants";
import {
  clampEnergy,
  createTimerState,
  isNaturalRegen,
  secondsUntilRegen,
  setAccelerated,
  tickRegen,
} from "./timers";
import { cooldownRemaining, createCooldownState, isCooldownPaused } from "./cooldown";
import {
  applyPhaseTransition,
  applyRaidStatus,
  createPhaseState,
  detectRoomEntry,
  withPhase,
} from "./phases";
import { matchDelveBossSpawn, matchFightStartSpawn, matchMenuOption, matchText } from "./grammars";
import { Logger, LoggerFactory } from "../logging/logger";

// ============================================================================
// Reducer
// ============================================================================

export function createSessionState(): SessionState {
  return {
    active: false,
    lastTickIndex: null,
    timer: createTimerState(),
    phase: createPhaseState(),
    cooldown: createCooldownState(),
  };
}

export interface ReduceResult {
  state: SessionState;
  transitions: PhaseTransition[];
}

/**
 * Apply one signal. Pure: the input state is never mutated.
 */
export function reduce(
  state: SessionState,
  event: SignalEvent,
  nowMs: number,
): ReduceResult {
  switch (event.type) {
    case "session_start": {
      const fresh = createSessionState();
      const energy = event.energy === undefined ? null : clampEnergy(event.energy);
      return {
        state: { ...fresh, active: true, timer: { ...fresh.timer, lastObservedEnergy: energy } },
        transitions: [],
      };
    }

    case "session_end":
      return { state: createSessionState(), transitions: [] };

    case "tick":
      if (!state.active) {
        return { state, transitions: [] };
      }
      return reduceTick(state, event, nowMs);

    case "chat": {
      if (!state.active) {
        return { state, transitions: [] };
      }
      const transition = matchText(event.message);
      if (!transition) {
        return { state, transitions: [] };
      }
      return { state: applyPhaseTransition(state, transition, nowMs), transitions: [transition] };
    }

    case "equipment":
      return {
        state: { ...state, timer: setAccelerated(state.timer, event.accelerant) },
        transitions: [],
      };

    case "npc_spawn":
      return reduceNpcSpawn(state, event.name, event.id, nowMs);

    case "menu_option": {
      const { phase } = state;
      if (!phase.insideRaid || !phase.secondaryZonePaused) {
        return { state, transitions: [] };
      }
      const transition = matchMenuOption(event.option, phase.currentZoneId);
      if (!transition) {
        return { state, transitions: [] };
      }
      return { state: applyPhaseTransition(state, transition, nowMs), transitions: [transition] };
    }

    case "raid_status":
      return {
        state: applyRaidStatus(state, event.inside, event.zoneId ?? null, nowMs),
        transitions: [],
      };
  }
}

export function applyEvent(state: SessionState, event: SignalEvent, nowMs: number): SessionState {
  return reduce(state, event, nowMs).state;
}

function reduceTick(state: SessionState, event: TickEvent, nowMs: number): ReduceResult {
  const timer = tickRegen(state.timer, event.energy, event.tickIndex, state.phase.encounterPaused);
  const next: SessionState = { ...state, lastTickIndex: event.tickIndex, timer };

  const { phase, entry } = detectRoomEntry(next.phase, event.position ?? null);
  if (entry === null) {
    return { state: { ...next, phase }, transitions: [] };
  }

  return {
    state: withPhase(next, phase, nowMs),
    transitions: [{ kind: "room_entered", via: entry }],
  };
}

function reduceNpcSpawn(
  state: SessionState,
  name: string | null,
  id: number,
  nowMs: number,
): ReduceResult {
  let next = state;
  const transitions: PhaseTransition[] = [];

  const delve = matchDelveBossSpawn(name);
  if (delve) {
    next = applyPhaseTransition(next, delve, nowMs);
    transitions.push(delve);
  }

  const fightStart = matchFightStartSpawn(id);
  if (fightStart && next.phase.secondaryZonePaused && next.phase.segmentEntryArmed) {
    next = applyPhaseTransition(next, fightStart, nowMs);
    transitions.push(fightStart);
  }

  return { state: next, transitions };
}

// ============================================================================
// Session Tracker
// ============================================================================

export const systemClock: Clock = {
  now: () => Date.now(),
};

export interface SessionTrackerOptions {
  clock?: Clock;
  logger?: Logger;
}

/**
 * Owns one session's state and exposes the read side to presentation code
 */
export class SessionTracker {
  private state: SessionState = createSessionState();
  private clock: Clock;
  private logger: Logger;

  constructor(options: SessionTrackerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? LoggerFactory.getLogger("SessionTracker");
  }

  /**
   * Apply one inbound signal
   */
  dispatch(event: SignalEvent): void {
    const before = this.state;
    const { state, transitions } = reduce(before, event, this.clock.now());
    this.state = state;

    if (event.type === "session_start" || event.type === "session_end") {
      this.logger.info(`Session ${event.type === "session_start" ? "started" : "ended"}`, {
        reason: event.type === "session_end" ? event.reason : undefined,
      });
      return;
    }

    if (!before.active && (event.type === "tick" || event.type === "chat")) {
      this.logger.debug(`Ignored ${event.type} outside of a session`);
      return;
    }

    if (event.type === "tick") {
      this.logAbsorbedRestore(before, state, event.tickIndex);
    }

    if (before.timer.accelerated !== state.timer.accelerated) {
      this.logger.logTick("info", `Regen cadence set to ${state.timer.regenCadence} ticks`, state.lastTickIndex, {
        ticksUntilRegen: state.timer.ticksUntilRegen,
      });
    }

    if (before.phase.insideRaid !== state.phase.insideRaid) {
      this.logger.logTick("info", state.phase.insideRaid ? "Entered raid" : "Left raid", state.lastTickIndex, {
        secondaryZonePaused: state.phase.secondaryZonePaused,
      });
    }

    for (const transition of transitions) {
      this.logger.logTick("info", `Phase transition: ${transition.kind}`, state.lastTickIndex, {
        transition,
        encounterPaused: state.phase.encounterPaused,
        secondaryZonePaused: state.phase.secondaryZonePaused,
        ticksUntilRegen: state.timer.ticksUntilRegen,
      });
    }

    if (isCooldownPaused(before.cooldown) !== isCooldownPaused(state.cooldown)) {
      this.logger.logTick(
        "debug",
        isCooldownPaused(state.cooldown) ? "Cooldown paused" : "Cooldown resumed",
        state.lastTickIndex,
        { cooldownRemainingMs: this.cooldownRemaining() },
      );
    }
  }

  private logAbsorbedRestore(before: SessionState, after: SessionState, tickIndex: number): void {
    const window = before.timer.energyIgnoreWindow;
    const previous = before.timer.lastObservedEnergy;
    const current = after.timer.lastObservedEnergy;
    if (window === null || previous === null || current === null || current <= previous) {
      return;
    }
    if (isNaturalRegen(before.timer, previous, current, tickIndex)) {
      return;
    }
    this.logger.logTick("debug", "Energy restore absorbed", tickIndex, {
      previous,
      current,
      expectedDelta: window.expectedDelta,
    });
  }

  /**
   * Apply a batch of signals in arrival order
   */
  dispatchAll(events: Iterable<SignalEvent>): void {
    for (const event of events) {
      this.dispatch(event);
    }
  }

  getState(): SessionState {
    return this.state;
  }

  reset(): void {
    this.state = createSessionState();
  }

  isSessionActive(): boolean {
    return this.state.active;
  }

  ticksUntilRegen(): number {
    return this.state.timer.ticksUntilRegen;
  }

  maxRegenCadence(): number {
    return this.state.timer.regenCadence;
  }

  secondsUntilRegen(): number {
    return secondsUntilRegen(this.state.timer);
  }

  isEncounterPaused(): boolean {
    return this.state.phase.encounterPaused;
  }

  isSecondaryZonePaused(): boolean {
    return this.state.phase.secondaryZonePaused;
  }

  isAcceleratedCadence(): boolean {
    return this.state.timer.accelerated;
  }

  energy(): number | null {
    return this.state.timer.lastObservedEnergy;
  }

  energyPercent(): number {
    return Math.floor((this.state.timer.lastObservedEnergy ?? 0) / 10);
  }

  isEnergyFull(): boolean {
    return (this.state.timer.lastObservedEnergy ?? 0) >= MAX_ENERGY;
  }

  cooldownRemaining(): number {
    return cooldownRemaining(this.state.cooldown, this.clock.now());
  }

  cooldownTicks(): number {
    return Math.floor(this.cooldownRemaining() / TICK_MS);
  }

  isCooldownPaused(): boolean {
    return isCooldownPaused(this.state.cooldown);
  }

  snapshot(): TrackerSnapshot {
    const cooldownRemainingMs = this.cooldownRemaining();
    return {
      tickIndex: this.state.lastTickIndex,
      ticksUntilRegen: this.ticksUntilRegen(),
      maxRegenCadence: this.maxRegenCadence(),
      secondsUntilRegen: this.secondsUntilRegen(),
      accelerated: this.isAcceleratedCadence(),
      encounterPaused: this.isEncounterPaused(),
      secondaryZonePaused: this.isSecondaryZonePaused(),
      energy: this.energy(),
      energyPercent: this.energyPercent(),
      energyFull: this.isEnergyFull(),
      cooldownRemainingMs,
      cooldownTicks: Math.floor(cooldownRemainingMs / TICK_MS),
      cooldownPaused: this.isCooldownPaused(),
    };
  }
}
