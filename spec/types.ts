/**
 * Core types for the special attack timer session
 */

// ============================================================================
// Positions
// ============================================================================

/**
 * De-instanced location of the player. `zoneId` is the template region id,
 * `x`/`y` are template tile coordinates.
 */
export interface Position {
  zoneId: number;
  x: number;
  y: number;
}

// ============================================================================
// Timer State
// ============================================================================

export interface IgnoreWindow {
  expiresAtTick: number;
  expectedDelta: number;
}

export interface TimerState {
  /** Ticks left until the next regen event, always in [0, regenCadence] */
  ticksUntilRegen: number;
  regenCadence: number;
  accelerated: boolean;
  /** Last sampled energy (0..1000), null until the first sample of the session */
  lastObservedEnergy: number | null;
  energyIgnoreWindow: IgnoreWindow | null;
}

// ============================================================================
// Phase State
// ============================================================================

export interface PhaseState {
  /** Regen timer is frozen between waves / delves */
  encounterPaused: boolean;
  /** Cooldown (but not regen) is frozen between raid rooms */
  secondaryZonePaused: boolean;
  insideRaid: boolean;
  currentZoneId: number | null;
  /** Watching for the next room entry in the current zone */
  segmentEntryArmed: boolean;
}

// ============================================================================
// Cooldown State
// ============================================================================

/**
 * At most one of the two fields is set. Both null means no cooldown.
 */
export interface CooldownState {
  endTimestamp: number | null; // Unix ms
  pausedRemaining: number | null; // ms
}

// ============================================================================
// Session
// ============================================================================

export interface SessionState {
  active: boolean;
  /** Index of the last tick applied, used to date text signals */
  lastTickIndex: number | null;
  timer: TimerState;
  phase: PhaseState;
  cooldown: CooldownState;
}

// ============================================================================
// Signal Events
// ============================================================================

export interface SessionStartEvent {
  type: 'session_start';
  energy?: number;
}

export type SessionEndReason = 'logout' | 'disconnect' | 'hop';

export interface SessionEndEvent {
  type: 'session_end';
  reason?: SessionEndReason;
}

export interface TickEvent {
  type: 'tick';
  tickIndex: number;
  energy: number;
  /** Null or missing when the player location can't be read */
  position?: Position | null;
}

export interface ChatEvent {
  type: 'chat';
  message: string;
}

export interface EquipmentEvent {
  type: 'equipment';
  /** Whether the cadence-halving ring is worn */
  accelerant: boolean;
}

export interface NpcSpawnEvent {
  type: 'npc_spawn';
  name: string | null;
  id: number;
}

export interface MenuOptionEvent {
  type: 'menu_option';
  option: string | null;
}

export interface RaidStatusEvent {
  type: 'raid_status';
  inside: boolean;
  zoneId?: number | null;
}

export type SignalEvent =
  | SessionStartEvent
  | SessionEndEvent
  | TickEvent
  | ChatEvent
  | EquipmentEvent
  | NpcSpawnEvent
  | MenuOptionEvent
  | RaidStatusEvent;

export type SignalEventType = SignalEvent['type'];

// ============================================================================
// Phase Transitions
// ============================================================================

/**
 * Outcome of a matched text / entity / menu signal. Applied by the phase
 * tracker; a matcher never touches state itself.
 */
export type PhaseTransition =
  | { kind: 'wave_completed'; wave: number }
  | { kind: 'wave_started'; wave: number }
  | { kind: 'rewards_claimed' }
  | { kind: 'delve_completed'; level: number }
  | { kind: 'delve_boss_spawned' }
  | { kind: 'room_completed'; room: string }
  | { kind: 'raid_completed' }
  | { kind: 'room_entered'; via: 'zone' | 'barrier' | 'npc' | 'dialogue' }
  | { kind: 'energy_restored'; source: RestoreSource; expectedDelta: number }
  | { kind: 'cooldown_expired' };


export type RestoreSource = 'surge_potion' | 'death_charge';

// ============================================================================
// Outbound
// ============================================================================

export interface TrackerSnapshot {
  tickIndex: number | null;
  ticksUntilRegen: number;
  maxRegenCadence: number;
  secondsUntilRegen: number;
  accelerated: boolean;
  encounterPaused: boolean;
  secondaryZonePaused: boolean;
  energy: number | null;
  energyPercent: number;
  energyFull: boolean;
  cooldownRemainingMs: number;
  cooldownTicks: number;
  cooldownPaused: boolean;
}

export interface Clock {
  now(): number;
}
