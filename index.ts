/**
 * Special Attack Timers
 * Main entry point and public API
 */

// ============================================================================
// Core Types
// ============================================================================
export {
  Position,
  IgnoreWindow,
  TimerState,
  PhaseState,
  CooldownState,
  SessionState,
  SignalEvent,
  SignalEventType,
  SessionStartEvent,
  SessionEndEvent,
  TickEvent,
  ChatEvent,
  EquipmentEvent,
  NpcSpawnEvent,
  MenuOptionEvent,
  RaidStatusEvent,
  PhaseTransition,
  RestoreSource,
  TrackerSnapshot,
  Clock,
} from './spec/types';
export * from './spec/constants';

// ============================================================================
// Schema & Validation
// ============================================================================
export {
  TrackerConfigSchema,
  DisplayConfigSchema,
  DisplayFormatSchema,
  SignalEventSchema,
  SessionLogSchema,
  TrackerConfig,
  DisplayConfig,
  DisplayFormat,
  SessionLog,
  validateTrackerConfig,
  validateSessionLog,
} from './spec/schema';

// ============================================================================
// Runtime
// ============================================================================
export {
  SessionTracker,
  SessionTrackerOptions,
  createSessionState,
  reduce,
  applyEvent,
  systemClock,
} from './runtime/engine';
export {
  cadenceFor,
  clampEnergy,
  tickRegen,
  setAccelerated,
  reseed,
  openIgnoreWindow,
} from './runtime/timers';
export {
  startCooldown,
  clearCooldown,
  cooldownRemaining,
  isCooldownPaused,
  syncPauseState,
} from './runtime/cooldown';
export {
  applyPhaseTransition,
  applyRaidStatus,
  detectRoomEntry,
  raidStatusFromVarbit,
} from './runtime/phases';
export { matchText, stripTags, TEXT_MATCHERS } from './runtime/grammars';

// ============================================================================
// Replay
// ============================================================================
export { ReplayEngine, ReplayResult, ManualClock, parseSessionLog } from './replay/ReplayEngine';

// ============================================================================
// Utilities
// ============================================================================
export { loadConfig } from './lib/config';
export { ConfigError, SessionLogError } from './lib/errors';
export {
  formatRegen,
  formatCooldown,
  regenProgress,
  regenLabel,
  cooldownLabel,
} from './utils/displayFormat';
export { Logger, LoggerFactory } from './logging/logger';
