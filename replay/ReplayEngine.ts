/**
 * Replay Engine
 * Runs a recorded session log through the tracker and collects a timeline
 */

import YAML from 'yaml';
import { ZodError } from 'zod';
import { SessionTracker } from '../runtime/engine';
import { Logger } from '../logging/logger';
import { CapturedLogEntry, MemoryTransport } from '../logging/MemoryTransport';
import { SessionLog, validateSessionLog } from '../spec/schema';
import { Clock, TrackerSnapshot } from '../spec/types';
import { SessionLogError, formatZodIssues } from '../lib/errors';

/**
 * Clock that only moves when told to
 * Replays wall time from the log instead of reading it
 */
export class ManualClock implements Clock {
  constructor(private current: number = 0) {}

  now(): number {
    return this.current;
  }

  set(ms: number): void {
    this.current = ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

/**
 * Replay result: one snapshot per tick plus the final state
 */
export interface ReplayResult {
  name: string;
  eventsProcessed: number;
  snapshots: Array<TrackerSnapshot & { atMs: number }>;
  // Snapshot after each change of either pause flag
  pauseChanges: Array<TrackerSnapshot & { atMs: number }>;
  final: TrackerSnapshot;
  log: CapturedLogEntry[];
}

export interface ReplayOptions {
  logLevel?: string;
  /** Also echo the tracker log to the console */
  verbose?: boolean;
}

/**
 * Parse a YAML or JSON session log. JSON is valid YAML, so one parser covers both.
 */
export function parseSessionLog(source: string): SessionLog {
  let parsed: unknown;
  try {
    parsed = YAML.parse(source);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SessionLogError(`Failed to parse session log: ${message}`);
  }

  try {
    return validateSessionLog(parsed);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new SessionLogError(`Invalid session log: ${formatZodIssues(error)}`, error.issues);
    }
    throw error;
  }
}

export class ReplayEngine {
  constructor(private options: ReplayOptions = {}) {}

  async runFromSource(source: string): Promise<ReplayResult> {
    return this.run(parseSessionLog(source));
  }

  async run(sessionLog: SessionLog): Promise<ReplayResult> {
    const clock = new ManualClock(sessionLog.startMs);
    const memory = new MemoryTransport();
    const logger = new Logger({
      component: 'replay',
      memory,
      enableConsole: this.options.verbose === true,
      logLevel: this.options.logLevel ?? 'info',
    });
    const tracker = new SessionTracker({ clock, logger });

    const snapshots: ReplayResult['snapshots'] = [];
    const pauseChanges: ReplayResult['pauseChanges'] = [];

    for (const entry of sessionLog.events) {
      if (entry.atMs !== undefined) {
        clock.set(entry.atMs);
      }

      const before = tracker.getState().phase;
      tracker.dispatch(entry.event);
      const after = tracker.getState().phase;

      if (
        before.encounterPaused !== after.encounterPaused ||
        before.secondaryZonePaused !== after.secondaryZonePaused
      ) {
        pauseChanges.push({ ...tracker.snapshot(), atMs: clock.now() });
      }

      if (entry.event.type === 'tick') {
        snapshots.push({ ...tracker.snapshot(), atMs: clock.now() });
      }
    }

    // Winston hands entries to transports asynchronously
    await new Promise<void>((resolve) => setImmediate(resolve));
    const log = memory.getEntries();
    logger.close();

    return {
      name: sessionLog.name ?? 'session',
      eventsProcessed: sessionLog.events.length,
      snapshots,
      pauseChanges,
      final: tracker.snapshot(),
      log,
    };
  }
}
