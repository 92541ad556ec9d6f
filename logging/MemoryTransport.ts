/**
 * Custom Winston Transport that keeps entries in memory
 * Bounded ring; oldest entries are dropped first
 */

import Transport from 'winston-transport';

export interface CapturedLogEntry {
  level: string;
  message: string;
  component?: string;
  tickIndex?: number | null;
  metadata: Record<string, unknown>;
}

interface WinstonInfo {
  level: string;
  message: unknown;
  component?: unknown;
  tickIndex?: unknown;
  timestamp?: unknown;
  [key: string]: unknown;
}

export interface MemoryTransportOptions extends Transport.TransportStreamOptions {
  maxEntries?: number;
}

export class MemoryTransport extends Transport {
  private entries: CapturedLogEntry[] = [];
  private maxEntries: number;

  constructor(opts: MemoryTransportOptions = {}) {
    super(opts);
    this.maxEntries = opts.maxEntries ?? 1000;
  }

  log(info: WinstonInfo, callback: () => void) {
    setImmediate(() => {
      this.emit('logged', info);
    });

    const { level, message, component, tickIndex, timestamp, ...metadata } = info;

    this.entries.push({
      level,
      message: typeof message === 'string' ? message : String(message),
      component: typeof component === 'string' ? component : undefined,
      tickIndex: typeof tickIndex === 'number' || tickIndex === null ? tickIndex : undefined,
      // String keys only; winston's own Symbol keys stay behind
      metadata: Object.fromEntries(Object.entries(metadata)),
    });

    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }

    callback();
  }

  getEntries(): CapturedLogEntry[] {
    return [...this.entries];
  }
}
