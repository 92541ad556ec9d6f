/**
 * Centralized Logger Service
 * Uses Winston with a console transport and an optional in-memory transport
 */

import winston from 'winston';
import Transport from 'winston-transport';
import { MemoryTransport } from './MemoryTransport';

const { combine, timestamp, printf, colorize, errors } = winston.format;

export type LogMeta = Record<string, unknown>;

// Custom format for console output
const consoleFormat = printf(({ level, message, timestamp, component, ...meta }) => {
  const metaStr = Object.keys(meta).length > 0 ? JSON.stringify(meta) : '';
  const componentStr = typeof component === 'string' ? `[${component}]` : '';
  return `${String(timestamp)} ${level} ${componentStr} ${String(message)} ${metaStr}`;
});

export interface LoggerOptions {
  component: string;
  memory?: MemoryTransport;
  enableConsole?: boolean;
  logLevel?: string;
}

export class Logger {
  private logger: winston.Logger;
  private component: string;

  constructor(options: LoggerOptions) {
    this.component = options.component;

    const transports: Transport[] = [];

    // Console transport (always enabled unless explicitly disabled)
    if (options.enableConsole !== false) {
      transports.push(
        new winston.transports.Console({
          format: combine(
            colorize(),
            timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            errors({ stack: true }),
            consoleFormat
          ),
        })
      );
    }

    // Captured entries, e.g. for replay reports
    if (options.memory) {
      transports.push(options.memory);
    }

    this.logger = winston.createLogger({
      level: options.logLevel || process.env.LOG_LEVEL || 'info',
      format: combine(
        timestamp(),
        errors({ stack: true }),
        winston.format.json()
      ),
      transports,
      exitOnError: false,
    });
  }

  debug(message: string, meta?: LogMeta) {
    this.logger.debug(message, { component: this.component, ...meta });
  }

  info(message: string, meta?: LogMeta) {
    this.logger.info(message, { component: this.component, ...meta });
  }

  error(message: string, error?: unknown, meta?: LogMeta) {
    const errorMeta: LogMeta = { component: this.component, ...meta };

    if (error) {
      if (error instanceof Error) {
        errorMeta.stackTrace = error.stack;
        errorMeta.errorCode = error.name;
      } else if (typeof error === 'object') {
        errorMeta.errorDetails = error;
      }
    }

    this.logger.error(message, errorMeta);
  }

  // Convenience method for tick-scoped logs
  logTick(level: 'debug' | 'info', message: string, tickIndex: number | null, meta?: LogMeta) {
    this.logger[level](message, {
      component: this.component,
      tickIndex,
      ...meta,
    });
  }

  close() {
    this.logger.close();
  }
}

// Singleton factory for creating loggers
class LoggerFactory {
  private static loggers: Map<string, Logger> = new Map();

  static getLogger(component: string): Logger {
    let logger = this.loggers.get(component);
    if (!logger) {
      logger = new Logger({ component });
      this.loggers.set(component, logger);
    }
    return logger;
  }
}

export { LoggerFactory };
