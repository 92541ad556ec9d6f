/**
 * Errors raised at the edges (configuration, recorded sessions). The
 * runtime itself never throws on game input.
 */
import { ZodError, ZodIssue } from 'zod';

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: ZodIssue[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class SessionLogError extends Error {
  constructor(message: string, public readonly issues: ZodIssue[] = []) {
    super(message);
    this.name = 'SessionLogError';
  }
}

/**
 * One line per issue, e.g. `events.3.event.tickIndex: Expected number, received string`
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
