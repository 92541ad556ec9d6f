#!/usr/bin/env node
/**
 * CLI: Replay Session
 * Feeds a recorded session log through the tracker and prints the timer timeline
 */

import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { loadConfig } from '../lib/config';
import { ConfigError, SessionLogError } from '../lib/errors';
import { Logger, LoggerFactory } from '../logging/logger';
import { ReplayEngine } from '../replay/ReplayEngine';
import { DisplayFormatSchema, DisplayFormat } from '../spec/schema';
import { cooldownLabel, regenLabel } from '../utils/displayFormat';

dotenv.config();

const USAGE =
  'Usage: npm run replay -- --file=<sessionLog.yaml> [--format=ticks|seconds|decimals] [--json] [--verbose]';

interface ReplayArgs {
  filePath?: string;
  format?: DisplayFormat;
  json: boolean;
  verbose: boolean;
}

export function parseArgs(args: string[]): ReplayArgs {
  const parsed: ReplayArgs = { json: false, verbose: false };

  for (const arg of args) {
    if (arg.startsWith('--file=')) {
      parsed.filePath = arg.slice('--file='.length);
    } else if (arg.startsWith('--format=')) {
      const format = DisplayFormatSchema.safeParse(arg.slice('--format='.length));
      if (!format.success) {
        throw new ConfigError(`Unknown format: ${arg.slice('--format='.length)}`);
      }
      parsed.format = format.data;
    } else if (arg === '--json') {
      parsed.json = true;
    } else if (arg === '--verbose') {
      parsed.verbose = true;
    }
  }

  return parsed;
}

/**
 * Log a failed run. Config and session log errors carry their validation issues.
 */
export function reportFailure(logger: Logger, error: unknown): void {
  if (error instanceof ConfigError || error instanceof SessionLogError) {
    logger.error(error.message, undefined, { errorCode: error.name, issues: error.issues });
    return;
  }
  logger.error('Replay failed', error);
}

async function main(logger: Logger) {
  const args = parseArgs(process.argv.slice(2));

  if (!args.filePath) {
    logger.error('--file=<sessionLog.yaml> is required');
    console.log(USAGE);
    process.exitCode = 1;
    return;
  }

  if (!fs.existsSync(args.filePath)) {
    logger.error(`File not found: ${args.filePath}`);
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  const display = {
    ...config.display,
    regenFormat: args.format ?? config.display.regenFormat,
    cooldownFormat: args.format ?? config.display.cooldownFormat,
  };

  const source = await fs.promises.readFile(args.filePath, 'utf-8');
  const engine = new ReplayEngine({ logLevel: config.logLevel, verbose: args.verbose });
  const result = await engine.runFromSource(source);

  if (args.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  console.log(`Replay: ${result.name} (${result.eventsProcessed} events)`);
  console.log('-'.repeat(60));
  console.log('tick'.padEnd(8) + 'regen'.padEnd(10) + 'cooldown'.padEnd(12) + 'state');

  for (const snapshot of result.snapshots) {
    const regen = regenLabel(snapshot, display);
    const cooldown = cooldownLabel(snapshot, display);
    const flags = [
      snapshot.encounterPaused ? 'between-segments' : '',
      snapshot.secondaryZonePaused ? 'between-rooms' : '',
      snapshot.accelerated ? 'accelerated' : '',
      snapshot.energyFull ? 'full' : '',
    ].filter((flag) => flag.length > 0);

    console.log(
      String(snapshot.tickIndex ?? '-').padEnd(8) +
        (regen.visible ? regen.text : '-').padEnd(10) +
        (cooldown.visible ? `${cooldown.text}${cooldown.paused ? ' (p)' : ''}` : '-').padEnd(12) +
        flags.join(',')
    );
  }

  console.log('-'.repeat(60));
  console.log(`Pause changes: ${result.pauseChanges.length}`);
}

if (require.main === module) {
  const logger = LoggerFactory.getLogger('replay-cli');
  main(logger).catch((error: unknown) => {
    reportFailure(logger, error);
    process.exitCode = 1;
  });
}
