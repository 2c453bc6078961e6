#!/usr/bin/env tsx

/**
 * Removes pending turns (agent runs waiting on a customer's approval) that
 * are older than the given age.
 *
 * Usage:
 *   npm run cleanup                    # STATE_MAX_AGE from the environment
 *   npm run cleanup -- --hours 12     # Custom 12 hours
 *   npm run cleanup -- --help         # Show help
 */

import 'dotenv/config';
import { loadEnvironment } from '../src/config/environment';
import { createRunStateStore } from '../src/config/persistence';
import { logger, toError } from '../src/utils/logger';

interface CleanupOptions {
  days?: number;
  hours?: number;
  help?: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parseAge(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new UsageError(`${flag} expects a positive number, got ${value === undefined ? 'nothing' : `"${value}"`}`);
  }
  return parsed;
}

export function parseArgs(args: string[]): CleanupOptions {
  const options: CleanupOptions = {};

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--days':
      case '-d':
        options.days = parseAge(args[i], args[++i]);
        break;
      case '--hours':
      case '-h':
        options.hours = parseAge(args[i], args[++i]);
        break;
      case '--help':
        options.help = true;
        break;
    }
  }

  return options;
}

function showHelp(): void {
  console.log(`
Pending Turn Cleanup Script

Usage:
  npm run cleanup                    # Entries older than STATE_MAX_AGE
  npm run cleanup -- --days 3       # Custom 3 days
  npm run cleanup -- --hours 12     # Custom 12 hours
  npm run cleanup -- --help         # Show this help

Options:
  --days, -d <number>    Remove pending turns older than specified days
  --hours, -h <number>   Remove pending turns older than specified hours
  --help                 Show this help message
`);
}

async function main(): Promise<void> {
  let options: CleanupOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`❌ ${error.message}`);
      showHelp();
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  if (options.help) {
    showHelp();
    return;
  }

  const config = loadEnvironment();
  let maxAgeMs = config.pendingTurns.maxAge;
  if (options.hours !== undefined) {
    maxAgeMs = options.hours * 60 * 60 * 1000;
  } else if (options.days !== undefined) {
    maxAgeMs = options.days * 24 * 60 * 60 * 1000;
  }
  console.log(`🧹 Cleaning up pending turns older than ${Math.round(maxAgeMs / 60000)} minutes...`);

  const startTime = Date.now();
  const store = createRunStateStore(config);
  await store.init();
  const cleanedCount = await store.cleanupOldStates(maxAgeMs);
  const duration = Date.now() - startTime;

  console.log(cleanedCount > 0
    ? `✅ Removed ${cleanedCount} pending turns in ${duration}ms`
    : `✅ No pending turns needed cleanup (${duration}ms)`);

  logger.info('Manual pending turn cleanup completed', {
    operation: 'manual_cleanup'
  }, {
    cleanedCount,
    maxAgeMs,
    durationMs: duration
  });
}

if (require.main === module) {
  main().catch(error => {
    console.error('❌ Cleanup failed:', toError(error).message);
    logger.error('Manual pending turn cleanup failed', toError(error), {
      operation: 'manual_cleanup'
    });
    process.exit(1);
  });
}
