/**
 * scheduleTagging.ts
 *
 * Runs unattended tagging on a fixed interval until interrupted.
 *
 * Usage:
 *   npx tsx src/cli/scheduleTagging.ts                      # Every TAGGING_INTERVAL_HOURS (default 6)
 *   npx tsx src/cli/scheduleTagging.ts --interval-hours 2   # Every 2 hours
 *   npx tsx src/cli/scheduleTagging.ts --now                # Also run once at startup
 */

import 'dotenv/config';
import { loadAppConfig, parseIntervalHours, printCredentialHelp, type AppConfig } from '../config/env.js';
import { setupDatabase } from '../store/bootstrap.js';
import { processInterrupted, runScheduleUntil, runTaggingOnce } from './taskRunners.js';

interface ScheduleArgs {
  intervalHours?: string;
  runImmediately: boolean;
}

function parseArgs(): ScheduleArgs {
  const args = process.argv.slice(2);
  const options: ScheduleArgs = {
    runImmediately: args.includes('--now'),
  };

  const intervalIdx = args.indexOf('--interval-hours');
  if (intervalIdx >= 0 && args[intervalIdx + 1]) {
    options.intervalHours = args[intervalIdx + 1];
  }

  return options;
}

async function main(): Promise<void> {
  const args = parseArgs();

  let config: AppConfig;
  let intervalHours: number;
  try {
    config = loadAppConfig();
    intervalHours = args.intervalHours ? parseIntervalHours(args.intervalHours) : config.intervalHours;
  } catch (error) {
    console.error('\n❌ Configuration error:', error instanceof Error ? error.message : error);
    printCredentialHelp();
    process.exit(1);
  }

  const store = setupDatabase({ dbFile: config.dbFile, mappingFile: config.mappingFile, log: console });

  try {
    await runScheduleUntil({
      intervalHours,
      runImmediately: args.runImmediately,
      log: console,
      until: processInterrupted(),
      task: async () => {
        await runTaggingOnce({ shopify: config.shopify, mappings: store, log: console });
      },
    });
  } finally {
    store.close();
  }
}

main().catch((err) => {
  console.error('\n❌ Scheduler failed:', err);
  process.exit(1);
});
