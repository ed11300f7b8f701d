#!/usr/bin/env node
/**
 * Admin console for product type → tags mappings.
 *
 * Usage:
 *   npx tsx src/index.ts
 */

import 'dotenv/config';
import { loadAppConfig, printCredentialHelp, type AppConfig } from './config/env.js';
import { setupDatabase } from './store/bootstrap.js';
import { runAdminMenu } from './cli/adminMenu.js';
import { createConsolePrompter } from './cli/prompt.js';
import { createWorklistReview, runScheduleUntil, runTaggingOnce } from './cli/taskRunners.js';

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadAppConfig();
  } catch (error) {
    console.error('\n❌ Configuration error:', error instanceof Error ? error.message : error);
    printCredentialHelp();
    process.exit(1);
  }

  const store = setupDatabase({ dbFile: config.dbFile, mappingFile: config.mappingFile, log: console });
  const prompter = createConsolePrompter();

  try {
    await runAdminMenu({
      store,
      prompter,
      log: console,
      mappingFile: config.mappingFile,
      intervalHours: config.intervalHours,
      runInteractive: async () => {
        await runTaggingOnce({
          shopify: config.shopify,
          mappings: store,
          log: console,
          review: createWorklistReview(prompter, console),
        });
      },
      startSchedule: () =>
        runScheduleUntil({
          intervalHours: config.intervalHours,
          log: console,
          until: prompter.interrupted(),
          task: async () => {
            await runTaggingOnce({ shopify: config.shopify, mappings: store, log: console });
          },
        }),
    });
  } finally {
    prompter.close();
    store.close();
  }
}

main().catch((err) => {
  console.error('\n❌ Fatal error:', err);
  process.exit(1);
});
