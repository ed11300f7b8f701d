/**
 * Glue shared by the CLI entry points: wires the Shopify session, the store and the
 * operator's console into the tagging workflow and the scheduler.
 */

import { openCatalogSession } from '../shopify/catalogSession.js';
import { HOUR_MS, scheduleRecurring } from '../scheduler/recurring.js';
import { runTaggingWorkflow, type MappingSource, type TaggingRunResult } from '../tagging/workflow.js';
import { confirm, type Prompter } from './prompt.js';
import { renderWorklistTable } from './display.js';
import type { ShopifyConfig } from '../shopify/adminRest.js';
import type { RunLog, Worklist } from '../types/Product.js';

export interface TaggingTaskOptions {
  shopify: ShopifyConfig;
  mappings: MappingSource;
  log: RunLog;
  review?: (worklist: Worklist) => Promise<boolean>;
}

export async function runTaggingOnce(options: TaggingTaskOptions): Promise<TaggingRunResult> {
  return runTaggingWorkflow({
    openSession: () => openCatalogSession(options.shopify),
    mappings: options.mappings,
    log: options.log,
    review: options.review,
  });
}

export function createWorklistReview(prompter: Prompter, log: RunLog): (worklist: Worklist) => Promise<boolean> {
  return async (worklist) => {
    log.log('\nProducts that will receive type tags:');
    for (const line of renderWorklistTable(worklist)) {
      log.log(line);
    }
    log.log(`\nTotal products to tag: ${worklist.length}`);
    return confirm(prompter, `\nApply these tags to ${worklist.length} products? (y/n): `, log);
  };
}

export interface ScheduleOptions {
  intervalHours: number;
  runImmediately?: boolean;
  task: () => Promise<void>;
  log: RunLog;
  /** Resolves when the service should stop */
  until: Promise<void>;
}

export async function runScheduleUntil(options: ScheduleOptions): Promise<void> {
  const { log } = options;
  const handle = scheduleRecurring(options.task, {
    intervalMs: options.intervalHours * HOUR_MS,
    runImmediately: options.runImmediately,
    log,
  });

  log.log(`⏰ Unattended tagging scheduled every ${options.intervalHours} hours.`);
  log.log('   Press CTRL+C to stop the service.');

  await options.until;
  handle.stop();
  await handle.idle();
  log.log('\n🛑 Scheduled tagging stopped.');
}

export function processInterrupted(): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });
}
