/**
 * workflow.ts
 *
 * One tagging run, shared by the admin menu, the one-shot CLI and the scheduler:
 *
 *   Idle → SessionOpen → MappingLoaded → Scanned → (ConfirmPending →)? Applying → Reported → SessionClosed
 *
 * A run that stops early (no mappings, nothing to do, declined, failed) jumps straight to
 * Reported. Every outcome is reported before the session is closed.
 *
 * Supplying `review` makes the run interactive. Failures that stop the run are returned
 * as a `failed` outcome rather than thrown.
 */

import { toTaggingError, type TaggingError } from '../errors.js';
import { applyWorklist, type ItemFailure } from './executor.js';
import { scanCatalog } from './scanner.js';
import { STORE_TAG_SEPARATOR } from './reconcile.js';
import type { CatalogSession } from '../shopify/catalogSession.js';
import type { RunLog, TagMapping, Worklist } from '../types/Product.js';

export type RunState =
  | 'Idle'
  | 'SessionOpen'
  | 'MappingLoaded'
  | 'Scanned'
  | 'ConfirmPending'
  | 'Applying'
  | 'Reported'
  | 'SessionClosed';

export interface MappingSource {
  loadAllAsMapping(): TagMapping;
}

export interface TaggingRunDeps {
  openSession: () => Promise<CatalogSession>;
  mappings: MappingSource;
  log: RunLog;
  /** Interactive gate: show the worklist and resolve true to apply it */
  review?: (worklist: Worklist) => Promise<boolean>;
  onStateChange?: (state: RunState) => void;
  now?: () => Date;
}

export type TaggingRunResult =
  | { status: 'no-mappings'; startedAt: Date }
  | { status: 'up-to-date'; startedAt: Date; scanned: number }
  | { status: 'declined'; startedAt: Date; scanned: number; worklist: Worklist }
  | {
      status: 'applied';
      startedAt: Date;
      finishedAt: Date;
      scanned: number;
      successCount: number;
      totalCount: number;
      failures: ItemFailure[];
    }
  | { status: 'failed'; startedAt: Date; failedIn: RunState; error: TaggingError };

interface RunContext {
  readonly startedAt: Date;
  state: RunState;
  session: CatalogSession | null;
  enter(next: RunState): void;
}

async function advance(deps: TaggingRunDeps, run: RunContext, now: () => Date): Promise<TaggingRunResult> {
  const { log } = deps;
  const { startedAt } = run;

  const session = await deps.openSession();
  run.session = session;
  run.enter('SessionOpen');

  const mapping = deps.mappings.loadAllAsMapping();
  run.enter('MappingLoaded');
  log.log(`📋 Loaded ${mapping.size} product type mappings`);
  if (mapping.size === 0) {
    return { status: 'no-mappings', startedAt };
  }

  log.log(`📡 Fetching products from ${session.shopDomain}...`);
  const { worklist, scanned } = await scanCatalog(session, mapping, {
    onProgress: (processed) => log.log(`   Processed ${processed} products...`),
  });
  run.enter('Scanned');
  log.log(`✅ Checked ${scanned} products`);

  if (worklist.length === 0) {
    return { status: 'up-to-date', startedAt, scanned };
  }

  if (deps.review) {
    run.enter('ConfirmPending');
    const approved = await deps.review(worklist);
    if (!approved) {
      return { status: 'declined', startedAt, scanned, worklist };
    }
  } else {
    log.log(`🔎 Found ${worklist.length} products missing type tags`);
  }

  run.enter('Applying');
  const applied = await applyWorklist(session, worklist, {
    onApplied: (item) =>
      log.log(`   ✓ Tagged '${item.product.title}': ${item.tagsToAdd.join(STORE_TAG_SEPARATOR)}`),
    onFailed: (_item, error) => log.error(`   ✗ ${error.message}`),
  });

  return {
    status: 'applied',
    startedAt,
    finishedAt: now(),
    scanned,
    ...applied,
  };
}

export async function runTaggingWorkflow(deps: TaggingRunDeps): Promise<TaggingRunResult> {
  const now = deps.now ?? (() => new Date());
  const { log } = deps;
  const run: RunContext = {
    startedAt: now(),
    state: 'Idle',
    session: null,
    enter: (next) => {
      run.state = next;
      deps.onStateChange?.(next);
    },
  };
  const mode = deps.review ? 'interactive' : 'unattended';

  log.log(`\n[${run.startedAt.toISOString()}] 🏷️  Starting ${mode} product type tagging...`);

  let result: TaggingRunResult;
  try {
    result = await advance(deps, run, now);
  } catch (error) {
    result = { status: 'failed', startedAt: run.startedAt, failedIn: run.state, error: toTaggingError(error) };
  }

  try {
    reportTaggingRun(result, log);
    run.enter('Reported');
  } finally {
    if (run.session) {
      run.session.close();
      run.enter('SessionClosed');
    }
  }
  return result;
}

function describeFailure(error: TaggingError): string {
  switch (error.kind) {
    case 'auth':
      return `Authentication failed: ${error.message}`;
    case 'connectivity':
      return `Could not reach the catalog: ${error.message}`;
    case 'config':
      return `Configuration error: ${error.message}`;
    default:
      return error.message;
  }
}

/**
 * Turns a run outcome into operator messages. This is the only place a run's
 * errors are printed.
 */
export function reportTaggingRun(result: TaggingRunResult, log: RunLog): void {
  switch (result.status) {
    case 'no-mappings':
      log.log('⚠️  No product type mappings found in the database.');
      break;
    case 'up-to-date':
      log.log(`✅ No products need type tags (${result.scanned} checked).`);
      break;
    case 'declined':
      log.log(`❌ Cancelled by user; ${result.worklist.length} products left unchanged.`);
      break;
    case 'applied':
      log.log(`\n[${result.finishedAt.toISOString()}] 🎉 Tagging complete!`);
      log.log(`   Products updated: ${result.successCount}/${result.totalCount}`);
      if (result.failures.length > 0) {
        log.warn(`   ⚠️  ${result.failures.length} products failed; re-run to retry them.`);
      }
      break;
    case 'failed':
      log.error(`❌ Tagging run aborted during ${result.failedIn}. ${describeFailure(result.error)}`);
      break;
  }
}
