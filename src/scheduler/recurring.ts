import type { RunLog } from '../types/Product.js';

export const HOUR_MS = 60 * 60 * 1000;
/** Longest delay Node timers accept; larger values fire after 1 ms. */
export const MAX_INTERVAL_MS = 2_147_483_647;

export interface RecurringOptions {
  intervalMs: number;
  /** Run once right away instead of waiting for the first interval */
  runImmediately?: boolean;
  log: RunLog;
}

export interface RecurringHandle {
  stop(): void;
  /** Resolves once no run is in flight */
  idle(): Promise<void>;
}

/**
 * Runs `task` every `intervalMs`. A tick that arrives while the previous run is still
 * going is skipped, so two runs never overlap within this process.
 */
export function scheduleRecurring(task: () => Promise<void>, options: RecurringOptions): RecurringHandle {
  const { intervalMs, log } = options;
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new RangeError(`intervalMs must be positive, got ${intervalMs}`);
  }
  if (intervalMs > MAX_INTERVAL_MS) {
    throw new RangeError(`intervalMs must be at most ${MAX_INTERVAL_MS}, got ${intervalMs}`);
  }

  let inFlight: Promise<void> | null = null;

  const tick = (): void => {
    if (inFlight) {
      log.warn('⏭️  Previous tagging run still in progress; skipping this tick.');
      return;
    }
    inFlight = task()
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        log.error(`❌ Scheduled run failed: ${message}`);
      })
      .finally(() => {
        inFlight = null;
      });
  };

  const timer = setInterval(tick, intervalMs);
  if (options.runImmediately) {
    tick();
  }

  return {
    stop: () => clearInterval(timer),
    idle: async () => {
      while (inFlight) {
        await inFlight;
      }
    },
  };
}
