import { RemoteWriteError } from '../errors.js';
import { mergeTags } from './reconcile.js';
import type { CatalogSession } from '../shopify/catalogSession.js';
import type { WorklistItem, Worklist } from '../types/Product.js';

export interface ApplyHooks {
  onApplied?: (item: WorklistItem, tags: string) => void;
  onFailed?: (item: WorklistItem, error: RemoteWriteError) => void;
}

export interface ItemFailure {
  item: WorklistItem;
  error: RemoteWriteError;
}

export interface ApplyResult {
  successCount: number;
  totalCount: number;
  failures: ItemFailure[];
}

/**
 * Writes each worklist item back exactly once. A failed save is recorded and the
 * batch moves on; retrying is left to whoever runs the next pass.
 */
export async function applyWorklist(
  session: CatalogSession,
  worklist: Worklist,
  hooks: ApplyHooks = {}
): Promise<ApplyResult> {
  let successCount = 0;
  const failures: ItemFailure[] = [];

  for (const item of worklist) {
    const tags = mergeTags(item.product.tags, item.tagsToAdd);
    try {
      await session.saveProduct({ ...item.product, tags });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const failure = new RemoteWriteError(
        item.product.id,
        `Failed to update product '${item.product.title}': ${message}`,
        { cause: error }
      );
      failures.push({ item, error: failure });
      hooks.onFailed?.(item, failure);
      continue;
    }

    successCount++;
    hooks.onApplied?.(item, tags);
  }

  return { successCount, totalCount: worklist.length, failures };
}
