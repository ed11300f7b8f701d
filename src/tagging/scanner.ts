import { MAX_PAGE_SIZE, type CatalogSession, type ProductPage } from '../shopify/catalogSession.js';
import { tagsToAdd } from './reconcile.js';
import type { TagMapping, Worklist } from '../types/Product.js';

export interface ScanOptions {
  pageSize?: number;
  /** Called after each page with the running count of products checked */
  onProgress?: (processed: number) => void;
}

export interface ScanResult {
  worklist: Worklist;
  scanned: number;
}

/**
 * Walks the catalog one page at a time and collects every mapped product
 * that is missing at least one of its type's tags.
 */
export async function scanCatalog(
  session: CatalogSession,
  mapping: TagMapping,
  options: ScanOptions = {}
): Promise<ScanResult> {
  const worklist: Worklist = [];
  if (mapping.size === 0) {
    return { worklist, scanned: 0 };
  }

  let scanned = 0;
  let page: ProductPage | null = await session.findProducts(options.pageSize ?? MAX_PAGE_SIZE);

  while (page) {
    for (const product of page.products) {
      scanned++;
      const desired = mapping.get(product.productType);
      if (!desired) continue;

      const missing = tagsToAdd(product.tags, desired);
      if (missing.length > 0) {
        worklist.push({ product, tagsToAdd: missing });
      }
    }

    options.onProgress?.(scanned);

    page = page.hasNext ? await page.next() : null;
  }

  return { worklist, scanned };
}
