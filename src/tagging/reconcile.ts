/**
 * reconcile.ts
 *
 * Pure tag arithmetic between what a product carries and what its type owes it.
 *
 * Two separators are in play:
 * - `;`  for mappings stored locally and for display
 * - `, ` for the catalog's own tags field (must match exactly on write)
 */

export const STORE_TAG_SEPARATOR = ';';
export const CATALOG_TAG_SEPARATOR = ', ';

export function parseCatalogTags(tags: string | null | undefined): string[] {
  return tags ? tags.split(CATALOG_TAG_SEPARATOR) : [];
}

export function parseStoredTags(raw: string): string[] {
  return raw
    .split(STORE_TAG_SEPARATOR)
    .map(tag => tag.trim())
    .filter(Boolean);
}

/**
 * Desired tags missing from the product, in the order the mapping lists them.
 * Matching is exact and case-sensitive. An empty result means no update is needed.
 */
export function tagsToAdd(currentTags: string | null | undefined, desiredTags: readonly string[]): string[] {
  const current = new Set(parseCatalogTags(currentTags));
  return desiredTags.filter(tag => !current.has(tag));
}

/**
 * Union of current and added tags, sorted so repeated runs never reorder a product's tags.
 */
export function mergeTags(currentTags: string | null | undefined, added: readonly string[]): string {
  const merged = new Set(parseCatalogTags(currentTags));
  for (const tag of added) {
    merged.add(tag);
  }
  return [...merged].sort().join(CATALOG_TAG_SEPARATOR);
}

export function formatTags(tags: readonly string[], maxLength = 50): string {
  const joined = tags.join(STORE_TAG_SEPARATOR);
  if (joined.length > maxLength) {
    return joined.slice(0, maxLength) + '...';
  }
  return joined;
}
