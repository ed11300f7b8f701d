import { formatTags, parseCatalogTags, STORE_TAG_SEPARATOR } from '../tagging/reconcile.js';
import type { MappingEntry, Worklist } from '../types/Product.js';

/**
 * Plain text table: header, dashed rule, rows; columns separated by two spaces.
 * Cells longer than their max width are clipped with '…'.
 */
export function renderTable(headers: string[], rows: string[][], maxWidths: number[] = []): string[] {
  const clip = (value: string, index: number): string => {
    const max = maxWidths[index];
    return max && value.length > max ? value.slice(0, max - 1) + '…' : value;
  };

  const cells = rows.map(row => headers.map((_, i) => clip(row[i] ?? '', i)));
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...cells.map(row => row[i].length))
  );
  const line = (row: string[]) => row.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd();

  return [
    line(headers),
    widths.map(width => '-'.repeat(width)).join('  '),
    ...cells.map(line),
  ];
}

export function renderMappingTable(entries: Iterable<MappingEntry>): string[] {
  const rows: string[][] = [];
  for (const entry of entries) {
    rows.push([
      String(entry.id),
      entry.productType,
      entry.tags.join(STORE_TAG_SEPARATOR),
      entry.updatedAt,
    ]);
  }
  if (rows.length === 0) return [];
  return renderTable(['ID', 'Product Type', 'Tags', 'Updated At'], rows, [6, 40, 60, 24]);
}

export function renderWorklistTable(worklist: Worklist): string[] {
  const rows = worklist.map(({ product, tagsToAdd }, i) => [
    String(i + 1),
    product.title.slice(0, 50),
    product.productType,
    formatTags(parseCatalogTags(product.tags)),
    formatTags(tagsToAdd),
  ]);
  return renderTable(['#', 'Title', 'Product Type', 'Current Tags', 'Tags To Add'], rows, [5, 50, 20, 53, 53]);
}
