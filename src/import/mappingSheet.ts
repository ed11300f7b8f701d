/**
 * Mapping sheet import.
 *
 * Reads `product_type` (or `tipo_produto`) and `tags` columns from a CSV export and
 * bulk-loads them into the mapping store. Tags inside a cell are separated by `;`.
 */

import { existsSync, readFileSync } from 'fs';
import { extname } from 'path';
import { parse } from 'csv-parse/sync';
import { SourceDataError, type TaggingError } from '../errors.js';
import type { BulkImportResult, MappingStore } from '../store/mappingStore.js';
import type { MappingRow, RunLog } from '../types/Product.js';

const PRODUCT_TYPE_COLUMNS = ['product_type', 'tipo_produto'];
const TAGS_COLUMNS = ['tags'];

export type ImportOutcome =
  | ({ ok: true; filePath: string } & BulkImportResult)
  | { ok: false; filePath: string; error: TaggingError };

function findColumn(headers: string[], candidates: string[]): string | undefined {
  return headers.find(header => candidates.includes(header.trim().toLowerCase()));
}

export function readMappingSheet(filePath: string): MappingRow[] {
  if (!existsSync(filePath)) {
    throw new SourceDataError(filePath, `Mapping file '${filePath}' not found`);
  }
  if (extname(filePath).toLowerCase() !== '.csv') {
    throw new SourceDataError(filePath, `Mapping file '${filePath}' must be a .csv export`);
  }

  let records: Record<string, string>[];
  try {
    records = parse(readFileSync(filePath, 'utf-8'), {
      columns: true,
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    }) as Record<string, string>[];
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SourceDataError(filePath, `Could not parse '${filePath}': ${message}`, { cause: error });
  }

  const headers = records.length > 0 ? Object.keys(records[0]) : readHeaderLine(filePath);
  const typeColumn = findColumn(headers, PRODUCT_TYPE_COLUMNS);
  const tagsColumn = findColumn(headers, TAGS_COLUMNS);
  if (!typeColumn) {
    throw new SourceDataError(filePath, `Column 'product_type' was not found in '${filePath}'`);
  }
  if (!tagsColumn) {
    throw new SourceDataError(filePath, `Column 'tags' was not found in '${filePath}'`);
  }

  return records.map(record => ({
    productType: record[typeColumn] ?? '',
    tags: record[tagsColumn] ?? '',
  }));
}

function readHeaderLine(filePath: string): string[] {
  const [header] = parse(readFileSync(filePath, 'utf-8'), { bom: true, to_line: 1 }) as string[][];
  return header ?? [];
}

/**
 * Reads the sheet and upserts its rows. A sheet problem is reported and leaves the
 * store untouched.
 */
export function importMappingSheet(store: MappingStore, filePath: string, log: RunLog): ImportOutcome {
  let rows: MappingRow[];
  try {
    rows = readMappingSheet(filePath);
  } catch (error) {
    if (!(error instanceof SourceDataError)) throw error;
    log.error(`❌ ${error.message}`);
    return { ok: false, filePath, error };
  }

  const result = store.bulkImport(rows);
  log.log(`✅ Imported ${result.imported} mappings from '${filePath}'` +
    (result.skipped > 0 ? ` (${result.skipped} incomplete rows skipped)` : ''));
  return { ok: true, filePath, ...result };
}
