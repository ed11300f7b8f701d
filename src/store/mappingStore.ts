import Database from 'better-sqlite3';
import { ValidationError } from '../errors.js';
import { parseStoredTags, STORE_TAG_SEPARATOR } from '../tagging/reconcile.js';
import type { MappingEntry, MappingRow, TagMapping } from '../types/Product.js';

interface MappingRowRecord {
  id: number;
  product_type: string;
  tags: string;
  created_at: string;
  updated_at: string;
}

export interface UpsertResult {
  entry: MappingEntry;
  created: boolean;
}

export interface BulkImportResult {
  imported: number;
  skipped: number;
}

export interface MappingStoreOptions {
  /** Clock used for created_at / updated_at */
  now?: () => Date;
}

function mapEntry(row: MappingRowRecord): MappingEntry {
  return {
    id: row.id,
    productType: row.product_type,
    tags: parseStoredTags(row.tags),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function normalizeTags(productType: string, tags: readonly string[]): string[] {
  const cleaned = tags.map(tag => tag.trim()).filter(Boolean);
  if (cleaned.length === 0) {
    throw new ValidationError(`At least one tag is required for product type '${productType}'`);
  }
  const withSeparator = cleaned.find(tag => tag.includes(STORE_TAG_SEPARATOR));
  if (withSeparator !== undefined) {
    throw new ValidationError(`Tag '${withSeparator}' must not contain '${STORE_TAG_SEPARATOR}'`);
  }
  return cleaned;
}

/**
 * Product type → tags table backed by better-sqlite3.
 * Every call reads or writes the database; statements auto-commit.
 * Pass ':memory:' for tests.
 */
export class MappingStore {
  readonly db: Database.Database;
  private readonly now: () => Date;

  constructor(dbPath: string = ':memory:', options: MappingStoreOptions = {}) {
    this.db = new Database(dbPath);
    this.now = options.now ?? (() => new Date());
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS product_type_tags (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        product_type TEXT UNIQUE NOT NULL,
        tags TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      );
    `);
  }

  close(): void {
    this.db.close();
  }

  get(productType: string): MappingEntry | null {
    const row = this.db
      .prepare('SELECT * FROM product_type_tags WHERE product_type = ?')
      .get(productType) as MappingRowRecord | undefined;
    return row ? mapEntry(row) : null;
  }

  count(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS total FROM product_type_tags').get() as { total: number };
    return row.total;
  }

  upsert(productType: string, tags: readonly string[]): UpsertResult {
    const key = productType.trim();
    if (!key) {
      throw new ValidationError('Product type is required');
    }
    const stored = normalizeTags(key, tags).join(STORE_TAG_SEPARATOR);

    const write = this.db.transaction((): UpsertResult => {
      const existing = this.get(key);
      this.writeRow(key, stored);
      const entry = this.get(key);
      if (!entry) {
        throw new Error(`Mapping for '${key}' was not persisted`);
      }
      return { entry, created: existing === null };
    });

    return write();
  }

  remove(productType: string): boolean {
    const result = this.db.prepare('DELETE FROM product_type_tags WHERE product_type = ?').run(productType.trim());
    return result.changes > 0;
  }

  /**
   * Entries ordered by product type. Each call starts a fresh iteration;
   * the database connection is busy until the iterator is exhausted or returned.
   */
  *listAll(): IterableIterator<MappingEntry> {
    const stmt = this.db.prepare('SELECT * FROM product_type_tags ORDER BY product_type');
    for (const row of stmt.iterate()) {
      yield mapEntry(row as MappingRowRecord);
    }
  }

  loadAllAsMapping(): TagMapping {
    const rows = this.db
      .prepare('SELECT product_type, tags FROM product_type_tags')
      .all() as Array<Pick<MappingRowRecord, 'product_type' | 'tags'>>;

    const mapping = new Map<string, string[]>();
    for (const row of rows) {
      mapping.set(row.product_type, parseStoredTags(row.tags));
    }
    return mapping;
  }

  /**
   * Upserts every row with both fields present. Rows with a blank field, or whose
   * tags cannot be stored, are counted as skipped and never abort the import.
   */
  bulkImport(rows: Iterable<MappingRow>): BulkImportResult {
    const run = this.db.transaction((input: Iterable<MappingRow>): BulkImportResult => {
      let imported = 0;
      let skipped = 0;
      for (const row of input) {
        const productType = row.productType.trim();
        const tags = row.tags.trim();
        if (!productType || !tags) {
          skipped++;
          continue;
        }
        const parsed = parseStoredTags(tags);
        if (parsed.length === 0) {
          skipped++;
          continue;
        }
        this.writeRow(productType, parsed.join(STORE_TAG_SEPARATOR));
        imported++;
      }
      return { imported, skipped };
    });

    return run(rows);
  }

  private writeRow(productType: string, tags: string): void {
    const now = this.now().toISOString();
    this.db.prepare(`
      INSERT INTO product_type_tags (product_type, tags, created_at, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(product_type) DO UPDATE SET
        tags = excluded.tags,
        updated_at = excluded.updated_at
    `).run(productType, tags, now, now);
  }
}
