import { existsSync } from 'fs';
import { importMappingSheet } from '../import/mappingSheet.js';
import { MappingStore, type MappingStoreOptions } from './mappingStore.js';
import type { RunLog } from '../types/Product.js';

export interface SetupDatabaseOptions extends MappingStoreOptions {
  dbFile: string;
  mappingFile: string;
  log: RunLog;
}

/**
 * Opens the mapping database, creating it when needed. A new or empty database is
 * seeded from the mapping sheet when one exists.
 */
export function setupDatabase(options: SetupDatabaseOptions): MappingStore {
  const { dbFile, mappingFile, log } = options;
  const existed = dbFile !== ':memory:' && existsSync(dbFile);
  const store = new MappingStore(dbFile, { now: options.now });

  const count = store.count();
  if (existed && count > 0) {
    log.log(`🗄️  Database found with ${count} mappings.`);
    return store;
  }

  log.log(existed
    ? '🗄️  Database is empty. Seeding from mapping sheet...'
    : `🗄️  Database not found. Created '${dbFile}', seeding from '${mappingFile}'...`);

  if (!existsSync(mappingFile)) {
    log.warn(`⚠️  Mapping file '${mappingFile}' not found. Starting with an empty database.`);
    return store;
  }

  importMappingSheet(store, mappingFile, log);
  return store;
}
