/**
 * importMappings.ts
 *
 * Loads product type → tags rows from a CSV sheet into the mapping database.
 * Expected columns: product_type (or tipo_produto) and tags, tags separated by ';'.
 *
 * Usage:
 *   npx tsx src/cli/importMappings.ts                      # Uses MAPPING_FILE
 *   npx tsx src/cli/importMappings.ts --file mappings.csv
 */

import 'dotenv/config';
import { loadStorageConfig } from '../config/env.js';
import { importMappingSheet } from '../import/mappingSheet.js';
import { MappingStore } from '../store/mappingStore.js';

function parseFileArg(): string | undefined {
  const args = process.argv.slice(2);
  const fileIdx = args.indexOf('--file');
  return fileIdx >= 0 ? args[fileIdx + 1] : undefined;
}

async function main(): Promise<void> {
  const config = loadStorageConfig();
  const filePath = parseFileArg() ?? config.mappingFile;

  console.log(`📥 Importing mappings from ${filePath} into ${config.dbFile}`);

  const store = new MappingStore(config.dbFile);
  try {
    const outcome = importMappingSheet(store, filePath, console);
    if (!outcome.ok) {
      process.exitCode = 1;
      return;
    }
    console.log(`🗄️  Database now holds ${store.count()} mappings.`);
  } finally {
    store.close();
  }
}

main().catch((err) => {
  console.error('\n❌ Import failed:', err);
  process.exit(1);
});
