/**
 * runTagging.ts
 *
 * Adds missing product type tags to every product in the store, once.
 *
 * Usage:
 *   npx tsx src/cli/runTagging.ts          # Show the worklist and ask before writing
 *   npx tsx src/cli/runTagging.ts --yes    # Unattended: write without asking
 */

import 'dotenv/config';
import { loadAppConfig, printCredentialHelp, type AppConfig } from '../config/env.js';
import { setupDatabase } from '../store/bootstrap.js';
import { createConsolePrompter } from './prompt.js';
import { createWorklistReview, runTaggingOnce } from './taskRunners.js';

interface RunOptions {
  unattended: boolean;
}

function printUsage(): void {
  console.log(`
Usage:
  npx tsx src/cli/runTagging.ts [options]

Options:
  --yes, -y   Apply tags without showing the worklist or asking for confirmation
  --help      Show this help message
`);
}

function parseArgs(): RunOptions {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  return {
    unattended: args.includes('--yes') || args.includes('-y'),
  };
}

async function main(): Promise<void> {
  const options = parseArgs();

  let config: AppConfig;
  try {
    config = loadAppConfig();
  } catch (error) {
    console.error('\n❌ Configuration error:', error instanceof Error ? error.message : error);
    printCredentialHelp();
    process.exit(1);
  }

  console.log('🏷️  Product Type Tagging');
  console.log('========================\n');
  console.log(`📍 Store: ${config.shopify.shopDomain}`);
  console.log(`🔒 Mode: ${options.unattended ? 'unattended' : 'interactive'}`);

  const store = setupDatabase({ dbFile: config.dbFile, mappingFile: config.mappingFile, log: console });
  const prompter = options.unattended ? null : createConsolePrompter();

  try {
    const result = await runTaggingOnce({
      shopify: config.shopify,
      mappings: store,
      log: console,
      review: prompter ? createWorklistReview(prompter, console) : undefined,
    });
    if (result.status === 'failed') {
      process.exitCode = 1;
    }
  } finally {
    prompter?.close();
    store.close();
  }
}

main().catch((err) => {
  console.error('\n❌ Tagging failed:', err);
  process.exit(1);
});
