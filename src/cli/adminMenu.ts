import { ValidationError } from '../errors.js';
import { importMappingSheet } from '../import/mappingSheet.js';
import { STORE_TAG_SEPARATOR } from '../tagging/reconcile.js';
import { confirm, type Prompter } from './prompt.js';
import { renderMappingTable } from './display.js';
import type { MappingStore } from '../store/mappingStore.js';
import type { RunLog } from '../types/Product.js';

export interface AdminMenuDeps {
  store: MappingStore;
  prompter: Prompter;
  log: RunLog;
  mappingFile: string;
  intervalHours: number;
  runInteractive: () => Promise<void>;
  startSchedule: () => Promise<void>;
}

const MENU = [
  '',
  '==== PRODUCT TYPE → TAGS MAPPINGS ====',
  '1. List all mappings',
  '2. Add or update a mapping',
  '3. Remove a mapping',
  '4. Import mappings from sheet',
  '5. Run tag update',
  '6. Start scheduled runs',
  '0. Exit',
];

function listMappings({ store, log }: AdminMenuDeps): void {
  const lines = renderMappingTable(store.listAll());
  if (lines.length === 0) {
    log.log('No mappings found in the database.');
    return;
  }
  log.log('\nProduct type → tags mappings:');
  for (const line of lines) {
    log.log(line);
  }
  log.log(`\nTotal mappings: ${store.count()}`);
}

async function addOrUpdateMapping(deps: AdminMenuDeps): Promise<void> {
  const { store, prompter, log } = deps;
  const productType = (await prompter.ask('Product type: ')).trim();
  const tags = (await prompter.ask(`Tags separated by ${STORE_TAG_SEPARATOR} `)).trim();
  if (!productType || !tags) {
    log.log('Product type and tags are required.');
    return;
  }

  if (store.get(productType)) {
    const overwrite = await confirm(prompter, `Product type '${productType}' already exists. Update it? (y/n): `, log);
    if (!overwrite) {
      log.log('Operation cancelled.');
      return;
    }
  }

  try {
    const { created } = store.upsert(productType, tags.split(STORE_TAG_SEPARATOR));
    log.log(created
      ? `✅ Added mapping for '${productType}'.`
      : `✅ Updated mapping for '${productType}'.`);
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    log.error(`❌ ${error.message}`);
  }
}

async function removeMapping(deps: AdminMenuDeps): Promise<void> {
  const { store, prompter, log } = deps;
  const productType = (await prompter.ask('Product type to remove: ')).trim();
  if (!productType) {
    log.log('Product type is required.');
    return;
  }
  if (!(await confirm(prompter, `Remove the mapping for '${productType}'? (y/n): `, log))) {
    return;
  }
  log.log(store.remove(productType)
    ? `✅ Removed mapping for '${productType}'.`
    : `Product type '${productType}' not found.`);
}

async function importSheet(deps: AdminMenuDeps): Promise<void> {
  const { store, prompter, log, mappingFile } = deps;
  if (await confirm(prompter, `This imports mappings from '${mappingFile}'. Continue? (y/n): `, log)) {
    importMappingSheet(store, mappingFile, log);
  }
}

async function scheduleRuns(deps: AdminMenuDeps): Promise<void> {
  const { prompter, log, intervalHours } = deps;
  if (await confirm(prompter, `Run tagging automatically every ${intervalHours} hours? (y/n): `, log)) {
    await deps.startSchedule();
  } else {
    log.log('Scheduling cancelled.');
  }
}

/** Returns false when the operator chose to exit. */
export async function handleMenuChoice(choice: string, deps: AdminMenuDeps): Promise<boolean> {
  switch (choice.trim()) {
    case '1':
      listMappings(deps);
      return true;
    case '2':
      await addOrUpdateMapping(deps);
      return true;
    case '3':
      await removeMapping(deps);
      return true;
    case '4':
      await importSheet(deps);
      return true;
    case '5':
      await deps.runInteractive();
      return true;
    case '6':
      await scheduleRuns(deps);
      return true;
    case '0':
      deps.log.log('Exiting...');
      return false;
    default:
      deps.log.log('Invalid option. Try again.');
      return true;
  }
}

export async function runAdminMenu(deps: AdminMenuDeps): Promise<void> {
  let keepGoing = true;
  while (keepGoing) {
    for (const line of MENU) {
      deps.log.log(line);
    }
    const choice = await deps.prompter.ask('\nChoose an option: ');
    keepGoing = await handleMenuChoice(choice, deps);
  }
}
