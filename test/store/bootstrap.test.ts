import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { setupDatabase } from '../../src/store/bootstrap.js';
import { MappingStore } from '../../src/store/mappingStore.js';
import { createLog } from '../helpers/fakeCatalog.js';

describe('setupDatabase', () => {
  let dir: string;
  let dbFile: string;
  let mappingFile: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'bootstrap-'));
    dbFile = join(dir, 'product_tags.db');
    mappingFile = join(dir, 'product_type_tags.csv');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates the database and seeds it from the sheet', () => {
    writeFileSync(mappingFile, 'product_type,tags\nShoes,sale;new\nHats,wool\n');
    const log = createLog();

    const store = setupDatabase({ dbFile, mappingFile, log });

    expect(store.count()).toBe(2);
    expect(store.loadAllAsMapping().get('Shoes')).toEqual(['sale', 'new']);
    expect(log.log).toHaveBeenCalledWith(
      `🗄️  Database not found. Created '${dbFile}', seeding from '${mappingFile}'...`
    );
    store.close();
  });

  it('starts empty when there is no sheet', () => {
    const log = createLog();

    const store = setupDatabase({ dbFile, mappingFile, log });

    expect(store.count()).toBe(0);
    expect(log.warn).toHaveBeenCalledWith(
      `⚠️  Mapping file '${mappingFile}' not found. Starting with an empty database.`
    );
    store.close();
  });

  it('leaves a populated database alone', () => {
    const existing = new MappingStore(dbFile);
    existing.upsert('Bags', ['leather']);
    existing.close();
    writeFileSync(mappingFile, 'product_type,tags\nShoes,sale\n');
    const log = createLog();

    const store = setupDatabase({ dbFile, mappingFile, log });

    expect(store.count()).toBe(1);
    expect(store.get('Shoes')).toBeNull();
    expect(log.log).toHaveBeenCalledWith('🗄️  Database found with 1 mappings.');
    store.close();
  });

  it('seeds an existing but empty database', () => {
    new MappingStore(dbFile).close();
    writeFileSync(mappingFile, 'product_type,tags\nShoes,sale\n');
    const log = createLog();

    const store = setupDatabase({ dbFile, mappingFile, log });

    expect(store.count()).toBe(1);
    expect(log.log).toHaveBeenCalledWith('🗄️  Database is empty. Seeding from mapping sheet...');
    store.close();
  });
});
