import { ConfigError } from '../errors.js';
import { loadShopifyConfig, type ShopifyConfig } from '../shopify/adminRest.js';

export interface StorageConfig {
  dbFile: string;
  mappingFile: string;
}

export interface AppConfig extends StorageConfig {
  shopify: ShopifyConfig;
  intervalHours: number;
}

export const DEFAULT_DB_FILE = 'product_tags.db';
export const DEFAULT_MAPPING_FILE = 'product_type_tags.csv';
export const DEFAULT_INTERVAL_HOURS = 6;
/** Largest whole number of hours a Node timer can wait. */
export const MAX_INTERVAL_HOURS = 596;

export function parseIntervalHours(value: string | undefined): number {
  if (value === undefined || value.trim() === '') return DEFAULT_INTERVAL_HOURS;
  const hours = Number(value);
  if (!Number.isFinite(hours) || hours <= 0) {
    throw new ConfigError(`Interval must be a positive number of hours, got '${value}'`);
  }
  if (hours > MAX_INTERVAL_HOURS) {
    throw new ConfigError(`Interval must be at most ${MAX_INTERVAL_HOURS} hours, got '${value}'`);
  }
  return hours;
}

export function loadStorageConfig(env: NodeJS.ProcessEnv = process.env): StorageConfig {
  return {
    dbFile: env.DB_FILE || DEFAULT_DB_FILE,
    mappingFile: env.MAPPING_FILE || DEFAULT_MAPPING_FILE,
  };
}

/**
 * Reads the whole app configuration from the environment (populated from .env by
 * the CLI entry points). Throws ConfigError when credentials are missing.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    ...loadStorageConfig(env),
    shopify: loadShopifyConfig(env),
    intervalHours: parseIntervalHours(env.TAGGING_INTERVAL_HOURS),
  };
}

export function printCredentialHelp(log: Pick<Console, 'error'> = console): void {
  log.error('');
  log.error('To set up Shopify Admin API access:');
  log.error('');
  log.error('1. In the Shopify admin, open Settings → Apps and sales channels → Develop apps');
  log.error('2. Create an app with the Admin API scopes read_products and write_products');
  log.error('3. Install the app and copy the Admin API access token');
  log.error('4. Edit .env and set:');
  log.error('   SHOPIFY_SHOP_URL=your-store.myshopify.com');
  log.error('   SHOPIFY_ACCESS_TOKEN=<admin api access token>');
  log.error('   SHOPIFY_API_VERSION=2024-10');
  log.error('');
}
