/**
 * adminRest.ts
 *
 * Minimal Shopify Admin REST client with:
 * - Rate limit handling (429 + Retry-After)
 * - Exponential backoff on 5xx and network errors
 * - Link header cursor pagination helpers
 *
 * Product tags travel as one comma-space joined string on this API.
 */

import { AuthError, ConfigError, ConnectivityError } from '../errors.js';

export interface ShopifyConfig {
  shopDomain: string;
  adminToken: string;
  apiVersion: string;
  /** Attempts per request before giving up (default 5) */
  maxRetries?: number;
  /** Backoff base; doubles per attempt (default 1000) */
  baseDelayMs?: number;
}

export type HttpMethod = 'GET' | 'PUT';

export interface RestResponse<T> {
  status: number;
  data: T;
  /** Absolute URL of the next page, from the Link header */
  nextPageUrl: string | null;
}

const DEFAULT_API_VERSION = '2024-10';
const MAX_RETRIES = 5;
const BASE_DELAY_MS = 1000;

/**
 * Load Shopify config from environment variables.
 * Supports SHOPIFY_SHOP_URL as well as the SHOPIFY_DOMAIN / SHOPIFY_SHOP_DOMAIN spellings.
 */
export function loadShopifyConfig(env: NodeJS.ProcessEnv = process.env): ShopifyConfig {
  const shopDomain = env.SHOPIFY_SHOP_URL || env.SHOPIFY_DOMAIN || env.SHOPIFY_SHOP_DOMAIN;
  const adminToken = env.SHOPIFY_ACCESS_TOKEN || env.SHOPIFY_ADMIN_TOKEN;
  const apiVersion = env.SHOPIFY_API_VERSION || DEFAULT_API_VERSION;

  if (!shopDomain) {
    throw new ConfigError('Missing SHOPIFY_SHOP_URL environment variable');
  }
  if (!adminToken || adminToken === 'replace_me') {
    throw new ConfigError('Missing SHOPIFY_ACCESS_TOKEN environment variable');
  }

  // Normalize domain (remove https://, trailing slashes)
  const normalizedDomain = shopDomain
    .replace(/^https?:\/\//, '')
    .replace(/\/+$/, '');

  return {
    shopDomain: normalizedDomain,
    adminToken,
    apiVersion,
  };
}

export function adminUrl(config: ShopifyConfig, path: string): string {
  return `https://${config.shopDomain}/admin/api/${config.apiVersion}/${path.replace(/^\/+/, '')}`;
}

/**
 * Extract the rel="next" target from a Link header such as
 * `<https://shop/admin/api/2024-10/products.json?page_info=abc>; rel="next"`.
 */
export function parseNextLink(header: string | null): string | null {
  if (!header) return null;
  // URLs may themselves contain commas (fields=id,title), so scan links rather than split
  for (const match of header.matchAll(/<([^>]+)>\s*;\s*rel="([^"]+)"/g)) {
    if (match[2] === 'next') return match[1];
  }
  return null;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function describeBody(body: unknown): string {
  if (body && typeof body === 'object' && 'errors' in body) {
    return JSON.stringify(body.errors);
  }
  return typeof body === 'string' ? body : JSON.stringify(body);
}

export interface RequestOptions {
  /**
   * Retry 5xx and network failures (default true). Writes that must reach the server at
   * most once pass false; a 429 is still waited out since the request was never processed.
   */
  retry?: boolean;
}

/**
 * Execute an Admin REST request with retry logic.
 * `pathOrUrl` is either a path under /admin/api/{version}/ or an absolute pagination URL.
 */
export async function executeRest<T>(
  config: ShopifyConfig,
  method: HttpMethod,
  pathOrUrl: string,
  body?: unknown,
  options: RequestOptions = {}
): Promise<RestResponse<T>> {
  const url = pathOrUrl.startsWith('https://') ? pathOrUrl : adminUrl(config, pathOrUrl);
  const maxRetries = config.maxRetries ?? MAX_RETRIES;
  const baseDelayMs = config.baseDelayMs ?? BASE_DELAY_MS;
  const retry = options.retry ?? true;

  let attempts = 0;
  let lastError = 'Unknown error';
  let lastStatus: number | undefined;
  let lastCause: unknown;

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    attempts = attempt + 1;
    const isLastAttempt = attempts === maxRetries;
    const backoffMs = baseDelayMs * Math.pow(2, attempt);
    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: {
          'Content-Type': 'application/json',
          'X-Shopify-Access-Token': config.adminToken,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (error) {
      lastError = error instanceof Error ? error.message : String(error);
      lastStatus = undefined;
      lastCause = error;
      if (!retry || isLastAttempt) break;
      await sleep(backoffMs);
      continue;
    }

    // Handle rate limiting (429)
    if (response.status === 429) {
      const retryAfter = response.headers.get('Retry-After');
      const retryAfterSeconds = retryAfter ? parseFloat(retryAfter) : NaN;
      const waitMs = Number.isFinite(retryAfterSeconds) ? retryAfterSeconds * 1000 : backoffMs;
      lastError = 'Rate limited';
      lastStatus = 429;
      if (isLastAttempt) break;
      await sleep(waitMs);
      continue;
    }

    // Handle server errors (5xx)
    if (response.status >= 500) {
      lastError = `Server error ${response.status}`;
      lastStatus = response.status;
      if (!retry || isLastAttempt) break;
      await sleep(backoffMs);
      continue;
    }

    const data = await readBody(response);

    if (response.status === 401 || response.status === 403) {
      throw new AuthError(
        response.status,
        `Shopify rejected the access token for ${config.shopDomain} (HTTP ${response.status})`
      );
    }

    if (!response.ok) {
      throw new ConnectivityError(
        `${method} ${url} failed: HTTP ${response.status} - ${describeBody(data)}`,
        { status: response.status }
      );
    }

    return {
      status: response.status,
      data: data as T,
      nextPageUrl: parseNextLink(response.headers.get('Link')),
    };
  }

  throw new ConnectivityError(
    `${method} ${url} failed after ${attempts} ${attempts === 1 ? 'attempt' : 'attempts'}: ${lastError}`,
    { status: lastStatus, cause: lastCause }
  );
}
