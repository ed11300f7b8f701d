import { executeRest, type ShopifyConfig } from './adminRest.js';
import type { CatalogProduct } from '../types/Product.js';

/** Largest page the products endpoint serves. */
export const MAX_PAGE_SIZE = 250;

export interface ProductPage {
  products: CatalogProduct[];
  hasNext: boolean;
  /** Fetches the following page, or resolves null on the last one. */
  next(): Promise<ProductPage | null>;
}

/**
 * Authenticated handle on the remote catalog. Owned by one run and closed by it.
 */
export interface CatalogSession {
  readonly shopDomain: string;
  findProducts(pageSize: number): Promise<ProductPage>;
  saveProduct(product: CatalogProduct): Promise<void>;
  close(): void;
}

interface RestProduct {
  id: number;
  title: string;
  product_type: string | null;
  tags: string | null;
}

interface ProductsResponse {
  products: RestProduct[];
}

interface ShopResponse {
  shop: { name: string; myshopify_domain: string };
}

const PRODUCT_FIELDS = 'id,title,product_type,tags';

function toCatalogProduct(node: RestProduct): CatalogProduct {
  return {
    id: node.id,
    title: node.title,
    productType: node.product_type ?? '',
    tags: node.tags ?? '',
  };
}

class ShopifyCatalogSession implements CatalogSession {
  private closed = false;

  constructor(private readonly config: ShopifyConfig) {}

  get shopDomain(): string {
    return this.config.shopDomain;
  }

  async findProducts(pageSize: number): Promise<ProductPage> {
    const limit = Math.max(1, Math.min(pageSize, MAX_PAGE_SIZE));
    return this.fetchPage(`products.json?limit=${limit}&fields=${PRODUCT_FIELDS}`);
  }

  /** One attempt per call; a failed write is left for the next run. */
  async saveProduct(product: CatalogProduct): Promise<void> {
    this.assertOpen();
    await executeRest<{ product: RestProduct }>(
      this.config,
      'PUT',
      `products/${product.id}.json`,
      { product: { id: product.id, tags: product.tags } },
      { retry: false }
    );
  }

  close(): void {
    this.closed = true;
  }

  private async fetchPage(pathOrUrl: string): Promise<ProductPage> {
    this.assertOpen();
    const response = await executeRest<ProductsResponse>(this.config, 'GET', pathOrUrl);
    const nextUrl = response.nextPageUrl;
    const products = (response.data?.products ?? []).map(toCatalogProduct);

    return {
      products,
      hasNext: nextUrl !== null,
      next: async () => (nextUrl ? this.fetchPage(nextUrl) : null),
    };
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error(`Catalog session for ${this.config.shopDomain} is closed`);
    }
  }
}

/**
 * Opens a session and checks the credentials against shop.json, so a bad token
 * fails here with an AuthError instead of on the first product page.
 */
export async function openCatalogSession(config: ShopifyConfig): Promise<CatalogSession> {
  await executeRest<ShopResponse>(config, 'GET', 'shop.json');
  return new ShopifyCatalogSession(config);
}
