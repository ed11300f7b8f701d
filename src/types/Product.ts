/** A catalog product as the tagger sees it. `tags` is the catalog's comma-space joined string. */
export interface CatalogProduct {
  id: number;
  title: string;
  productType: string;
  tags: string;
}

export interface WorklistItem {
  product: CatalogProduct;
  tagsToAdd: string[];
}

export type Worklist = WorklistItem[];

/** Product type → tags owed to every product of that type. */
export type TagMapping = ReadonlyMap<string, string[]>;

export interface MappingEntry {
  id: number;
  productType: string;
  tags: string[];
  createdAt: string;
  updatedAt: string;
}

export interface MappingRow {
  productType: string;
  tags: string;
}

/** Console-shaped sink so library code can be exercised without printing. */
export type RunLog = Pick<Console, 'log' | 'warn' | 'error'>;
