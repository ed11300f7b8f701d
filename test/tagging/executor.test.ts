import { describe, it, expect, vi } from 'vitest';
import { applyWorklist } from '../../src/tagging/executor.js';
import { RemoteWriteError } from '../../src/errors.js';
import { FakeCatalogSession, product } from '../helpers/fakeCatalog.js';
import type { Worklist } from '../../src/types/Product.js';

describe('applyWorklist', () => {
  const worklist: Worklist = [
    { product: product(1, 'Shoes', 'old, sale'), tagsToAdd: ['new'] },
    { product: product(2, 'Shoes', ''), tagsToAdd: ['sale', 'new'] },
    { product: product(3, 'Bags', 'leather'), tagsToAdd: ['gift'] },
  ];

  it('keeps going after a failed write and counts successes', async () => {
    const session = new FakeCatalogSession([], { failSaveFor: [2] });
    const onFailed = vi.fn();

    const result = await applyWorklist(session, worklist, { onFailed });

    expect(result.successCount).toBe(2);
    expect(result.totalCount).toBe(3);
    expect(session.saved.map(p => [p.id, p.tags])).toEqual([
      [1, 'new, old, sale'],
      [3, 'gift, leather'],
    ]);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0].item).toBe(worklist[1]);
    expect(result.failures[0].error).toBeInstanceOf(RemoteWriteError);
    expect(result.failures[0].error.productId).toBe(2);
    expect(result.failures[0].error.message).toBe(
      "Failed to update product 'Product 2': HTTP 422 for product 2"
    );
    expect(onFailed).toHaveBeenCalledTimes(1);
  });

  it('reports each applied product with its new tags', async () => {
    const session = new FakeCatalogSession([]);
    const onApplied = vi.fn();

    await applyWorklist(session, worklist.slice(0, 1), { onApplied });

    expect(onApplied).toHaveBeenCalledWith(worklist[0], 'new, old, sale');
  });

  it('does not record a saved product as failed when the applied hook throws', async () => {
    const session = new FakeCatalogSession([]);
    const onFailed = vi.fn();
    const onApplied = vi.fn(() => {
      throw new Error('display closed');
    });

    await expect(applyWorklist(session, worklist.slice(0, 1), { onApplied, onFailed })).rejects.toThrow(
      'display closed'
    );
    expect(session.saved.map(p => p.id)).toEqual([1]);
    expect(onFailed).not.toHaveBeenCalled();
  });

  it('does not modify the worklist products', async () => {
    const session = new FakeCatalogSession([]);

    await applyWorklist(session, worklist);

    expect(worklist[0].product.tags).toBe('old, sale');
  });

  it('handles an empty worklist', async () => {
    const session = new FakeCatalogSession([]);
    expect(await applyWorklist(session, [])).toEqual({ successCount: 0, totalCount: 0, failures: [] });
  });
});
