import { beforeEach, describe, expect, it } from 'vitest';
import type { IndexedPoint, Vector } from './catalog-types';
import { IndexUnavailable, ValidationError } from './errors';
import { MemoryProductIndex } from './memory-product-index';

function point(id: string, subCategory: string, vector: Vector): IndexedPoint {
  return {
    id,
    vector,
    payload: {
      product_id: id,
      product_name: `Product ${id}`,
      main_category: 'electronics',
      sub_category: subCategory,
      price: '฿100',
      price_usd: '$3.50',
    },
  };
}

describe('MemoryProductIndex', () => {
  let index: MemoryProductIndex;

  beforeEach(async () => {
    index = new MemoryProductIndex({ collectionName: 'products-test', vectorSize: 3 });
    await index.ensureCollection();
  });

  it('refuses reads and writes before the collection exists', async () => {
    const fresh = new MemoryProductIndex({ collectionName: 'fresh', vectorSize: 3 });

    await expect(fresh.getById('P1')).rejects.toBeInstanceOf(IndexUnavailable);
    await expect(fresh.upsertOne(point('P1', 'Smartphones', [1, 0, 0]))).rejects.toBeInstanceOf(
      IndexUnavailable
    );
  });

  it('keeps existing points when ensureCollection runs again', async () => {
    await index.upsertOne(point('P1', 'Smartphones', [1, 0, 0]));
    await index.ensureCollection();

    expect((await index.stats()).points).toBe(1);
  });

  it('returns null for an unknown id', async () => {
    expect(await index.getById('missing')).toBeNull();
  });

  it('returns the vector only when asked for it', async () => {
    await index.upsertOne(point('P1', 'Smartphones', [1, 2, 3]));

    const withoutVector = await index.getById('P1');
    const withVector = await index.getById('P1', { withVector: true });

    expect(withoutVector?.vector).toBeUndefined();
    expect(withoutVector?.payload.sub_category).toBe('Smartphones');
    expect(withVector?.vector).toEqual([1, 2, 3]);
  });

  it('rejects a vector of the wrong length and leaves the id untouched', async () => {
    await expect(index.upsertOne(point('P1', 'Smartphones', [1, 0]))).rejects.toThrow(
      'Product P1: expected a vector of 3 dimensions, got 2'
    );
    expect(await index.getById('P1')).toBeNull();
  });

  it('writes nothing from a batch that contains an invalid point', async () => {
    const batch = [point('P1', 'Smartphones', [1, 0, 0]), point('P2', 'Smartphones', [1, 0, 0, 0])];

    await expect(index.upsertMany(batch)).rejects.toBeInstanceOf(ValidationError);
    expect((await index.stats()).points).toBe(0);
  });

  it('overwrites a point with the same id', async () => {
    await index.upsertOne(point('P1', 'Smartphones', [1, 0, 0]));
    await index.upsertOne(point('P1', 'Laptops', [0, 1, 0]));

    const stored = await index.getById('P1', { withVector: true });
    expect((await index.stats()).points).toBe(1);
    expect(stored?.payload.sub_category).toBe('Laptops');
    expect(stored?.vector).toEqual([0, 1, 0]);
  });

  it('returns the nearest matching points by ascending cosine distance', async () => {
    const written = await index.upsertMany([
      point('far', 'Smartphones', [0, 1, 0]),
      point('near', 'Smartphones', [1, 0.1, 0]),
      point('same', 'Smartphones', [2, 0, 0]),
      point('other', 'Laptops', [1, 0, 0]),
    ]);
    expect(written).toEqual({ upserted: 4, rejected: [] });

    const results = await index.searchSimilar([1, 0, 0], 2, { sub_category: 'Smartphones' });

    expect(results.map((r) => r.id)).toEqual(['same', 'near']);
    expect(results[0]?.distance).toBeCloseTo(0, 10);
    expect(results[1]?.distance).toBeCloseTo(1 - 1 / Math.sqrt(1.01), 10);
  });

  it('validates the search arguments', async () => {
    await expect(index.searchSimilar([1, 0], 2, {})).rejects.toBeInstanceOf(ValidationError);
    await expect(index.searchSimilar([1, 0, 0], 0, {})).rejects.toThrow(
      'k must be a positive integer, got 0'
    );
  });
});
