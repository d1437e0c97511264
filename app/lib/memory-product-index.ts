import type {
  IndexedPoint,
  PayloadFilter,
  ScoredPoint,
  StoredPoint,
  Vector,
} from './catalog-types';
import { IndexUnavailable } from './errors';
import {
  assertIndexable,
  assertSearchLimit,
  assertVector,
  matchesFilter,
  type GetOptions,
  type IndexSettings,
  type IndexStats,
  type ProductIndex,
  type UpsertResult,
} from './product-index';
import { cosineDistance } from './vector';

type RecordEntry = {
  vector: Vector;
  payload: IndexedPoint['payload'];
};

/**
 * Exact k-NN over an in-process map. Used by the tests and for local runs
 * without a Typesense node.
 */
export class MemoryProductIndex implements ProductIndex {
  private records?: Map<string, RecordEntry>;

  constructor(readonly settings: IndexSettings) {}

  async ensureCollection(): Promise<void> {
    if (!this.records) this.records = new Map();
  }

  async upsertOne(point: IndexedPoint): Promise<void> {
    await this.upsertMany([point]);
  }

  async upsertMany(points: readonly IndexedPoint[]): Promise<UpsertResult> {
    const records = this.collection();
    for (const point of points) assertIndexable(point, this.settings.vectorSize);
    for (const point of points) {
      records.set(point.id, { vector: point.vector.slice(), payload: { ...point.payload } });
    }
    return { upserted: points.length, rejected: [] };
  }

  async getById(id: string, options: GetOptions = {}): Promise<StoredPoint | null> {
    const rec = this.collection().get(id);
    if (!rec) return null;
    const point: StoredPoint = { id, payload: { ...rec.payload } };
    if (options.withVector) point.vector = rec.vector.slice();
    return point;
  }

  async searchSimilar(queryVector: Vector, k: number, filter: PayloadFilter): Promise<ScoredPoint[]> {
    const records = this.collection();
    assertSearchLimit(k);
    assertVector(queryVector, this.settings.vectorSize, 'Query');

    const results: ScoredPoint[] = [];
    for (const [id, rec] of records) {
      if (!matchesFilter(rec.payload, filter)) continue;
      results.push({ id, payload: { ...rec.payload }, distance: cosineDistance(queryVector, rec.vector) });
    }
    results.sort((a, b) => a.distance - b.distance);
    return results.slice(0, k);
  }

  async stats(): Promise<IndexStats> {
    return {
      collectionName: this.settings.collectionName,
      vectorSize: this.settings.vectorSize,
      points: this.collection().size,
    };
  }

  private collection(): Map<string, RecordEntry> {
    if (!this.records) {
      throw new IndexUnavailable(`Collection ${this.settings.collectionName} has not been created`);
    }
    return this.records;
  }
}
