// app/lib/product-index.ts
import type {
  IndexedPoint,
  PayloadFilter,
  ScoredPoint,
  StoredPoint,
  Vector,
} from './catalog-types';
import { ValidationError } from './errors';

export interface IndexSettings {
  collectionName: string;
  vectorSize: number;
}

export interface IndexStats {
  collectionName: string;
  vectorSize: number;
  points: number;
}

export interface GetOptions {
  withVector?: boolean;
}

// A point the backing store refused on its own merits; the rest of its batch still lands
export interface RejectedPoint {
  id: string;
  reason: string;
}

export interface UpsertResult {
  upserted: number;
  rejected: RejectedPoint[];
}

/**
 * Storage for embedded products: `product_id -> (vector, payload)`.
 *
 * Distances returned by {@link ProductIndex.searchSimilar} are cosine distances
 * (`1 - cos(a, b)`), nearest first. Backing-store failures surface as
 * `IndexUnavailable`; malformed input as `ValidationError`.
 */
export interface ProductIndex {
  readonly settings: IndexSettings;

  /** Creates the collection with cosine distance if it does not exist yet. Idempotent. */
  ensureCollection(): Promise<void>;

  /** Raises `ValidationError` if the store refuses the point. */
  upsertOne(point: IndexedPoint): Promise<void>;

  /**
   * Validates every point before writing any of them. One round trip.
   * Documents the store refuses come back in `rejected`; transport and
   * schema failures still raise `IndexUnavailable`.
   */
  upsertMany(points: readonly IndexedPoint[]): Promise<UpsertResult>;

  /** Resolves to `null` when no point has this id. */
  getById(id: string, options?: GetOptions): Promise<StoredPoint | null>;

  searchSimilar(queryVector: Vector, k: number, filter: PayloadFilter): Promise<ScoredPoint[]>;

  stats(): Promise<IndexStats>;
}

export function assertVector(vector: Vector, vectorSize: number, label: string): void {
  if (vector.length !== vectorSize) {
    throw new ValidationError(
      `${label}: expected a vector of ${vectorSize} dimensions, got ${vector.length}`
    );
  }
  if (!vector.every((value) => Number.isFinite(value))) {
    throw new ValidationError(`${label}: vector contains non-finite values`);
  }
}

export function assertIndexable(point: IndexedPoint, vectorSize: number): void {
  if (!point.id) {
    throw new ValidationError('Point id must not be empty');
  }
  if (point.id !== point.payload.product_id) {
    throw new ValidationError(
      `Point id ${point.id} does not match payload product_id ${point.payload.product_id}`
    );
  }
  assertVector(point.vector, vectorSize, `Product ${point.id}`);
}

export function assertSearchLimit(k: number): void {
  if (!Number.isInteger(k) || k < 1) {
    throw new ValidationError(`k must be a positive integer, got ${k}`);
  }
}

export const FILTER_FIELDS = ['product_id', 'main_category', 'sub_category'] as const;

export function matchesFilter(payload: StoredPoint['payload'], filter: PayloadFilter): boolean {
  return FILTER_FIELDS.every((key) => filter[key] === undefined || payload[key] === filter[key]);
}
