// app/lib/catalog-types.ts
import { z } from 'zod';
import { ValidationError } from './errors';

export type Vector = number[];

// Payload fields as stored next to each vector in the index
export const ProductPayloadSchema = z.object({
  product_id: z.string().min(1),
  product_name: z.string(),
  main_category: z.string(),
  sub_category: z.string(),
  ratings: z.number().optional(),
  no_of_ratings: z.number().int().optional(),
  price: z.string(),
  price_usd: z.string().optional(),
});

export type ProductPayload = z.infer<typeof ProductPayloadSchema>;

export interface Product extends ProductPayload {
  embedding?: Vector;
}

export interface IndexedPoint {
  id: string;
  vector: Vector;
  payload: ProductPayload;
}

export interface StoredPoint {
  id: string;
  payload: ProductPayload;
  vector?: Vector;
}

export interface ScoredPoint {
  id: string;
  payload: ProductPayload;
  // cosine distance, 1 - cos(a, b); lower is closer
  distance: number;
}

export type PayloadFilter = Partial<Pick<ProductPayload, 'product_id' | 'main_category' | 'sub_category'>>;

export interface RecommendedProduct {
  product_id: string;
  category: string;
  sub_category: string;
  price: string | null;
}

export interface RecommendationResult {
  product: RecommendedProduct;
  distance: number;
}

export type RecommendationSet = RecommendationResult[];

export type RecommendationOutcome =
  | { status: 'found'; results: RecommendationSet }
  | { status: 'not_found'; productId: string };

// A catalog row as read from the CSV, before any coercion
export interface CatalogRow {
  product_id?: string;
  product_name: string;
  main_category: string;
  sub_category: string;
  ratings?: string;
  no_of_ratings?: string;
  price: string;
}

export function toPayload(product: Product): ProductPayload {
  return {
    product_id: product.product_id,
    product_name: product.product_name,
    main_category: product.main_category,
    sub_category: product.sub_category,
    ratings: product.ratings,
    no_of_ratings: product.no_of_ratings,
    price: product.price,
    price_usd: product.price_usd,
  };
}

export function toIndexedPoint(product: Product): IndexedPoint {
  if (!product.embedding || product.embedding.length === 0) {
    throw new ValidationError(`Product ${product.product_id} must have an embedding`);
  }
  return {
    id: product.product_id,
    vector: product.embedding,
    payload: toPayload(product),
  };
}

export function toRecommendationResult(point: ScoredPoint): RecommendationResult {
  return {
    product: {
      product_id: point.payload.product_id,
      category: point.payload.main_category,
      sub_category: point.payload.sub_category,
      price: point.payload.price_usd ?? null,
    },
    distance: point.distance,
  };
}
