// app/lib/pipeline/persist.ts
import { toIndexedPoint, type IndexedPoint } from '../catalog-types';
import { RowTransformError, ValidationError } from '../errors';
import { assertIndexable, type ProductIndex } from '../product-index';
import { chunk } from './chunk';
import type { TransformedProduct } from './transform';

export interface PersistOptions {
  batchSize: number;
}

export interface PersistResult {
  persisted: number;
  failures: RowTransformError[];
}

export async function persistProducts(
  index: ProductIndex,
  products: readonly TransformedProduct[],
  options: PersistOptions
): Promise<PersistResult> {
  const failures: RowTransformError[] = [];
  const points: IndexedPoint[] = [];

  for (const product of products) {
    try {
      const point = toIndexedPoint(product);
      assertIndexable(point, index.settings.vectorSize);
      points.push(point);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      const failure = new RowTransformError(error.message, {
        rowIndex: product.rowIndex,
        productId: product.product_id,
      }, { cause: error });
      console.warn(`Skipping product ${product.product_id}: ${failure.message}`);
      failures.push(failure);
    }
  }

  const rowIndexById = new Map(products.map((product) => [product.product_id, product.rowIndex]));
  let persisted = 0;

  // Gateway failures abort the run; re-running is safe since upserts are keyed by id
  for (const batch of chunk(points, options.batchSize)) {
    const result = await index.upsertMany(batch);
    persisted += result.upserted;

    for (const rejected of result.rejected) {
      const failure = new RowTransformError(`Index rejected product ${rejected.id}: ${rejected.reason}`, {
        rowIndex: rowIndexById.get(rejected.id) ?? -1,
        productId: rejected.id,
      });
      console.warn(`Skipping product ${rejected.id}: ${failure.message}`);
      failures.push(failure);
    }

    console.log(`Upserted ${result.upserted} of ${batch.length} products into ${index.settings.collectionName}`);
  }

  return { persisted, failures };
}
