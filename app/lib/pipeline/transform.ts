// app/lib/pipeline/transform.ts
import type { Product } from '../catalog-types';
import type { EmbeddingProvider } from '../embedding-provider';
import { RowTransformError } from '../errors';
import { chunk } from './chunk';
import type { IngestedRow } from './ingest';

export interface TransformOptions {
  exchangeRate: number;
  batchSize: number;
  vectorSize: number;
}

export interface TransformedProduct extends Product {
  rowIndex: number;
  embedding: number[];
  price_usd: string;
}

export interface TransformResult {
  products: TransformedProduct[];
  failures: RowTransformError[];
}

const CURRENCY_SYMBOLS = /[฿$€£¥₹]/g;

export function buildEmbeddingText(row: Pick<IngestedRow, 'product_name' | 'main_category' | 'sub_category'>): string {
  return `${row.product_name}. Category: ${row.main_category}. Sub-category: ${row.sub_category}`;
}

/**
 * "฿7,999" at 0.035 -> "$279.97". Anything that does not parse as a
 * decimal after dropping the currency symbol and separators comes back as is.
 */
export function convertPriceToUsd(price: string, exchangeRate: number): string {
  const cleaned = price.replace(CURRENCY_SYMBOLS, '').replace(/,/g, '').trim();
  if (!/^[+-]?(\d+\.?\d*|\.\d+)$/.test(cleaned)) return price;

  const priceUsd = Number(cleaned) * exchangeRate;
  if (!Number.isFinite(priceUsd)) return price;
  return `$${priceUsd.toFixed(2)}`;
}

function checkRow(row: IngestedRow): void {
  const blank = (['product_name', 'main_category', 'sub_category'] as const).filter(
    (field) => row[field].trim() === ''
  );
  if (blank.length > 0) {
    throw new RowTransformError(`Row ${row.rowIndex} has blank ${blank.join(', ')}`, {
      rowIndex: row.rowIndex,
      productId: row.product_id,
    });
  }
}

export async function transformRows(
  rows: readonly IngestedRow[],
  embedder: EmbeddingProvider,
  options: TransformOptions
): Promise<TransformResult> {
  const failures: RowTransformError[] = [];
  const valid: IngestedRow[] = [];

  for (const row of rows) {
    try {
      checkRow(row);
      valid.push(row);
    } catch (error) {
      if (!(error instanceof RowTransformError)) throw error;
      console.warn(`Skipping catalog row: ${error.message}`);
      failures.push(error);
    }
  }

  const products: TransformedProduct[] = [];
  for (const batch of chunk(valid, options.batchSize)) {
    const vectors = await embedder.embed(batch.map(buildEmbeddingText));

    batch.forEach((row, i) => {
      const embedding = vectors[i] ?? [];
      if (embedding.length !== options.vectorSize) {
        const failure = new RowTransformError(
          `Row ${row.rowIndex} got a ${embedding.length}-dimensional embedding, expected ${options.vectorSize}`,
          { rowIndex: row.rowIndex, productId: row.product_id }
        );
        console.warn(`Skipping catalog row: ${failure.message}`);
        failures.push(failure);
        return;
      }

      products.push({
        rowIndex: row.rowIndex,
        product_id: row.product_id,
        product_name: row.product_name,
        main_category: row.main_category,
        sub_category: row.sub_category,
        ratings: row.ratings,
        no_of_ratings: row.no_of_ratings,
        price: row.price,
        price_usd: convertPriceToUsd(row.price, options.exchangeRate),
        embedding,
      });
    });
  }

  console.log(`Transformed ${products.length} of ${rows.length} rows`, {
    model: embedder.model,
    skipped: failures.length,
  });
  return { products, failures };
}
