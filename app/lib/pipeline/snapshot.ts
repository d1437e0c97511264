// app/lib/pipeline/snapshot.ts
import { mkdir, stat } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import type { TransformedProduct } from './transform';

export interface SnapshotContext {
  runAt: Date;
  embeddingModel: string;
}

export interface SnapshotWriter {
  /** Writes one immutable archive file for this run and returns its path. */
  write(products: readonly TransformedProduct[], context: SnapshotContext): Promise<string>;
}

type SnapshotRow = {
  product_id: string;
  product_name: string;
  main_category: string;
  sub_category: string;
  ratings?: number;
  no_of_ratings?: number;
  price: string;
  price_usd: string;
  embedding: number[];
  embedding_model: string;
  ingested_at: Date;
};

export const snapshotSchema = new ParquetSchema({
  product_id: { type: 'UTF8' },
  product_name: { type: 'UTF8' },
  main_category: { type: 'UTF8' },
  sub_category: { type: 'UTF8' },
  ratings: { type: 'DOUBLE', optional: true },
  no_of_ratings: { type: 'INT64', optional: true },
  price: { type: 'UTF8' },
  price_usd: { type: 'UTF8' },
  embedding: { type: 'DOUBLE', repeated: true },
  embedding_model: { type: 'UTF8' },
  ingested_at: { type: 'TIMESTAMP_MILLIS' },
});

// date=YYYY-MM-DD/products-<compact ISO timestamp>.parquet, both in UTC
export function snapshotPath(baseDir: string, runAt: Date): string {
  const iso = runAt.toISOString();
  const partition = `date=${iso.slice(0, 10)}`;
  const stamp = iso.replace(/[-:.]/g, '');
  return join(baseDir, partition, `products-${stamp}.parquet`);
}

function toSnapshotRow(product: TransformedProduct, context: SnapshotContext): SnapshotRow {
  const row: SnapshotRow = {
    product_id: product.product_id,
    product_name: product.product_name,
    main_category: product.main_category,
    sub_category: product.sub_category,
    price: product.price,
    price_usd: product.price_usd,
    embedding: product.embedding,
    embedding_model: context.embeddingModel,
    ingested_at: context.runAt,
  };
  if (product.ratings !== undefined) row.ratings = product.ratings;
  if (product.no_of_ratings !== undefined) row.no_of_ratings = product.no_of_ratings;
  return row;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false;
    throw error;
  }
}

export class ParquetSnapshotWriter implements SnapshotWriter {
  constructor(private readonly baseDir: string) {}

  async write(products: readonly TransformedProduct[], context: SnapshotContext): Promise<string> {
    const path = snapshotPath(this.baseDir, context.runAt);
    if (await fileExists(path)) {
      throw new Error(`Snapshot ${path} already exists; archives are never overwritten`);
    }

    await mkdir(dirname(path), { recursive: true });
    const writer = await ParquetWriter.openFile(snapshotSchema, path);
    try {
      for (const product of products) {
        await writer.appendRow(toSnapshotRow(product, context));
      }
    } finally {
      await writer.close();
    }

    console.log(`Wrote snapshot of ${products.length} products to ${path}`);
    return path;
  }
}
