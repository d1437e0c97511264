// app/lib/pipeline/embedding-pipeline.ts
import type { EmbeddingProvider } from '../embedding-provider';
import { ValidationError, type RowTransformError } from '../errors';
import type { ProductIndex } from '../product-index';
import { readCatalogFile, type IngestOptions } from './ingest';
import { persistProducts } from './persist';
import type { SnapshotWriter } from './snapshot';
import { transformRows } from './transform';

export interface PipelineDeps {
  index: ProductIndex;
  embedder: EmbeddingProvider;
  snapshots: SnapshotWriter;
  now?: () => Date;
}

export interface PipelineOptions extends IngestOptions {
  csvPath: string;
  exchangeRate: number;
  batchSize: number;
}

export interface PipelineReport {
  ingested: number;
  transformed: number;
  persisted: number;
  skipped: RowTransformError[];
  snapshotPath: string;
}

/**
 * Products embedding pipeline:
 * 1. Read products from CSV
 * 2. Create text embeddings and USD prices
 * 3. Upsert into the vector index
 * 4. Save a dated Parquet snapshot
 *
 * Runs with the same input and model produce the same index state.
 */
export async function runEmbeddingPipeline(
  deps: PipelineDeps,
  options: PipelineOptions
): Promise<PipelineReport> {
  const { index, embedder, snapshots } = deps;
  const runAt = (deps.now ?? (() => new Date()))();
  const { vectorSize } = index.settings;

  if (embedder.dimensions !== vectorSize) {
    throw new ValidationError(
      `Embedding model ${embedder.model} produces ${embedder.dimensions} dimensions but collection ${index.settings.collectionName} expects ${vectorSize}`
    );
  }

  await index.ensureCollection();

  const rows = await readCatalogFile(options.csvPath, options);

  const transformed = await transformRows(rows, embedder, {
    exchangeRate: options.exchangeRate,
    batchSize: options.batchSize,
    vectorSize,
  });

  const persisted = await persistProducts(index, transformed.products, {
    batchSize: options.batchSize,
  });

  const snapshotPath = await snapshots.write(transformed.products, {
    runAt,
    embeddingModel: embedder.model,
  });

  const report: PipelineReport = {
    ingested: rows.length,
    transformed: transformed.products.length,
    persisted: persisted.persisted,
    skipped: [...transformed.failures, ...persisted.failures],
    snapshotPath,
  };

  console.log('Pipeline completed successfully', {
    ingested: report.ingested,
    persisted: report.persisted,
    skipped: report.skipped.length,
    snapshotPath,
  });
  return report;
}
