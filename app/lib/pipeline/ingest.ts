// app/lib/pipeline/ingest.ts
import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { CatalogRow } from '../catalog-types';
import { ValidationError } from '../errors';

export interface IngestedRow {
  rowIndex: number;
  product_id: string;
  product_name: string;
  main_category: string;
  sub_category: string;
  ratings?: number;
  no_of_ratings?: number;
  price: string;
}

export type ProductIdAssigner = (row: CatalogRow, rowIndex: number) => string;

export interface IngestOptions {
  assignProductId?: ProductIdAssigner;
}

const CatalogRowSchema = z.object({
  product_id: z.string().optional(),
  product_name: z.string().default(''),
  main_category: z.string().default(''),
  sub_category: z.string().default(''),
  ratings: z.string().optional(),
  no_of_ratings: z.string().optional(),
  price: z.string().default(''),
});

const REQUIRED_COLUMNS = ['product_name', 'main_category', 'sub_category', 'price'] as const;

// Stable across runs, so re-ingesting the same file upserts the same ids
export const contentHashId: ProductIdAssigner = (row) =>
  createHash('sha1')
    .update([row.product_name, row.main_category, row.sub_category, row.price].join('\u0000'))
    .digest('hex')
    .slice(0, 20);

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Strict decimal parse: blank, "Get", "1,234", "0x1F" are all absent
export function parseOptionalNumber(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const text = raw.trim();
  if (!DECIMAL.test(text)) return undefined;
  const value = Number(text);
  return Number.isFinite(value) ? value : undefined;
}

export function parseOptionalInteger(raw: string | undefined): number | undefined {
  const value = parseOptionalNumber(raw);
  return value === undefined ? undefined : Math.trunc(value);
}

export function parseCatalog(text: string, options: IngestOptions = {}): IngestedRow[] {
  const assignProductId = options.assignProductId ?? contentHashId;

  const records: unknown = parse(text, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });

  const parsed = z.array(z.record(z.string(), z.string())).safeParse(records);
  if (!parsed.success) {
    throw new ValidationError(`Catalog is not a table of text columns: ${parsed.error.message}`);
  }

  const [header] = parsed.data;
  if (header) {
    const missing = REQUIRED_COLUMNS.filter((column) => !(column in header));
    if (missing.length > 0) {
      throw new ValidationError(`Catalog is missing columns: ${missing.join(', ')}`);
    }
  }

  return parsed.data.map((record, rowIndex) => {
    const row: CatalogRow = CatalogRowSchema.parse(record);
    const productId = row.product_id?.trim() || assignProductId(row, rowIndex);
    return {
      rowIndex,
      product_id: productId,
      product_name: row.product_name,
      main_category: row.main_category,
      sub_category: row.sub_category,
      ratings: parseOptionalNumber(row.ratings),
      no_of_ratings: parseOptionalInteger(row.no_of_ratings),
      price: row.price,
    };
  });
}

export async function readCatalogFile(path: string, options: IngestOptions = {}): Promise<IngestedRow[]> {
  const text = await readFile(path, 'utf8');
  const rows = parseCatalog(text, options);
  console.log(`Read ${rows.length} catalog rows from ${path}`);
  return rows;
}
