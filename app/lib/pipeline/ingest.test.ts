import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ValidationError } from '../errors';
import {
  contentHashId,
  parseCatalog,
  parseOptionalInteger,
  parseOptionalNumber,
  readCatalogFile,
} from './ingest';

const CATALOG = [
  '\uFEFFproduct_id,product_name,main_category,sub_category,ratings,no_of_ratings,price',
  'P1,Phone A,tv audio cameras,Smartphones,4.2,1020,"฿7,999"',
  'P2,Phone B,tv audio cameras,Smartphones,,Get,N/A',
  'P3,Phone C,tv audio cameras,Smartphones,abc,"1,234",฿100',
  'P4,Phone D,tv audio cameras,Smartphones, 3.5 ,12.7,฿10',
].join('\n');

describe('numeric coercion', () => {
  it('parses decimals and treats blank or non-numeric text as absent', () => {
    expect(parseOptionalNumber('4.2')).toBe(4.2);
    expect(parseOptionalNumber('')).toBeUndefined();
    expect(parseOptionalNumber('   ')).toBeUndefined();
    expect(parseOptionalNumber(undefined)).toBeUndefined();
    expect(parseOptionalNumber('Get')).toBeUndefined();
    expect(parseOptionalNumber('1,234')).toBeUndefined();
  });

  it('accepts only decimal notation', () => {
    expect(parseOptionalNumber('1e3')).toBe(1000);
    expect(parseOptionalNumber('-.5')).toBe(-0.5);
    expect(parseOptionalNumber('0x1F')).toBeUndefined();
    expect(parseOptionalNumber('0b11')).toBeUndefined();
    expect(parseOptionalNumber('Infinity')).toBeUndefined();
  });

  it('truncates counts to integers', () => {
    expect(parseOptionalInteger('12.7')).toBe(12);
    expect(parseOptionalInteger('0')).toBe(0);
    expect(parseOptionalInteger('n/a')).toBeUndefined();
  });
});

describe('parseCatalog', () => {
  it('reads rows and coerces ratings columns', () => {
    const rows = parseCatalog(CATALOG);

    expect(rows).toHaveLength(4);
    expect(rows[0]).toEqual({
      rowIndex: 0,
      product_id: 'P1',
      product_name: 'Phone A',
      main_category: 'tv audio cameras',
      sub_category: 'Smartphones',
      ratings: 4.2,
      no_of_ratings: 1020,
      price: '฿7,999',
    });
    expect(rows[1]).toMatchObject({ product_id: 'P2', ratings: undefined, no_of_ratings: undefined, price: 'N/A' });
    expect(rows[2]).toMatchObject({ ratings: undefined, no_of_ratings: undefined });
    expect(rows[3]).toMatchObject({ ratings: 3.5, no_of_ratings: 12 });
  });

  it('derives a stable id for rows without product_id', () => {
    const text = [
      'product_name,main_category,sub_category,ratings,no_of_ratings,price',
      'Phone A,tv audio cameras,Smartphones,4.2,10,฿100',
      'Phone B,tv audio cameras,Smartphones,4.0,12,฿200',
    ].join('\n');

    const first = parseCatalog(text);
    const second = parseCatalog(text);

    expect(first[0]?.product_id).toMatch(/^[0-9a-f]{20}$/);
    expect(first.map((r) => r.product_id)).toEqual(second.map((r) => r.product_id));
    expect(first[0]?.product_id).not.toBe(first[1]?.product_id);
    expect(first[0]?.product_id).toBe(
      contentHashId(
        { product_name: 'Phone A', main_category: 'tv audio cameras', sub_category: 'Smartphones', price: '฿100' },
        0
      )
    );
  });

  it('uses the caller-supplied id assigner for blank ids', () => {
    const text = [
      'product_id,product_name,main_category,sub_category,ratings,no_of_ratings,price',
      ',Phone A,tv audio cameras,Smartphones,4.2,10,฿100',
      'KEEP,Phone B,tv audio cameras,Smartphones,4.0,12,฿200',
    ].join('\n');

    const rows = parseCatalog(text, { assignProductId: (_row, rowIndex) => `row-${rowIndex}` });

    expect(rows.map((r) => r.product_id)).toEqual(['row-0', 'KEEP']);
  });

  it('rejects a catalog without the required columns', () => {
    const text = ['product_name,main_category,sub_category', 'Phone A,tv audio cameras,Smartphones'].join('\n');

    expect(() => parseCatalog(text)).toThrow(ValidationError);
    expect(() => parseCatalog(text)).toThrow('Catalog is missing columns: price');
  });

  it('returns no rows for a header-only file', () => {
    expect(parseCatalog('product_name,main_category,sub_category,price\n')).toEqual([]);
  });
});

describe('readCatalogFile', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('reads the catalog from disk', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    dir = await mkdtemp(join(tmpdir(), 'catalog-'));
    const path = join(dir, 'products.csv');
    await writeFile(path, CATALOG, 'utf8');

    const rows = await readCatalogFile(path);

    expect(rows.map((r) => r.product_id)).toEqual(['P1', 'P2', 'P3', 'P4']);
  });
});
