// app/lib/typesense-product-index.ts
import { Errors, type Client } from 'typesense';
import { z } from 'zod';
import {
  ProductPayloadSchema,
  type IndexedPoint,
  type PayloadFilter,
  type ScoredPoint,
  type StoredPoint,
  type Vector,
} from './catalog-types';
import { IndexUnavailable, ValidationError, errorMessage } from './errors';
import {
  FILTER_FIELDS,
  assertIndexable,
  assertSearchLimit,
  assertVector,
  type GetOptions,
  type IndexSettings,
  type IndexStats,
  type ProductIndex,
  type RejectedPoint,
  type UpsertResult,
} from './product-index';

// Typesense refuses per_page above this
export const MAX_SEARCH_LIMIT = 250;

export type ProductDocument = {
  id: string;
  product_id: string;
  product_name: string;
  main_category: string;
  sub_category: string;
  ratings?: number;
  no_of_ratings?: number;
  price: string;
  price_usd?: string;
  embedding: number[];
};

type FieldType = 'string' | 'float' | 'int64' | 'float[]';

export type CollectionField = {
  name: string;
  type: FieldType;
  facet?: boolean;
  optional?: boolean;
  index?: boolean;
  num_dim?: number;
};

export interface ProductCollectionSchema {
  name: string;
  fields: CollectionField[];
}

export interface SearchRequest {
  vectorQuery: string;
  filterBy: string;
  perPage: number;
}

/**
 * The handful of Typesense calls the index makes against one collection.
 * Every method resolves to the raw response; the index validates it.
 */
export interface TypesenseCollectionApi {
  retrieveCollection(): Promise<unknown>;
  createCollection(schema: ProductCollectionSchema): Promise<unknown>;
  /** Resolves to the per-document import results, failed documents included. */
  importDocuments(documents: ProductDocument[]): Promise<unknown>;
  retrieveDocument(id: string): Promise<unknown>;
  search(request: SearchRequest): Promise<unknown>;
}

export function createTypesenseCollectionApi(client: Client, collectionName: string): TypesenseCollectionApi {
  return {
    retrieveCollection: () => client.collections(collectionName).retrieve(),
    createCollection: (schema) => client.collections().create(schema),
    async importDocuments(documents) {
      try {
        return await client.collections(collectionName).documents().import(documents, { action: 'upsert' });
      } catch (error) {
        // The client throws when any document fails, carrying every result
        if (error instanceof Errors.ImportError) return error.importResults;
        throw error;
      }
    },
    retrieveDocument: (id) => client.collections(collectionName).documents(id).retrieve(),
    search: (request) =>
      client.multiSearch.perform({
        searches: [
          {
            collection: collectionName,
            q: '*',
            query_by: 'product_name',
            vector_query: request.vectorQuery,
            filter_by: request.filterBy,
            per_page: request.perPage,
            exclude_fields: 'embedding',
          },
        ],
      }),
  };
}

const StoredDocumentSchema = ProductPayloadSchema.extend({
  id: z.string(),
  embedding: z.array(z.number()).optional(),
});

const CollectionInfoSchema = z.object({
  name: z.string(),
  num_documents: z.number().default(0),
  fields: z
    .array(z.object({ name: z.string(), num_dim: z.number().optional() }))
    .default([]),
});

const ImportResultsSchema = z.array(
  z.object({
    success: z.boolean(),
    error: z.string().optional(),
    id: z.string().optional(),
    // Failed results echo the document back as a JSON line
    document: z.string().optional(),
  })
);

const EchoedDocumentSchema = z.object({ id: z.string() });

const MultiSearchResponseSchema = z.object({
  results: z.array(
    z.object({
      hits: z
        .array(
          z.object({
            document: StoredDocumentSchema,
            vector_distance: z.number(),
          })
        )
        .optional(),
      error: z.string().optional(),
      code: z.number().optional(),
    })
  ),
});

export function productCollectionSchema(collectionName: string, vectorSize: number): ProductCollectionSchema {
  return {
    name: collectionName,
    fields: [
      { name: 'product_id', type: 'string' },
      { name: 'product_name', type: 'string' },
      { name: 'main_category', type: 'string', facet: true },
      { name: 'sub_category', type: 'string', facet: true },
      { name: 'ratings', type: 'float', optional: true },
      { name: 'no_of_ratings', type: 'int64', optional: true },
      { name: 'price', type: 'string', index: false, optional: true },
      { name: 'price_usd', type: 'string', index: false, optional: true },
      { name: 'embedding', type: 'float[]', num_dim: vectorSize },
    ],
  };
}

export function toDocument(point: IndexedPoint): ProductDocument {
  const { payload } = point;
  const document: ProductDocument = {
    id: point.id,
    product_id: payload.product_id,
    product_name: payload.product_name,
    main_category: payload.main_category,
    sub_category: payload.sub_category,
    price: payload.price,
    embedding: point.vector,
  };
  // Optional fields are left out entirely when absent
  if (payload.ratings !== undefined) document.ratings = payload.ratings;
  if (payload.no_of_ratings !== undefined) document.no_of_ratings = payload.no_of_ratings;
  if (payload.price_usd !== undefined) document.price_usd = payload.price_usd;
  return document;
}

export function buildFilterBy(filter: PayloadFilter): string {
  return FILTER_FIELDS.flatMap((field) => {
    const value = filter[field];
    if (value === undefined) return [];
    return [`${field}:=\`${value.replace(/`/g, '')}\``];
  }).join(' && ');
}

export function buildVectorQuery(queryVector: Vector, k: number): string {
  return `embedding:([${queryVector.join(',')}], k:${k})`;
}

export function parseSearchResponse(response: unknown): ScoredPoint[] {
  const parsed = MultiSearchResponseSchema.safeParse(response);
  if (!parsed.success) {
    throw new IndexUnavailable(`Unexpected Typesense search response: ${parsed.error.message}`);
  }

  const [first] = parsed.data.results;
  if (!first) return [];
  if (first.error) {
    throw new IndexUnavailable(`Typesense search failed (${first.code ?? 'unknown'}): ${first.error}`);
  }

  return (first.hits ?? []).map((hit) => {
    const { id, embedding: _embedding, ...payload } = hit.document;
    return { id, payload, distance: hit.vector_distance };
  });
}

function echoedId(document: string | undefined): string | undefined {
  if (document === undefined) return undefined;
  let value: unknown;
  try {
    value = JSON.parse(document);
  } catch {
    return undefined;
  }
  const parsed = EchoedDocumentSchema.safeParse(value);
  return parsed.success ? parsed.data.id : undefined;
}

// Failures are matched by the id they carry, falling back to request order
export function parseImportResults(results: unknown, documents: readonly ProductDocument[]): UpsertResult {
  const parsed = ImportResultsSchema.safeParse(results);
  if (!parsed.success) {
    throw new IndexUnavailable(`Unexpected Typesense import response: ${parsed.error.message}`);
  }

  const positional = parsed.data.length === documents.length;
  const rejected: RejectedPoint[] = [];
  parsed.data.forEach((result, i) => {
    if (result.success) return;
    const id = result.id ?? echoedId(result.document) ?? (positional ? documents[i]?.id : undefined);
    if (id === undefined) {
      throw new IndexUnavailable(
        `Typesense rejected a document it did not identify: ${result.error ?? 'unknown error'}`
      );
    }
    rejected.push({ id, reason: result.error ?? 'unknown error' });
  });
  return { upserted: documents.length - rejected.length, rejected };
}

function unavailable(action: string, error: unknown): IndexUnavailable {
  if (error instanceof IndexUnavailable) return error;
  return new IndexUnavailable(`Typesense ${action} failed: ${errorMessage(error)}`, { cause: error });
}

/**
 * {@link ProductIndex} backed by a Typesense collection. The embedding field is
 * a `float[]` with `num_dim` fixed at creation; Typesense defaults such fields to
 * cosine distance and reports it as `vector_distance`.
 */
export class TypesenseProductIndex implements ProductIndex {
  private ready = false;

  constructor(
    private readonly api: TypesenseCollectionApi,
    readonly settings: IndexSettings
  ) {}

  async ensureCollection(): Promise<void> {
    const { collectionName, vectorSize } = this.settings;
    const existing = await this.retrieveCollection();

    if (existing) {
      const embeddingField = existing.fields.find((field) => field.name === 'embedding');
      if (embeddingField?.num_dim !== vectorSize) {
        throw new IndexUnavailable(
          `Collection ${collectionName} has embedding dimensions ${embeddingField?.num_dim ?? 'none'}, expected ${vectorSize}`
        );
      }
    } else {
      await this.createCollection();
    }
    this.ready = true;
  }

  async upsertOne(point: IndexedPoint): Promise<void> {
    const { rejected } = await this.upsertMany([point]);
    const [refused] = rejected;
    if (refused) {
      throw new ValidationError(`Typesense rejected product ${refused.id}: ${refused.reason}`);
    }
  }

  async upsertMany(points: readonly IndexedPoint[]): Promise<UpsertResult> {
    this.assertReady();
    for (const point of points) assertIndexable(point, this.settings.vectorSize);
    if (points.length === 0) return { upserted: 0, rejected: [] };

    const documents = points.map(toDocument);
    let results: unknown;
    try {
      results = await this.api.importDocuments(documents);
    } catch (error) {
      throw unavailable('import', error);
    }
    return parseImportResults(results, documents);
  }

  async getById(id: string, options: GetOptions = {}): Promise<StoredPoint | null> {
    this.assertReady();

    let document: unknown;
    try {
      document = await this.api.retrieveDocument(id);
    } catch (error) {
      if (!(error instanceof Errors.ObjectNotFound)) throw unavailable('retrieve', error);
      // A 404 also comes back when the collection itself is gone
      if (!(await this.retrieveCollection())) {
        throw new IndexUnavailable(`Collection ${this.settings.collectionName} no longer exists`, {
          cause: error,
        });
      }
      return null;
    }

    const parsed = StoredDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new IndexUnavailable(`Document ${id} does not match the product schema: ${parsed.error.message}`);
    }

    const { id: storedId, embedding, ...payload } = parsed.data;
    const point: StoredPoint = { id: storedId, payload };
    if (options.withVector && embedding) point.vector = embedding;
    return point;
  }

  async searchSimilar(queryVector: Vector, k: number, filter: PayloadFilter): Promise<ScoredPoint[]> {
    this.assertReady();
    assertSearchLimit(k);
    if (k > MAX_SEARCH_LIMIT) {
      throw new ValidationError(`k must be at most ${MAX_SEARCH_LIMIT}, got ${k}`);
    }
    assertVector(queryVector, this.settings.vectorSize, 'Query');

    let response: unknown;
    try {
      response = await this.api.search({
        vectorQuery: buildVectorQuery(queryVector, k),
        filterBy: buildFilterBy(filter),
        perPage: k,
      });
    } catch (error) {
      throw unavailable('search', error);
    }
    // A missing collection shows up as a per-search 404 and is raised from here
    return parseSearchResponse(response);
  }

  async stats(): Promise<IndexStats> {
    this.assertReady();
    const info = await this.retrieveCollection();
    if (!info) {
      throw new IndexUnavailable(`Collection ${this.settings.collectionName} no longer exists`);
    }
    return {
      collectionName: info.name,
      vectorSize: this.settings.vectorSize,
      points: info.num_documents,
    };
  }

  private async retrieveCollection(): Promise<z.infer<typeof CollectionInfoSchema> | null> {
    let info: unknown;
    try {
      info = await this.api.retrieveCollection();
    } catch (error) {
      if (error instanceof Errors.ObjectNotFound) return null;
      throw unavailable('collection lookup', error);
    }

    const parsed = CollectionInfoSchema.safeParse(info);
    if (!parsed.success) {
      throw new IndexUnavailable(`Unexpected Typesense collection response: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async createCollection(): Promise<void> {
    const { collectionName, vectorSize } = this.settings;
    console.log(`Creating Typesense collection ${collectionName} (${vectorSize} dimensions)`);
    try {
      await this.api.createCollection(productCollectionSchema(collectionName, vectorSize));
    } catch (error) {
      // Another process created it between our lookup and create
      if (error instanceof Errors.ObjectAlreadyExists) return;
      throw unavailable('collection create', error);
    }
  }

  private assertReady(): void {
    if (!this.ready) {
      throw new IndexUnavailable(
        `Collection ${this.settings.collectionName} is not initialized; call ensureCollection() first`
      );
    }
  }
}
