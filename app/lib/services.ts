// app/lib/services.ts
import { loadConfig, type AppConfig } from './app-config';
import { OpenAIEmbeddingProvider, type EmbeddingProvider } from './embedding-provider';
import type { ProductIndex } from './product-index';
import { RecommendationEngine } from './recommendation-engine';
import { createTypesenseClient, logTypesenseConfig } from './typesense-config';
import { TypesenseProductIndex, createTypesenseCollectionApi } from './typesense-product-index';

export function createProductIndex(config: AppConfig): ProductIndex {
  return new TypesenseProductIndex(
    createTypesenseCollectionApi(createTypesenseClient(config), config.collectionName),
    {
      collectionName: config.collectionName,
      vectorSize: config.vectorSize,
    }
  );
}

export function createEmbeddingProvider(config: AppConfig): EmbeddingProvider {
  return new OpenAIEmbeddingProvider({
    apiKey: config.openaiApiKey,
    model: config.embeddingModel,
    dimensions: config.vectorSize,
  });
}

export interface RecommendationServices {
  config: AppConfig;
  index: ProductIndex;
  engine: RecommendationEngine;
}

export async function createRecommendationServices(config: AppConfig): Promise<RecommendationServices> {
  const index = createProductIndex(config);
  await index.ensureCollection();
  return { config, index, engine: new RecommendationEngine(index) };
}

// Shared by the route handlers, built on first use
let recommendationServices: Promise<RecommendationServices> | null = null;

export function getRecommendationServices(): Promise<RecommendationServices> {
  if (!recommendationServices) {
    const config = loadConfig();
    logTypesenseConfig(config);
    recommendationServices = createRecommendationServices(config).catch((error: unknown) => {
      // Let the next request try again once the index is reachable
      recommendationServices = null;
      throw error;
    });
  }
  return recommendationServices;
}
