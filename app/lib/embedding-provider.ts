import OpenAI from 'openai';
import type { Vector } from './catalog-types';

/**
 * Opaque text-to-vector function. Identical input text and model must give
 * identical vectors; vectors from different models are not comparable.
 */
export interface EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;
  embed(texts: string[]): Promise<Vector[]>;
}

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  model: string;
  dimensions: number;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;
  private readonly openai: OpenAI;

  constructor(options: OpenAIEmbeddingOptions, openai?: OpenAI) {
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.openai = openai ?? new OpenAI({ apiKey: options.apiKey });
  }

  async embed(texts: string[]): Promise<Vector[]> {
    if (texts.length === 0) return [];

    const response = await this.openai.embeddings.create({
      model: this.model,
      input: texts,
      dimensions: this.dimensions,
    });

    // The API reports each vector's input position; don't rely on response order
    const byIndex = new Map(response.data.map((item) => [item.index, item.embedding]));
    return texts.map((_, i) => {
      const vector = byIndex.get(i);
      if (!vector) throw new Error(`Embedding response from ${this.model} is missing input ${i}`);
      return vector;
    });
  }
}
