import type { Vector } from '../catalog-types';
import type { EmbeddingProvider } from '../embedding-provider';

// Deterministic stand-in for a real embedding model
export class FakeEmbedder implements EmbeddingProvider {
  readonly model = 'fake-embedder-v1';
  readonly calls: string[][] = [];

  constructor(
    readonly dimensions: number,
    private readonly overrides: Record<string, Vector> = {}
  ) {}

  async embed(texts: string[]): Promise<Vector[]> {
    this.calls.push([...texts]);
    return texts.map((text) => this.overrides[text] ?? this.vectorFor(text));
  }

  vectorFor(text: string): Vector {
    const vector = new Array<number>(this.dimensions).fill(1);
    for (let i = 0; i < text.length; i++) {
      const slot = i % this.dimensions;
      vector[slot] = ((vector[slot] ?? 0) + text.charCodeAt(i) * (i + 1)) % 97;
    }
    return vector.map((value) => value + 1);
  }
}
