// app/lib/recommendation-engine.ts
import {
  toRecommendationResult,
  type RecommendationOutcome,
} from './catalog-types';
import { IndexUnavailable } from './errors';
import { assertSearchLimit, type ProductIndex } from './product-index';

/**
 * Finds the products nearest to an anchor product within its sub-category.
 *
 * The index is asked for `k + 1` neighbors because the anchor normally comes
 * back as its own nearest neighbor and is dropped afterwards. If the index
 * leaves the anchor out, the extra result is cut by the final truncation.
 */
export class RecommendationEngine {
  constructor(private readonly index: ProductIndex) {}

  async recommend(productId: string, k: number): Promise<RecommendationOutcome> {
    assertSearchLimit(k);

    const anchor = await this.index.getById(productId, { withVector: true });
    if (!anchor) {
      return { status: 'not_found', productId };
    }
    if (!anchor.vector) {
      throw new IndexUnavailable(`Product ${productId} is stored without its embedding`);
    }

    const neighbors = await this.index.searchSimilar(anchor.vector, k + 1, {
      sub_category: anchor.payload.sub_category,
    });

    const results = neighbors
      .filter((point) => point.id !== anchor.id)
      .slice(0, k)
      .map(toRecommendationResult);

    return { status: 'found', results };
  }
}
