import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "@/app/lib/app-config";
import { IndexUnavailable } from "@/app/lib/errors";
import { MemoryProductIndex } from "@/app/lib/memory-product-index";
import { RecommendationEngine } from "@/app/lib/recommendation-engine";
import type { RecommendationServices } from "@/app/lib/services";
import { GET } from "./route";

const { getRecommendationServices } = vi.hoisted(() => ({
  getRecommendationServices: vi.fn<() => Promise<RecommendationServices>>(),
}));

vi.mock("@/app/lib/services", () => ({ getRecommendationServices }));

describe("GET /api/health", () => {
  let index: MemoryProductIndex;

  beforeEach(async () => {
    index = new MemoryProductIndex({ collectionName: "products", vectorSize: 2 });
    await index.ensureCollection();
    getRecommendationServices.mockResolvedValue({
      config: loadConfig({}),
      index,
      engine: new RecommendationEngine(index),
    });
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    getRecommendationServices.mockReset();
  });

  it("reports healthy with index stats", async () => {
    const response = await GET();

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      status: "healthy",
      index: { collectionName: "products", vectorSize: 2, points: 0 },
      timestamp: expect.any(String),
    });
  });

  it("reports unhealthy when the index cannot be reached", async () => {
    vi.spyOn(index, "stats").mockRejectedValue(
      new IndexUnavailable("Typesense collection lookup failed: ECONNREFUSED")
    );

    const response = await GET();

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({
      status: "unhealthy",
      error: "Typesense collection lookup failed: ECONNREFUSED",
      timestamp: expect.any(String),
    });
  });

  it("reports unhealthy when the services cannot start", async () => {
    getRecommendationServices.mockRejectedValue(
      new IndexUnavailable("Collection products has embedding dimensions 8, expected 2")
    );

    const response = await GET();

    expect(response.status).toBe(503);
    expect(await response.json()).toMatchObject({
      status: "unhealthy",
      error: "Collection products has embedding dimensions 8, expected 2",
    });
  });
});
