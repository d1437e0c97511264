// app/api/get-recommendation/route.ts
import { NextRequest, NextResponse } from "next/server";
import { IndexUnavailable, ValidationError } from "@/app/lib/errors";
import { getRecommendationServices, type RecommendationServices } from "@/app/lib/services";

export async function GET(request: NextRequest) {
  const { searchParams } = request.nextUrl;

  const productId = searchParams.get("product_id")?.trim();
  if (!productId) {
    return NextResponse.json({ error: "product_id is required" }, { status: 400 });
  }

  let services: RecommendationServices;
  try {
    services = await getRecommendationServices();
  } catch (error) {
    // Configuration mistakes are ours, not the caller's
    return serverError(error);
  }
  const { config, engine } = services;

  let limit = config.defaultRecommendationLimit;
  const rawLimit = searchParams.get("limit");
  if (rawLimit !== null && rawLimit.trim() !== "") {
    const parsed = Number(rawLimit);
    if (!Number.isInteger(parsed) || parsed < 1) {
      return NextResponse.json({ error: "Limit must be greater than 0" }, { status: 400 });
    }
    limit = Math.min(parsed, config.maxRecommendationLimit);
  }

  try {
    const outcome = await engine.recommend(productId, limit);

    if (outcome.status === "not_found") {
      return NextResponse.json(
        { error: `Product with ID ${productId} not found` },
        { status: 404 }
      );
    }

    return NextResponse.json({ results: outcome.results });
  } catch (error) {
    if (error instanceof ValidationError) {
      return NextResponse.json({ error: error.message }, { status: 400 });
    }
    return serverError(error);
  }
}

function serverError(error: unknown) {
  if (error instanceof IndexUnavailable) {
    console.error("Recommendation index unavailable:", error);
    return NextResponse.json({ error: error.message }, { status: 503 });
  }
  console.error("Recommendation API error:", error);
  return NextResponse.json({ error: "Internal server error" }, { status: 500 });
}
