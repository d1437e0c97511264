// app/api/health/route.ts
import { NextResponse } from "next/server";
import { errorMessage } from "@/app/lib/errors";
import { getRecommendationServices } from "@/app/lib/services";

// Never prerender: the answer depends on the index at request time
export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const { index } = await getRecommendationServices();

    // Test the index connection and read collection info
    const stats = await index.stats();

    return NextResponse.json({
      status: "healthy",
      index: stats,
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    console.error("Health check failed:", error);
    return NextResponse.json(
      {
        status: "unhealthy",
        error: errorMessage(error),
        timestamp: new Date().toISOString(),
      },
      { status: 503 }
    );
  }
}
