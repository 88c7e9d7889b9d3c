/**
 * GET /api/v1/search/health — backend, retrieval mode, embedding provider and index size
 */
import { NextResponse } from "next/server";
import { getSearchService } from "@/lib/search/service";
import { errorMessage } from "@/lib/search/errors";

export async function GET() {
  try {
    const service = await getSearchService();
    const health = await service.health();
    return NextResponse.json({ status: health.embeddings.ok ? "ok" : "degraded", ...health });
  } catch (e: unknown) {
    return NextResponse.json({ status: "unavailable", detail: errorMessage(e) }, { status: 503 });
  }
}
