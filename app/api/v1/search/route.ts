/**
 * POST /api/v1/search — hybrid semantic + keyword search over servers, tools and agents
 *
 * Backend trouble never turns into a 5xx here: the engine answers with an
 * empty or keyword-only result flagged `degraded`. Only a broken service
 * start-up (configuration) surfaces as 500.
 */
import { NextRequest, NextResponse } from "next/server";
import { getSearchService, type SearchService } from "@/lib/search/service";
import { badRequest, readJson } from "@/lib/search/http";
import { errorMessage } from "@/lib/search/errors";
import { SearchRequestSchema, describeValidationError } from "@/lib/validation";

export async function POST(request: NextRequest) {
  const parsed = SearchRequestSchema.safeParse(await readJson(request));
  if (!parsed.success) return badRequest(describeValidationError(parsed.error));
  const { query, entity_types, max_results } = parsed.data;

  let service: SearchService;
  try {
    service = await getSearchService();
  } catch (e: unknown) {
    console.error("[search-api] search service unavailable:", errorMessage(e));
    return NextResponse.json({ detail: errorMessage(e) }, { status: 500 });
  }

  const result = await service.engine.search(query, {
    entityTypes: entity_types,
    maxResults: max_results,
  });
  return NextResponse.json(result);
}
