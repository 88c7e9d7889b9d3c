/**
 * PUT    /api/v1/search/index          — (re)index one server (with its tools) or agent
 * DELETE /api/v1/search/index?path=... — remove an entity; servers cascade to their tools
 *
 * Indexing is synchronous: once this responds 200 the entity is searchable.
 */
import { NextRequest, NextResponse } from "next/server";
import { getSearchService } from "@/lib/search/service";
import { badRequest, indexErrorResponse, readJson } from "@/lib/search/http";
import {
  IndexRequestSchema,
  describeValidationError,
  toAgentRecord,
  toServerRecord,
} from "@/lib/validation";

export async function PUT(request: NextRequest) {
  const parsed = IndexRequestSchema.safeParse(await readJson(request));
  if (!parsed.success) return badRequest(describeValidationError(parsed.error));
  const body = parsed.data;

  try {
    const { indexer } = await getSearchService();
    if (body.entity_type === "server" || body.entity_type === "mcp_server") {
      await indexer.indexServer(toServerRecord(body));
      return NextResponse.json({ path: body.path, entity_type: "server", indexed: true, tools: body.tools.length });
    }
    await indexer.indexAgent(toAgentRecord(body));
    return NextResponse.json({ path: body.path, entity_type: "agent", indexed: true });
  } catch (e: unknown) {
    return indexErrorResponse(e);
  }
}

export async function DELETE(request: NextRequest) {
  const path = request.nextUrl.searchParams.get("path")?.trim();
  if (!path) return badRequest("path is required");

  try {
    const { indexer } = await getSearchService();
    await indexer.removeEntity(path);
    return NextResponse.json({ path, removed: true });
  } catch (e: unknown) {
    return indexErrorResponse(e);
  }
}
