/**
 * PATCH /api/v1/search/index/status — enable or disable an entity without re-embedding
 */
import { NextRequest, NextResponse } from "next/server";
import { getSearchService } from "@/lib/search/service";
import { badRequest, indexErrorResponse, readJson } from "@/lib/search/http";
import { StatusRequestSchema, describeValidationError } from "@/lib/validation";

export async function PATCH(request: NextRequest) {
  const parsed = StatusRequestSchema.safeParse(await readJson(request));
  if (!parsed.success) return badRequest(describeValidationError(parsed.error));
  const { path, is_enabled } = parsed.data;

  try {
    const { indexer } = await getSearchService();
    await indexer.setEnabled(path, is_enabled);
    return NextResponse.json({ path, is_enabled });
  } catch (e: unknown) {
    return indexErrorResponse(e);
  }
}
