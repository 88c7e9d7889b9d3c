/**
 * POST /api/v1/search/index/rebuild — bulk re-index; one bad record does not stop the rest
 */
import { NextRequest, NextResponse } from "next/server";
import { getSearchService } from "@/lib/search/service";
import { badRequest, indexErrorResponse, readJson } from "@/lib/search/http";
import {
  RebuildRequestSchema,
  describeValidationError,
  toAgentRecord,
  toServerRecord,
} from "@/lib/validation";

export async function POST(request: NextRequest) {
  const parsed = RebuildRequestSchema.safeParse(await readJson(request));
  if (!parsed.success) return badRequest(describeValidationError(parsed.error));

  try {
    const { indexer } = await getSearchService();
    const report = await indexer.rebuild({
      servers: parsed.data.servers.map(toServerRecord),
      agents: parsed.data.agents.map(toAgentRecord),
    });
    return NextResponse.json(report, { status: report.failed.length ? 207 : 200 });
  } catch (e: unknown) {
    return indexErrorResponse(e);
  }
}
