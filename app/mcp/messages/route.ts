/**
 * POST /mcp/messages?sessionId=... — client→server JSON-RPC for an SSE session
 */
import { NextRequest, NextResponse } from "next/server";
import { JSONRPCMessageSchema } from "@modelcontextprotocol/sdk/types.js";
import { activeTransports } from "@/lib/mcp/registry";
import { readJson } from "@/lib/search/http";

export async function POST(request: NextRequest) {
  const sessionId = request.nextUrl.searchParams.get("sessionId");
  if (!sessionId) {
    return NextResponse.json({ detail: "sessionId is required" }, { status: 400 });
  }

  const transport = activeTransports.get(sessionId);
  if (!transport) {
    return NextResponse.json({ detail: "Session not found or expired" }, { status: 404 });
  }

  const parsed = JSONRPCMessageSchema.safeParse(await readJson(request));
  if (!parsed.success) {
    return NextResponse.json({ detail: "Body is not a JSON-RPC message" }, { status: 400 });
  }
  transport.handlePostMessage(parsed.data);
  return new NextResponse(null, { status: 202 });
}
