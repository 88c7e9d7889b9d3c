/**
 * GET /mcp/sse — MCP over SSE, serving the intelligent_tool_finder tool
 */
import { NextResponse } from "next/server";
import { createMcpServer } from "@/lib/mcp/server";
import { NextSSETransport } from "@/lib/mcp/transport";
import { activeTransports } from "@/lib/mcp/registry";
import { getSearchService, type SearchService } from "@/lib/search/service";
import { errorMessage } from "@/lib/search/errors";

const MESSAGES_ENDPOINT = "/mcp/messages";
const KEEPALIVE_MS = 30_000;

export async function GET() {
  let service: SearchService;
  try {
    service = await getSearchService();
  } catch (e: unknown) {
    console.error("[mcp] search service unavailable:", errorMessage(e));
    return NextResponse.json({ detail: errorMessage(e) }, { status: 503 });
  }

  let transportRef: NextSSETransport | null = null;
  let keepAlive: ReturnType<typeof setInterval> | null = null;

  const stream = new ReadableStream<Uint8Array>({
    async start(controller) {
      const transport = new NextSSETransport(controller, MESSAGES_ENDPOINT);
      transportRef = transport;
      activeTransports.set(transport.sessionId, transport);
      keepAlive = setInterval(() => transport.sendKeepAlive(), KEEPALIVE_MS);

      try {
        // connect() sets onmessage and calls transport.start()
        await createMcpServer(service.engine).connect(transport);
        transport.flushQueue();
      } catch (e: unknown) {
        console.error("[mcp] server connection error:", errorMessage(e));
        transport.onerror?.(e instanceof Error ? e : new Error(errorMessage(e)));
      }
    },
    async cancel() {
      if (keepAlive) clearInterval(keepAlive);
      if (transportRef) {
        activeTransports.delete(transportRef.sessionId);
        await transportRef.close();
      }
    },
  });

  return new Response(stream, {
    headers: {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache, no-transform",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
    },
  });
}
