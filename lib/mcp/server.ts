/**
 * MCP server exposing registry search to agents.
 *
 *   intelligent_tool_finder -- hybrid semantic + keyword search over the
 *                              registered MCP servers, their tools and A2A
 *                              agents. Returns the search result set as JSON.
 *
 * The host attaches whatever transport it serves (SSE, streamable HTTP, stdio).
 */
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { HybridSearchEngine } from "@/lib/search/engine";
import { errorMessage } from "@/lib/search/errors";
import { EntityTypeParamSchema, MAX_QUERY_LENGTH, MAX_RESULTS_LIMIT } from "@/lib/validation";

// Pre-define tool input schemas to avoid TS2589 deep type instantiation
const toolFinderSchema = {
  query: z
    .string()
    .min(1)
    .max(MAX_QUERY_LENGTH)
    .describe("Natural language description of the capability you need, e.g. 'current weather for a city'."),
  entity_types: z
    .array(EntityTypeParamSchema)
    .optional()
    .describe("Restrict results to these kinds: server (mcp_server), tool, agent (a2a_agent). Default: all."),
  max_results: z
    .number()
    .int()
    .min(1)
    .max(MAX_RESULTS_LIMIT)
    .optional()
    .describe(`Maximum results per kind (default 10, max ${MAX_RESULTS_LIMIT}).`),
};

export function createMcpServer(engine: Pick<HybridSearchEngine, "search">): McpServer {
  const server = new McpServer({ name: "registry-search", version: "0.1.0" });

  server.registerTool(
    "intelligent_tool_finder",
    {
      description:
        "Find MCP servers, tools and A2A agents in the registry that can do what you describe. " +
        "Ranks by semantic similarity boosted by literal keyword matches. " +
        "Tool results name their owning server (server_path, server_name). " +
        "When `degraded` is true semantic ranking was unavailable and results are keyword matches only.",
      inputSchema: toolFinderSchema,
    },
    async ({ query, entity_types, max_results }) => {
      try {
        const result = await engine.search(query, { entityTypes: entity_types, maxResults: max_results });
        return { content: [{ type: "text", text: JSON.stringify(result) }] };
      } catch (e: unknown) {
        const msg = errorMessage(e);
        console.error("[mcp] intelligent_tool_finder failed:", msg);
        return { content: [{ type: "text", text: `Error searching registry: ${msg}` }], isError: true };
      }
    }
  );

  return server;
}
