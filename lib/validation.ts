/**
 * Zod schemas for the search API and the MCP tool surface.
 *
 * Wire bodies use snake_case; the `to*Record` helpers map them onto the
 * camelCase records the indexer takes.
 */
import { z } from "zod";
import type { AgentRecord, EntityType, ServerRecord } from "@/lib/search/types";

// --- Entity types ---

/** Accepts the registry's public names (mcp_server, a2a_agent) as aliases. */
export const EntityTypeParamSchema = z
  .enum(["server", "tool", "agent", "mcp_server", "a2a_agent"])
  .transform((t): EntityType => (t === "mcp_server" ? "server" : t === "a2a_agent" ? "agent" : t));

// --- Search ---

export const MAX_QUERY_LENGTH = 512;
export const MAX_RESULTS_LIMIT = 50;

export const SearchRequestSchema = z.object({
  query: z.string().min(1).max(MAX_QUERY_LENGTH),
  entity_types: z.array(EntityTypeParamSchema).optional(),
  max_results: z.number().int().min(1).max(MAX_RESULTS_LIMIT).optional(),
});
export type SearchRequestBody = z.infer<typeof SearchRequestSchema>;

// --- Index writes ---

const path = z.string().trim().min(1);
const tags = z.array(z.string()).optional().default([]);

export const ToolBodySchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().optional().default(""),
  input_schema: z.record(z.string(), z.unknown()).optional(),
});

export const ServerBodySchema = z.object({
  path,
  name: z.string().trim().min(1),
  description: z.string().optional().default(""),
  tags,
  is_enabled: z.boolean().optional().default(true),
  num_tools: z.number().int().min(0).optional(),
  proxy_pass_url: z.string().optional(),
  tools: z.array(ToolBodySchema).optional().default([]),
});
export type ServerBody = z.infer<typeof ServerBodySchema>;

export const AgentSkillBodySchema = z.object({
  id: z.string().optional(),
  name: z.string().trim().min(1),
  description: z.string().optional(),
  tags: z.array(z.string()).optional(),
});

export const AgentBodySchema = z.object({
  path,
  name: z.string().trim().min(1),
  description: z.string().optional().default(""),
  tags,
  is_enabled: z.boolean().optional().default(true),
  url: z.string().optional(),
  version: z.string().optional(),
  visibility: z.string().optional(),
  trust_level: z.string().optional(),
  capabilities: z.array(z.string()).optional().default([]),
  skills: z.array(AgentSkillBodySchema).optional().default([]),
});
export type AgentBody = z.infer<typeof AgentBodySchema>;

export const IndexRequestSchema = z.union([
  ServerBodySchema.extend({ entity_type: z.enum(["server", "mcp_server"]) }),
  AgentBodySchema.extend({ entity_type: z.enum(["agent", "a2a_agent"]) }),
]);
export type IndexRequestBody = z.infer<typeof IndexRequestSchema>;

export const StatusRequestSchema = z.object({
  path,
  is_enabled: z.boolean(),
});

export const RebuildRequestSchema = z.object({
  servers: z.array(ServerBodySchema).optional().default([]),
  agents: z.array(AgentBodySchema).optional().default([]),
});

export function toServerRecord(body: ServerBody): ServerRecord {
  return {
    path: body.path,
    name: body.name,
    description: body.description,
    tags: body.tags,
    isEnabled: body.is_enabled,
    numTools: body.num_tools,
    proxyPassUrl: body.proxy_pass_url,
    tools: body.tools.map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: t.input_schema,
    })),
  };
}

export function toAgentRecord(body: AgentBody): AgentRecord {
  return {
    path: body.path,
    name: body.name,
    description: body.description,
    tags: body.tags,
    isEnabled: body.is_enabled,
    url: body.url,
    version: body.version,
    visibility: body.visibility,
    trustLevel: body.trust_level,
    capabilities: body.capabilities,
    skills: body.skills,
  };
}

/** First issue as "field: message", for 400 responses. */
export function describeValidationError(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "Invalid request";
  return issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}
