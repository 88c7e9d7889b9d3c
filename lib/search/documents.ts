/**
 * Turns registry records into index rows: the text that gets embedded and
 * the document stored next to the vector.
 */
import { z } from "zod";
import type { AgentRecord, EntityDocument, ServerRecord, ToolRecord } from "./types";

export const TOOL_ID_SEPARATOR = "::";

export function toolId(serverPath: string, toolName: string): string {
  return `${serverPath}${TOOL_ID_SEPARATOR}${toolName}`;
}

export const entityDocumentSchema = z.object({
  id: z.string().min(1),
  entityType: z.enum(["server", "tool", "agent"]),
  path: z.string(),
  owner: z.string(),
  name: z.string(),
  description: z.string(),
  tags: z.array(z.string()),
  isEnabled: z.boolean(),
  attributes: z.record(z.unknown()),
});

function cleanTags(tags: string[] | undefined): string[] {
  const out: string[] = [];
  for (const t of tags ?? []) {
    const tag = t.trim();
    if (tag && !out.includes(tag)) out.push(tag);
  }
  return out;
}

function lines(parts: Array<string | undefined>): string {
  return parts
    .map((p) => p?.trim())
    .filter((p): p is string => Boolean(p))
    .join("\n");
}

/** First occurrence wins; tools without a name are dropped. */
export function uniqueTools(tools: ToolRecord[] | undefined): ToolRecord[] {
  const seen = new Set<string>();
  const out: ToolRecord[] = [];
  for (const tool of tools ?? []) {
    const name = tool.name.trim();
    if (!name || seen.has(name)) continue;
    seen.add(name);
    out.push({ ...tool, name });
  }
  return out;
}

export function serverText(server: ServerRecord): string {
  const tags = cleanTags(server.tags);
  const tools = uniqueTools(server.tools).map((t) => t.name);
  return lines([
    server.name,
    server.description,
    tags.length ? `Tags: ${tags.join(", ")}` : undefined,
    tools.length ? `Tools: ${tools.join(", ")}` : undefined,
  ]);
}

export function toolText(tool: ToolRecord): string {
  return lines([tool.name, tool.description]);
}

export function agentText(agent: AgentRecord): string {
  const tags = cleanTags(agent.tags);
  const capabilities = agent.capabilities ?? [];
  return lines([
    agent.name,
    agent.description,
    tags.length ? `Tags: ${tags.join(", ")}` : undefined,
    capabilities.length ? `Capabilities: ${capabilities.join(", ")}` : undefined,
    ...(agent.skills ?? []).map((s) => (s.description ? `${s.name}: ${s.description}` : s.name)),
  ]);
}

export function serverDocument(server: ServerRecord): EntityDocument {
  const tools = uniqueTools(server.tools);
  return {
    id: server.path,
    entityType: "server",
    path: server.path,
    owner: server.path,
    name: server.name,
    description: server.description ?? "",
    tags: cleanTags(server.tags),
    isEnabled: server.isEnabled ?? true,
    attributes: {
      num_tools: server.numTools ?? tools.length,
      ...(server.proxyPassUrl ? { proxy_pass_url: server.proxyPassUrl } : {}),
    },
  };
}

export function toolDocument(server: ServerRecord, tool: ToolRecord): EntityDocument {
  const id = toolId(server.path, tool.name);
  return {
    id,
    entityType: "tool",
    path: id,
    owner: server.path,
    name: tool.name,
    description: tool.description ?? "",
    tags: [],
    isEnabled: server.isEnabled ?? true,
    attributes: {
      server_path: server.path,
      server_name: server.name,
      ...(tool.inputSchema ? { input_schema: tool.inputSchema } : {}),
    },
  };
}

export function agentDocument(agent: AgentRecord): EntityDocument {
  return {
    id: agent.path,
    entityType: "agent",
    path: agent.path,
    owner: agent.path,
    name: agent.name,
    description: agent.description ?? "",
    tags: cleanTags(agent.tags),
    isEnabled: agent.isEnabled ?? true,
    attributes: {
      ...(agent.url ? { url: agent.url } : {}),
      ...(agent.version ? { version: agent.version } : {}),
      ...(agent.visibility ? { visibility: agent.visibility } : {}),
      ...(agent.trustLevel ? { trust_level: agent.trustLevel } : {}),
      capabilities: agent.capabilities ?? [],
      skills: (agent.skills ?? []).map((s) => s.name),
    },
  };
}
