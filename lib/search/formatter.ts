/**
 * Result formatter: turns the scored candidate pool into the wire payload.
 *
 * Pure and deterministic. Relevance is min-max normalised against the
 * bounds of the combined-score domain, over the whole pool and before
 * truncation, so the top hit only reaches 1.0 when its score does.
 */
import { compareMatches } from "@/lib/vector_stores/cosine";
import type { EntityDocument, EntityType, RetrievalMode } from "./types";

export interface ScoredHit {
  id: string;
  document: EntityDocument;
  /** Combined score in [scoreRange.min, scoreRange.max]. */
  score: number;
  /** Raw cosine similarity, null when the query was not embedded. */
  similarity: number | null;
  keywordFraction: number;
}

export interface MatchingTool {
  tool_name: string;
  description: string;
  relevance_score: number;
}

export interface ServerResult {
  name: string;
  path: string;
  description: string;
  tags: string[];
  num_tools: number;
  relevance_score: number;
  matching_tools: MatchingTool[];
}

export interface ToolResult {
  name: string;
  tool_name: string;
  path: string;
  description: string;
  tags: string[];
  server_path: string;
  server_name: string;
  relevance_score: number;
  input_schema?: Record<string, unknown>;
}

export interface AgentResult {
  name: string;
  path: string;
  description: string;
  tags: string[];
  relevance_score: number;
  url?: string;
  version?: string;
  visibility?: string;
  trust_level?: string;
  capabilities: string[];
  skills: string[];
}

export interface SearchResultSet {
  query: string;
  servers: ServerResult[];
  tools: ToolResult[];
  agents: AgentResult[];
  total_servers: number;
  total_tools: number;
  total_agents: number;
  degraded: boolean;
  mode: RetrievalMode;
}

export interface FormatInput {
  query: string;
  hits: ScoredHit[];
  maxResults: number;
  /** Types to return; hits of other types only feed matching_tools. All when omitted. */
  entityTypes?: readonly EntityType[];
  scoreRange: { min: number; max: number };
  degraded: boolean;
  mode: RetrievalMode;
}

export function normalizeScore(score: number, range: { min: number; max: number }): number {
  const span = range.max - range.min;
  if (!(span > 0)) return score > range.min ? 1 : 0;
  const x = (score - range.min) / span;
  return Math.round(Math.max(0, Math.min(1, x)) * 10_000) / 10_000;
}

export function emptyResultSet(query: string, mode: RetrievalMode, degraded = false): SearchResultSet {
  return {
    query,
    servers: [],
    tools: [],
    agents: [],
    total_servers: 0,
    total_tools: 0,
    total_agents: 0,
    degraded,
    mode,
  };
}

export function formatResults(input: FormatInput): SearchResultSet {
  const ranked = [...input.hits].sort(compareMatches);
  const relevance = new Map(ranked.map((h) => [h.id, normalizeScore(h.score, input.scoreRange)]));
  const rel = (h: ScoredHit): number => relevance.get(h.id) ?? 0;
  const byType = (t: EntityType) => ranked.filter((h) => h.document.entityType === t);
  const wanted = (t: EntityType) => !input.entityTypes || input.entityTypes.includes(t);

  const toolHits = byType("tool");
  const toolsByOwner = new Map<string, ScoredHit[]>();
  for (const hit of toolHits) {
    const list = toolsByOwner.get(hit.document.owner) ?? [];
    list.push(hit);
    toolsByOwner.set(hit.document.owner, list);
  }

  const servers = byType("server")
    .slice(0, wanted("server") ? input.maxResults : 0)
    .map((h): ServerResult => ({
      name: h.document.name,
      path: h.document.path,
      description: h.document.description,
      tags: [...h.document.tags],
      num_tools: numberAttr(h.document, "num_tools") ?? 0,
      relevance_score: rel(h),
      matching_tools: (toolsByOwner.get(h.document.path) ?? []).map((t) => ({
        tool_name: t.document.name,
        description: t.document.description,
        relevance_score: rel(t),
      })),
    }));

  const tools = toolHits.slice(0, wanted("tool") ? input.maxResults : 0).map((h): ToolResult => {
    const schema = h.document.attributes.input_schema;
    return {
      name: h.document.name,
      tool_name: h.document.name,
      path: h.document.path,
      description: h.document.description,
      tags: [...h.document.tags],
      server_path: stringAttr(h.document, "server_path") ?? h.document.owner,
      server_name: stringAttr(h.document, "server_name") ?? "",
      relevance_score: rel(h),
      ...(isRecord(schema) ? { input_schema: schema } : {}),
    };
  });

  const agents = byType("agent")
    .slice(0, wanted("agent") ? input.maxResults : 0)
    .map((h): AgentResult => {
      const url = stringAttr(h.document, "url");
      const version = stringAttr(h.document, "version");
      const visibility = stringAttr(h.document, "visibility");
      const trustLevel = stringAttr(h.document, "trust_level");
      return {
        name: h.document.name,
        path: h.document.path,
        description: h.document.description,
        tags: [...h.document.tags],
        relevance_score: rel(h),
        ...(url ? { url } : {}),
        ...(version ? { version } : {}),
        ...(visibility ? { visibility } : {}),
        ...(trustLevel ? { trust_level: trustLevel } : {}),
        capabilities: stringListAttr(h.document, "capabilities"),
        skills: stringListAttr(h.document, "skills"),
      };
    });

  return {
    query: input.query,
    servers,
    tools,
    agents,
    total_servers: servers.length,
    total_tools: tools.length,
    total_agents: agents.length,
    degraded: input.degraded,
    mode: input.mode,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringAttr(doc: EntityDocument, key: string): string | undefined {
  const v = doc.attributes[key];
  return typeof v === "string" ? v : undefined;
}

function numberAttr(doc: EntityDocument, key: string): number | undefined {
  const v = doc.attributes[key];
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

function stringListAttr(doc: EntityDocument, key: string): string[] {
  const v = doc.attributes[key];
  return Array.isArray(v) ? v.filter((x): x is string => typeof x === "string") : [];
}
