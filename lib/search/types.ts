/**
 * Shared types for the registry search subsystem.
 *
 * Records (`ServerRecord`, `AgentRecord`) are what the registry hands the
 * indexer. Documents (`EntityDocument`) are what the vector stores persist
 * next to each vector.
 */

export type EntityType = "server" | "tool" | "agent";

export const ENTITY_TYPES: readonly EntityType[] = ["server", "tool", "agent"];

export type SimilarityMetric = "cosine";

/** Which retrieval path served a query. */
export type StoreMode = "native" | "fallback";
export type RetrievalMode = StoreMode | "keyword";

export interface ToolRecord {
  name: string;
  description?: string;
  inputSchema?: Record<string, unknown>;
}

export interface ServerRecord {
  path: string;
  name: string;
  description?: string;
  tags?: string[];
  isEnabled?: boolean;
  numTools?: number;
  proxyPassUrl?: string;
  tools?: ToolRecord[];
}

export interface AgentSkill {
  id?: string;
  name: string;
  description?: string;
  tags?: string[];
}

export interface AgentRecord {
  path: string;
  name: string;
  description?: string;
  tags?: string[];
  isEnabled?: boolean;
  url?: string;
  version?: string;
  visibility?: string;
  trustLevel?: string;
  capabilities?: string[];
  skills?: AgentSkill[];
}

/**
 * One row of the vector index. `owner` is the path of the entity that owns
 * the row: a server's or agent's own path, or the owning server's path for
 * a tool row. Cascading removes and status toggles key on it.
 */
export interface EntityDocument {
  id: string;
  entityType: EntityType;
  path: string;
  owner: string;
  name: string;
  description: string;
  tags: string[];
  isEnabled: boolean;
  /** Display-only fields carried through to results. */
  attributes: Record<string, unknown>;
}

export interface VectorRecord {
  id: string;
  vector: number[];
  document: EntityDocument;
}

export interface VectorFilter {
  entityTypes?: readonly EntityType[];
}

/** A nearest-neighbour hit; `score` is raw cosine similarity in [-1, 1]. */
export interface VectorMatch {
  id: string;
  score: number;
  document: EntityDocument;
}

/** A literal keyword hit together with its stored vector. */
export interface KeywordCandidate {
  document: EntityDocument;
  vector: number[];
}
