import type {
  EntityDocument,
  KeywordCandidate,
  SimilarityMetric,
  StoreMode,
  VectorFilter,
  VectorMatch,
  VectorRecord,
} from "@/lib/search/types";

export type VectorBackend = "memory" | "file" | "memgraph";

/**
 * Contract shared by every vector index backend.
 *
 * Ordering of `query` results is similarity descending, id ascending on
 * ties. Removing a missing id is a no-op. Every entry point rejects vectors
 * whose length differs from the dimension passed to `ensureIndex` with a
 * ConfigurationError.
 */
export interface VectorIndexStore {
  readonly backend: VectorBackend;
  /** Which retrieval path `query` currently uses. */
  mode(): StoreMode;
  /** Idempotent; safe on every startup. Never fails only because native search is missing. */
  ensureIndex(dimension: number, metric: SimilarityMetric): Promise<void>;
  upsert(entityId: string, vector: number[], document: EntityDocument): Promise<void>;
  /**
   * Atomically replace every row owned by `ownerId` with `records`. Rows the
   * owner had before but that are not in `records` disappear.
   */
  replaceEntity(ownerId: string, records: VectorRecord[]): Promise<void>;
  /** Remove the row and every row it owns. */
  remove(entityId: string): Promise<void>;
  /** Flip the enabled flag of an entity and of every row it owns. */
  setEnabled(entityId: string, enabled: boolean): Promise<void>;
  query(vector: number[], k: number, filter?: VectorFilter): Promise<VectorMatch[]>;
  /** Rows whose name, path, description or tags contain any token. */
  findByKeywords(tokens: readonly string[], limit: number, filter?: VectorFilter): Promise<KeywordCandidate[]>;
  /** Look up the live documents for the given ids (missing ids are omitted). */
  getDocuments(ids: readonly string[]): Promise<Map<string, EntityDocument>>;
  count(filter?: VectorFilter): Promise<number>;
  close(): Promise<void>;
}
