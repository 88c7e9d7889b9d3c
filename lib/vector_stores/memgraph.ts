/**
 * Native vector index on Memgraph (MAGE `vector_search`).
 *
 * Every indexed row is one `:SearchEntry` node:
 *   id, entityType, owner, isEnabled   plain properties used for filtering
 *   searchText                         lowercased name/path/description/tags for keyword lookups
 *   document                           JSON of the remaining EntityDocument fields
 *   embedding                          the vector, covered by the vector index
 *
 * Modes:
 *   native    queries go through vector_search.search (HNSW)
 *   fallback  vectors are scanned and ranked by exact cosine here
 *
 * ensureIndex() resets to native when the index is present. A native
 * failure switches to fallback until the next ensureIndex(). A native
 * timeout degrades only the current query, unless it is the Nth in a row.
 */
import { z } from "zod";
import type { CypherRow, CypherRunner } from "@/lib/db/memgraph";
import { entityDocumentSchema } from "@/lib/search/documents";
import {
  ConfigurationError,
  IndexBackendError,
  SearchTimeoutError,
  errorMessage,
} from "@/lib/search/errors";
import { keywordFields } from "@/lib/search/keyword";
import type {
  EntityDocument,
  KeywordCandidate,
  SimilarityMetric,
  StoreMode,
  VectorFilter,
  VectorMatch,
  VectorRecord,
} from "@/lib/search/types";
import { withTimeout } from "@/lib/utils/timeout";
import { VectorBackend, VectorIndexStore } from "./base";
import { assertDimension, compareMatches, rankByCosine } from "./cosine";

export const CYPHER = {
  SHOW_INDEX_INFO: `CALL vector_search.show_index_info() YIELD index_name, dimension
    RETURN index_name, dimension`,
  CREATE_ID_CONSTRAINT: `CREATE CONSTRAINT ON (n:SearchEntry) ASSERT n.id IS UNIQUE`,
  CREATE_OWNER_INDEX: `CREATE INDEX ON :SearchEntry(owner)`,
  UPSERT_ROWS: `UNWIND $rows AS row
    MERGE (n:SearchEntry {id: row.id})
    SET n.entityType = row.entityType,
        n.owner      = row.owner,
        n.isEnabled  = row.isEnabled,
        n.searchText = row.searchText,
        n.document   = row.document,
        n.embedding  = row.embedding`,
  DELETE_OWNED: `MATCH (n:SearchEntry)
    WHERE n.id = $id OR n.owner = $id
    DETACH DELETE n`,
  SET_ENABLED: `MATCH (n:SearchEntry)
    WHERE n.id = $id OR n.owner = $id
    SET n.isEnabled = $enabled`,
  NATIVE_SEARCH: `CALL vector_search.search($indexName, toInteger($fetch), $embedding) YIELD node, similarity
    WITH node, similarity
    WHERE size($entityTypes) = 0 OR node.entityType IN $entityTypes
    RETURN node.id AS id, node.document AS document, node.isEnabled AS isEnabled, similarity
    LIMIT $limit`,
  SCAN_VECTORS: `MATCH (n:SearchEntry)
    WHERE size($entityTypes) = 0 OR n.entityType IN $entityTypes
    RETURN n.id AS id, n.document AS document, n.isEnabled AS isEnabled, n.embedding AS embedding`,
  KEYWORD_FIND: `MATCH (n:SearchEntry)
    WHERE (size($entityTypes) = 0 OR n.entityType IN $entityTypes)
    WITH n, size([t IN $tokens WHERE n.searchText CONTAINS t]) AS matched
    WHERE matched > 0
    RETURN n.id AS id, n.document AS document, n.isEnabled AS isEnabled, n.embedding AS embedding, matched
    ORDER BY matched DESC, id
    LIMIT $limit`,
  GET_DOCUMENTS: `MATCH (n:SearchEntry)
    WHERE n.id IN $ids
    RETURN n.id AS id, n.document AS document, n.isEnabled AS isEnabled`,
  COUNT: `MATCH (n:SearchEntry)
    WHERE size($entityTypes) = 0 OR n.entityType IN $entityTypes
    RETURN count(n) AS total`,
} as const;

export function createIndexStatement(indexName: string, dimension: number): string {
  return `CREATE VECTOR INDEX ${indexName} ON :SearchEntry(embedding)
    WITH CONFIG {"dimension": ${dimension}, "capacity": 100000, "metric": "cos"}`;
}

const NATIVE_OVERFETCH = 4;

const storedDocumentSchema = entityDocumentSchema.omit({ isEnabled: true });
const vectorSchema = z.array(z.number());
const indexInfoSchema = z.object({
  index_name: z.string(),
  dimension: z.coerce.number().optional(),
});

export interface MemgraphVectorStoreOptions {
  runner: CypherRunner;
  indexName: string;
  /** Deadline for one native query in ms; 0 disables it. */
  queryTimeoutMs?: number;
  /** Consecutive native timeouts that make the fallback switch permanent. */
  timeoutStrikes?: number;
}

export class MemgraphVectorStore implements VectorIndexStore {
  readonly backend: VectorBackend = "memgraph";
  private readonly runner: CypherRunner;
  private readonly indexName: string;
  private readonly queryTimeoutMs: number;
  private readonly maxStrikes: number;
  private dimension: number | null = null;
  private currentMode: StoreMode = "native";
  private forcedMode: StoreMode | null = null;
  private strikes = 0;

  constructor(options: MemgraphVectorStoreOptions) {
    this.runner = options.runner;
    this.indexName = options.indexName;
    this.queryTimeoutMs = options.queryTimeoutMs ?? 0;
    this.maxStrikes = Math.max(1, options.timeoutStrikes ?? 3);
  }

  mode(): StoreMode {
    return this.forcedMode ?? this.currentMode;
  }

  /** Pin the retrieval mode (null restores automatic switching). */
  forceMode(mode: StoreMode | null): void {
    this.forcedMode = mode;
  }

  async ensureIndex(dimension: number, metric: SimilarityMetric): Promise<void> {
    if (metric !== "cosine") {
      throw new ConfigurationError(`Unsupported similarity metric: ${String(metric)}`);
    }
    this.dimension = dimension;
    try {
      const rows = await this.runner.read(CYPHER.SHOW_INDEX_INFO);
      const existing = rows
        .map((r) => indexInfoSchema.safeParse({ ...r, index_name: String(r.index_name ?? "").replace(/"/g, "") }))
        .flatMap((p) => (p.success ? [p.data] : []))
        .find((info) => info.index_name === this.indexName);

      if (existing?.dimension !== undefined && existing.dimension !== dimension) {
        throw new ConfigurationError(
          `Vector index ${this.indexName} has dimension ${existing.dimension}, configured dimension is ${dimension}`
        );
      }
      if (!existing) {
        console.info(`[memgraph-store] creating vector index ${this.indexName} (dimension ${dimension})`);
        await this.ddl(createIndexStatement(this.indexName, dimension));
      }
      await this.ddl(CYPHER.CREATE_ID_CONSTRAINT);
      await this.ddl(CYPHER.CREATE_OWNER_INDEX);
      this.currentMode = "native";
      this.strikes = 0;
    } catch (err) {
      if (err instanceof ConfigurationError) throw err;
      console.warn(
        `[memgraph-store] native vector search unavailable, running in fallback mode: ${errorMessage(err)}`
      );
      this.currentMode = "fallback";
    }
  }

  async upsert(entityId: string, vector: number[], document: EntityDocument): Promise<void> {
    assertDimension(vector, this.dimension, `upsert ${entityId}`);
    await this.indexWrite(`upsert ${entityId}`, () =>
      this.runner.write(CYPHER.UPSERT_ROWS, { rows: [toRow({ id: entityId, vector, document })] })
    );
  }

  async replaceEntity(ownerId: string, records: VectorRecord[]): Promise<void> {
    for (const r of records) assertDimension(r.vector, this.dimension, `replace ${r.id}`);
    await this.indexWrite(`replace ${ownerId}`, () =>
      this.runner.transaction([
        { cypher: CYPHER.DELETE_OWNED, params: { id: ownerId } },
        { cypher: CYPHER.UPSERT_ROWS, params: { rows: records.map(toRow) } },
      ])
    );
  }

  async remove(entityId: string): Promise<void> {
    await this.indexWrite(`remove ${entityId}`, () =>
      this.runner.write(CYPHER.DELETE_OWNED, { id: entityId })
    );
  }

  async setEnabled(entityId: string, enabled: boolean): Promise<void> {
    await this.indexWrite(`set enabled ${entityId}`, () =>
      this.runner.write(CYPHER.SET_ENABLED, { id: entityId, enabled })
    );
  }

  async query(vector: number[], k: number, filter?: VectorFilter): Promise<VectorMatch[]> {
    assertDimension(vector, this.dimension, "query");
    if (k <= 0) return [];
    if (this.mode() === "fallback") return this.fallbackQuery(vector, k, filter);

    try {
      const matches = await withTimeout(this.nativeQuery(vector, k, filter), this.queryTimeoutMs, "native vector query");
      this.strikes = 0;
      return matches;
    } catch (err) {
      if (this.forcedMode === "native") {
        throw new IndexBackendError(`Native vector query failed: ${errorMessage(err)}`, { cause: err });
      }
      if (err instanceof SearchTimeoutError) {
        this.strikes++;
        if (this.strikes >= this.maxStrikes) {
          this.switchToFallback(`${this.strikes} consecutive native timeouts`);
        } else {
          console.warn(
            `[memgraph-store] ${err.message}; using fallback for this query (${this.strikes}/${this.maxStrikes})`
          );
        }
      } else {
        this.switchToFallback(errorMessage(err));
      }
      return this.fallbackQuery(vector, k, filter);
    }
  }

  async findByKeywords(
    tokens: readonly string[],
    limit: number,
    filter?: VectorFilter
  ): Promise<KeywordCandidate[]> {
    if (tokens.length === 0 || limit <= 0) return [];
    const rows = await this.indexRead("keyword lookup", () =>
      this.runner.read(CYPHER.KEYWORD_FIND, {
        tokens: [...tokens],
        entityTypes: entityTypesParam(filter),
        limit,
      })
    );
    const out: KeywordCandidate[] = [];
    for (const row of rows) {
      const document = parseDocument(row);
      const vector = vectorSchema.safeParse(row.embedding);
      if (document && vector.success) out.push({ document, vector: vector.data });
    }
    return out;
  }

  async getDocuments(ids: readonly string[]): Promise<Map<string, EntityDocument>> {
    const out = new Map<string, EntityDocument>();
    if (ids.length === 0) return out;
    const rows = await this.indexRead("document lookup", () =>
      this.runner.read(CYPHER.GET_DOCUMENTS, { ids: [...ids] })
    );
    for (const row of rows) {
      const document = parseDocument(row);
      if (document) out.set(document.id, document);
    }
    return out;
  }

  async count(filter?: VectorFilter): Promise<number> {
    const rows = await this.indexRead("count", () =>
      this.runner.read(CYPHER.COUNT, { entityTypes: entityTypesParam(filter) })
    );
    const total = Number(rows[0]?.total ?? 0);
    return Number.isFinite(total) ? total : 0;
  }

  async close(): Promise<void> {
    await this.runner.close();
  }

  private switchToFallback(reason: string): void {
    if (this.currentMode === "fallback") return;
    this.currentMode = "fallback";
    console.warn(`[memgraph-store] switching to fallback mode until the next ensureIndex: ${reason}`);
  }

  private async nativeQuery(vector: number[], k: number, filter?: VectorFilter): Promise<VectorMatch[]> {
    const rows = await this.runner.read(
      CYPHER.NATIVE_SEARCH,
      {
        indexName: this.indexName,
        fetch: k * NATIVE_OVERFETCH,
        embedding: vector,
        entityTypes: entityTypesParam(filter),
        limit: k * NATIVE_OVERFETCH,
      },
      { timeoutMs: this.queryTimeoutMs || undefined }
    );
    const matches: VectorMatch[] = [];
    for (const row of rows) {
      const document = parseDocument(row);
      const similarity = Number(row.similarity);
      if (!document || !Number.isFinite(similarity)) continue;
      matches.push({ id: document.id, score: Math.max(-1, Math.min(1, similarity)), document });
    }
    return matches.sort(compareMatches).slice(0, k);
  }

  private async fallbackQuery(vector: number[], k: number, filter?: VectorFilter): Promise<VectorMatch[]> {
    const rows = await this.indexRead("fallback scan", () =>
      this.runner.read(CYPHER.SCAN_VECTORS, { entityTypes: entityTypesParam(filter) })
    );
    const entries: Array<{ vector: number[]; document: EntityDocument }> = [];
    for (const row of rows) {
      const document = parseDocument(row);
      const parsed = vectorSchema.safeParse(row.embedding);
      if (document && parsed.success) entries.push({ vector: parsed.data, document });
    }
    return rankByCosine(vector, entries, k, filter);
  }

  private async ddl(statement: string): Promise<void> {
    try {
      await this.runner.write(statement);
    } catch (err) {
      if (!/already exists/i.test(errorMessage(err))) throw err;
    }
  }

  private async indexWrite(operation: string, fn: () => Promise<unknown>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      console.error(`[memgraph-store] ${operation} failed:`, errorMessage(err));
      throw new IndexBackendError(`${operation} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async indexRead(operation: string, fn: () => Promise<CypherRow[]>): Promise<CypherRow[]> {
    try {
      return await fn();
    } catch (err) {
      throw new IndexBackendError(`${operation} failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}

function entityTypesParam(filter?: VectorFilter): string[] {
  return filter?.entityTypes ? [...filter.entityTypes] : [];
}

function toRow(record: VectorRecord): Record<string, unknown> {
  const { isEnabled, ...rest } = { ...record.document, id: record.id };
  return {
    id: record.id,
    entityType: rest.entityType,
    owner: rest.owner,
    isEnabled,
    searchText: keywordFields({ ...rest, isEnabled }).join("\n"),
    document: JSON.stringify(rest),
    embedding: record.vector,
  };
}

function parseDocument(row: CypherRow): EntityDocument | null {
  if (typeof row.document !== "string") return null;
  let json: unknown;
  try {
    json = JSON.parse(row.document);
  } catch (err) {
    console.warn(`[memgraph-store] skipping row ${String(row.id)} with unreadable document:`, errorMessage(err));
    return null;
  }
  const parsed = storedDocumentSchema.safeParse(json);
  if (!parsed.success) {
    console.warn(`[memgraph-store] skipping row ${String(row.id)} with malformed document`);
    return null;
  }
  return { ...parsed.data, isEnabled: row.isEnabled !== false };
}
