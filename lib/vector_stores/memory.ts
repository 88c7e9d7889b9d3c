import { keywordMatchFraction } from "@/lib/search/keyword";
import type {
  EntityDocument,
  KeywordCandidate,
  SimilarityMetric,
  StoreMode,
  VectorFilter,
  VectorMatch,
  VectorRecord,
} from "@/lib/search/types";
import { ConfigurationError } from "@/lib/search/errors";
import { VectorBackend, VectorIndexStore } from "./base";
import { assertDimension, matchesFilter, rankByCosine } from "./cosine";

export interface StoredEntry {
  readonly vector: readonly number[];
  readonly document: EntityDocument;
}

export interface MemoryVectorStoreOptions {
  dimension?: number;
}

/**
 * In-process exact index. Entries are immutable and replaced wholesale, and
 * `query` ranks a copy of the entry list taken when it starts, so a
 * concurrent write is either fully visible to a query or not at all.
 */
export class MemoryVectorStore implements VectorIndexStore {
  readonly backend: VectorBackend = "memory";
  protected entries = new Map<string, StoredEntry>();
  protected dimension: number | null;

  constructor(options: MemoryVectorStoreOptions = {}) {
    this.dimension = options.dimension ?? null;
  }

  mode(): StoreMode {
    return "fallback";
  }

  async ensureIndex(dimension: number, metric: SimilarityMetric): Promise<void> {
    if (metric !== "cosine") {
      throw new ConfigurationError(`Unsupported similarity metric: ${String(metric)}`);
    }
    for (const entry of this.entries.values()) {
      assertDimension(entry.vector, dimension, `entry ${entry.document.id}`);
    }
    this.dimension = dimension;
  }

  async upsert(entityId: string, vector: number[], document: EntityDocument): Promise<void> {
    assertDimension(vector, this.dimension, `upsert ${entityId}`);
    const entry = freeze(vector, { ...document, id: entityId });
    await this.commit((draft) => {
      draft.set(entityId, entry);
      return 1;
    });
  }

  async replaceEntity(ownerId: string, records: VectorRecord[]): Promise<void> {
    for (const r of records) assertDimension(r.vector, this.dimension, `replace ${r.id}`);
    const fresh = records.map((r) => freeze(r.vector, { ...r.document, id: r.id }));
    await this.commit((draft) => {
      const removed = deleteOwned(draft, ownerId);
      for (const e of fresh) draft.set(e.document.id, e);
      return removed + fresh.length;
    });
  }

  async remove(entityId: string): Promise<void> {
    await this.commit((draft) => deleteOwned(draft, entityId));
  }

  async setEnabled(entityId: string, enabled: boolean): Promise<void> {
    await this.commit((draft) => {
      let changed = 0;
      for (const [id, entry] of draft) {
        if (!ownedBy(entry.document, entityId) || entry.document.isEnabled === enabled) continue;
        draft.set(id, { vector: entry.vector, document: { ...entry.document, isEnabled: enabled } });
        changed++;
      }
      return changed;
    });
  }

  async query(vector: number[], k: number, filter?: VectorFilter): Promise<VectorMatch[]> {
    assertDimension(vector, this.dimension, "query");
    return rankByCosine(vector, [...this.entries.values()], k, filter);
  }

  async findByKeywords(
    tokens: readonly string[],
    limit: number,
    filter?: VectorFilter
  ): Promise<KeywordCandidate[]> {
    const hits: Array<KeywordCandidate & { fraction: number }> = [];
    for (const entry of [...this.entries.values()]) {
      if (!matchesFilter(entry.document, filter)) continue;
      const fraction = keywordMatchFraction(tokens, entry.document);
      if (fraction > 0) hits.push({ document: entry.document, vector: [...entry.vector], fraction });
    }
    hits.sort((a, b) => b.fraction - a.fraction || compareIds(a.document.id, b.document.id));
    return hits.slice(0, Math.max(0, limit)).map(({ document, vector }) => ({ document, vector }));
  }

  async getDocuments(ids: readonly string[]): Promise<Map<string, EntityDocument>> {
    const out = new Map<string, EntityDocument>();
    for (const id of ids) {
      const entry = this.entries.get(id);
      if (entry) out.set(id, entry.document);
    }
    return out;
  }

  async count(filter?: VectorFilter): Promise<number> {
    let n = 0;
    for (const entry of this.entries.values()) {
      if (matchesFilter(entry.document, filter)) n++;
    }
    return n;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  /**
   * Applies `mutate` to a copy of the entries and swaps the copy in when it
   * reports a change. Durable subclasses write the copy out first, so a
   * failed write leaves the previous entries live.
   */
  protected async commit(mutate: (draft: Map<string, StoredEntry>) => number): Promise<number> {
    const draft = new Map(this.entries);
    const changed = mutate(draft);
    if (changed > 0) this.entries = draft;
    return changed;
  }
}

function deleteOwned(entries: Map<string, StoredEntry>, ownerId: string): number {
  let removed = 0;
  for (const [id, entry] of entries) {
    if (ownedBy(entry.document, ownerId)) {
      entries.delete(id);
      removed++;
    }
  }
  return removed;
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function ownedBy(doc: EntityDocument, ownerId: string): boolean {
  return doc.id === ownerId || doc.owner === ownerId;
}

function freeze(vector: readonly number[], document: EntityDocument): StoredEntry {
  return { vector: [...vector], document: { ...document, tags: [...document.tags] } };
}
