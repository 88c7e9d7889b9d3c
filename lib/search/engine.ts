/**
 * Hybrid query engine.
 *
 *   1. normalise + tokenize the query (too short → empty result)
 *   2. embed the query; on failure continue keyword-only and flag `degraded`
 *   3. per entity type, over-fetch maxResults * candidateMultiplier neighbours
 *      (tools are fetched for server queries too, to fill matching_tools)
 *   4. per entity type, add the best literal keyword matches the vector arm missed
 *   5. drop disabled entities (checked live, not from index time)
 *   6. combined = sim01 * (1 + w * keywordFraction), sim01 = (cos + 1) / 2;
 *      a candidate with cos <= 0 and no keyword overlap is not a match
 *   7. hand the pool to the formatter (sort, normalise, group, truncate)
 *
 * Read-path failures never throw: the caller gets an empty or keyword-only
 * result marked degraded.
 */
import type { Embedder } from "@/lib/embeddings/base";
import type { VectorIndexStore } from "@/lib/vector_stores/base";
import { cosineSimilarity } from "@/lib/vector_stores/cosine";
import { errorMessage } from "./errors";
import { emptyResultSet, formatResults, ScoredHit, SearchResultSet } from "./formatter";
import { keywordMatchFraction, normalizeQuery, tokenizeQuery } from "./keyword";
import {
  ENTITY_TYPES,
  EntityDocument,
  EntityType,
  KeywordCandidate,
  RetrievalMode,
  VectorMatch,
} from "./types";

/** Answers "is this entity visible right now?" for a batch of documents. */
export interface EntityStatusSource {
  enabledIds(documents: readonly EntityDocument[]): Promise<Set<string>>;
}

/**
 * Reads the live flags from the vector store. A tool is visible only while
 * its owning server is.
 */
export class StoreStatusSource implements EntityStatusSource {
  constructor(private readonly store: VectorIndexStore) {}

  async enabledIds(documents: readonly EntityDocument[]): Promise<Set<string>> {
    const ids = new Set<string>();
    for (const d of documents) {
      ids.add(d.id);
      ids.add(d.owner);
    }
    const live = await this.store.getDocuments([...ids]);
    const enabled = new Set<string>();
    for (const d of documents) {
      const self = live.get(d.id);
      if (!self?.isEnabled) continue;
      if (d.owner !== d.id) {
        const owner = live.get(d.owner);
        if (owner && !owner.isEnabled) continue;
      }
      enabled.add(d.id);
    }
    return enabled;
  }
}

export interface HybridSearchOptions {
  keywordBoostWeight?: number;
  candidateMultiplier?: number;
  minQueryLength?: number;
  defaultMaxResults?: number;
  maxResultsLimit?: number;
  statusSource?: EntityStatusSource;
}

export interface SearchRequest {
  entityTypes?: readonly EntityType[];
  maxResults?: number;
}

interface Candidate {
  document: EntityDocument;
  similarity: number | null;
}

export class HybridSearchEngine {
  private readonly weight: number;
  private readonly multiplier: number;
  private readonly minQueryLength: number;
  private readonly defaultMaxResults: number;
  private readonly maxResultsLimit: number;
  private readonly statusSource: EntityStatusSource;

  constructor(
    private readonly embedder: Embedder,
    private readonly store: VectorIndexStore,
    options: HybridSearchOptions = {}
  ) {
    this.weight = options.keywordBoostWeight ?? 1;
    this.multiplier = options.candidateMultiplier ?? 3;
    this.minQueryLength = options.minQueryLength ?? 2;
    this.defaultMaxResults = options.defaultMaxResults ?? 10;
    this.maxResultsLimit = options.maxResultsLimit ?? 50;
    this.statusSource = options.statusSource ?? new StoreStatusSource(store);
  }

  async search(query: string, request: SearchRequest = {}): Promise<SearchResultSet> {
    const maxResults = Math.min(
      this.maxResultsLimit,
      Math.max(1, Math.floor(request.maxResults ?? this.defaultMaxResults))
    );
    const types = request.entityTypes?.length
      ? ENTITY_TYPES.filter((t) => request.entityTypes?.includes(t))
      : [...ENTITY_TYPES];
    const fetchTypes: EntityType[] =
      types.includes("server") && !types.includes("tool") ? [...types, "tool"] : types;

    const normalized = normalizeQuery(query);
    if (normalized.length < this.minQueryLength) {
      return emptyResultSet(query, this.store.mode());
    }
    const tokens = tokenizeQuery(query);
    const poolSize = maxResults * this.multiplier;

    let queryVector: number[] | null = null;
    try {
      queryVector = await this.embedder.embed(normalized);
    } catch (err) {
      console.warn(`[search] query embedding unavailable, keyword-only results: ${errorMessage(err)}`);
    }

    const candidates = new Map<string, Candidate>();
    let mode: RetrievalMode = "keyword";

    if (queryVector) {
      const vector = queryVector;
      try {
        const perType = await Promise.all(
          fetchTypes.map((t) => this.store.query(vector, poolSize, { entityTypes: [t] }))
        );
        mode = this.store.mode();
        for (const m of perType.flat()) addVectorMatch(candidates, m);
      } catch (err) {
        console.error(`[search] vector retrieval failed, keyword-only results: ${errorMessage(err)}`);
        queryVector = null;
      }
    }

    let keywordFailed = false;
    if (tokens.length > 0) {
      try {
        const perType = await Promise.all(
          fetchTypes.map((t) => this.store.findByKeywords(tokens, poolSize, { entityTypes: [t] }))
        );
        for (const hit of perType.flat()) addKeywordHit(candidates, hit, queryVector);
      } catch (err) {
        keywordFailed = true;
        console.error(`[search] keyword retrieval failed: ${errorMessage(err)}`);
      }
    }

    const degraded = queryVector === null;
    if (degraded && keywordFailed) return emptyResultSet(query, "keyword", true);

    const visible = await this.visibleCandidates([...candidates.values()]);
    const hits: ScoredHit[] = [];
    for (const c of visible) {
      const fraction = keywordMatchFraction(tokens, c.document);
      if (degraded || c.similarity === null) {
        if (!degraded || fraction === 0) continue;
        hits.push({ id: c.document.id, document: c.document, score: fraction, similarity: null, keywordFraction: fraction });
        continue;
      }
      if (c.similarity <= 0 && fraction === 0) continue;
      hits.push({
        id: c.document.id,
        document: c.document,
        score: this.combine(c.similarity, fraction),
        similarity: c.similarity,
        keywordFraction: fraction,
      });
    }

    if (degraded) {
      console.warn(`[search] degraded query "${normalized}" returned ${hits.length} keyword match(es)`);
    }
    return formatResults({
      query,
      hits,
      maxResults,
      entityTypes: types,
      scoreRange: { min: 0, max: degraded ? 1 : 1 + this.weight },
      degraded,
      mode: degraded ? "keyword" : mode,
    });
  }

  /** sim01 * (1 + w * fraction), clamped to [0, 1 + w]. */
  combine(cosine: number, fraction: number): number {
    const sim01 = (cosine + 1) / 2;
    const combined = sim01 * (1 + this.weight * fraction);
    return Math.max(0, Math.min(1 + this.weight, combined));
  }

  private async visibleCandidates(candidates: Candidate[]): Promise<Candidate[]> {
    if (candidates.length === 0) return [];
    let enabled: Set<string>;
    try {
      enabled = await this.statusSource.enabledIds(candidates.map((c) => c.document));
    } catch (err) {
      console.warn(`[search] live status lookup failed, using indexed flags: ${errorMessage(err)}`);
      enabled = new Set(candidates.filter((c) => c.document.isEnabled).map((c) => c.document.id));
    }
    return candidates.filter((c) => enabled.has(c.document.id));
  }
}

function addVectorMatch(candidates: Map<string, Candidate>, match: VectorMatch): void {
  const existing = candidates.get(match.id);
  if (!existing || existing.similarity === null || match.score > existing.similarity) {
    candidates.set(match.id, { document: match.document, similarity: match.score });
  }
}

function addKeywordHit(
  candidates: Map<string, Candidate>,
  hit: KeywordCandidate,
  queryVector: number[] | null
): void {
  if (candidates.has(hit.document.id)) return;
  candidates.set(hit.document.id, {
    document: hit.document,
    similarity: queryVector ? cosineSimilarity(queryVector, hit.vector) : null,
  });
}
