/**
 * Exact client-side cosine ranking, used by the in-process stores and by
 * the native store's fallback mode.
 */
import { ConfigurationError } from "@/lib/search/errors";
import type { EntityDocument, VectorFilter, VectorMatch } from "@/lib/search/types";

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  const sim = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  // float drift can push identical vectors a hair past 1
  return Math.max(-1, Math.min(1, sim));
}

/** Similarity descending, id ascending. */
export function compareMatches(a: { id: string; score: number }, b: { id: string; score: number }): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function matchesFilter(doc: EntityDocument, filter?: VectorFilter): boolean {
  if (!filter?.entityTypes || filter.entityTypes.length === 0) return true;
  return filter.entityTypes.includes(doc.entityType);
}

export interface RankableEntry {
  vector: readonly number[];
  document: EntityDocument;
}

export function rankByCosine(
  query: readonly number[],
  entries: Iterable<RankableEntry>,
  k: number,
  filter?: VectorFilter
): VectorMatch[] {
  if (k <= 0) return [];
  const scored: VectorMatch[] = [];
  for (const e of entries) {
    if (!matchesFilter(e.document, filter)) continue;
    scored.push({ id: e.document.id, score: cosineSimilarity(query, e.vector), document: e.document });
  }
  scored.sort(compareMatches);
  return scored.slice(0, k);
}

export function assertDimension(vector: readonly number[], dimension: number | null, context: string): void {
  if (dimension !== null && vector.length !== dimension) {
    throw new ConfigurationError(
      `${context}: vector has ${vector.length} dimensions, index expects ${dimension}`
    );
  }
}
