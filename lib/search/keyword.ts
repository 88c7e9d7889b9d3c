/**
 * Query tokenization and literal keyword scoring.
 */
import stopwordList from "./stopwords.json";
import type { EntityDocument } from "./types";

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

/** Lowercase, turn punctuation into spaces, collapse whitespace. */
export function normalizeQuery(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
}

/** Every letter/digit run of the normalised text, duplicates kept. Shared with the local embedder. */
export function textTokens(text: string): string[] {
  const normalized = normalizeQuery(text);
  return normalized ? normalized.split(/\s+/) : [];
}

/** Unique non-stopword tokens of two or more characters, in query order. */
export function tokenizeQuery(text: string): string[] {
  const seen = new Set<string>();
  for (const token of textTokens(text)) {
    if (token.length < 2 || STOPWORDS.has(token)) continue;
    seen.add(token);
  }
  return [...seen];
}

/** Lowercased searchable fields of a document. */
export function keywordFields(doc: EntityDocument): string[] {
  return [doc.name, doc.path, doc.description, ...doc.tags].map((f) => f.toLowerCase());
}

/**
 * Fraction of query tokens that occur (as substrings) in the document's
 * name, path, description or tags. 0 when there are no tokens.
 */
export function keywordMatchFraction(tokens: readonly string[], doc: EntityDocument): number {
  if (tokens.length === 0) return 0;
  const fields = keywordFields(doc);
  let hits = 0;
  for (const t of tokens) {
    if (fields.some((f) => f.includes(t))) hits++;
  }
  return hits / tokens.length;
}
