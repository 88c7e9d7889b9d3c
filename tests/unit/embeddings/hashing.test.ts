/**
 * lib/embeddings/hashing.ts + lib/embeddings/base.ts
 *
 * HSH_01  fnv1a32 matches the reference FNV-1a values
 * HSH_02  vectors have the configured dimension and unit length
 * HSH_03  identical texts are identical vectors (cosine 1)
 * HSH_04  blank texts embed to the zero vector without touching the provider
 * HSH_05  idf.json weights are applied
 * HSH_06  unreadable / malformed model files raise EmbeddingUnavailableError
 * HSH_07  healthCheck reports ok and latency
 * HSH_08  non-ASCII words embed like the keyword matcher tokenizes them
 */
export {};

import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { HashingEmbedder, fnv1a32 } from "@/lib/embeddings/hashing";
import { textTokens } from "@/lib/search/keyword";
import { EmbeddingUnavailableError } from "@/lib/search/errors";
import { cosineSimilarity } from "@/lib/vector_stores/cosine";

function norm(v: number[]): number {
  return Math.sqrt(v.reduce((s, x) => s + x * x, 0));
}

describe("HashingEmbedder", () => {
  test("HSH_01: fnv1a32 matches reference values", () => {
    expect(fnv1a32("")).toBe(0x811c9dc5);
    expect(fnv1a32("a")).toBe(0xe40c292c);
    expect(fnv1a32("foobar")).toBe(0xbf9cf968);
  });

  test("HSH_02: vectors have the configured dimension and unit length", async () => {
    const e = new HashingEmbedder({ model: "feature-hashing", dimension: 64 });
    const [v] = await e.embedBatch(["get current weather data"]);
    expect(v).toHaveLength(64);
    expect(norm(v)).toBeCloseTo(1, 10);
  });

  test("HSH_03: identical texts have cosine similarity 1", async () => {
    const e = new HashingEmbedder({ model: "feature-hashing", dimension: 128 });
    const [a, b] = await e.embedBatch(["historical weather records", "Historical\nweather records"]);
    expect(cosineSimilarity(a, b)).toBeCloseTo(1, 10);
  });

  test("HSH_04: blank texts embed to the zero vector", async () => {
    const e = new HashingEmbedder({ model: "feature-hashing", dimension: 8 });
    const [blank, spaces, real] = await e.embedBatch(["", "   \n ", "files"]);
    expect(blank).toEqual(new Array(8).fill(0));
    expect(spaces).toEqual(new Array(8).fill(0));
    expect(norm(real)).toBeCloseTo(1, 10);
  });

  test("HSH_05: idf.json weights are applied", async () => {
    const dir = mkdtempSync(path.join(tmpdir(), "hashing-idf-"));
    writeFileSync(path.join(dir, "idf.json"), JSON.stringify({ weather: 3 }));
    const e = new HashingEmbedder({ model: "feature-hashing", dimension: 1, modelDir: dir });
    // dimension 1: every token lands in bucket 0, so the raw sum is 3 + 1 before normalisation
    const [v] = await e.embedBatch(["weather api"]);
    expect(v).toEqual([1]);

    const single = new HashingEmbedder({ model: "feature-hashing", dimension: 2, modelDir: dir });
    const [w] = await single.embedBatch(["weather"]);
    expect(norm(w)).toBeCloseTo(1, 10);
  });

  test("HSH_06: unreadable or malformed model files raise EmbeddingUnavailableError", async () => {
    const missing = new HashingEmbedder({
      model: "feature-hashing",
      dimension: 8,
      modelDir: path.join(tmpdir(), "definitely-missing-model-dir"),
    });
    await expect(missing.embed("weather")).rejects.toBeInstanceOf(EmbeddingUnavailableError);

    const dir = mkdtempSync(path.join(tmpdir(), "hashing-bad-"));
    writeFileSync(path.join(dir, "idf.json"), JSON.stringify({ weather: "high" }));
    const malformed = new HashingEmbedder({ model: "feature-hashing", dimension: 8, modelDir: dir });
    await expect(malformed.embed("weather")).rejects.toThrow(/non-negative weights/);
  });

  test("HSH_07: healthCheck reports ok", async () => {
    const e = new HashingEmbedder({ model: "feature-hashing", dimension: 16 });
    const health = await e.healthCheck();
    expect(health.ok).toBe(true);
    expect(health.latencyMs).toBeGreaterThanOrEqual(0);
    expect(health.error).toBeUndefined();
  });

  test("HSH_08: non-ASCII words are embedded, not dropped", async () => {
    const e = new HashingEmbedder({ model: "feature-hashing", dimension: 64 });
    const [query, doc, blank] = await e.embedBatch(["météo", "Prévisions MÉTÉO", "?!"]);
    expect(textTokens("Prévisions MÉTÉO")).toEqual(["prévisions", "météo"]);
    expect(norm(query)).toBeCloseTo(1, 10);
    expect(cosineSimilarity(query, doc)).toBeGreaterThan(0.7);
    expect(blank).toEqual(new Array(64).fill(0));
  });
});
