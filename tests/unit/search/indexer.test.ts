/**
 * lib/search/indexer.ts — EntityIndexer over MemoryVectorStore
 *
 * IDX_01  indexServer writes the server row and one row per tool
 * IDX_02  re-indexing replaces the previous rows (dropped tools disappear)
 * IDX_03  removeEntity cascades to tools; unknown paths are a no-op
 * IDX_04  an embedding outage leaves the previous version in place
 * IDX_05  a transient embedding failure is retried
 * IDX_06  blank path or name is rejected before any embedding call
 * IDX_07  setEnabled flips visibility without re-embedding
 * IDX_08  rebuild indexes everything it can and reports failures by path
 */
export {};

import { EntityIndexer } from "@/lib/search/indexer";
import { EmbeddingUnavailableError, SearchValidationError } from "@/lib/search/errors";
import { MemoryVectorStore } from "@/lib/vector_stores/memory";
import { FlakyEmbedder, VocabularyEmbedder } from "../../helpers/embedders";
import { VOCABULARY, filesServer, travelAgent, weatherServer } from "../../helpers/registry";

let store: MemoryVectorStore;
let embedder: FlakyEmbedder;
let indexer: EntityIndexer;

beforeEach(async () => {
  jest.spyOn(console, "info").mockImplementation(() => undefined);
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
  jest.spyOn(console, "error").mockImplementation(() => undefined);
  store = new MemoryVectorStore();
  await store.ensureIndex(VOCABULARY.length + 1, "cosine");
  embedder = new FlakyEmbedder(new VocabularyEmbedder(VOCABULARY));
  indexer = new EntityIndexer(embedder, store, { retryAttempts: 2, retryBaseDelayMs: 1 });
});

afterEach(() => {
  jest.restoreAllMocks();
});

async function ids(): Promise<string[]> {
  const docs = await store.findByKeywords(["/"], 100);
  return docs.map((d) => d.document.id);
}

describe("EntityIndexer", () => {
  test("IDX_01: indexServer writes server and tool rows in one embedding call", async () => {
    await indexer.indexServer(weatherServer());
    expect(await ids()).toEqual(["/weather", "/weather::get_forecast"]);
    expect(embedder.calls).toBe(1);

    const docs = await store.getDocuments(["/weather::get_forecast"]);
    expect(docs.get("/weather::get_forecast")).toMatchObject({
      entityType: "tool",
      owner: "/weather",
      name: "get_forecast",
      attributes: { server_path: "/weather", server_name: "Weather", input_schema: { type: "object" } },
    });
  });

  test("IDX_02: re-indexing replaces the previous rows", async () => {
    await indexer.indexServer(weatherServer());
    await indexer.indexServer(weatherServer());
    expect(await store.count()).toBe(2);

    await indexer.indexServer(weatherServer({ tools: [{ name: "alerts" }] }));
    expect(await ids()).toEqual(["/weather", "/weather::alerts"]);
  });

  test("IDX_03: removeEntity cascades to tools", async () => {
    await indexer.indexServer(weatherServer());
    await indexer.indexServer(filesServer());
    await indexer.removeEntity("/weather");
    expect(await ids()).toEqual(["/files", "/files::read_file"]);

    await expect(indexer.removeEntity("/missing")).resolves.toBeUndefined();
    expect(await store.count()).toBe(2);
  });

  test("IDX_04: an embedding outage keeps the previous version", async () => {
    await indexer.indexServer(weatherServer());
    embedder.failAlways();
    await expect(indexer.indexServer(weatherServer({ tools: [] }))).rejects.toBeInstanceOf(
      EmbeddingUnavailableError
    );
    expect(embedder.calls).toBe(3);
    expect(await ids()).toEqual(["/weather", "/weather::get_forecast"]);
  });

  test("IDX_05: a transient embedding failure is retried", async () => {
    embedder.failNext(1);
    await indexer.indexAgent(travelAgent());
    expect(embedder.calls).toBe(2);
    expect(await ids()).toEqual(["/agents/travel"]);
  });

  test("IDX_06: blank identity is rejected", async () => {
    await expect(indexer.indexServer(weatherServer({ path: "  " }))).rejects.toBeInstanceOf(SearchValidationError);
    await expect(indexer.indexAgent(travelAgent({ name: "" }))).rejects.toThrow(
      "The agent at /agents/travel has no name"
    );
    await expect(indexer.setEnabled("", false)).rejects.toBeInstanceOf(SearchValidationError);
    expect(embedder.calls).toBe(0);
  });

  test("IDX_07: setEnabled flips visibility without re-embedding", async () => {
    await indexer.indexServer(weatherServer());
    await indexer.setEnabled("/weather", false);
    const docs = await store.getDocuments(["/weather", "/weather::get_forecast"]);
    expect(docs.get("/weather")?.isEnabled).toBe(false);
    expect(docs.get("/weather::get_forecast")?.isEnabled).toBe(false);
    expect(embedder.calls).toBe(1);
  });

  test("IDX_08: rebuild reports failures sorted by path", async () => {
    const report = await indexer.rebuild({
      servers: [filesServer(), weatherServer({ path: "/broken", name: " " })],
      agents: [travelAgent(), travelAgent({ path: "/agents/anon", name: "" })],
    });
    expect(report).toEqual({
      indexed: 2,
      failed: [
        { path: "/agents/anon", error: "The agent at /agents/anon has no name" },
        { path: "/broken", error: "The server at /broken has no name" },
      ],
    });
    expect(await ids()).toEqual(["/agents/travel", "/files", "/files::read_file"]);
  });
});
