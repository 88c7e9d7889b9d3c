/**
 * lib/search/engine.ts — HybridSearchEngine end to end over MemoryVectorStore
 *
 * Vectors come from VocabularyEmbedder (see tests/helpers/registry.ts), so
 * every similarity below can be worked out by hand.
 *
 * ENG_01  "weather forecast" ranks the weather server and its tool first
 * ENG_02  queries shorter than the minimum return an empty, non-degraded result
 * ENG_03  embedding outage → keyword-only results flagged degraded
 * ENG_04  vector store failure → keyword-only results flagged degraded
 * ENG_05  disabling hides an entity and its tools without re-indexing
 * ENG_06  a tool stays hidden while its server is disabled
 * ENG_07  identical queries give identical results
 * ENG_08  keyword boost is monotonic and bounded
 * ENG_09  querying with an entity's own description scores it above 0.9
 * ENG_10  entity type filter and max_results truncation
 * ENG_11  status lookup failure falls back to the indexed flags
 * ENG_12  two weather servers outrank the file manager; re-indexing keeps scores
 * ENG_13  a query sharing nothing with the index returns empty lists
 * ENG_14  degraded keyword results cover every entity type, whatever the tool count
 * ENG_15  a server-only query still fills matching_tools
 */
export {};

import { HybridSearchEngine, EntityStatusSource } from "@/lib/search/engine";
import { EntityIndexer } from "@/lib/search/indexer";
import { HashingEmbedder } from "@/lib/embeddings/hashing";
import { MemoryVectorStore } from "@/lib/vector_stores/memory";
import { FlakyEmbedder, VocabularyEmbedder } from "../../helpers/embedders";
import { VOCABULARY, filesServer, travelAgent, weatherServer } from "../../helpers/registry";

let store: MemoryVectorStore;
let embedder: FlakyEmbedder;
let indexer: EntityIndexer;
let engine: HybridSearchEngine;

beforeEach(async () => {
  jest.spyOn(console, "info").mockImplementation(() => undefined);
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
  jest.spyOn(console, "error").mockImplementation(() => undefined);
  store = new MemoryVectorStore();
  await store.ensureIndex(VOCABULARY.length + 1, "cosine");
  embedder = new FlakyEmbedder(new VocabularyEmbedder(VOCABULARY));
  indexer = new EntityIndexer(embedder, store, { retryAttempts: 1 });
  engine = new HybridSearchEngine(embedder, store);
  await indexer.rebuild({ servers: [weatherServer(), filesServer()], agents: [travelAgent()] });
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe("HybridSearchEngine", () => {
  test("ENG_01: weather forecast ranks the weather server and tool first", async () => {
    const result = await engine.search("Weather forecast?");

    expect(result.query).toBe("Weather forecast?");
    expect(result.degraded).toBe(false);
    expect(result.mode).toBe("fallback");
    expect(result.servers.map((s) => s.path)).toEqual(["/weather", "/files"]);
    expect(result.tools.map((t) => t.path)).toEqual(["/weather::get_forecast", "/files::read_file"]);
    expect(result.agents.map((a) => a.path)).toEqual(["/agents/travel"]);
    expect(result.total_servers).toBe(2);

    // cos(/weather) = 5 / (3 * sqrt(3)), every query token matches → sim01 * 2 / 2
    expect(result.servers[0].relevance_score).toBeCloseTo((5 / (3 * Math.sqrt(3)) + 1) / 2, 3);
    expect(result.servers[0].num_tools).toBe(1);
    expect(result.servers[0].matching_tools).toEqual([
      {
        tool_name: "get_forecast",
        description: "forecast for a city",
        relevance_score: result.tools[0].relevance_score,
      },
    ]);
    expect(result.tools[0]).toMatchObject({
      tool_name: "get_forecast",
      server_path: "/weather",
      server_name: "Weather",
      input_schema: { type: "object" },
    });
    // no keyword overlap: (cos + 1) / 2 / 2 with cos = 1 / sqrt(30)
    expect(result.servers[1].relevance_score).toBeCloseTo((1 / Math.sqrt(30) + 1) / 4, 3);
  });

  test("ENG_02: too-short queries return an empty result", async () => {
    const callsBefore = embedder.calls;
    const result = await engine.search(" a ");
    expect(result).toEqual({
      query: " a ",
      servers: [],
      tools: [],
      agents: [],
      total_servers: 0,
      total_tools: 0,
      total_agents: 0,
      degraded: false,
      mode: "fallback",
    });
    expect(embedder.calls).toBe(callsBefore);
  });

  test("ENG_03: embedding outage degrades to keyword matches", async () => {
    embedder.failAlways();
    const result = await engine.search("weather");
    expect(result.degraded).toBe(true);
    expect(result.mode).toBe("keyword");
    expect(result.servers.map((s) => [s.path, s.relevance_score])).toEqual([["/weather", 1]]);
    expect(result.tools.map((t) => [t.path, t.relevance_score])).toEqual([["/weather::get_forecast", 1]]);
    expect(result.agents).toEqual([]);
  });

  test("ENG_04: vector store failure degrades to keyword matches", async () => {
    jest.spyOn(store, "query").mockRejectedValue(new Error("index offline"));
    const result = await engine.search("read files");
    expect(result.degraded).toBe(true);
    expect(result.servers.map((s) => [s.path, s.relevance_score])).toEqual([["/files", 1]]);
    // "read" matches the tool, "files" matches its path "/files::read_file"
    expect(result.tools.map((t) => [t.path, t.relevance_score])).toEqual([["/files::read_file", 1]]);
  });

  test("ENG_05: disabling hides an entity and its tools without re-indexing", async () => {
    const callsBefore = embedder.calls;
    await indexer.setEnabled("/weather", false);
    expect(embedder.calls).toBe(callsBefore);

    const hidden = await engine.search("weather forecast");
    expect(hidden.servers.map((s) => s.path)).toEqual(["/files"]);
    expect(hidden.tools.map((t) => t.path)).toEqual(["/files::read_file"]);

    await indexer.setEnabled("/weather", true);
    const visible = await engine.search("weather forecast");
    expect(visible.servers[0].path).toBe("/weather");
  });

  test("ENG_06: a tool stays hidden while its server is disabled", async () => {
    await store.setEnabled("/weather", false);
    await store.setEnabled("/weather::get_forecast", true);
    const result = await engine.search("forecast");
    expect(result.tools.map((t) => t.path)).toEqual(["/files::read_file"]);
  });

  test("ENG_07: identical queries give identical results", async () => {
    const first = await engine.search("read and write files");
    const second = await engine.search("read and write files");
    expect(second).toEqual(first);
  });

  test("ENG_08: keyword boost is monotonic and bounded", () => {
    expect(engine.combine(0.2, 0.5)).toBeGreaterThan(engine.combine(0.2, 0));
    expect(engine.combine(0.2, 1)).toBeGreaterThan(engine.combine(0.2, 0.5));
    expect(engine.combine(0, 0)).toBe(0.5);
    expect(engine.combine(1, 1)).toBe(2);
    expect(engine.combine(-1, 1)).toBe(0);

    const heavy = new HybridSearchEngine(embedder, store, { keywordBoostWeight: 3 });
    expect(heavy.combine(1, 1)).toBe(4);
  });

  test("ENG_09: an entity's own description scores above 0.9", async () => {
    const result = await engine.search("read and write files");
    expect(result.servers[0].path).toBe("/files");
    // cos = 6 / (2 * sqrt(10)), all four tokens match
    expect(result.servers[0].relevance_score).toBeCloseTo((6 / (2 * Math.sqrt(10)) + 1) / 2, 3);
    expect(result.servers[0].relevance_score).toBeGreaterThan(0.9);
  });

  test("ENG_10: entity type filter and max_results", async () => {
    const toolsOnly = await engine.search("weather forecast", { entityTypes: ["tool"] });
    expect(toolsOnly.servers).toEqual([]);
    expect(toolsOnly.agents).toEqual([]);
    expect(toolsOnly.tools.map((t) => t.path)).toEqual(["/weather::get_forecast", "/files::read_file"]);

    const top = await engine.search("weather forecast", { maxResults: 1 });
    expect(top.servers.map((s) => s.path)).toEqual(["/weather"]);
    expect(top.tools.map((t) => t.path)).toEqual(["/weather::get_forecast"]);
    expect(top.total_servers).toBe(1);
    expect(top.servers[0].matching_tools.map((t) => t.tool_name)).toEqual(["get_forecast"]);
  });

  test("ENG_11: status lookup failure falls back to indexed flags", async () => {
    const failing: EntityStatusSource = {
      enabledIds: jest.fn().mockRejectedValue(new Error("registry unreachable")),
    };
    await store.setEnabled("/files", false);
    const withFailingStatus = new HybridSearchEngine(embedder, store, { statusSource: failing });
    const result = await withFailingStatus.search("read files");
    expect(result.degraded).toBe(false);
    expect(result.servers.map((s) => s.path)).toEqual(["/weather"]);
    expect(result.tools.map((t) => t.path)).toEqual(["/weather::get_forecast"]);
    expect(result.agents.map((a) => a.path)).toEqual(["/agents/travel"]);
  });

  test("ENG_12: weather servers outrank the file manager", async () => {
    // vectors: weather-api [2,0,1,0,1], file-manager [0,1,0,0,1], weather-archive [2,0,0,1,1]
    const vocabulary = ["weather", "files", "data", "records"];
    const localEmbedder = new VocabularyEmbedder(vocabulary);
    const localStore = new MemoryVectorStore({ dimension: localEmbedder.dimension });
    const localIndexer = new EntityIndexer(localEmbedder, localStore);
    const servers = [
      { path: "/weather-api", name: "weather-api", description: "get current weather data" },
      { path: "/file-manager", name: "file-manager", description: "manage files and directories" },
      { path: "/weather-archive", name: "weather-archive", description: "historical weather records" },
    ];
    await localIndexer.rebuild({ servers });
    const local = new HybridSearchEngine(localEmbedder, localStore);

    const all = await local.search("weather", { maxResults: 10 });
    expect(all.servers.map((s) => s.path)).toEqual(["/weather-api", "/weather-archive", "/file-manager"]);
    expect(all.servers[0].relevance_score).toBe(all.servers[1].relevance_score);

    const capped = await local.search("weather", { maxResults: 2 });
    expect(capped.servers.map((s) => s.path)).toEqual(["/weather-api", "/weather-archive"]);

    await localIndexer.indexServer(servers[0]);
    expect(await localStore.count()).toBe(3);
    expect(await local.search("weather", { maxResults: 10 })).toEqual(all);
  });

  test("ENG_13: a query that matches nothing returns empty lists", async () => {
    // dimension 128: no FNV-1a bucket is shared between the query and either server
    const hashing = new HashingEmbedder({ model: "feature-hashing", dimension: 128 });
    const localStore = new MemoryVectorStore({ dimension: 128 });
    await new EntityIndexer(hashing, localStore).rebuild({
      servers: [
        { path: "/weather-api", name: "weather-api", description: "get current weather data" },
        { path: "/file-manager", name: "file-manager", description: "manage files and directories" },
      ],
    });
    const local = new HybridSearchEngine(hashing, localStore);

    const none = await local.search("zzqx blorp");
    expect(none.servers).toEqual([]);
    expect(none.tools).toEqual([]);
    expect(none.agents).toEqual([]);
    expect(none.degraded).toBe(false);

    const weather = await local.search("weather");
    expect(weather.servers.map((s) => s.path)).toEqual(["/weather-api"]);
  });

  test("ENG_14: degraded keyword results are limited per entity type", async () => {
    const localEmbedder = new FlakyEmbedder(new VocabularyEmbedder(VOCABULARY));
    const localStore = new MemoryVectorStore({ dimension: localEmbedder.dimension });
    await new EntityIndexer(localEmbedder, localStore).rebuild({
      servers: [
        {
          path: "/a-weather",
          name: "a-weather",
          tools: Array.from({ length: 10 }, (_, i) => ({ name: `weather_${i}`, description: "station data" })),
        },
      ],
      agents: [{ path: "/z-agent", name: "z-agent", description: "weather agent" }],
    });
    localEmbedder.failAlways();
    const local = new HybridSearchEngine(localEmbedder, localStore);

    const result = await local.search("weather", { maxResults: 1 });
    expect(result.degraded).toBe(true);
    expect(result.servers.map((s) => s.path)).toEqual(["/a-weather"]);
    expect(result.tools.map((t) => t.path)).toEqual(["/a-weather::weather_0"]);
    expect(result.agents.map((a) => a.path)).toEqual(["/z-agent"]);
  });

  test("ENG_15: server-only queries still attach matching tools", async () => {
    const result = await engine.search("weather forecast", { entityTypes: ["server"] });
    expect(result.tools).toEqual([]);
    expect(result.agents).toEqual([]);
    expect(result.servers[0].path).toBe("/weather");
    expect(result.servers[0].matching_tools.map((t) => t.tool_name)).toEqual(["get_forecast"]);
  });
});
