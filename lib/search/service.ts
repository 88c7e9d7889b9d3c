/**
 * Composition root for the search subsystem.
 *
 *   createSearchService(settings, overrides)  wire embedder + store + indexer + engine
 *   getSearchService()                        process-wide instance built from the environment
 *   closeSearchService()                      release it (shutdown, tests)
 */
import { loadSearchSettings, SearchSettings } from "@/lib/config/search";
import type { Embedder, EmbedderHealth } from "@/lib/embeddings/base";
import { EmbedderFactory } from "@/lib/embeddings/factory";
import type { VectorIndexStore } from "@/lib/vector_stores/base";
import { VectorStoreFactory } from "@/lib/vector_stores/factory";
import type { CypherRunner } from "@/lib/db/memgraph";
import { HybridSearchEngine, EntityStatusSource } from "./engine";
import { EntityIndexer } from "./indexer";
import { ConfigurationError, errorMessage } from "./errors";
import type { StoreMode } from "./types";

export interface SearchServiceOverrides {
  embedder?: Embedder;
  store?: VectorIndexStore;
  runner?: CypherRunner;
  statusSource?: EntityStatusSource;
}

export interface SearchHealth {
  backend: string;
  mode: StoreMode;
  provider: string;
  model: string;
  dimension: number;
  indexed: number | null;
  embeddings: EmbedderHealth;
}

export interface SearchService {
  readonly settings: SearchSettings;
  readonly embedder: Embedder;
  readonly store: VectorIndexStore;
  readonly indexer: EntityIndexer;
  readonly engine: HybridSearchEngine;
  initialize(): Promise<void>;
  health(): Promise<SearchHealth>;
  close(): Promise<void>;
}

export function createSearchService(
  settings: SearchSettings,
  overrides: SearchServiceOverrides = {}
): SearchService {
  const embedder = overrides.embedder ?? EmbedderFactory.create(settings.embeddings);
  const store = overrides.store ?? VectorStoreFactory.create(settings, { runner: overrides.runner });
  const indexer = new EntityIndexer(embedder, store, {
    retryAttempts: settings.indexRetryAttempts,
    retryBaseDelayMs: settings.indexRetryBaseDelayMs,
    rebuildConcurrency: settings.rebuildConcurrency,
  });
  const engine = new HybridSearchEngine(embedder, store, {
    keywordBoostWeight: settings.keywordBoostWeight,
    candidateMultiplier: settings.candidateMultiplier,
    minQueryLength: settings.minQueryLength,
    defaultMaxResults: settings.defaultMaxResults,
    statusSource: overrides.statusSource,
  });

  return {
    settings,
    embedder,
    store,
    indexer,
    engine,

    async initialize(): Promise<void> {
      if (embedder.dimension !== settings.embeddings.dimension) {
        throw new ConfigurationError(
          `Embedder ${embedder.provider}/${embedder.model} produces ${embedder.dimension}-dimensional vectors, ` +
            `index is configured for ${settings.embeddings.dimension}`
        );
      }
      await store.ensureIndex(settings.embeddings.dimension, settings.metric);
      console.info(
        `[search] ready: backend=${store.backend} mode=${store.mode()} provider=${embedder.provider} dim=${embedder.dimension}`
      );
    },

    async health(): Promise<SearchHealth> {
      const [indexed, embeddings] = await Promise.all([
        store.count().catch((err: unknown) => {
          console.warn("[search] health count failed:", errorMessage(err));
          return null;
        }),
        embedder.healthCheck(),
      ]);
      return {
        backend: store.backend,
        mode: store.mode(),
        provider: embedder.provider,
        model: embedder.model,
        dimension: embedder.dimension,
        indexed,
        embeddings,
      };
    },

    async close(): Promise<void> {
      await store.close();
    },
  };
}

// ---------------------------------------------------------------------------
// Process-wide instance: globalThis guard survives Next.js HMR module re-creates
// ---------------------------------------------------------------------------

type GlobalWithSearch = typeof globalThis & { __searchService?: Promise<SearchService> | null };

export function getSearchService(): Promise<SearchService> {
  const g: GlobalWithSearch = globalThis;
  if (!g.__searchService) {
    const pending = (async () => {
      const service = createSearchService(loadSearchSettings());
      await service.initialize();
      return service;
    })();
    g.__searchService = pending;
    // A failed start is not cached; the next request tries again.
    pending.catch(() => {
      if (g.__searchService === pending) g.__searchService = null;
    });
  }
  return g.__searchService;
}

export async function closeSearchService(): Promise<void> {
  const g: GlobalWithSearch = globalThis;
  const pending = g.__searchService;
  g.__searchService = null;
  if (!pending) return;
  let service: SearchService;
  try {
    service = await pending;
  } catch (err) {
    console.warn("[search] nothing to close, the service never started:", errorMessage(err));
    return;
  }
  await service.close();
}
