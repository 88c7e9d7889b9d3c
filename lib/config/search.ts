/**
 * Search settings: parsed once from the environment at startup.
 *
 * Fallback chains (EMBEDDINGS_API_KEY → OPENAI_API_KEY, ...) are resolved
 * here so that nothing downstream ever reads process.env.
 */
import { z } from "zod";
import { ConfigurationError } from "@/lib/search/errors";

export type EmbeddingsProvider = "hashing" | "openai" | "azure_openai";
export type SearchBackend = "file" | "memory" | "memgraph";

export interface SearchSettings {
  embeddings: {
    provider: EmbeddingsProvider;
    model: string;
    dimension: number;
    modelDir?: string;
    apiKey?: string;
    apiBase?: string;
    apiVersion?: string;
    timeoutMs: number;
  };
  backend: SearchBackend;
  indexPath: string;
  indexName: string;
  metric: "cosine";
  candidateMultiplier: number;
  keywordBoostWeight: number;
  minQueryLength: number;
  defaultMaxResults: number;
  queryTimeoutMs: number;
  nativeTimeoutStrikes: number;
  indexRetryAttempts: number;
  indexRetryBaseDelayMs: number;
  rebuildConcurrency: number;
  memgraph: {
    url: string;
    user: string;
    password: string;
  };
}

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const int = (def: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max).default(def);

const num = (def: number, min: number, max: number) =>
  z.coerce.number().min(min).max(max).default(def);

export const envSchema = z.object({
  EMBEDDINGS_PROVIDER: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["hashing", "openai", "azure_openai"]))
    .default("hashing"),
  EMBEDDINGS_MODEL_NAME: optionalText,
  EMBEDDINGS_MODEL_DIMENSIONS: int(384, 1, 65_536),
  EMBEDDINGS_MODEL_DIR: optionalText,
  EMBEDDINGS_API_KEY: optionalText,
  OPENAI_API_KEY: optionalText,
  EMBEDDINGS_API_BASE: optionalText,
  OPENAI_BASE_URL: optionalText,
  EMBEDDINGS_API_VERSION: optionalText,
  EMBEDDINGS_TIMEOUT_MS: int(15_000, 0),

  SEARCH_BACKEND: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["file", "memory", "memgraph"]))
    .default("file"),
  SEARCH_INDEX_PATH: z.string().trim().min(1).default("./data/search-index.json"),
  SEARCH_INDEX_NAME: z
    .string()
    .trim()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be a plain identifier")
    .default("registry_vectors"),
  SEARCH_SIMILARITY_METRIC: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.literal("cosine"))
    .default("cosine"),
  SEARCH_CANDIDATE_MULTIPLIER: int(3, 1, 50),
  SEARCH_KEYWORD_BOOST_WEIGHT: num(1.0, 0, 10),
  SEARCH_MIN_QUERY_LENGTH: int(2, 1, 512),
  SEARCH_DEFAULT_MAX_RESULTS: int(10, 1, 50),
  SEARCH_QUERY_TIMEOUT_MS: int(5_000, 0),
  SEARCH_NATIVE_TIMEOUT_STRIKES: int(3, 1, 100),
  SEARCH_INDEX_RETRY_ATTEMPTS: int(3, 1, 10),
  SEARCH_INDEX_RETRY_BASE_DELAY_MS: int(250, 0),
  SEARCH_REBUILD_CONCURRENCY: int(4, 1, 64),

  MEMGRAPH_URL: z.string().trim().min(1).default("bolt://localhost:7687"),
  MEMGRAPH_USER: z.string().default(""),
  MEMGRAPH_PASSWORD: z.string().default(""),
});

const DEFAULT_MODEL: Record<EmbeddingsProvider, string> = {
  hashing: "feature-hashing",
  openai: "text-embedding-3-small",
  azure_openai: "text-embedding-3-small",
};

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.join(".") || "env"}: ${i.message}`)
    .join("; ");
}

/**
 * Parse and resolve search settings. Throws ConfigurationError on any
 * invalid value or missing credential; callers let it abort startup.
 */
export function loadSearchSettings(
  env: Record<string, string | undefined> = process.env
): SearchSettings {
  // Empty strings count as unset so `FOO=` in a .env file picks the default.
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== "")
  );
  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid search configuration: ${describeIssues(parsed.error)}`);
  }
  const e = parsed.data;
  const provider = e.EMBEDDINGS_PROVIDER;
  const apiKey = e.EMBEDDINGS_API_KEY ?? e.OPENAI_API_KEY;
  const apiBase = e.EMBEDDINGS_API_BASE ?? e.OPENAI_BASE_URL;

  if (provider !== "hashing" && !apiKey) {
    throw new ConfigurationError(
      `EMBEDDINGS_PROVIDER=${provider} requires EMBEDDINGS_API_KEY (or OPENAI_API_KEY)`
    );
  }
  if (provider === "azure_openai" && !apiBase) {
    throw new ConfigurationError(
      "EMBEDDINGS_PROVIDER=azure_openai requires EMBEDDINGS_API_BASE (the Azure endpoint)"
    );
  }

  const settings: SearchSettings = {
    embeddings: {
      provider,
      model: e.EMBEDDINGS_MODEL_NAME ?? DEFAULT_MODEL[provider],
      dimension: e.EMBEDDINGS_MODEL_DIMENSIONS,
      modelDir: e.EMBEDDINGS_MODEL_DIR,
      apiKey,
      apiBase,
      apiVersion: e.EMBEDDINGS_API_VERSION,
      timeoutMs: e.EMBEDDINGS_TIMEOUT_MS,
    },
    backend: e.SEARCH_BACKEND,
    indexPath: e.SEARCH_INDEX_PATH,
    indexName: e.SEARCH_INDEX_NAME,
    metric: e.SEARCH_SIMILARITY_METRIC,
    candidateMultiplier: e.SEARCH_CANDIDATE_MULTIPLIER,
    keywordBoostWeight: e.SEARCH_KEYWORD_BOOST_WEIGHT,
    minQueryLength: e.SEARCH_MIN_QUERY_LENGTH,
    defaultMaxResults: e.SEARCH_DEFAULT_MAX_RESULTS,
    queryTimeoutMs: e.SEARCH_QUERY_TIMEOUT_MS,
    nativeTimeoutStrikes: e.SEARCH_NATIVE_TIMEOUT_STRIKES,
    indexRetryAttempts: e.SEARCH_INDEX_RETRY_ATTEMPTS,
    indexRetryBaseDelayMs: e.SEARCH_INDEX_RETRY_BASE_DELAY_MS,
    rebuildConcurrency: e.SEARCH_REBUILD_CONCURRENCY,
    memgraph: {
      url: e.MEMGRAPH_URL,
      user: e.MEMGRAPH_USER,
      password: e.MEMGRAPH_PASSWORD,
    },
  };
  return Object.freeze(settings);
}
