import {
  EmbeddingUnavailableError,
  SearchTimeoutError,
  errorMessage,
} from "@/lib/search/errors";
import { withTimeout } from "@/lib/utils/timeout";

export interface EmbedderHealth {
  ok: boolean;
  latencyMs: number;
  error?: string;
}

export interface Embedder {
  readonly provider: string;
  readonly model: string;
  readonly dimension: number;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
  healthCheck(): Promise<EmbedderHealth>;
}

export interface EmbedderOptions {
  model: string;
  dimension: number;
  /** Per-call deadline in ms; 0 disables it. */
  timeoutMs?: number;
}

/**
 * Shared behaviour for every provider:
 *
 *  - blank texts never reach the provider and embed to the zero vector
 *  - newlines are flattened before embedding
 *  - each provider call runs under the configured deadline
 *  - provider failures surface as EmbeddingUnavailableError or SearchTimeoutError
 *  - every returned vector is checked for length and finiteness
 */
export abstract class BaseEmbedder implements Embedder {
  abstract readonly provider: string;
  readonly model: string;
  readonly dimension: number;
  protected readonly timeoutMs: number;

  constructor(options: EmbedderOptions) {
    this.model = options.model;
    this.dimension = options.dimension;
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  /** Provider call for a batch of non-blank, single-line texts. */
  protected abstract embedTexts(texts: string[]): Promise<number[][]>;

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const results: number[][] = texts.map(() => new Array<number>(this.dimension).fill(0));
    const pending: number[] = [];
    const inputs: string[] = [];
    texts.forEach((t, i) => {
      const cleaned = t.replace(/\s*\n+\s*/g, " ").trim();
      if (cleaned) {
        pending.push(i);
        inputs.push(cleaned);
      }
    });
    if (inputs.length === 0) return results;

    let vectors: number[][];
    try {
      vectors = await withTimeout(this.embedTexts(inputs), this.timeoutMs, `${this.provider} embedding`);
    } catch (err) {
      throw this.classify(err);
    }

    if (!Array.isArray(vectors) || vectors.length !== inputs.length) {
      throw new EmbeddingUnavailableError(
        `${this.provider} returned ${Array.isArray(vectors) ? vectors.length : "no"} embeddings for ${inputs.length} inputs`
      );
    }
    vectors.forEach((v, j) => {
      this.assertVector(v);
      results[pending[j]] = v;
    });
    return results;
  }

  async healthCheck(): Promise<EmbedderHealth> {
    const start = Date.now();
    try {
      await this.embed("health check");
      return { ok: true, latencyMs: Date.now() - start };
    } catch (err) {
      return { ok: false, latencyMs: Date.now() - start, error: errorMessage(err) };
    }
  }

  protected classify(err: unknown): Error {
    if (err instanceof SearchTimeoutError || err instanceof EmbeddingUnavailableError) return err;
    const kind = err instanceof Error ? `${err.name} ${err.constructor.name}` : "";
    if (/timeout/i.test(kind)) {
      return new SearchTimeoutError(`${this.provider} embedding`, this.timeoutMs);
    }
    return new EmbeddingUnavailableError(
      `${this.provider} embedding failed: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  private assertVector(v: unknown): asserts v is number[] {
    if (
      !Array.isArray(v) ||
      v.length !== this.dimension ||
      !v.every((x) => typeof x === "number" && Number.isFinite(x))
    ) {
      const len = Array.isArray(v) ? v.length : typeof v;
      throw new EmbeddingUnavailableError(
        `${this.provider} returned a malformed embedding (expected ${this.dimension} finite numbers, got ${len})`
      );
    }
  }
}
