/**
 * Deterministic embedders for tests.
 */
import { BaseEmbedder, Embedder, EmbedderHealth } from "@/lib/embeddings/base";
import { EmbeddingUnavailableError, errorMessage } from "@/lib/search/errors";

/**
 * One axis per vocabulary word (its count in the text) plus a constant bias
 * axis, so every text has a non-zero vector and similarities are easy to
 * work out by hand.
 */
export class VocabularyEmbedder extends BaseEmbedder {
  readonly provider = "test-vocabulary";
  calls = 0;

  constructor(private readonly vocabulary: string[]) {
    super({ model: "vocabulary", dimension: vocabulary.length + 1 });
  }

  protected async embedTexts(texts: string[]): Promise<number[][]> {
    this.calls++;
    return texts.map((t) => {
      const tokens = t.toLowerCase().match(/[a-z0-9]+/g) ?? [];
      const v = this.vocabulary.map((w) => tokens.filter((x) => x === w).length);
      v.push(1);
      return v;
    });
  }
}

/** Wraps an embedder and fails the next N calls with EmbeddingUnavailableError. */
export class FlakyEmbedder implements Embedder {
  private pendingFailures = 0;
  calls = 0;

  constructor(private readonly inner: Embedder) {}

  get provider(): string {
    return this.inner.provider;
  }
  get model(): string {
    return this.inner.model;
  }
  get dimension(): number {
    return this.inner.dimension;
  }

  failNext(n: number): void {
    this.pendingFailures = n;
  }

  failAlways(): void {
    this.pendingFailures = Number.POSITIVE_INFINITY;
  }

  async embed(text: string): Promise<number[]> {
    const [v] = await this.embedBatch([text]);
    return v;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls++;
    if (this.pendingFailures > 0) {
      this.pendingFailures--;
      throw new EmbeddingUnavailableError("embedding service unreachable");
    }
    return this.inner.embedBatch(texts);
  }

  async healthCheck(): Promise<EmbedderHealth> {
    try {
      await this.embed("health check");
      return { ok: true, latencyMs: 0 };
    } catch (err) {
      return { ok: false, latencyMs: 0, error: errorMessage(err) };
    }
  }
}
