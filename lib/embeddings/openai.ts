import OpenAI from "openai";
import { BaseEmbedder, EmbedderOptions } from "./base";

export interface OpenAIEmbedderOptions extends EmbedderOptions {
  apiKey: string;
  /** Any OpenAI-compatible endpoint (LiteLLM proxy, LM Studio, ...). */
  baseURL?: string;
}

/**
 * Remote embedder over the OpenAI embeddings API.
 *
 * SDK retries are disabled: the indexer owns the retry policy and the query
 * path degrades instead of waiting.
 */
export class OpenAIEmbedder extends BaseEmbedder {
  readonly provider: string = "openai";
  private openai: OpenAI;

  constructor(options: OpenAIEmbedderOptions) {
    super(options);
    this.openai = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      maxRetries: 0,
      timeout: options.timeoutMs || undefined,
    });
  }

  protected async embedTexts(texts: string[]): Promise<number[][]> {
    const response = await this.openai.embeddings.create({
      model: this.model,
      input: texts,
      // text-embedding-3* accept a target size (Matryoshka truncation)
      ...(this.model.startsWith("text-embedding-3") ? { dimensions: this.dimension } : {}),
    });
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }
}
