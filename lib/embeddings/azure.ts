import { AzureOpenAI } from "openai";
import { BaseEmbedder, EmbedderOptions } from "./base";

export interface AzureOpenAIEmbedderOptions extends EmbedderOptions {
  apiKey: string;
  endpoint: string;
  apiVersion?: string;
}

/** Azure OpenAI embeddings; `model` is the deployment name. */
export class AzureOpenAIEmbedder extends BaseEmbedder {
  readonly provider = "azure_openai";
  private client: AzureOpenAI;

  constructor(options: AzureOpenAIEmbedderOptions) {
    super(options);
    this.client = new AzureOpenAI({
      apiKey: options.apiKey,
      endpoint: options.endpoint,
      apiVersion: options.apiVersion ?? "2024-10-21",
      deployment: options.model,
      maxRetries: 0,
      timeout: options.timeoutMs || undefined,
    });
  }

  protected async embedTexts(texts: string[]): Promise<number[][]> {
    const response = await this.client.embeddings.create({
      model: this.model,
      input: texts,
      ...(this.model.startsWith("text-embedding-3") ? { dimensions: this.dimension } : {}),
    });
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }
}
