import type { SearchSettings } from "@/lib/config/search";
import { ConfigurationError } from "@/lib/search/errors";
import { AzureOpenAIEmbedder } from "./azure";
import { Embedder } from "./base";
import { HashingEmbedder } from "./hashing";
import { OpenAIEmbedder } from "./openai";

export class EmbedderFactory {
  static create(config: SearchSettings["embeddings"]): Embedder {
    const common = {
      model: config.model,
      dimension: config.dimension,
      timeoutMs: config.timeoutMs,
    };
    switch (config.provider) {
      case "hashing":
        return new HashingEmbedder({ ...common, modelDir: config.modelDir });
      case "openai":
        return new OpenAIEmbedder({
          ...common,
          apiKey: requireSetting(config.apiKey, "EMBEDDINGS_API_KEY"),
          baseURL: config.apiBase,
        });
      case "azure_openai":
        return new AzureOpenAIEmbedder({
          ...common,
          apiKey: requireSetting(config.apiKey, "EMBEDDINGS_API_KEY"),
          endpoint: requireSetting(config.apiBase, "EMBEDDINGS_API_BASE"),
          apiVersion: config.apiVersion,
        });
      default:
        throw new ConfigurationError(`Unsupported embedder provider: ${String(config.provider)}`);
    }
  }
}

function requireSetting(value: string | undefined, name: string): string {
  if (!value) throw new ConfigurationError(`${name} is required for this embeddings provider`);
  return value;
}
