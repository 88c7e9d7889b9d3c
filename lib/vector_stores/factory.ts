import type { SearchSettings } from "@/lib/config/search";
import { CypherRunner, MemgraphClient } from "@/lib/db/memgraph";
import { ConfigurationError } from "@/lib/search/errors";
import { VectorIndexStore } from "./base";
import { FileVectorStore } from "./file";
import { MemgraphVectorStore } from "./memgraph";
import { MemoryVectorStore } from "./memory";

export interface VectorStoreDeps {
  /** Injected Cypher runner; defaults to a MemgraphClient built from settings. */
  runner?: CypherRunner;
}

export class VectorStoreFactory {
  static create(settings: SearchSettings, deps: VectorStoreDeps = {}): VectorIndexStore {
    switch (settings.backend) {
      case "memory":
        return new MemoryVectorStore({ dimension: settings.embeddings.dimension });
      case "file":
        return new FileVectorStore({ filePath: settings.indexPath });
      case "memgraph":
        return new MemgraphVectorStore({
          runner: deps.runner ?? new MemgraphClient(settings.memgraph),
          indexName: settings.indexName,
          queryTimeoutMs: settings.queryTimeoutMs,
          timeoutStrikes: settings.nativeTimeoutStrikes,
        });
      default:
        throw new ConfigurationError(`Unsupported vector store backend: ${String(settings.backend)}`);
    }
  }
}
