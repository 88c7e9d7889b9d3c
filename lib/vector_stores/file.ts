/**
 * File-backed vector index for single-node deployments.
 *
 * The whole index lives in memory (exact cosine ranking) and is mirrored to
 * one JSON document:
 *
 *   { "version": 1, "dimension": 384, "metric": "cosine", "entries": [{ id, vector, document }] }
 *
 * Writes go through a serialised queue. Each one builds the next entry
 * map, writes it to a temp file and renames that over the index; only then
 * does the new map replace the live one, so queries never see rows the
 * file does not hold.
 */
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { entityDocumentSchema } from "@/lib/search/documents";
import { ConfigurationError, IndexBackendError, errorMessage } from "@/lib/search/errors";
import type { SimilarityMetric, StoreMode } from "@/lib/search/types";
import { VectorBackend } from "./base";
import { MemoryVectorStore, StoredEntry } from "./memory";

export const INDEX_FILE_VERSION = 1;

const indexFileSchema = z.object({
  version: z.literal(INDEX_FILE_VERSION),
  dimension: z.number().int().positive(),
  metric: z.literal("cosine"),
  entries: z.array(
    z.object({
      id: z.string().min(1),
      vector: z.array(z.number()),
      document: entityDocumentSchema,
    })
  ),
});

export type IndexFile = z.infer<typeof indexFileSchema>;

export interface FileVectorStoreOptions {
  filePath: string;
}

export class FileVectorStore extends MemoryVectorStore {
  readonly backend: VectorBackend = "file";
  private readonly filePath: string;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(options: FileVectorStoreOptions) {
    super();
    this.filePath = path.resolve(options.filePath);
  }

  mode(): StoreMode {
    return "native";
  }

  async ensureIndex(dimension: number, metric: SimilarityMetric): Promise<void> {
    await this.writeQueue;
    const file = await this.readIndexFile();
    if (file && file.dimension !== dimension) {
      throw new ConfigurationError(
        `Index file ${this.filePath} was built with dimension ${file.dimension}, configured dimension is ${dimension}`
      );
    }
    this.entries.clear();
    for (const e of file?.entries ?? []) {
      if (e.vector.length !== dimension) {
        throw new ConfigurationError(
          `Index file ${this.filePath}: entry ${e.id} has ${e.vector.length} dimensions, expected ${dimension}`
        );
      }
      this.entries.set(e.id, { vector: e.vector, document: { ...e.document, id: e.id } });
    }
    await super.ensureIndex(dimension, metric);
    if (!file) await this.enqueue(() => this.flush(this.entries));
    console.info(`[file-store] loaded ${this.entries.size} entries from ${this.filePath}`);
  }

  async close(): Promise<void> {
    await this.writeQueue;
    await super.close();
  }

  protected commit(mutate: (draft: Map<string, StoredEntry>) => number): Promise<number> {
    return this.enqueue(async () => {
      const draft = new Map(this.entries);
      const changed = mutate(draft);
      if (changed > 0) {
        await this.flush(draft);
        this.entries = draft;
      }
      return changed;
    });
  }

  private enqueue<T>(work: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(work);
    this.writeQueue = run.then(
      () => undefined,
      (err: unknown) => {
        console.error("[file-store] write failed:", errorMessage(err));
      }
    );
    return run;
  }

  private async flush(entries: ReadonlyMap<string, StoredEntry>): Promise<void> {
    const body: IndexFile = {
      version: INDEX_FILE_VERSION,
      dimension: this.dimension ?? 0,
      metric: "cosine",
      entries: [...entries.values()].map((e) => ({
        id: e.document.id,
        vector: [...e.vector],
        document: e.document,
      })),
    };
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(tmp, JSON.stringify(body), "utf8");
      await rename(tmp, this.filePath);
    } catch (err) {
      throw new IndexBackendError(`Cannot write index file ${this.filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private async readIndexFile(): Promise<IndexFile | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new IndexBackendError(`Cannot read index file ${this.filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new IndexBackendError(`Index file ${this.filePath} is not valid JSON`, { cause: err });
    }
    const parsed = indexFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new IndexBackendError(
        `Index file ${this.filePath} is malformed: ${parsed.error.issues[0]?.message ?? "unknown"}`
      );
    }
    return parsed.data;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
