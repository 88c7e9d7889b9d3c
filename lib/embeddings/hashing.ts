/**
 * Local, offline embedder based on feature hashing.
 *
 * Each token (the letter/digit runs the keyword matcher also sees) is
 * hashed (FNV-1a, 32-bit) into one of `dimension` buckets and the bucket
 * accumulates the token's weight. The
 * weight is 1 unless `<modelDir>/idf.json` supplies one. The result is
 * L2-normalised, so identical texts have cosine similarity 1 and texts
 * without shared tokens (or bucket collisions) have 0.
 *
 * No network access happens here. The only failure mode is a configured
 * model directory whose idf.json cannot be read or parsed.
 */
import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { EmbeddingUnavailableError, errorMessage } from "@/lib/search/errors";
import { textTokens } from "@/lib/search/keyword";
import { BaseEmbedder, EmbedderOptions } from "./base";

const idfSchema = z.record(z.number().finite().nonnegative());

export interface HashingEmbedderOptions extends EmbedderOptions {
  modelDir?: string;
}

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export function fnv1a32(token: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export class HashingEmbedder extends BaseEmbedder {
  readonly provider = "hashing";
  private readonly modelDir?: string;
  private idf: Promise<Record<string, number>> | null = null;

  constructor(options: HashingEmbedderOptions) {
    super(options);
    this.modelDir = options.modelDir;
  }

  protected async embedTexts(texts: string[]): Promise<number[][]> {
    const idf = await this.loadIdf();
    return texts.map((t) => this.vectorize(t, idf));
  }

  private vectorize(text: string, idf: Record<string, number>): number[] {
    const v = new Array<number>(this.dimension).fill(0);
    for (const token of textTokens(text)) {
      v[fnv1a32(token) % this.dimension] += idf[token] ?? 1;
    }
    let norm = 0;
    for (const x of v) norm += x * x;
    if (norm === 0) return v;
    norm = Math.sqrt(norm);
    return v.map((x) => x / norm);
  }

  private loadIdf(): Promise<Record<string, number>> {
    if (!this.idf) {
      this.idf = this.readIdf();
      // Allow a later call to retry after a failed load.
      this.idf.catch(() => {
        this.idf = null;
      });
    }
    return this.idf;
  }

  private async readIdf(): Promise<Record<string, number>> {
    if (!this.modelDir) return {};
    const file = path.join(this.modelDir, "idf.json");
    let raw: string;
    try {
      raw = await readFile(file, "utf8");
    } catch (err) {
      throw new EmbeddingUnavailableError(`Cannot read model file ${file}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new EmbeddingUnavailableError(`Model file ${file} is not valid JSON`, { cause: err });
    }
    const parsed = idfSchema.safeParse(json);
    if (!parsed.success) {
      throw new EmbeddingUnavailableError(
        `Model file ${file} must map tokens to non-negative weights`
      );
    }
    return parsed.data;
  }
}
