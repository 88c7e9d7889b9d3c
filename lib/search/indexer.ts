/**
 * Entity indexer: the only writer of the vector index.
 *
 * Every entity is embedded in one batch (its own text plus one text per
 * tool) before anything touches the store, and the store swaps the whole
 * set in with replaceEntity(). An embedding failure therefore leaves the
 * previous version in place.
 */
import type { Embedder } from "@/lib/embeddings/base";
import type { VectorIndexStore } from "@/lib/vector_stores/base";
import { mapSettledBounded } from "@/lib/utils/bounded";
import { withRetry } from "@/lib/utils/retry";
import {
  agentDocument,
  agentText,
  serverDocument,
  serverText,
  toolDocument,
  toolText,
  uniqueTools,
} from "./documents";
import { SearchValidationError, errorMessage, isRetryableIndexError } from "./errors";
import type { AgentRecord, EntityDocument, ServerRecord, VectorRecord } from "./types";

export interface IndexerOptions {
  retryAttempts?: number;
  retryBaseDelayMs?: number;
  rebuildConcurrency?: number;
}

export interface RebuildInput {
  servers?: ServerRecord[];
  agents?: AgentRecord[];
}

export interface RebuildReport {
  indexed: number;
  failed: Array<{ path: string; error: string }>;
}

export class EntityIndexer {
  private readonly retryAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly rebuildConcurrency: number;

  constructor(
    private readonly embedder: Embedder,
    private readonly store: VectorIndexStore,
    options: IndexerOptions = {}
  ) {
    this.retryAttempts = options.retryAttempts ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 250;
    this.rebuildConcurrency = options.rebuildConcurrency ?? 4;
  }

  async indexServer(server: ServerRecord): Promise<void> {
    requireIdentity("server", server.path, server.name);
    const tools = uniqueTools(server.tools);
    const rows: Array<{ text: string; document: EntityDocument }> = [
      { text: serverText(server), document: serverDocument(server) },
      ...tools.map((tool) => ({ text: toolText(tool), document: toolDocument(server, tool) })),
    ];
    await this.write(server.path, rows);
    console.info(`[indexer] indexed server ${server.path} with ${tools.length} tool(s)`);
  }

  async indexAgent(agent: AgentRecord): Promise<void> {
    requireIdentity("agent", agent.path, agent.name);
    await this.write(agent.path, [{ text: agentText(agent), document: agentDocument(agent) }]);
    console.info(`[indexer] indexed agent ${agent.path}`);
  }

  /** Remove an entity and, for servers, all of its tools. Missing paths are a no-op. */
  async removeEntity(path: string): Promise<void> {
    requirePath(path);
    await this.store.remove(path);
    console.info(`[indexer] removed ${path}`);
  }

  /** Toggle visibility without re-embedding. */
  async setEnabled(path: string, enabled: boolean): Promise<void> {
    requirePath(path);
    await this.store.setEnabled(path, enabled);
    console.info(`[indexer] ${path} ${enabled ? "enabled" : "disabled"}`);
  }

  async rebuild(input: RebuildInput): Promise<RebuildReport> {
    const jobs: Array<{ path: string; run: () => Promise<void> }> = [
      ...(input.servers ?? []).map((s) => ({ path: s.path, run: () => this.indexServer(s) })),
      ...(input.agents ?? []).map((a) => ({ path: a.path, run: () => this.indexAgent(a) })),
    ];
    const outcomes = await mapSettledBounded(jobs, this.rebuildConcurrency, (job) => job.run());
    const report: RebuildReport = { indexed: 0, failed: [] };
    outcomes.forEach((outcome, i) => {
      if (outcome.status === "fulfilled") {
        report.indexed++;
        return;
      }
      const error = errorMessage(outcome.reason);
      console.error(`[indexer] rebuild failed for ${jobs[i].path}:`, error);
      report.failed.push({ path: jobs[i].path, error });
    });
    report.failed.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    console.info(`[indexer] rebuild finished: ${report.indexed} indexed, ${report.failed.length} failed`);
    return report;
  }

  private async write(ownerId: string, rows: Array<{ text: string; document: EntityDocument }>): Promise<void> {
    const vectors = await withRetry(() => this.embedder.embedBatch(rows.map((r) => r.text)), {
      attempts: this.retryAttempts,
      baseDelayMs: this.retryBaseDelayMs,
      shouldRetry: isRetryableIndexError,
      onRetry: (err, attempt, delay) =>
        console.warn(
          `[indexer] embedding ${ownerId} failed on attempt ${attempt}/${this.retryAttempts}, retry in ${delay}ms:`,
          errorMessage(err)
        ),
    });
    const records: VectorRecord[] = rows.map((r, i) => ({
      id: r.document.id,
      vector: vectors[i],
      document: r.document,
    }));
    await this.store.replaceEntity(ownerId, records);
  }
}

function requirePath(path: string): void {
  if (!path || !path.trim()) throw new SearchValidationError("Entity path must not be empty");
}

function requireIdentity(kind: string, path: string, name: string): void {
  requirePath(path);
  if (!name || !name.trim()) throw new SearchValidationError(`The ${kind} at ${path} has no name`);
}
