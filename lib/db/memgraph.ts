/**
 * Memgraph connection layer for the native vector store.
 *
 * Provides MemgraphClient, a CypherRunner over neo4j-driver:
 *  - read(q, p, opts)   read Cypher, plain-object records, optional tx timeout
 *  - write(q, p)        write Cypher, plain-object records
 *  - transaction(steps) several statements committed atomically
 *
 * Reliability:
 *  - transient errors (connection drops, MVCC conflicts) are retried with
 *    exponential backoff
 *  - a connection-level error drops the driver so the next attempt opens a
 *    fresh Bolt connection
 */
import neo4j, { Driver } from "neo4j-driver";
import { errorMessage } from "@/lib/search/errors";
import { withRetry } from "@/lib/utils/retry";

export type CypherParams = Record<string, unknown>;
export type CypherRow = Record<string, unknown>;

export interface CypherStep {
  cypher: string;
  params?: CypherParams;
}

export interface CypherReadOptions {
  /** Server-side transaction timeout in ms. */
  timeoutMs?: number;
}

/** The slice of Memgraph access the vector store needs; faked in tests. */
export interface CypherRunner {
  read(cypher: string, params?: CypherParams, options?: CypherReadOptions): Promise<CypherRow[]>;
  write(cypher: string, params?: CypherParams): Promise<CypherRow[]>;
  /** Run every step in one write transaction; all commit or none do. */
  transaction(steps: CypherStep[]): Promise<CypherRow[][]>;
  close(): Promise<void>;
}

export interface MemgraphConnection {
  url: string;
  user: string;
  password: string;
}

/**
 * Error messages that indicate a transient condition worth retrying:
 *   - "Connection was closed by server"  Bolt TCP tear-down under load
 *   - "Failed to connect to server"      container restart / network blip
 *   - "ECONNREFUSED" / "ECONNRESET"      OS-level TCP errors
 *   - "Cannot resolve conflicting transactions"  MVCC conflict, retry wins
 */
const TRANSIENT_PATTERNS = [
  "Connection was closed by server",
  "Failed to connect to server",
  "ServiceUnavailable",
  "ECONNREFUSED",
  "ECONNRESET",
  "Cannot resolve conflicting transactions",
];

const CONNECTION_PATTERNS = TRANSIENT_PATTERNS.filter(
  (p) => p !== "Cannot resolve conflicting transactions"
);

export function isTransientError(err: unknown): boolean {
  const msg = errorMessage(err);
  return TRANSIENT_PATTERNS.some((p) => msg.includes(p));
}

function isConnectionError(err: unknown): boolean {
  const msg = errorMessage(err);
  return CONNECTION_PATTERNS.some((p) => msg.includes(p));
}

/**
 * Memgraph requires SKIP / LIMIT values to be Bolt integers, not floats.
 * Rewriting `LIMIT $x` to `LIMIT toInteger($x)` lets Memgraph convert the
 * type regardless of how the driver serialises the parameter.
 */
export function wrapSkipLimit(cypher: string): string {
  return cypher
    .replace(/\bSKIP\s+\$(\w+)/gi, "SKIP toInteger($$$1)")
    .replace(/\bLIMIT\s+\$(\w+)/gi, "LIMIT toInteger($$$1)");
}

export class MemgraphClient implements CypherRunner {
  private driver: Driver | null = null;

  constructor(
    private readonly connection: MemgraphConnection,
    private readonly retry = { attempts: 3, baseDelayMs: 300 }
  ) {}

  private getDriver(): Driver {
    if (!this.driver) {
      const { url, user, password } = this.connection;
      this.driver = neo4j.driver(url, neo4j.auth.basic(user, password), {
        disableLosslessIntegers: true,
        // Memgraph listens on plain Bolt
        encrypted: false,
        maxConnectionPoolSize: 25,
        // fail fast rather than queue behind an unreachable server
        connectionAcquisitionTimeout: 10_000,
      });
    }
    return this.driver;
  }

  private dropDriver(): void {
    const stale = this.driver;
    this.driver = null;
    if (stale) {
      stale.close().catch((err: unknown) => {
        console.warn("[memgraph] closing stale driver failed:", errorMessage(err));
      });
    }
  }

  private withRetry<T>(fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      ...this.retry,
      shouldRetry: isTransientError,
      onRetry: (err, attempt, delay) => {
        console.warn(
          `[memgraph] transient error on attempt ${attempt}/${this.retry.attempts}, retry in ${delay}ms:`,
          errorMessage(err).slice(0, 120)
        );
        if (isConnectionError(err)) this.dropDriver();
      },
    });
  }

  async read(cypher: string, params: CypherParams = {}, options: CypherReadOptions = {}): Promise<CypherRow[]> {
    return this.withRetry(async () => {
      const session = this.getDriver().session({ defaultAccessMode: "READ" });
      try {
        const result = await session.run(
          wrapSkipLimit(cypher),
          params,
          options.timeoutMs ? { timeout: options.timeoutMs } : undefined
        );
        return result.records.map((r) => r.toObject());
      } finally {
        await session.close();
      }
    });
  }

  async write(cypher: string, params: CypherParams = {}): Promise<CypherRow[]> {
    return this.withRetry(async () => {
      const session = this.getDriver().session({ defaultAccessMode: "WRITE" });
      try {
        const result = await session.run(wrapSkipLimit(cypher), params);
        return result.records.map((r) => r.toObject());
      } finally {
        await session.close();
      }
    });
  }

  async transaction(steps: CypherStep[]): Promise<CypherRow[][]> {
    return this.withRetry(async () => {
      const session = this.getDriver().session({ defaultAccessMode: "WRITE" });
      const tx = session.beginTransaction();
      const results: CypherRow[][] = [];
      try {
        for (const { cypher, params = {} } of steps) {
          const result = await tx.run(wrapSkipLimit(cypher), params);
          results.push(result.records.map((r) => r.toObject()));
        }
        await tx.commit();
        return results;
      } catch (err) {
        await tx.rollback().catch((rollbackErr: unknown) => {
          console.warn("[memgraph] rollback failed:", errorMessage(rollbackErr));
        });
        throw err;
      } finally {
        await session.close();
      }
    });
  }

  async close(): Promise<void> {
    if (this.driver) {
      const driver = this.driver;
      this.driver = null;
      await driver.close();
    }
  }
}
