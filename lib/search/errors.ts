/**
 * lib/search/errors.ts — search error taxonomy
 *
 *   SearchValidationError     malformed query input; absorbed into an empty result
 *   EmbeddingUnavailableError provider unreachable, misconfigured or returned junk
 *   IndexBackendError         vector store operation failed
 *   SearchTimeoutError        a dependency exceeded its deadline
 *   ConfigurationError        fatal at startup (dimension mismatch, missing credentials)
 */

export class SearchValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SearchValidationError";
  }
}

export class EmbeddingUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmbeddingUnavailableError";
  }
}

export class IndexBackendError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IndexBackendError";
  }
}

export class SearchTimeoutError extends Error {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "SearchTimeoutError";
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Index-path failures the caller may retry later. */
export function isRetryableIndexError(err: unknown): boolean {
  return err instanceof EmbeddingUnavailableError || err instanceof SearchTimeoutError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
