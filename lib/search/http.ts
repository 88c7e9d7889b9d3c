/**
 * Shared bits for the search route handlers.
 */
import { NextRequest, NextResponse } from "next/server";
import {
  ConfigurationError,
  IndexBackendError,
  SearchValidationError,
  errorMessage,
  isRetryableIndexError,
} from "./errors";

/** Parse a JSON body; undefined when the body is missing or not JSON. */
export async function readJson(request: NextRequest): Promise<unknown> {
  try {
    return await request.json();
  } catch (err) {
    console.warn("[search-api] unreadable JSON body:", errorMessage(err));
    return undefined;
  }
}

export function badRequest(detail: string): NextResponse {
  return NextResponse.json({ detail }, { status: 400 });
}

/**
 * Index-path failures propagate to the caller:
 *   400  invalid record
 *   503  embedding provider unavailable or timed out (retryable)
 *   502  vector index backend failed
 *   500  configuration problems and anything unexpected
 */
export function indexErrorResponse(err: unknown): NextResponse {
  const detail = errorMessage(err);
  if (err instanceof SearchValidationError) {
    return NextResponse.json({ detail }, { status: 400 });
  }
  if (isRetryableIndexError(err)) {
    return NextResponse.json({ detail, retryable: true }, { status: 503 });
  }
  if (err instanceof IndexBackendError) {
    return NextResponse.json({ detail, retryable: false }, { status: 502 });
  }
  if (err instanceof ConfigurationError) {
    console.error("[search-api] configuration error:", detail);
  } else {
    console.error("[search-api] unexpected index error:", detail);
  }
  return NextResponse.json({ detail }, { status: 500 });
}
