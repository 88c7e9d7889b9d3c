import { SearchTimeoutError } from "@/lib/search/errors";

/**
 * Race `work` against a deadline. Rejects with SearchTimeoutError naming
 * `operation` when the deadline passes first. The timer is always cleared.
 *
 * A non-positive or non-finite `ms` disables the deadline.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  ms: number,
  operation: string
): Promise<T> {
  if (!Number.isFinite(ms) || ms <= 0) return work;

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new SearchTimeoutError(operation, ms)), ms);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
