/**
 * @fileoverview Async Utilities
 *
 * Timeouts and bounded fan-out shared by the retrieval and federation layers.
 *
 * @packageDocumentation
 */

/**
 * Options for withTimeout function.
 */
export interface WithTimeoutOptions {
  /** Context string for error messages */
  context?: string;
}

/**
 * Error thrown when a promise times out.
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: string) {
    const message = context
      ? `Timeout after ${timeoutMs}ms: ${context}`
      : `Operation timed out after ${timeoutMs}ms`;
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Wrap a promise with a timeout.
 *
 * @param timeoutMs - Timeout in milliseconds (if <= 0 or undefined, returns promise as-is)
 * @throws TimeoutError if the promise does not settle within timeoutMs
 *
 * @example
 * ```typescript
 * const response = await withTimeout(handle.query(text, options), 30000, {
 *   context: 'querying collection annual_report',
 * });
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs?: number,
  options?: WithTimeoutOptions
): Promise<T> {
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null;

  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(new TimeoutError(timeoutMs, options?.context));
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Split array into chunks.
 */
export function chunkArray<T>(array: readonly T[], chunkSize: number): T[][] {
  const size = Math.max(1, Math.floor(chunkSize));
  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += size) {
    chunks.push(array.slice(i, i + size));
  }
  return chunks;
}

/**
 * Map items through an async function, at most `concurrency` at a time.
 * Output order follows input order regardless of completion order.
 */
export async function mapInBatches<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = [];
  let offset = 0;

  for (const batch of chunkArray(items, concurrency)) {
    const start = offset;
    const batchResults = await Promise.all(batch.map((item, i) => fn(item, start + i)));
    results.push(...batchResults);
    offset += batch.length;
  }

  return results;
}
