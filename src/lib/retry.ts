/**
 * @fileoverview Retry with exponential backoff and jitter.
 *
 * @module lib/retry
 */

/**
 * Throw from inside a retried function to stop retrying immediately.
 */
export class NonRetriableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "NonRetriableError"
  }
}

export interface RetryOptions {
  /** Total attempts, including the first */
  maxAttempts: number
  /** Delay before the second attempt; doubles per attempt. @default 1000 */
  baseDelayMs?: number
  /** @default 30000 */
  maxDelayMs?: number
  /** Fraction of the delay applied as +/- random jitter. @default 0 */
  jitterFactor?: number
  /** Return false to rethrow without further attempts. */
  shouldRetry?: (error: unknown, attempt: number) => boolean
  /** Called before each wait with the failed attempt number (1-based). */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void
  sleep?: (ms: number) => Promise<void>
  random?: () => number
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

/**
 * Delay before the attempt following `attempt`.
 *
 * @example
 * ```typescript
 * backoffDelay(1, { baseDelayMs: 1000, maxDelayMs: 30000 }) // 1000
 * backoffDelay(3, { baseDelayMs: 1000, maxDelayMs: 30000 }) // 4000
 * ```
 */
export function backoffDelay(
  attempt: number,
  options: Pick<RetryOptions, "baseDelayMs" | "maxDelayMs" | "jitterFactor" | "random">
): number {
  const base = options.baseDelayMs ?? 1_000
  const max = options.maxDelayMs ?? 30_000
  const jitter = options.jitterFactor ?? 0
  const random = options.random ?? Math.random

  const exponential = Math.min(max, base * 2 ** (attempt - 1))
  const offset = exponential * jitter * (random() * 2 - 1)
  return Math.max(0, Math.round(exponential + offset))
}

/**
 * Run `fn` until it resolves or attempts run out.
 *
 * @throws the last error once attempts are exhausted, or the first
 *   `NonRetriableError`
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep
  const maxAttempts = Math.max(1, options.maxAttempts)

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt)
    } catch (error) {
      const retriable =
        !(error instanceof NonRetriableError) && (options.shouldRetry?.(error, attempt) ?? true)
      if (!retriable || attempt >= maxAttempts) {
        throw error
      }

      const delayMs = backoffDelay(attempt, options)
      options.onRetry?.(error, attempt, delayMs)
      await sleep(delayMs)
    }
  }
}
