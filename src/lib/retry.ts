/**
 * @fileoverview Retry Utility with Exponential Backoff
 *
 * Retries transient failures of the hosted-dataset page requests.
 *
 * @module lib/retry
 */

/**
 * Error that should not be retried.
 */
export class NonRetriableError extends Error {
  readonly retriable = false

  constructor(message: string) {
    super(message)
    this.name = "NonRetriableError"
  }
}

function isRetriable(error: unknown): boolean {
  if (error instanceof NonRetriableError) {
    return false
  }
  if (error instanceof Error && "retriable" in error) {
    return error.retriable !== false
  }
  return true
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Retry options.
 */
export interface RetryOptions {
  /** Maximum number of attempts (default: 3) */
  maxAttempts?: number
  /** Backoff delays in ms for each retry (default: [1000, 2000, 4000]) */
  backoff?: number[]
  /** Optional callback on each retry */
  onRetry?: (error: Error, attempt: number) => void
}

/**
 * Execute a function with retry on failure.
 *
 * @example
 * const page = await withRetry(
 *   () => requestRowsPage(split, offset),
 *   { maxAttempts: 3, backoff: [1000, 2000, 4000] }
 * )
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { maxAttempts = 3, backoff = [1000, 2000, 4000], onRetry } = options

  let lastError: Error | undefined

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn()
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error))

      if (!isRetriable(error) || attempt >= maxAttempts) {
        throw lastError
      }

      onRetry?.(lastError, attempt)

      const delay = backoff[attempt - 1] ?? backoff[backoff.length - 1] ?? 0
      await sleep(delay)
    }
  }

  throw lastError ?? new Error("Retry failed")
}
