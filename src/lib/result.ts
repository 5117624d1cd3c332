/**
 * Result type for composable error handling.
 *
 * Represents either success (Ok) or failure (Err). Every dataset
 * component returns one of these instead of throwing, so the
 * acquisition pipeline can branch on failures without try/catch.
 *
 * @example
 * ```typescript
 * const fetched = await fetchToFile(url, archivePath)
 *
 * if (!fetched.ok) {
 *   return useFallback(fetched.error)
 * }
 *
 * return extractArchive(fetched.value.destination, root)
 * ```
 */

/**
 * Result type - represents either success or failure.
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

/**
 * Create a success result.
 */
export const Ok = <T>(value: T): Result<T, never> => ({
  ok: true,
  value,
})

/**
 * Create a failure result.
 */
export const Err = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
})
