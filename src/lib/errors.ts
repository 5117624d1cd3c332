/**
 * Custom error classes for structured error handling.
 *
 * Usage:
 *   return Err(new NetworkError("HTTP 503 for archive", { url, status: 503 }))
 *   return Err(new ExtractionError("Archive is corrupt", { archivePath }))
 *   throw ConfigurationError.fromZodError(parsed.error)
 *
 * At the CLI boundary:
 *   catch (error) {
 *     const appError = toAppError(error)
 *     console.error(JSON.stringify(appError.toJSON()))
 *   }
 */

export type ErrorCode =
  | "CONFIGURATION_ERROR"
  | "INTERNAL_ERROR"
  // Dataset acquisition pipeline
  | "NETWORK_ERROR"
  | "EXTRACTION_FAILED"
  | "FALLBACK_FAILED"

export interface ErrorDetail {
  field?: string
  message: string
  code?: string
}

export interface SerializedError {
  code: ErrorCode
  message: string
  details?: ErrorDetail[]
}

/**
 * Base application error class.
 * All custom errors extend this for consistent handling.
 */
export class AppError extends Error {
  public readonly isOperational = true

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetail[],
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = this.constructor.name
    Object.setPrototypeOf(this, new.target.prototype)
    Error.captureStackTrace(this, this.constructor)
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    }
  }
}

/**
 * Environment configuration failed validation.
 */
export class ConfigurationError extends AppError {
  constructor(message = "Invalid configuration", details?: ErrorDetail[]) {
    super("CONFIGURATION_ERROR", message, details)
  }

  static fromZodError(error: {
    issues: ReadonlyArray<{ path: ReadonlyArray<PropertyKey>; message: string }>
  }): ConfigurationError {
    const details = error.issues.map((e) => ({
      field: e.path.map(String).join("."),
      message: e.message,
    }))
    return new ConfigurationError("Invalid configuration", details)
  }
}

/**
 * Primary archive fetch failed: bad status, timeout or connection failure.
 * Recovered by switching to the fallback source.
 */
export class NetworkError extends AppError {
  public readonly url: string
  public readonly status?: number
  public readonly timedOut: boolean

  constructor(
    message: string,
    context: { url: string; status?: number; timedOut?: boolean; cause?: unknown }
  ) {
    super("NETWORK_ERROR", message, undefined, { cause: context.cause })
    this.url = context.url
    this.status = context.status
    this.timedOut = context.timedOut ?? false
  }
}

/**
 * Staged archive is present but cannot be read or unpacked. Fatal.
 */
export class ExtractionError extends AppError {
  public readonly archivePath: string

  constructor(message: string, context: { archivePath: string; cause?: unknown }) {
    super("EXTRACTION_FAILED", message, undefined, { cause: context.cause })
    this.archivePath = context.archivePath
  }
}

/**
 * Alternate hosted source could not be retrieved or written. Fatal.
 */
export class FallbackError extends AppError {
  public readonly split?: string

  constructor(message: string, context: { split?: string; cause?: unknown } = {}) {
    super(
      "FALLBACK_FAILED",
      message,
      context.split ? [{ field: "split", message: context.split }] : undefined,
      { cause: context.cause }
    )
    this.split = context.split
  }
}

/**
 * Unexpected failure outside the known taxonomy.
 */
export class InternalError extends AppError {
  constructor(message = "An unexpected error occurred", options?: { cause?: unknown }) {
    super("INTERNAL_ERROR", message, undefined, options)
  }
}

/**
 * Type guard to check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

/**
 * Convert any error to an AppError for consistent handling.
 * Preserves AppErrors, wraps others in InternalError.
 */
export function toAppError(error: unknown): AppError {
  if (isAppError(error)) {
    return error
  }

  if (error instanceof Error) {
    return new InternalError(error.message, { cause: error })
  }

  return new InternalError(String(error))
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
