/**
 * Custom error classes for structured error handling.
 *
 * Usage:
 *   throw new NotFoundError("Document not found")
 *   throw new AnchorNotFoundError("Start anchor not found: \"Chapter 1\"")
 *   throw new LlmFailedError("Failed to generate structure after 3 attempts", { cause: lastError })
 *
 * Callers of the structuring pipeline only ever see AppError subclasses:
 *   catch (error) {
 *     const appError = toAppError(error)
 *     logger.error(appError.message, { code: appError.code })
 *   }
 */

export type ErrorCode =
  | "BAD_REQUEST"
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "INVALID_STATE"
  | "INTERNAL_ERROR"
  // Domain-specific error codes for the structuring pipeline
  | "LLM_FAILED"
  | "ANCHOR_NOT_FOUND"
  | "INVALID_RANGE"
  | "CHUNK_PROCESSING_FAILED"
  | "PERSISTENCE_FAILED"
  | "STRUCTURE_FAILED"

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

export interface AppErrorOptions {
  cause?: unknown
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
    public readonly statusCode: number = 500,
    public readonly details?: ErrorDetail[],
    options?: AppErrorOptions
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
 * 400 Validation Error - Input or structural validation failed
 */
export class ValidationError extends AppError {
  constructor(message = "Validation failed", details?: ErrorDetail[]) {
    super("VALIDATION_ERROR", message, 400, details)
  }

  static fromZodError(error: { issues: Array<{ path: PropertyKey[]; message: string }> }): ValidationError {
    const details = error.issues.map((e) => ({
      field: e.path.map(String).join("."),
      message: e.message,
    }))
    return new ValidationError("Validation failed", details)
  }
}

/**
 * 404 Not Found - Resource doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super("NOT_FOUND", message, 404)
  }
}

/**
 * 409 Invalid State - Resource exists but is not in a state that allows the operation
 */
export class InvalidStateError extends AppError {
  constructor(message = "Resource is not in a valid state for this operation") {
    super("INVALID_STATE", message, 409)
  }
}

/**
 * 500 Internal Error - Unexpected server error
 */
export class InternalError extends AppError {
  constructor(message = "An unexpected error occurred", options?: AppErrorOptions) {
    super("INTERNAL_ERROR", message, 500, undefined, options)
  }
}

/**
 * 500 LLM Failed - Language model API error
 */
export class LlmFailedError extends AppError {
  constructor(message = "Language model request failed", options?: AppErrorOptions) {
    super("LLM_FAILED", message, 500, undefined, options)
  }
}

/**
 * 422 Anchor Not Found - No matching strategy located an anchor and no usable
 * model-suggested offsets were supplied.
 */
export class AnchorNotFoundError extends AppError {
  constructor(message = "Anchor not found", options?: AppErrorOptions) {
    super("ANCHOR_NOT_FOUND", message, 422, undefined, options)
  }
}

/**
 * 422 Invalid Range - Resolved offsets are inconsistent, or a proposal is
 * missing required metadata.
 */
export class InvalidRangeError extends AppError {
  constructor(message = "Invalid node range", details?: ErrorDetail[]) {
    super("INVALID_RANGE", message, 422, details)
  }
}

/**
 * 502 Chunk Processing Failed - A chunk's model call failed with something
 * other than an empty result.
 */
export class ChunkProcessingError extends AppError {
  constructor(
    message = "Chunk processing failed",
    public readonly chunkIndex?: number,
    options?: AppErrorOptions
  ) {
    super("CHUNK_PROCESSING_FAILED", message, 502, undefined, options)
  }
}

/**
 * 500 Persistence Failed - A depth layer could not be written. Layers below
 * `depth` are already committed.
 */
export class PersistenceError extends AppError {
  constructor(
    message = "Failed to persist nodes",
    public readonly depth?: number,
    public readonly savedNodeCount = 0,
    options?: AppErrorOptions
  ) {
    super("PERSISTENCE_FAILED", message, 500, undefined, options)
  }
}

/**
 * 500 Structure Failed - Catch-all for anything the structuring pipeline did
 * not classify.
 */
export class UnexpectedStructureError extends AppError {
  constructor(message = "Unexpected error during structure building", options?: AppErrorOptions) {
    super("STRUCTURE_FAILED", message, 500, undefined, options)
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
  if (error instanceof AppError) {
    return error
  }

  if (error instanceof Error) {
    // Don't expose internal error messages in production
    const message =
      process.env.NODE_ENV === "production"
        ? "An unexpected error occurred"
        : error.message

    return new InternalError(message, { cause: error })
  }

  return new InternalError("An unexpected error occurred")
}

/**
 * Whether `text` appears in the message of `error` or of any error in its
 * `cause` chain.
 */
export function errorChainIncludes(error: unknown, text: string): boolean {
  const seen = new Set<unknown>()
  let current: unknown = error

  while (current instanceof Error && !seen.has(current)) {
    if (current.message.includes(text)) {
      return true
    }
    seen.add(current)
    current = current.cause
  }

  return false
}
