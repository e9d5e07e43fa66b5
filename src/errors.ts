/**
 * @fileoverview Error hierarchy for packlens
 *
 * Every error raised by the decoders, the repository access service and the
 * CLI extends {@link PackLensError}, which provides:
 * - Error codes for programmatic handling
 * - Cause chaining for error context
 * - Consistent serialization
 *
 * @module errors
 *
 * @example
 * ```typescript
 * import { DecodeError, isPackLensError } from './errors'
 *
 * try {
 *   decodeLooseObject(bytes)
 * } catch (error) {
 *   if (error instanceof DecodeError) {
 *     console.log(`${error.code} at offset ${error.offset}`)
 *   }
 * }
 * ```
 */

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Error codes for the PackLensError base class.
 */
export type PackLensErrorCode =
  | 'UNKNOWN'
  | 'INVALID_ARGUMENT'
  | 'INTERNAL'

/**
 * Base error class for all packlens errors.
 *
 * @description
 * Provides a `code` for programmatic handling, `cause` chaining and a
 * `toJSON()` used by the structured logger.
 */
export class PackLensError extends Error {
  /**
   * Error code for programmatic handling.
   */
  readonly code: string

  /**
   * The underlying cause of this error, if any.
   */
  override readonly cause?: unknown

  constructor(
    message: string,
    code: PackLensErrorCode | string = 'UNKNOWN',
    options?: { cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'PackLensError'
    this.code = code
    this.cause = options?.cause

    // Maintains proper stack trace for where the error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Serializes the error to a plain object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    }
  }

  /**
   * Wraps another error as the cause of a new PackLensError.
   *
   * @param cause - The underlying error
   * @param message - Replacement message; defaults to the cause's message
   */
  static wrap(cause: unknown, message?: string): PackLensError {
    const msg = message || (cause instanceof Error ? cause.message : String(cause))
    return new PackLensError(msg, 'INTERNAL', { cause })
  }
}

// =============================================================================
// I/O Errors
// =============================================================================

/**
 * Error codes for filesystem access.
 */
export type IoErrorCode =
  | 'NOT_FOUND'
  | 'READ_ERROR'
  | 'NOT_A_REPOSITORY'

/**
 * Raised when a file or directory cannot be read.
 *
 * @example
 * ```typescript
 * throw IoError.notFound('/repo/.git/objects/pack/missing.pack')
 * ```
 */
export class IoError extends PackLensError {
  /**
   * The path that could not be read.
   */
  readonly path: string

  constructor(
    message: string,
    code: IoErrorCode,
    options: { path: string; cause?: unknown }
  ) {
    super(message, code, options)
    this.name = 'IoError'
    this.path = options.path
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), path: this.path }
  }

  static notFound(path: string, cause?: unknown): IoError {
    return new IoError(`No such file or directory: ${path}`, 'NOT_FOUND', { path, cause })
  }

  static readFailed(path: string, cause?: unknown): IoError {
    const reason = cause instanceof Error ? `: ${cause.message}` : ''
    return new IoError(`Cannot read ${path}${reason}`, 'READ_ERROR', { path, cause })
  }

  static notARepository(path: string): IoError {
    return new IoError(`Not a git repository (or storage directory): ${path}`, 'NOT_A_REPOSITORY', { path })
  }
}

// =============================================================================
// Decode Errors
// =============================================================================

/**
 * Error codes for byte decoding.
 */
export type DecodeErrorCode =
  | 'TRUNCATED_HEADER'
  | 'INVALID_HEADER'
  | 'UNKNOWN_OBJECT_KIND'
  | 'SIZE_MISMATCH'
  | 'TRUNCATED_RECORD'
  | 'INVALID_SIGNATURE'
  | 'UNSUPPORTED_VERSION'
  | 'INVALID_DELTA'
  | 'DELTA_OUT_OF_BOUNDS'
  | 'DELTA_SIZE_MISMATCH'
  | 'DELTA_CYCLE'
  | 'DELTA_CHAIN_TOO_DEEP'
  | 'DANGLING_BASE'

/**
 * Raised when bytes do not match the format they are decoded as.
 *
 * @description
 * `offset` is the byte position of the offending data within the span that
 * was being decoded (the pack file for pack entries, the inflated stream for
 * loose objects), when it is known.
 */
export class DecodeError extends PackLensError {
  readonly offset?: number

  /** Short reason without the offset decoration. */
  readonly reason: string

  private readonly decodeCode: DecodeErrorCode

  constructor(
    reason: string,
    code: DecodeErrorCode,
    options?: { offset?: number; cause?: unknown }
  ) {
    const at = options?.offset !== undefined ? ` (at offset ${options.offset})` : ''
    super(`${reason}${at}`, code, options)
    this.name = 'DecodeError'
    this.reason = reason
    this.decodeCode = code
    this.offset = options?.offset
  }

  /**
   * Same error, located at `offset`. Used when a decoder that only sees a
   * sub-span fails and the caller knows where that span sits.
   */
  withOffset(offset: number): DecodeError {
    return new DecodeError(this.reason, this.decodeCode, { offset, cause: this.cause })
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), offset: this.offset, reason: this.reason }
  }

  static truncated(what: string, offset?: number): DecodeError {
    return new DecodeError(`Truncated ${what}`, 'TRUNCATED_HEADER', { offset })
  }

  static sizeMismatch(declared: number, actual: number, offset?: number): DecodeError {
    return new DecodeError(
      `Declared size ${declared} does not match payload length ${actual}`,
      'SIZE_MISMATCH',
      { offset }
    )
  }

  static unknownKind(tag: string | number, offset?: number): DecodeError {
    return new DecodeError(`Unknown object kind: ${tag}`, 'UNKNOWN_OBJECT_KIND', { offset })
  }
}

// =============================================================================
// Compression Errors
// =============================================================================

/**
 * Raised when a zlib stream cannot be inflated.
 */
export class CompressionError extends PackLensError {
  readonly offset?: number

  constructor(message: string, options?: { offset?: number; cause?: unknown }) {
    super(message, 'INFLATE_FAILED', options)
    this.name = 'CompressionError'
    this.offset = options?.offset
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), offset: this.offset }
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isPackLensError(error: unknown): error is PackLensError {
  return error instanceof PackLensError
}

export function isIoError(error: unknown): error is IoError {
  return error instanceof IoError
}

export function isDecodeError(error: unknown): error is DecodeError {
  return error instanceof DecodeError
}

export function isCompressionError(error: unknown): error is CompressionError {
  return error instanceof CompressionError
}

export function hasErrorCode<T extends string>(error: unknown, code: T): error is PackLensError & { code: T } {
  return error instanceof PackLensError && error.code === code
}

/**
 * Renders any thrown value as a single line suitable for an error panel.
 */
export function describeError(error: unknown): string {
  if (error instanceof PackLensError) {
    return `${error.name} [${error.code}]: ${error.message}`
  }
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`
  }
  return String(error)
}
