/**
 * aspectdb Error Handling Module
 *
 * Every failure surfaced by the library is an {@link AspectDBError}, which
 * carries:
 * - a stable error code for programmatic handling
 * - context data for debugging
 * - JSON serialization
 * - cause chaining
 *
 * Error Hierarchy:
 * - AspectDBError (base class)
 *   - ValidationError (malformed documents, bad arguments)
 *   - NotFoundError (document, overlay or uuid lookup failed)
 *   - MergeError (base and overlay trees do not line up)
 *   - VersionError (version out of range, corrupt history, smash refused)
 *   - CircularDependencyError (batch contains a reference cycle)
 *   - StoreCommitError (a store transaction could not be applied)
 *   - ConfigurationError (invalid configuration)
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for aspectdb operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',

  // Validation
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  INVALID_INPUT = 'INVALID_INPUT',

  // Not found
  NOT_FOUND = 'NOT_FOUND',
  DOCUMENT_NOT_FOUND = 'DOCUMENT_NOT_FOUND',
  OVERLAY_NOT_FOUND = 'OVERLAY_NOT_FOUND',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',

  // Merge
  STRUCTURAL_MISMATCH = 'STRUCTURAL_MISMATCH',
  TYPE_CONFLICT = 'TYPE_CONFLICT',

  // Versioning
  INVALID_VERSION = 'INVALID_VERSION',
  VERSION_HISTORY_CORRUPT = 'VERSION_HISTORY_CORRUPT',
  SMASH_REJECTED = 'SMASH_REJECTED',

  // Dependencies
  CIRCULAR_DEPENDENCY = 'CIRCULAR_DEPENDENCY',

  // Store
  STORE_COMMIT_FAILED = 'STORE_COMMIT_FAILED',

  // Configuration
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

/**
 * The two ways a merge can fail
 */
export type MergeFailureKind = ErrorCode.STRUCTURAL_MISMATCH | ErrorCode.TYPE_CONFLICT

/**
 * The three ways a version operation can fail
 */
export type VersionFailureKind =
  | ErrorCode.INVALID_VERSION
  | ErrorCode.VERSION_HISTORY_CORRUPT
  | ErrorCode.SMASH_REJECTED

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * JSON form of an error
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Stack trace (omitted in production) */
  stack?: string | undefined
  /** Additional context data */
  context?: Record<string, unknown> | undefined
  /** Serialized cause */
  cause?: SerializedError | undefined
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all aspectdb errors.
 *
 * @example
 * ```typescript
 * throw new AspectDBError('Operation failed', ErrorCode.INTERNAL, {
 *   operation: 'updateOrInsert',
 *   slug: 'bird_obs'
 * })
 * ```
 */
export class AspectDBError extends Error {
  override readonly name: string = 'AspectDBError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: process.env.NODE_ENV !== 'production' ? this.stack : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof AspectDBError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Rebuild an error from its serialized form. The result is always the
   * base class; the code and context survive the trip.
   */
  static fromJSON(data: SerializedError): AspectDBError {
    const cause = data.cause ? AspectDBError.fromJSON(data.cause) : undefined
    const error = new AspectDBError(data.message, data.code, data.context, cause)
    if (data.stack) {
      error.stack = data.stack
    }
    return error
  }

  is(code: ErrorCode): boolean {
    return this.code === code
  }

  /**
   * Check if error is in a category (e.g. every `*_NOT_FOUND` code)
   */
  isCategory(category: string): boolean {
    return this.code.includes(category)
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Thrown when a document, aspect tree or call argument is malformed.
 */
export class ValidationError extends AspectDBError {
  override readonly name = 'ValidationError'
  readonly field: string | undefined

  constructor(
    message: string,
    context?: {
      field?: string | undefined
      slug?: string | undefined
      value?: unknown
      issues?: string[] | undefined
    },
    cause?: Error
  ) {
    super(
      message,
      context?.field ? ErrorCode.INVALID_INPUT : ErrorCode.VALIDATION_FAILED,
      context,
      cause
    )
    this.field = context?.field
    Object.setPrototypeOf(this, ValidationError.prototype)
  }
}

// =============================================================================
// Not Found Errors
// =============================================================================

/**
 * Thrown when a lookup by uuid, slug or slug+language misses.
 *
 * `tried` lists the languages that were attempted, in order, when a
 * language fallback was involved.
 */
export class NotFoundError extends AspectDBError {
  override readonly name = 'NotFoundError'
  readonly tried: string[]

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NOT_FOUND,
    context?: {
      slug?: string | undefined
      uuid?: string | undefined
      language?: string | undefined
      tried?: string[] | undefined
      path?: string | undefined
    },
    cause?: Error
  ) {
    super(message, code, context, cause)
    this.tried = context?.tried ?? []
    Object.setPrototypeOf(this, NotFoundError.prototype)
  }
}

// =============================================================================
// Merge Errors
// =============================================================================

/**
 * Thrown when a base tree and an overlay tree cannot be merged.
 *
 * `path` is the dotted location of the first disagreement, e.g.
 * `aspects.2` when the overlay has fewer aspects than the base.
 */
export class MergeError extends AspectDBError {
  override readonly name = 'MergeError'
  readonly kind: MergeFailureKind
  readonly path: string

  constructor(kind: MergeFailureKind, path: string, message?: string, cause?: Error) {
    super(
      message ?? (kind === ErrorCode.STRUCTURAL_MISMATCH
        ? `Structural mismatch at "${path}"`
        : `Type conflict at "${path}"`),
      kind,
      { path },
      cause
    )
    this.kind = kind
    this.path = path
    Object.setPrototypeOf(this, MergeError.prototype)
  }
}

// =============================================================================
// Version Errors
// =============================================================================

/**
 * Thrown by version reconstruction, update and smash.
 */
export class VersionError extends AspectDBError {
  override readonly name = 'VersionError'
  readonly kind: VersionFailureKind

  constructor(
    kind: VersionFailureKind,
    message: string,
    context?: {
      slug?: string | undefined
      language?: string | null | undefined
      version?: number | undefined
      target?: number | undefined
      deltas?: number | undefined
    },
    cause?: Error
  ) {
    super(message, kind, context, cause)
    this.kind = kind
    Object.setPrototypeOf(this, VersionError.prototype)
  }
}

// =============================================================================
// Dependency Errors
// =============================================================================

/**
 * Thrown in strict ordering mode when the batch contains a cycle.
 * `remaining` maps every unordered slug to its unresolved in-batch deps.
 */
export class CircularDependencyError extends AspectDBError {
  override readonly name = 'CircularDependencyError'
  readonly remaining: Map<string, Set<string>>

  constructor(remaining: Map<string, Set<string>>, cause?: Error) {
    const summary = [...remaining.entries()]
      .map(([slug, deps]) => `${slug} -> [${[...deps].join(', ')}]`)
      .join('; ')
    super(
      `Circular dependency among ${remaining.size} document(s): ${summary}`,
      ErrorCode.CIRCULAR_DEPENDENCY,
      {
        remaining: Object.fromEntries(
          [...remaining.entries()].map(([slug, deps]) => [slug, [...deps]])
        ),
      },
      cause
    )
    this.remaining = remaining
    Object.setPrototypeOf(this, CircularDependencyError.prototype)
  }
}

// =============================================================================
// Store Errors
// =============================================================================

/**
 * Thrown when a store transaction fails; the store has been rolled back.
 */
export class StoreCommitError extends AspectDBError {
  override readonly name = 'StoreCommitError'

  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCode.STORE_COMMIT_FAILED, context, cause)
    Object.setPrototypeOf(this, StoreCommitError.prototype)
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigurationError extends AspectDBError {
  override readonly name = 'ConfigurationError'
  readonly configKey: string | undefined

  constructor(
    message: string,
    context?: {
      configKey?: string | undefined
      actualValue?: unknown
    },
    cause?: Error
  ) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context, cause)
    this.configKey = context?.configKey
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isAspectDBError(error: unknown): error is AspectDBError {
  return error instanceof AspectDBError
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

/**
 * Check if an error is a NotFoundError, or any error with a `*_NOT_FOUND` code
 */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError ||
    (isAspectDBError(error) && error.isCategory('NOT_FOUND'))
}

export function isMergeError(error: unknown): error is MergeError {
  return error instanceof MergeError
}

export function isVersionError(error: unknown): error is VersionError {
  return error instanceof VersionError
}

export function isCircularDependencyError(error: unknown): error is CircularDependencyError {
  return error instanceof CircularDependencyError
}

export function isStoreCommitError(error: unknown): error is StoreCommitError {
  return error instanceof StoreCommitError
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError
}

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Wrap an unknown thrown value in an AspectDBError
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): AspectDBError {
  if (error instanceof AspectDBError) {
    return error
  }

  if (error instanceof Error) {
    return new AspectDBError(error.message, ErrorCode.INTERNAL, context, error)
  }

  return new AspectDBError(String(error), ErrorCode.UNKNOWN, context)
}

/**
 * What a caller outside the library gets to see
 */
export interface UserFacingError {
  status: number
  code: ErrorCode
  message: string
}

/**
 * Map a failure to a status code and message for an outer surface
 * (HTTP handler, CLI). An out-of-range version reads as "not found".
 */
export function toUserFacing(error: unknown): UserFacingError {
  const wrapped = wrapError(error)

  if (wrapped instanceof VersionError) {
    const status = wrapped.kind === ErrorCode.INVALID_VERSION ? 404
      : wrapped.kind === ErrorCode.SMASH_REJECTED ? 409
        : 500
    return { status, code: wrapped.code, message: wrapped.message }
  }
  if (isNotFoundError(wrapped)) {
    return { status: 404, code: wrapped.code, message: wrapped.message }
  }
  if (wrapped instanceof ValidationError) {
    return { status: 400, code: wrapped.code, message: wrapped.message }
  }
  if (wrapped instanceof MergeError) {
    return { status: 422, code: wrapped.code, message: wrapped.message }
  }
  if (wrapped instanceof CircularDependencyError) {
    return { status: 409, code: wrapped.code, message: wrapped.message }
  }
  if (wrapped instanceof ConfigurationError) {
    return { status: 500, code: wrapped.code, message: wrapped.message }
  }
  return { status: 500, code: wrapped.code, message: 'Internal error' }
}
