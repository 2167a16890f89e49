import type { FilePath } from "@stashfs/storage"
import type { CacheKey } from "../../ports/cache-key"

export const CacheErrorCodes = {
  InvalidArgument: "invalid_argument",
  OperationFailed: "cache_operation_failed",
  InvalidConfig: "invalid_config",
} as const

export type CacheErrorCode = (typeof CacheErrorCodes)[keyof typeof CacheErrorCodes]

/**
 * Keys, paths and offending values attached to an error. Frozen.
 */
export type CacheErrorContext = Readonly<Record<string, unknown>>

export type CacheErrorOptions = Readonly<{
  context?: CacheErrorContext
  cause?: unknown
}>

/**
 * Parent of every error the cache raises. `instanceof CacheError` separates
 * them from programming errors thrown by the caller's own code.
 */
export abstract class CacheError<C extends CacheErrorCode = CacheErrorCode> extends Error {
  readonly code: C
  readonly context: CacheErrorContext

  /**
   * `true` for failures expected at run time (bad input, an unwritable
   * disk), `false` when the deployment itself is misconfigured.
   */
  readonly isOperational: boolean

  protected constructor(
    message: string,
    code: C,
    options: CacheErrorOptions & { isOperational?: boolean },
  ) {
    super(message, { cause: options.cause })

    this.name = new.target.name
    this.code = code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true

    Error.captureStackTrace(this, new.target)
  }
}

/**
 * Bad input from the caller. Always raised before any I/O.
 */
export class InvalidArgumentError extends CacheError<typeof CacheErrorCodes.InvalidArgument> {
  constructor(message: string, options: CacheErrorOptions = {}) {
    super(message, CacheErrorCodes.InvalidArgument, options)
  }

  static invalidKey(key: unknown): InvalidArgumentError {
    return new InvalidArgumentError(
      "Cache key must be 1-64 characters of [a-zA-Z0-9_.]",
      { context: { key: describe(key) } },
    )
  }

  static invalidDomain(domain: unknown): InvalidArgumentError {
    return new InvalidArgumentError(
      "Cache domain must be 1-64 characters of [a-zA-Z0-9_-]",
      { context: { domain: describe(domain) } },
    )
  }

  static invalidTtl(ttl: unknown, reason: string): InvalidArgumentError {
    return new InvalidArgumentError(`Invalid ttl: ${reason}`, {
      context: { ttl: describe(ttl) },
    })
  }

  static unsupportedValue(valueType: string, cause?: unknown): InvalidArgumentError {
    return new InvalidArgumentError(`Cannot cache a value of type ${valueType}`, {
      context: { valueType },
      cause,
    })
  }

  static notIterable(argument: string, value: unknown): InvalidArgumentError {
    return new InvalidArgumentError(`${argument} must be an iterable of cache keys`, {
      context: { argument, received: describe(value) },
    })
  }

  static invalidRecord(reason: string): InvalidArgumentError {
    return new InvalidArgumentError(`Invalid cache item record: ${reason}`, {
      context: { reason },
    })
  }
}

/**
 * The storage backend failed, or the storage path cannot be used.
 */
export class CacheOperationError extends CacheError<typeof CacheErrorCodes.OperationFailed> {
  constructor(message: string, options: CacheErrorOptions = {}) {
    super(message, CacheErrorCodes.OperationFailed, options)
  }

  static storagePathNotWritable(storagePath: FilePath): CacheOperationError {
    return new CacheOperationError(
      `Storage path is not a writable directory: ${storagePath}`,
      { context: { storagePath } },
    )
  }

  static backendFailure(
    operation: string,
    cause: unknown,
    context: { key?: CacheKey; path?: FilePath } = {},
  ): CacheOperationError {
    const detail = cause instanceof Error ? cause.message : String(cause)

    return new CacheOperationError(`Cache ${operation} failed: ${detail}`, {
      context: { operation, ...context },
      cause,
    })
  }
}

/**
 * Configuration loaded from the environment failed validation.
 */
export class ConfigurationError extends CacheError<typeof CacheErrorCodes.InvalidConfig> {
  constructor(message: string, options: CacheErrorOptions = {}) {
    super(message, CacheErrorCodes.InvalidConfig, { ...options, isOperational: false })
  }
}

function describe(value: unknown): string {
  if (typeof value === "string") return value
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"

  return typeof value
}
