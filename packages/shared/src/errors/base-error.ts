/**
 * Base error class with error codes
 * @module @capbench/shared/errors/base-error
 */

/**
 * Error codes for categorization
 */
export enum ErrorCode {
  // General errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,
  TIMEOUT = 1003,
  CANCELLED = 1004,

  // Validation errors (2xxx)
  VALIDATION_FAILED = 2000,
  INVALID_INPUT = 2001,
  MISSING_REQUIRED_FIELD = 2002,
  INVALID_FORMAT = 2003,
  OUT_OF_RANGE = 2004,

  // Resource errors (5xxx)
  NOT_FOUND = 5000,
  CONFLICT = 5002,

  // Scenario resolution errors (6xxx)
  TARGET_UNRESOLVED = 6000,
  NETWORK_UNRESOLVED = 6001,

  // Injection / restoration errors (7xxx)
  INJECTION_FAILED = 7000,
  PARTITION_VERIFICATION_FAILED = 7001,
  RESTORATION_FAILED = 7002,
  RECOVERY_TIMEOUT = 7003,

  // Store and orchestrator errors (8xxx)
  PROBE_FAILED = 8000,
  STORE_UNAVAILABLE = 8001,
  ORCHESTRATOR_UNAVAILABLE = 8002,
  ORCHESTRATOR_COMMAND_FAILED = 8003,
}

/**
 * Error metadata for additional context
 */
export interface ErrorMeta {
  /** Node involved */
  nodeId?: string;
  /** Store involved */
  store?: string;
  /** Network involved */
  network?: string;
  /** Field that caused the error */
  field?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Base error class for all capbench errors
 */
export class CapbenchError extends Error {
  /** Error code for categorization */
  public readonly code: ErrorCode;
  /** HTTP status code equivalent */
  public readonly statusCode: number;
  /** Error metadata */
  public readonly meta: ErrorMeta;
  /** Timestamp when error occurred */
  public readonly timestamp: Date;
  /** Correlation ID for tracing */
  public correlationId?: string;
  /** Original error if this wraps another */
  public override readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    meta: ErrorMeta = {},
    cause?: Error,
  ) {
    super(message);
    this.name = 'CapbenchError';
    this.code = code;
    this.meta = meta;
    this.timestamp = new Date();
    this.cause = cause;
    this.statusCode = statusCodeFor(code);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Set correlation ID for tracing
   */
  withCorrelationId(correlationId: string): this {
    this.correlationId = correlationId;
    return this;
  }

  /**
   * Convert to the API error body
   */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: ErrorCode[this.code] ?? String(this.code),
        message: this.message,
        ...(Object.keys(this.meta).length > 0 && { details: this.meta }),
      },
    };
  }

  /**
   * Convert to log-friendly format
   */
  toLog(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      meta: this.meta,
      timestamp: this.timestamp.toISOString(),
      correlationId: this.correlationId,
      cause: this.cause?.message,
    };
  }

  /**
   * Check if this is a client error (4xx)
   */
  isClientError(): boolean {
    return this.statusCode >= 400 && this.statusCode < 500;
  }
}

/**
 * Map an error code to its HTTP status code
 */
export function statusCodeFor(code: ErrorCode): number {
  switch (code) {
    case ErrorCode.NOT_FOUND:
      return 404;
    case ErrorCode.CONFLICT:
      return 409;
    case ErrorCode.TIMEOUT:
    case ErrorCode.RECOVERY_TIMEOUT:
      return 504;
    case ErrorCode.STORE_UNAVAILABLE:
    case ErrorCode.ORCHESTRATOR_UNAVAILABLE:
      return 503;
    default:
      break;
  }

  switch (Math.floor(code / 1000)) {
    case 2: // Validation
      return 400;
    case 6: // Resolution
      return 422;
    case 7: // Injection
    case 8: // Store / orchestrator
      return 502;
    default:
      return 500;
  }
}

/**
 * Check if an error is a CapbenchError
 */
export function isCapbenchError(error: unknown): error is CapbenchError {
  return error instanceof CapbenchError;
}

/**
 * Wrap an unknown error as a CapbenchError
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN): CapbenchError {
  if (isCapbenchError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new CapbenchError(error.message, code, {}, error);
  }

  return new CapbenchError(String(error), code);
}

/**
 * Extract a message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
