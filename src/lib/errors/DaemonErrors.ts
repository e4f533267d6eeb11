/**
 * Base error class for daemon errors
 */
export abstract class DaemonError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly retryable: boolean;

  constructor(message: string, code: string, category: ErrorCategory, retryable: boolean = false) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    this.retryable = retryable;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error categories for classification
 */
export enum ErrorCategory {
  /**
   * Transient errors that may resolve on retry
   */
  TRANSIENT = 'transient',

  /**
   * Permanent errors that won't resolve on retry
   */
  PERMANENT = 'permanent',

  /**
   * Fatal errors that require restart
   */
  FATAL = 'fatal'
}

/**
 * Process exit statuses for fatal startup errors
 */
export const EXIT_CODES = {
  GENERAL: 1,
  BIND_CONFLICT: 3,
  STORAGE: 4,
} as const;

/**
 * Malformed frame, unknown message type or invalid payload
 */
export class ProtocolError extends DaemonError {
  public readonly messageType?: string;

  constructor(message: string, messageType?: string) {
    super(message, 'PROTOCOL_ERROR', ErrorCategory.PERMANENT, false);
    this.messageType = messageType;
  }
}

export type StoreErrorKind = 'WRITE_FAILED' | 'READ_FAILED' | 'CORRUPT';

/**
 * Command store failure
 */
export class StoreError extends DaemonError {
  public readonly kind: StoreErrorKind;
  public readonly operation: string;
  public readonly originalError?: Error;

  constructor(kind: StoreErrorKind, operation: string, originalError?: Error) {
    const message = `Command store ${operation} failed${originalError ? `: ${originalError.message}` : ''}`;
    const category = kind === 'CORRUPT' ? ErrorCategory.FATAL : ErrorCategory.TRANSIENT;
    super(message, `STORE_${kind}`, category, kind !== 'CORRUPT');
    this.kind = kind;
    this.operation = operation;
    this.originalError = originalError;
  }
}

export type IndexErrorKind = 'DIMENSION_MISMATCH' | 'NOT_BUILT' | 'EMPTY_INDEX' | 'PERSISTENCE';

/**
 * Vector index failure
 */
export class IndexError extends DaemonError {
  public readonly kind: IndexErrorKind;
  public readonly originalError?: Error;

  constructor(kind: IndexErrorKind, message: string, originalError?: Error) {
    super(message, `INDEX_${kind}`, ErrorCategory.PERMANENT, kind === 'NOT_BUILT');
    this.kind = kind;
    this.originalError = originalError;
  }

  static dimensionMismatch(expected: number, actual: number): IndexError {
    return new IndexError(
      'DIMENSION_MISMATCH',
      `Vector has ${actual} dimensions, index expects ${expected}`
    );
  }

  static notBuilt(): IndexError {
    return new IndexError('NOT_BUILT', 'Vector index has not been built');
  }
}

/**
 * A suggestion request could not read the command store
 */
export class RetrievalFailedError extends DaemonError {
  public readonly originalError?: Error;

  constructor(reason: string, originalError?: Error) {
    super(`Suggestion retrieval failed: ${reason}`, 'RETRIEVAL_FAILED', ErrorCategory.TRANSIENT, true);
    this.originalError = originalError;
  }
}

/**
 * Operation exceeded its time budget
 */
export class TimedOutError extends DaemonError {
  public readonly operation: string;
  public readonly timeout: number;

  constructor(operation: string, timeout: number) {
    const message = `Operation '${operation}' timed out after ${timeout}ms`;
    super(message, 'TIMED_OUT', ErrorCategory.TRANSIENT, true);
    this.operation = operation;
    this.timeout = timeout;
  }
}

/**
 * Another daemon already owns the socket
 */
export class BindConflictError extends DaemonError {
  public readonly socketPath: string;

  constructor(socketPath: string) {
    super(`Daemon already running on ${socketPath}`, 'BIND_CONFLICT', ErrorCategory.FATAL, false);
    this.socketPath = socketPath;
  }
}

/**
 * Configuration validation error
 */
export class ConfigurationError extends DaemonError {
  public readonly field: string;
  public readonly value: unknown;

  constructor(field: string, value: unknown, reason: string) {
    const message = `Invalid configuration for '${field}': ${reason} (value: ${JSON.stringify(value)})`;
    super(message, 'CONFIG_ERROR', ErrorCategory.PERMANENT, false);
    this.field = field;
    this.value = value;
  }
}

/**
 * Request arrived after the daemon began shutting down
 */
export class ShuttingDownError extends DaemonError {
  constructor() {
    super('Daemon is shutting down', 'SHUTTING_DOWN', ErrorCategory.TRANSIENT, true);
  }
}

/**
 * A collaborator needed for the request is not configured
 */
export class UnavailableError extends DaemonError {
  public readonly capability: string;

  constructor(capability: string) {
    super(`${capability} is not available`, 'UNAVAILABLE', ErrorCategory.PERMANENT, false);
    this.capability = capability;
  }
}

function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Determines if an error is retryable based on its type and properties
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof DaemonError) {
    return error.retryable;
  }

  const code = systemErrorCode(error);
  if (code === undefined) {
    return false;
  }

  const retryableCodes = [
    'EBUSY',
    'EAGAIN',
    'ETIMEDOUT',
    'ECONNRESET',
    'EPIPE',
    'EMFILE',
    'ENFILE',
    'SQLITE_BUSY',
    'SQLITE_LOCKED',
  ];
  return retryableCodes.includes(code);
}

/**
 * Gets the error category for any error
 */
export function getErrorCategory(error: unknown): ErrorCategory {
  if (error instanceof DaemonError) {
    return error.category;
  }

  if (isRetryableError(error)) {
    return ErrorCategory.TRANSIENT;
  }

  const code = systemErrorCode(error);
  if (code === 'SQLITE_CORRUPT' || code === 'SQLITE_NOTADB') {
    return ErrorCategory.FATAL;
  }

  return ErrorCategory.PERMANENT;
}

/**
 * Maps a fatal startup error to the process exit status
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof BindConflictError) {
    return EXIT_CODES.BIND_CONFLICT;
  }
  if (error instanceof StoreError) {
    return EXIT_CODES.STORAGE;
  }
  return EXIT_CODES.GENERAL;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
