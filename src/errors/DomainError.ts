/**
 * Domain Error Base Class
 * Structured errors with codes, context and retry information. Each kind maps
 * to a recovery scope during ingestion: message, batch, file or directory.
 */

// ============================================================================
// Error Codes
// ============================================================================

export type ErrorCode =
  // Parsing Errors
  | 'PARSE_001' // Not an email (no header block)
  | 'PARSE_002' // Empty record
  | 'PARSE_003' // Encoding / MIME failure
  // Validation Errors
  | 'VALID_001' // Invalid option value
  // Storage Errors
  | 'STORE_001' // Insert failed
  | 'STORE_002' // Thread metadata update failed
  | 'STORE_003' // Schema creation failed
  // File Errors
  | 'FILE_001' // File not found
  | 'FILE_002' // Permission denied
  | 'FILE_003' // Read failure
  | 'FILE_004' // Lock acquisition failed
  // Directory Errors
  | 'DIR_001' // Directory missing
  | 'DIR_002' // Not a directory
  | 'DIR_003' // No matching files
  | 'DIR_004' // Directory unreadable
  // Resource Errors
  | 'MEM_001' // Memory pressure did not subside
  // Generic Errors
  | 'UNKNOWN';

// ============================================================================
// Base Domain Error
// ============================================================================

export interface DomainErrorContext {
  /** Original error that caused this error */
  cause?: Error;
  /** File path if applicable */
  filePath?: string;
  /** Index of the record within its mailbox */
  recordIndex?: number;
  /** Index of the batch within its mailbox */
  batchIndex?: number;
  /** Additional context */
  [key: string]: unknown;
}

export abstract class DomainError extends Error {
  /** Unique error code for categorization */
  abstract readonly code: ErrorCode;
  /** Whether the operation can be retried */
  readonly isRetryable: boolean;
  /** Additional context about the error */
  readonly context: DomainErrorContext;
  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    message: string,
    context: DomainErrorContext = {},
    isRetryable = false
  ) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.isRetryable = isRetryable;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to a JSON-serializable object for logging.
   */
  toJSON(): Record<string, unknown> {
    const { cause, ...rest } = this.context;
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      isRetryable: this.isRetryable,
      context: cause ? { ...rest, cause: cause.message } : rest,
      timestamp: this.timestamp.toISOString(),
    };
  }

  toUserMessage(): string {
    return `Error ${this.code}: ${this.message}`;
  }
}

// ============================================================================
// Parsing Errors (one record)
// ============================================================================

export class ParsingError extends DomainError {
  readonly code: ErrorCode;

  constructor(
    message: string,
    code: ErrorCode = 'PARSE_001',
    context: DomainErrorContext = {}
  ) {
    super(message, context, false);
    this.code = code;
  }

  static notAnEmail(details?: string): ParsingError {
    return new ParsingError(
      `Record is not an email${details ? ': ' + details : ''}`,
      'PARSE_001'
    );
  }

  static emptyRecord(): ParsingError {
    return new ParsingError('Record is empty', 'PARSE_002');
  }

  static mimeFailure(cause: Error): ParsingError {
    return new ParsingError(
      `Unable to decode message: ${cause.message}`,
      'PARSE_003',
      { cause }
    );
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export class ValidationError extends DomainError {
  readonly code: ErrorCode = 'VALID_001';

  constructor(
    message: string,
    public readonly field: string,
    context: DomainErrorContext = {}
  ) {
    super(message, { ...context, field }, false);
  }

  static invalidOption(field: string, value: unknown, expected: string): ValidationError {
    return new ValidationError(
      `Invalid value for ${field}: expected ${expected}`,
      field,
      { value }
    );
  }
}

// ============================================================================
// Storage Errors (one batch or thread group)
// ============================================================================

export type StorageOperation = 'insert' | 'upsert_thread' | 'merge_threads' | 'schema';

export class StorageError extends DomainError {
  readonly code: ErrorCode;

  constructor(
    message: string,
    code: ErrorCode,
    public readonly operation: StorageOperation,
    context: DomainErrorContext = {},
    isRetryable = true
  ) {
    super(message, { ...context, operation }, isRetryable);
    this.code = code;
  }

  static insertFailed(count: number, cause?: Error): StorageError {
    return new StorageError(
      `Failed to insert ${count} message(s)${cause ? ': ' + cause.message : ''}`,
      'STORE_001',
      'insert',
      { cause, count }
    );
  }

  static threadUpdateFailed(threadId: string, cause?: Error): StorageError {
    return new StorageError(
      `Failed to update thread ${threadId}${cause ? ': ' + cause.message : ''}`,
      'STORE_002',
      'upsert_thread',
      { cause, threadId }
    );
  }

  static mergeFailed(count: number, cause?: Error): StorageError {
    return new StorageError(
      `Failed to apply ${count} thread merge(s)${cause ? ': ' + cause.message : ''}`,
      'STORE_002',
      'merge_threads',
      { cause, count }
    );
  }

  static schemaFailed(cause?: Error): StorageError {
    return new StorageError(
      `Failed to create storage schema${cause ? ': ' + cause.message : ''}`,
      'STORE_003',
      'schema',
      { cause },
      false
    );
  }
}

// ============================================================================
// File Access Errors (one source file)
// ============================================================================

export class FileAccessError extends DomainError {
  readonly code: ErrorCode;

  constructor(
    message: string,
    code: ErrorCode,
    filePath: string,
    context: DomainErrorContext = {},
    isRetryable = false
  ) {
    super(message, { ...context, filePath }, isRetryable);
    this.code = code;
  }

  static notFound(filePath: string): FileAccessError {
    return new FileAccessError(`File not found: ${filePath}`, 'FILE_001', filePath);
  }

  static permissionDenied(filePath: string): FileAccessError {
    return new FileAccessError(`Permission denied: ${filePath}`, 'FILE_002', filePath);
  }

  static readFailed(filePath: string, cause?: Error): FileAccessError {
    return new FileAccessError(
      `Unable to read ${filePath}${cause ? ': ' + cause.message : ''}`,
      'FILE_003',
      filePath,
      { cause }
    );
  }

  static lockFailed(filePath: string, timeout: number): FileAccessError {
    return new FileAccessError(
      `Failed to acquire lock on ${filePath} after ${timeout}ms`,
      'FILE_004',
      filePath,
      { timeout },
      true
    );
  }

  /**
   * Map a Node.js fs error onto the matching file error
   */
  static fromNodeError(filePath: string, error: unknown): FileAccessError {
    if (error instanceof FileAccessError) {
      return error;
    }
    const code = isErrnoException(error) ? error.code : undefined;
    if (code === 'ENOENT') return FileAccessError.notFound(filePath);
    if (code === 'EACCES' || code === 'EPERM') return FileAccessError.permissionDenied(filePath);
    return FileAccessError.readFailed(filePath, toError(error));
  }
}

// ============================================================================
// Directory Errors (whole run)
// ============================================================================

export class DirectoryError extends DomainError {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, directory: string) {
    super(message, { directory }, false);
    this.code = code;
  }

  static notFound(directory: string): DirectoryError {
    return new DirectoryError(`Directory does not exist: ${directory}`, 'DIR_001', directory);
  }

  static notADirectory(directory: string): DirectoryError {
    return new DirectoryError(`Not a directory: ${directory}`, 'DIR_002', directory);
  }

  static noMatchingFiles(directory: string, extensions: string[]): DirectoryError {
    return new DirectoryError(
      `No ${extensions.join(', ')} files found in directory: ${directory}`,
      'DIR_003',
      directory
    );
  }

  static unreadable(directory: string, cause?: Error): DirectoryError {
    return new DirectoryError(
      `Unable to list directory ${directory}${cause ? ': ' + cause.message : ''}`,
      'DIR_004',
      directory
    );
  }
}

// ============================================================================
// Memory Pressure Errors (whole run)
// ============================================================================

export class MemoryPressureError extends DomainError {
  readonly code: ErrorCode = 'MEM_001';

  constructor(usagePercent: number, maxPercent: number, attempts: number) {
    super(
      `Memory usage at ${usagePercent.toFixed(1)}% stayed above ${maxPercent}% after ${attempts} check(s)`,
      { usagePercent, maxPercent, attempts },
      true
    );
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

/**
 * Node system error (fs, net) with its `code`. Matched by shape: errors
 * raised inside Node's own modules may come from another realm.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

/**
 * The thrown value as an Error, when it is one
 */
export function toError(error: unknown): Error | undefined {
  if (error instanceof Error) return error;
  if (isErrnoException(error)) return error;
  return undefined;
}

class UnknownError extends DomainError {
  readonly code: ErrorCode = 'UNKNOWN';
}

/**
 * Wrap an unknown error in a DomainError if it isn't one already.
 */
export function wrapError(error: unknown, defaultMessage = 'An unexpected error occurred'): DomainError {
  if (isDomainError(error)) {
    return error;
  }

  const cause = toError(error);
  const message = cause ? cause.message : defaultMessage;

  return new UnknownError(message, { cause });
}

/**
 * Message of any thrown value, for log metadata
 */
export function errorMessage(error: unknown): string {
  return toError(error)?.message ?? String(error);
}
