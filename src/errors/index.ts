/**
 * Error Module
 * Exports all domain error types and utilities.
 */

export {
  DomainError,
  type DomainErrorContext,
  type ErrorCode,
  ParsingError,
  ValidationError,
  StorageError,
  type StorageOperation,
  FileAccessError,
  DirectoryError,
  MemoryPressureError,
  isDomainError,
  isErrnoException,
  toError,
  wrapError,
  errorMessage,
} from './DomainError';
