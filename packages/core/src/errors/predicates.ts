/**
 * Type guards and predicates for errors.
 *
 * @packageDocumentation
 */

import {
  type TransactionErrorType,
  TransactionError,
  ConfigError,
  ValidationError,
  EncodingError,
  CryptoError,
  SequenceError,
  OperationError,
  PipelineError,
} from './errors.js';

/**
 * Check if error was raised by this library.
 */
export function isTransactionError(error: unknown): error is TransactionErrorType {
  return error instanceof TransactionError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isEncodingError(error: unknown): error is EncodingError {
  return error instanceof EncodingError;
}

export function isCryptoError(error: unknown): error is CryptoError {
  return error instanceof CryptoError;
}

export function isSequenceError(error: unknown): error is SequenceError {
  return error instanceof SequenceError;
}

export function isOperationError(error: unknown): error is OperationError {
  return error instanceof OperationError;
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Walk the `cause` chain and return the innermost error.
 * Useful to get at the variant error behind an {@link OperationError}.
 */
export function getRootCause(error: unknown): unknown {
  let current = error;
  while (current instanceof Error && current.cause !== undefined) {
    current = current.cause;
  }
  return current;
}
