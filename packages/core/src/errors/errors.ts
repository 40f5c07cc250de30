/**
 * Typed error definitions for transaction building and signing.
 *
 * Every error raised by the pipeline is a {@link TransactionError} carrying a
 * stable `code` and optional structured `context`.
 *
 * @packageDocumentation
 */

export type TransactionErrorCode =
  | 'CONFIG_ERROR'
  | 'VALIDATION_ERROR'
  | 'ENCODING_ERROR'
  | 'CRYPTO_ERROR'
  | 'SEQUENCE_ERROR'
  | 'OPERATION_ERROR'
  | 'PIPELINE_ERROR';

/**
 * Base error class for all transaction-related errors.
 */
export class TransactionError extends Error {
  constructor(
    message: string,
    public readonly code: TransactionErrorCode,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransactionError';
    Object.setPrototypeOf(this, TransactionError.prototype);
  }
}

/**
 * Error thrown when required configuration is missing, such as timebounds
 * that were not produced by one of their factories.
 */
export class ConfigError extends TransactionError {
  constructor(
    message: string,
    public readonly missingFields?: readonly string[]
  ) {
    super(message, 'CONFIG_ERROR', missingFields ? { missingFields } : undefined);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Error thrown when a value breaks a business rule: a timebound range, a
 * native asset where an issued one is required, a missing field.
 */
export class ValidationError extends TransactionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Error thrown when a value cannot be put on the wire: malformed addresses,
 * oversized memos, codec failures.
 */
export class EncodingError extends TransactionError {
  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super(message, 'ENCODING_ERROR', options?.context, { cause: options?.cause });
    this.name = 'EncodingError';
    Object.setPrototypeOf(this, EncodingError.prototype);
  }
}

/**
 * Error thrown when hashing or signing fails.
 */
export class CryptoError extends TransactionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CRYPTO_ERROR', undefined, options);
    this.name = 'CryptoError';
    Object.setPrototypeOf(this, CryptoError.prototype);
  }
}

/**
 * Error thrown when the source account cannot supply its next sequence number.
 */
export class SequenceError extends TransactionError {
  constructor(
    message: string,
    public readonly account?: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'SEQUENCE_ERROR', account ? { account } : undefined, options);
    this.name = 'SequenceError';
    Object.setPrototypeOf(this, SequenceError.prototype);
  }
}

/**
 * Error thrown by a build when one operation fails its conversion.
 * Names the operation by position and kind; the variant's own error is the `cause`.
 */
export class OperationError extends TransactionError {
  constructor(
    public readonly index: number,
    public readonly operationType: string,
    cause: unknown
  ) {
    super(
      `Failed to build operation ${index} (${operationType}): ${cause instanceof Error ? cause.message : String(cause)}`,
      'OPERATION_ERROR',
      { index, operationType },
      { cause }
    );
    this.name = 'OperationError';
    Object.setPrototypeOf(this, OperationError.prototype);
  }
}

export type PipelineStage = 'build' | 'sign' | 'encode';

/**
 * Error thrown by the combined build-sign-encode helper, naming the stage that failed.
 */
export class PipelineError extends TransactionError {
  constructor(
    public readonly stage: PipelineStage,
    cause: unknown
  ) {
    super(
      `Couldn't ${stage} transaction: ${cause instanceof Error ? cause.message : String(cause)}`,
      'PIPELINE_ERROR',
      { stage },
      { cause }
    );
    this.name = 'PipelineError';
    Object.setPrototypeOf(this, PipelineError.prototype);
  }
}

/**
 * Union type of all transaction errors.
 */
export type TransactionErrorType =
  | ConfigError
  | ValidationError
  | EncodingError
  | CryptoError
  | SequenceError
  | OperationError
  | PipelineError;
