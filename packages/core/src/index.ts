/**
 * @txnkit/core
 *
 * Type-safe ledger transaction builder.
 *
 * Features:
 * - Immutable builder with compile-time validation
 * - Operations as a closed union with per-variant wire conversion
 * - Configurable fee policy
 * - Build → sign → encode chain of immutable values
 * - Base64 envelope import and export
 *
 * @packageDocumentation
 */

// Main export - builder and its results
export { TransactionBuilder } from './builder/builder.js';
export type { TransactionBuilderConfig } from './builder/builder.js';
export { BuiltTransaction, SignedTransaction } from './builder/built-transaction.js';

// Type-safety types
export type { BuilderState, RequiredState } from './types.js';

// Errors
export * from './errors/index.js';

// Timebounds
export * from './timebounds/index.js';

// Operations, assets, amounts, memos
export * from './operations/index.js';
export * from './assets/index.js';
export * from './amounts/index.js';
export * from './memo/index.js';

// Accounts and keys
export * from './account/index.js';
export * from './keys/index.js';

// Network hashing
export * from './network/index.js';

// Fees
export * from './fees/index.js';

// Envelope serialization
export * from './envelope/index.js';

// Validation
export * from './validation/index.js';

// Logging
export * from './logging/index.js';

// Helpers
export * from './helpers.js';

// Wire types
export type { DecoratedSignature, WireEnvelope, WireTransaction, WireOperation } from '@txnkit/wire';
