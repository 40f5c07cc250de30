/**
 * @txnkit/wire
 *
 * Canonical binary codecs for ledger transactions and envelopes.
 *
 * @packageDocumentation
 */

export * from './types.js';
export * from './primitives.js';
export * from './codecs.js';
