/**
 * Error types and utilities for transaction building.
 *
 * @packageDocumentation
 */

export * from './errors.js';
export * from './predicates.js';
