/**
 * Operations and their wire conversion.
 *
 * @packageDocumentation
 */

export type { Operation, OperationType, OperationMap } from './types.js';
export type { BaseOperation } from './shared.js';
export * from './create-account.js';
export * from './payment.js';
export * from './path-payment.js';
export * from './manage-offer.js';
export * from './create-passive-offer.js';
export * from './set-options.js';
export * from './change-trust.js';
export * from './allow-trust.js';
export * from './account-merge.js';
export * from './inflation.js';
export * from './manage-data.js';
export * from './bump-sequence.js';
export { toWireBody, toWireOperation } from './convert.js';
