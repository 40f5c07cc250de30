import type { WireOperationBody } from '@txnkit/wire';
import { requireInt64, type BaseOperation } from './shared.js';

/**
 * Raises the source account's sequence number to `bumpTo`.
 */
export interface BumpSequenceOperation extends BaseOperation<'bumpSequence'> {
  readonly bumpTo: bigint | number | string;
}

export function bumpSequence(params: Omit<BumpSequenceOperation, 'type'>): BumpSequenceOperation {
  return { type: 'bumpSequence', ...params };
}

export function convertBumpSequence(op: BumpSequenceOperation): WireOperationBody {
  return { __kind: 'BumpSequence', bumpTo: requireInt64(op.bumpTo, 'bumpTo') };
}
