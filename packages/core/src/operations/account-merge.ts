import type { WireOperationBody } from '@txnkit/wire';
import { requireAccountId, type BaseOperation } from './shared.js';

/**
 * Transfers the native balance to `destination` and removes the source account.
 */
export interface AccountMergeOperation extends BaseOperation<'accountMerge'> {
  readonly destination: string;
}

export function accountMerge(params: Omit<AccountMergeOperation, 'type'>): AccountMergeOperation {
  return { type: 'accountMerge', ...params };
}

export function convertAccountMerge(op: AccountMergeOperation): WireOperationBody {
  return { __kind: 'AccountMerge', destination: requireAccountId(op.destination, 'destination') };
}
