import type { WireOperationBody } from '@txnkit/wire';
import { parseAmount } from '../amounts/index.js';
import { requireAccountId, type BaseOperation } from './shared.js';

/**
 * Creates and funds a new account.
 */
export interface CreateAccountOperation extends BaseOperation<'createAccount'> {
  readonly destination: string;
  readonly startingBalance: string;
}

export function createAccount(params: Omit<CreateAccountOperation, 'type'>): CreateAccountOperation {
  return { type: 'createAccount', ...params };
}

export function convertCreateAccount(op: CreateAccountOperation): WireOperationBody {
  return {
    __kind: 'CreateAccount',
    destination: requireAccountId(op.destination, 'destination'),
    startingBalance: parseAmount(op.startingBalance),
  };
}
