import type { WireOperationBody } from '@txnkit/wire';
import { ValidationError } from '../errors/index.js';
import { parseAmount } from '../amounts/index.js';
import { assetToWire, type Asset } from '../assets/index.js';
import { requireAccountId, type BaseOperation } from './shared.js';

/**
 * Sends an amount of an asset to an existing account.
 */
export interface PaymentOperation extends BaseOperation<'payment'> {
  readonly destination: string;
  readonly amount: string;
  /**
   * Required; checked at build time.
   */
  readonly asset?: Asset;
}

export function payment(params: Omit<PaymentOperation, 'type'>): PaymentOperation {
  return { type: 'payment', ...params };
}

export function convertPayment(op: PaymentOperation): WireOperationBody {
  const destination = requireAccountId(op.destination, 'destination');
  if (!op.asset) {
    throw new ValidationError('asset required');
  }
  return {
    __kind: 'Payment',
    destination,
    asset: assetToWire(op.asset),
    amount: parseAmount(op.amount),
  };
}
