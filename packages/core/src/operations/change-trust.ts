import type { WireOperationBody } from '@txnkit/wire';
import { ValidationError } from '../errors/index.js';
import { MAX_AMOUNT, parseAmount } from '../amounts/index.js';
import { assetToWire, type Asset } from '../assets/index.js';
import type { BaseOperation } from './shared.js';

/**
 * Creates, updates or (with limit `"0"`) removes a trustline.
 */
export interface ChangeTrustOperation extends BaseOperation<'changeTrust'> {
  readonly line: Asset;
  /**
   * Defaults to the largest representable amount.
   */
  readonly limit?: string;
}

export function changeTrust(params: Omit<ChangeTrustOperation, 'type'>): ChangeTrustOperation {
  return { type: 'changeTrust', ...params };
}

export function removeTrustline(line: Asset): ChangeTrustOperation {
  return changeTrust({ line, limit: '0' });
}

export function convertChangeTrust(op: ChangeTrustOperation): WireOperationBody {
  if (op.line.type === 'native') {
    throw new ValidationError('trustlines cannot be created for the native asset');
  }
  return {
    __kind: 'ChangeTrust',
    line: assetToWire(op.line),
    limit: parseAmount(op.limit ?? MAX_AMOUNT),
  };
}
