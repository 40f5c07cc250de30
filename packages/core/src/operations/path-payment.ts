import { MAX_PATH_LENGTH, type WireOperationBody } from '@txnkit/wire';
import { ValidationError } from '../errors/index.js';
import { parseAmount } from '../amounts/index.js';
import { assetToWire, type Asset } from '../assets/index.js';
import { requireAccountId, type BaseOperation } from './shared.js';

/**
 * Sends one asset and delivers another, converting through up to five
 * intermediate assets.
 */
export interface PathPaymentOperation extends BaseOperation<'pathPayment'> {
  readonly sendAsset: Asset;
  /**
   * Most the source is willing to spend, in `sendAsset`.
   */
  readonly sendMax: string;
  readonly destination: string;
  readonly destAsset: Asset;
  /**
   * Exact amount delivered, in `destAsset`.
   */
  readonly destAmount: string;
  readonly path?: readonly Asset[];
}

export function pathPayment(params: Omit<PathPaymentOperation, 'type'>): PathPaymentOperation {
  return { type: 'pathPayment', ...params };
}

export function convertPathPayment(op: PathPaymentOperation): WireOperationBody {
  const path = op.path ?? [];
  if (path.length > MAX_PATH_LENGTH) {
    throw new ValidationError(`path may contain at most ${MAX_PATH_LENGTH} assets`, { length: path.length });
  }
  return {
    __kind: 'PathPayment',
    sendAsset: assetToWire(op.sendAsset),
    sendMax: parseAmount(op.sendMax),
    destination: requireAccountId(op.destination, 'destination'),
    destAsset: assetToWire(op.destAsset),
    destAmount: parseAmount(op.destAmount),
    path: path.map(assetToWire),
  };
}
