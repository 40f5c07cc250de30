import type { WireOperationBody } from '@txnkit/wire';
import { parseAmount, parsePrice, type PriceInput } from '../amounts/index.js';
import { assetToWire, type Asset } from '../assets/index.js';
import type { BaseOperation } from './shared.js';

/**
 * Creates an offer that does not take offers of the same price.
 */
export interface CreatePassiveOfferOperation extends BaseOperation<'createPassiveOffer'> {
  readonly selling: Asset;
  readonly buying: Asset;
  readonly amount: string;
  readonly price: PriceInput;
}

export function createPassiveOffer(params: Omit<CreatePassiveOfferOperation, 'type'>): CreatePassiveOfferOperation {
  return { type: 'createPassiveOffer', ...params };
}

export function convertCreatePassiveOffer(op: CreatePassiveOfferOperation): WireOperationBody {
  return {
    __kind: 'CreatePassiveOffer',
    selling: assetToWire(op.selling),
    buying: assetToWire(op.buying),
    amount: parseAmount(op.amount),
    price: parsePrice(op.price),
  };
}
