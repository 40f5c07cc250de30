import type { WireOperationBody } from '@txnkit/wire';
import { parseAmount, parsePrice, type PriceInput } from '../amounts/index.js';
import { assetToWire, creditAsset, nativeAsset, type Asset } from '../assets/index.js';
import { requireInt64, type BaseOperation } from './shared.js';

/**
 * Creates, updates or deletes an offer on the order book.
 * An `offerId` of 0 creates; an amount of `"0"` deletes.
 */
export interface ManageOfferOperation extends BaseOperation<'manageOffer'> {
  readonly selling: Asset;
  readonly buying: Asset;
  readonly amount: string;
  readonly price: PriceInput;
  readonly offerId?: bigint | number | string;
}

// The network ignores the assets of a deleted offer; any well-formed pair will do.
const DELETE_SELLING = nativeAsset();
const DELETE_BUYING = creditAsset('FAKE', 'GBAQPADEYSKYMYXTMASBUIS5JI3LMOAWSTM2CHGDBJ3QDDPNCSO3DVAA');

export function manageOffer(params: Omit<ManageOfferOperation, 'type'>): ManageOfferOperation {
  return { type: 'manageOffer', ...params };
}

export function createOffer(selling: Asset, buying: Asset, amount: string, price: PriceInput): ManageOfferOperation {
  return manageOffer({ selling, buying, amount, price, offerId: 0n });
}

export function updateOffer(
  selling: Asset,
  buying: Asset,
  amount: string,
  price: PriceInput,
  offerId: bigint | number | string
): ManageOfferOperation {
  return manageOffer({ selling, buying, amount, price, offerId });
}

export function deleteOffer(offerId: bigint | number | string): ManageOfferOperation {
  return manageOffer({ selling: DELETE_SELLING, buying: DELETE_BUYING, amount: '0', price: '1', offerId });
}

export function convertManageOffer(op: ManageOfferOperation): WireOperationBody {
  return {
    __kind: 'ManageOffer',
    selling: assetToWire(op.selling),
    buying: assetToWire(op.buying),
    amount: parseAmount(op.amount),
    price: parsePrice(op.price),
    offerId: requireInt64(op.offerId ?? 0n, 'offerId'),
  };
}
