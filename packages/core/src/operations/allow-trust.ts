import type { WireOperationBody } from '@txnkit/wire';
import { assetToAllowTrustWire, type Asset } from '../assets/index.js';
import { requireAccountId, type BaseOperation } from './shared.js';

/**
 * Lets an issuer authorize or revoke another account's trustline to one of
 * its assets.
 */
export interface AllowTrustOperation extends BaseOperation<'allowTrust'> {
  readonly trustor: string;
  readonly asset: Asset;
  readonly authorize: boolean;
}

export function allowTrust(params: Omit<AllowTrustOperation, 'type'>): AllowTrustOperation {
  return { type: 'allowTrust', ...params };
}

export function convertAllowTrust(op: AllowTrustOperation): WireOperationBody {
  const trustor = requireAccountId(op.trustor, 'trustor');
  return {
    __kind: 'AllowTrust',
    trustor,
    asset: assetToAllowTrustWire(op.asset),
    authorize: op.authorize,
  };
}
