/**
 * Wire-level structures of a ledger transaction envelope.
 *
 * Union members carry their arm in `__kind`; the arm's position in the codec
 * definition is its on-wire discriminant.
 *
 * @packageDocumentation
 */

import type { ReadonlyUint8Array } from '@solana/codecs';

/**
 * A 32-byte ed25519 public key identifying an account.
 */
export type AccountId = ReadonlyUint8Array;

export interface WireTimeBounds {
  minTime: bigint;
  maxTime: bigint;
}

export type WireMemo =
  | { __kind: 'None' }
  | { __kind: 'Text'; text: string }
  | { __kind: 'Id'; id: bigint }
  | { __kind: 'Hash'; hash: ReadonlyUint8Array }
  | { __kind: 'Return'; retHash: ReadonlyUint8Array };

export type WireAsset =
  | { __kind: 'Native' }
  | { __kind: 'CreditAlphanum4'; assetCode: ReadonlyUint8Array; issuer: AccountId }
  | { __kind: 'CreditAlphanum12'; assetCode: ReadonlyUint8Array; issuer: AccountId };

/**
 * Asset reference used by allow-trust: the issuer is implied by the source account.
 * `Native` occupies discriminant 0 and is never produced.
 */
export type WireAllowTrustAsset =
  | { __kind: 'Native' }
  | { __kind: 'CreditAlphanum4'; assetCode: ReadonlyUint8Array }
  | { __kind: 'CreditAlphanum12'; assetCode: ReadonlyUint8Array };

export interface WirePrice {
  n: number;
  d: number;
}

export type WireSignerKey =
  | { __kind: 'Ed25519'; ed25519: ReadonlyUint8Array }
  | { __kind: 'PreAuthTx'; preAuthTx: ReadonlyUint8Array }
  | { __kind: 'HashX'; hashX: ReadonlyUint8Array };

export interface WireSigner {
  key: WireSignerKey;
  weight: number;
}

export type WireOperationBody =
  | { __kind: 'CreateAccount'; destination: AccountId; startingBalance: bigint }
  | { __kind: 'Payment'; destination: AccountId; asset: WireAsset; amount: bigint }
  | {
      __kind: 'PathPayment';
      sendAsset: WireAsset;
      sendMax: bigint;
      destination: AccountId;
      destAsset: WireAsset;
      destAmount: bigint;
      path: WireAsset[];
    }
  | {
      __kind: 'ManageOffer';
      selling: WireAsset;
      buying: WireAsset;
      amount: bigint;
      price: WirePrice;
      offerId: bigint;
    }
  | {
      __kind: 'CreatePassiveOffer';
      selling: WireAsset;
      buying: WireAsset;
      amount: bigint;
      price: WirePrice;
    }
  | {
      __kind: 'SetOptions';
      inflationDest: AccountId | null;
      clearFlags: number | null;
      setFlags: number | null;
      masterWeight: number | null;
      lowThreshold: number | null;
      medThreshold: number | null;
      highThreshold: number | null;
      homeDomain: string | null;
      signer: WireSigner | null;
    }
  | { __kind: 'ChangeTrust'; line: WireAsset; limit: bigint }
  | { __kind: 'AllowTrust'; trustor: AccountId; asset: WireAllowTrustAsset; authorize: boolean }
  | { __kind: 'AccountMerge'; destination: AccountId }
  | { __kind: 'Inflation' }
  | { __kind: 'ManageData'; dataName: string; dataValue: ReadonlyUint8Array | null }
  | { __kind: 'BumpSequence'; bumpTo: bigint };

export type WireOperationKind = WireOperationBody['__kind'];

export interface WireOperation {
  sourceAccount: AccountId | null;
  body: WireOperationBody;
}

export interface WireTransaction {
  sourceAccount: AccountId;
  fee: number;
  seqNum: bigint;
  timeBounds: WireTimeBounds | null;
  memo: WireMemo;
  operations: WireOperation[];
  ext: { __kind: 'V0' };
}

export interface DecoratedSignature {
  hint: ReadonlyUint8Array;
  signature: ReadonlyUint8Array;
}

export interface WireEnvelope {
  tx: WireTransaction;
  signatures: DecoratedSignature[];
}
