/**
 * Codecs for transaction envelopes, composed from @solana/codecs primitives.
 *
 * @packageDocumentation
 */

import {
  getDiscriminatedUnionCodec,
  getStructCodec,
  getUnitCodec,
  transformCodec,
  type Codec,
  type ReadonlyUint8Array,
} from '@solana/codecs';
import {
  getFixedOpaqueCodec,
  getInt32Codec,
  getInt64Codec,
  getOptionalCodec,
  getUint32Codec,
  getUint64Codec,
  getVarArrayCodec,
  getVarOpaqueCodec,
  getWireBooleanCodec,
  getWireStringCodec,
} from './primitives.js';
import type {
  AccountId,
  DecoratedSignature,
  WireAllowTrustAsset,
  WireAsset,
  WireEnvelope,
  WireMemo,
  WireOperation,
  WireOperationBody,
  WirePrice,
  WireSigner,
  WireSignerKey,
  WireTimeBounds,
  WireTransaction,
} from './types.js';

export const MAX_OPERATIONS = 100;
export const MAX_SIGNATURES = 20;
export const MAX_PATH_LENGTH = 5;
export const MAX_MEMO_TEXT_BYTES = 28;
export const MAX_HOME_DOMAIN_BYTES = 32;
export const MAX_DATA_NAME_BYTES = 64;
export const MAX_DATA_VALUE_BYTES = 64;

/**
 * Envelope type tag mixed into the signature payload of a transaction.
 */
export const ENVELOPE_TYPE_TX = 2;

const unionConfig = () => ({ size: getInt32Codec() });

export function getAccountIdCodec(): Codec<AccountId> {
  return transformCodec(
    getDiscriminatedUnionCodec([['Ed25519', getStructCodec([['ed25519', getFixedOpaqueCodec(32)]])]], unionConfig()),
    (key: ReadonlyUint8Array) => ({ __kind: 'Ed25519' as const, ed25519: key }),
    (value) => value.ed25519
  );
}

export function getTimeBoundsCodec(): Codec<WireTimeBounds> {
  return getStructCodec([
    ['minTime', getUint64Codec()],
    ['maxTime', getUint64Codec()],
  ]);
}

export function getMemoCodec(): Codec<WireMemo> {
  return getDiscriminatedUnionCodec(
    [
      ['None', getUnitCodec()],
      ['Text', getStructCodec([['text', getWireStringCodec(MAX_MEMO_TEXT_BYTES)]])],
      ['Id', getStructCodec([['id', getUint64Codec()]])],
      ['Hash', getStructCodec([['hash', getFixedOpaqueCodec(32)]])],
      ['Return', getStructCodec([['retHash', getFixedOpaqueCodec(32)]])],
    ],
    unionConfig()
  );
}

export function getAssetCodec(): Codec<WireAsset> {
  return getDiscriminatedUnionCodec(
    [
      ['Native', getUnitCodec()],
      [
        'CreditAlphanum4',
        getStructCodec([
          ['assetCode', getFixedOpaqueCodec(4)],
          ['issuer', getAccountIdCodec()],
        ]),
      ],
      [
        'CreditAlphanum12',
        getStructCodec([
          ['assetCode', getFixedOpaqueCodec(12)],
          ['issuer', getAccountIdCodec()],
        ]),
      ],
    ],
    unionConfig()
  );
}

function getAllowTrustAssetCodec(): Codec<WireAllowTrustAsset> {
  return getDiscriminatedUnionCodec(
    [
      ['Native', getUnitCodec()],
      ['CreditAlphanum4', getStructCodec([['assetCode', getFixedOpaqueCodec(4)]])],
      ['CreditAlphanum12', getStructCodec([['assetCode', getFixedOpaqueCodec(12)]])],
    ],
    unionConfig()
  );
}

export function getPriceCodec(): Codec<WirePrice> {
  return getStructCodec([
    ['n', getInt32Codec()],
    ['d', getInt32Codec()],
  ]);
}

function getSignerKeyCodec(): Codec<WireSignerKey> {
  return getDiscriminatedUnionCodec(
    [
      ['Ed25519', getStructCodec([['ed25519', getFixedOpaqueCodec(32)]])],
      ['PreAuthTx', getStructCodec([['preAuthTx', getFixedOpaqueCodec(32)]])],
      ['HashX', getStructCodec([['hashX', getFixedOpaqueCodec(32)]])],
    ],
    unionConfig()
  );
}

function getSignerCodec(): Codec<WireSigner> {
  return getStructCodec([
    ['key', getSignerKeyCodec()],
    ['weight', getUint32Codec()],
  ]);
}

/**
 * Operation bodies, in discriminant order.
 */
export function getOperationBodyCodec(): Codec<WireOperationBody> {
  const asset = getAssetCodec();
  const accountId = getAccountIdCodec();
  const int64 = getInt64Codec();
  const optionalUint32 = getOptionalCodec(getUint32Codec());

  return getDiscriminatedUnionCodec(
    [
      [
        'CreateAccount',
        getStructCodec([
          ['destination', accountId],
          ['startingBalance', int64],
        ]),
      ],
      [
        'Payment',
        getStructCodec([
          ['destination', accountId],
          ['asset', asset],
          ['amount', int64],
        ]),
      ],
      [
        'PathPayment',
        getStructCodec([
          ['sendAsset', asset],
          ['sendMax', int64],
          ['destination', accountId],
          ['destAsset', asset],
          ['destAmount', int64],
          ['path', getVarArrayCodec(asset, MAX_PATH_LENGTH)],
        ]),
      ],
      [
        'ManageOffer',
        getStructCodec([
          ['selling', asset],
          ['buying', asset],
          ['amount', int64],
          ['price', getPriceCodec()],
          ['offerId', getUint64Codec()],
        ]),
      ],
      [
        'CreatePassiveOffer',
        getStructCodec([
          ['selling', asset],
          ['buying', asset],
          ['amount', int64],
          ['price', getPriceCodec()],
        ]),
      ],
      [
        'SetOptions',
        getStructCodec([
          ['inflationDest', getOptionalCodec(accountId)],
          ['clearFlags', optionalUint32],
          ['setFlags', optionalUint32],
          ['masterWeight', optionalUint32],
          ['lowThreshold', optionalUint32],
          ['medThreshold', optionalUint32],
          ['highThreshold', optionalUint32],
          ['homeDomain', getOptionalCodec(getWireStringCodec(MAX_HOME_DOMAIN_BYTES))],
          ['signer', getOptionalCodec(getSignerCodec())],
        ]),
      ],
      [
        'ChangeTrust',
        getStructCodec([
          ['line', asset],
          ['limit', int64],
        ]),
      ],
      [
        'AllowTrust',
        getStructCodec([
          ['trustor', accountId],
          ['asset', getAllowTrustAssetCodec()],
          ['authorize', getWireBooleanCodec()],
        ]),
      ],
      ['AccountMerge', getStructCodec([['destination', accountId]])],
      ['Inflation', getUnitCodec()],
      [
        'ManageData',
        getStructCodec([
          ['dataName', getWireStringCodec(MAX_DATA_NAME_BYTES)],
          ['dataValue', getOptionalCodec(getVarOpaqueCodec(MAX_DATA_VALUE_BYTES))],
        ]),
      ],
      ['BumpSequence', getStructCodec([['bumpTo', int64]])],
    ],
    unionConfig()
  );
}

export function getOperationCodec(): Codec<WireOperation> {
  return getStructCodec([
    ['sourceAccount', getOptionalCodec(getAccountIdCodec())],
    ['body', getOperationBodyCodec()],
  ]);
}

export function getTransactionCodec(): Codec<WireTransaction> {
  return getStructCodec([
    ['sourceAccount', getAccountIdCodec()],
    ['fee', getUint32Codec()],
    ['seqNum', getInt64Codec()],
    ['timeBounds', getOptionalCodec(getTimeBoundsCodec())],
    ['memo', getMemoCodec()],
    ['operations', getVarArrayCodec(getOperationCodec(), MAX_OPERATIONS)],
    ['ext', getDiscriminatedUnionCodec([['V0', getUnitCodec()]], unionConfig())],
  ]);
}

export function getDecoratedSignatureCodec(): Codec<DecoratedSignature> {
  return getStructCodec([
    ['hint', getFixedOpaqueCodec(4)],
    ['signature', getVarOpaqueCodec(64)],
  ]);
}

export function getEnvelopeCodec(): Codec<WireEnvelope> {
  return getStructCodec([
    ['tx', getTransactionCodec()],
    ['signatures', getVarArrayCodec(getDecoratedSignatureCodec(), MAX_SIGNATURES)],
  ]);
}
