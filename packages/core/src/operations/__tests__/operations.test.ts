/**
 * Tests for operation validation and wire conversion.
 */

import { describe, it, expect } from 'vitest';
import { getBase16Decoder } from '@solana/codecs-strings';
import { EncodingError, ValidationError } from '../../errors/index.js';
import { creditAsset, nativeAsset } from '../../assets/index.js';
import {
  allowTrust,
  changeTrust,
  createAccount,
  deleteOffer,
  inflation,
  manageData,
  pathPayment,
  payment,
  setOptions,
  toWireBody,
  toWireOperation,
  bumpSequence,
} from '../index.js';

const hex = (bytes: ArrayLike<number>) => getBase16Decoder().decode(Uint8Array.from(bytes));

const ADDRESS_0 = 'GDQNY3PBOJOKYZSRMK2S7LHHGWZIUISD4QORETLMXEWXBI7KFZZMKTL3';
const ADDRESS_1 = 'GAS4V4O2B7DW5T7IQRPEEVCRXMDZESKISR7DVIGKZQYYV3OSQ5SH5LVP';

describe('payment', () => {
  it('should convert a native payment', () => {
    const body = toWireBody(payment({ destination: ADDRESS_1, asset: nativeAsset(), amount: '10' }));

    expect(body).toEqual({
      __kind: 'Payment',
      destination: expect.any(Uint8Array),
      asset: { __kind: 'Native' },
      amount: 100_000_000n,
    });
  });

  it('should fail when no asset is specified', () => {
    const op = payment({ destination: ADDRESS_1, amount: '10' });

    expect(() => toWireBody(op)).toThrow(ValidationError);
    expect(() => toWireBody(op)).toThrow('asset required');
  });

  it('should reject a malformed destination', () => {
    expect(() => toWireBody(payment({ destination: 'GBAD', asset: nativeAsset(), amount: '1' }))).toThrow(
      EncodingError
    );
  });
});

describe('allowTrust', () => {
  it('should carry only the padded asset code', () => {
    const body = toWireBody(allowTrust({ trustor: ADDRESS_1, asset: creditAsset('ABCD', ADDRESS_1), authorize: true }));

    expect(body.__kind).toBe('AllowTrust');
    if (body.__kind !== 'AllowTrust') return;
    expect(body.asset.__kind).toBe('CreditAlphanum4');
    expect(body.asset.__kind !== 'Native' && hex(body.asset.assetCode)).toBe('41424344');
    expect(body.authorize).toBe(true);
  });

  it('should use the twelve-character form for longer codes', () => {
    const body = toWireBody(allowTrust({ trustor: ADDRESS_1, asset: creditAsset('ABCDE', ADDRESS_1), authorize: false }));

    expect(body.__kind === 'AllowTrust' && body.asset.__kind).toBe('CreditAlphanum12');
  });

  it('should fail for a native asset', () => {
    expect(() => toWireBody(allowTrust({ trustor: ADDRESS_1, asset: nativeAsset(), authorize: true }))).toThrow(
      ValidationError
    );
  });

  it('should fail for a malformed trustor before looking at the asset', () => {
    expect(() => toWireBody(allowTrust({ trustor: 'nope', asset: nativeAsset(), authorize: true }))).toThrow(
      EncodingError
    );
  });
});

describe('changeTrust', () => {
  it('should default the limit to the maximum amount', () => {
    const body = toWireBody(changeTrust({ line: creditAsset('ABCD', ADDRESS_1) }));

    expect(body.__kind === 'ChangeTrust' && body.limit).toBe(9_223_372_036_854_775_807n);
  });

  it('should reject the native asset', () => {
    expect(() => toWireBody(changeTrust({ line: nativeAsset(), limit: '10' }))).toThrow(ValidationError);
  });
});

describe('setOptions', () => {
  it('should combine flags', () => {
    const body = toWireBody(setOptions({ setFlags: [1, 4] }));

    expect(body.__kind === 'SetOptions' && body.setFlags).toBe(5);
  });

  it('should leave absent fields null', () => {
    const body = toWireBody(setOptions({ masterWeight: 10 }));

    expect(body).toEqual({
      __kind: 'SetOptions',
      inflationDest: null,
      clearFlags: null,
      setFlags: null,
      masterWeight: 10,
      lowThreshold: null,
      medThreshold: null,
      highThreshold: null,
      homeDomain: null,
      signer: null,
    });
  });

  it('should reject a home domain over 32 bytes', () => {
    expect(() => toWireBody(setOptions({ homeDomain: 'LovelyLumensLookLuminousLately.com' }))).toThrow(
      ValidationError
    );
  });

  it('should reject weights outside a byte', () => {
    expect(() => toWireBody(setOptions({ highThreshold: 256 }))).toThrow(ValidationError);
  });

  it('should accept pre-auth-tx and hash-x signers', () => {
    const preAuth = toWireBody(
      setOptions({ signer: { key: 'TAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAABLVU', weight: 1 } })
    );
    const hashX = toWireBody(
      setOptions({ signer: { key: 'XAAQCAIBAEAQCAIBAEAQCAIBAEAQCAIBAEAQCAIBAEAQCAIBAEAQDAIP', weight: 1 } })
    );

    expect(preAuth.__kind === 'SetOptions' && preAuth.signer?.key.__kind).toBe('PreAuthTx');
    expect(hashX.__kind === 'SetOptions' && hashX.signer?.key.__kind).toBe('HashX');
  });
});

describe('manageData', () => {
  it('should reject an empty name', () => {
    expect(() => toWireBody(manageData({ name: '' }))).toThrow(ValidationError);
  });

  it('should reject a value over 64 bytes', () => {
    expect(() => toWireBody(manageData({ name: 'key', value: 'x'.repeat(65) }))).toThrow(ValidationError);
  });

  it('should encode a missing value as null', () => {
    expect(toWireBody(manageData({ name: 'key' }))).toEqual({ __kind: 'ManageData', dataName: 'key', dataValue: null });
  });
});

describe('pathPayment', () => {
  it('should reject more than five path assets', () => {
    const path = Array.from({ length: 6 }, () => creditAsset('ABCD', ADDRESS_0));
    const op = pathPayment({
      sendAsset: nativeAsset(),
      sendMax: '10',
      destination: ADDRESS_1,
      destAsset: nativeAsset(),
      destAmount: '1',
      path,
    });

    expect(() => toWireBody(op)).toThrow(ValidationError);
  });
});

describe('other variants', () => {
  it('should convert inflation without fields', () => {
    expect(toWireBody(inflation())).toEqual({ __kind: 'Inflation' });
  });

  it('should reject a negative bump target', () => {
    expect(() => toWireBody(bumpSequence({ bumpTo: -1 }))).toThrow(ValidationError);
  });

  it('should delete offers with a zero amount', () => {
    const body = toWireBody(deleteOffer(7));

    expect(body.__kind === 'ManageOffer' && [body.amount, body.offerId]).toEqual([0n, 7n]);
  });

  it('should delete offers selling native for the placeholder credit asset', () => {
    const body = toWireBody(deleteOffer(2921622));

    expect(body.__kind === 'ManageOffer' && body.selling.__kind).toBe('Native');
    expect(body.__kind === 'ManageOffer' && body.buying.__kind).toBe('CreditAlphanum4');
    expect(body.__kind === 'ManageOffer' && body.price).toEqual({ n: 1, d: 1 });
  });

  it('should reject a starting balance with too many decimals', () => {
    expect(() => toWireBody(createAccount({ destination: ADDRESS_1, startingBalance: '1.00000001' }))).toThrow(
      ValidationError
    );
  });
});

describe('toWireOperation', () => {
  it('should leave the source account null by default', () => {
    expect(toWireOperation(inflation()).sourceAccount).toBeNull();
  });

  it('should resolve an operation-level source account', () => {
    const op = toWireOperation(inflation({ sourceAccount: ADDRESS_0 }));

    expect(op.sourceAccount && hex(op.sourceAccount)).toBe(
      'e0dc6de1725cac665162b52face735b28a2243e41d124d6cb92d70a3ea2e72c5'
    );
  });
});
