/**
 * Tests for the envelope codecs.
 */

import { describe, it, expect } from 'vitest';
import { getBase16Decoder, getBase64Decoder, getBase64Encoder } from '@solana/codecs-strings';
import {
  getAccountIdCodec,
  getEnvelopeCodec,
  getMemoCodec,
  getOperationBodyCodec,
  getTimeBoundsCodec,
} from '../codecs.js';
import { getVarOpaqueCodec, getWireStringCodec, WireCodecError } from '../primitives.js';

const hex = (bytes: ArrayLike<number>) => getBase16Decoder().decode(Uint8Array.from(bytes));

// Inflation operation from account GDQNY3PB…KTL3 at sequence 3556091187167236, signed on the test network.
const INFLATION_ENVELOPE =
  'AAAAAODcbeFyXKxmUWK1L6znNbKKIkPkHRJNbLktcKPqLnLFAAAAZAAMoj8AAAAEAAAAAQAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAQAAAAAAAAAJAAAAAAAAAAHqLnLFAAAAQP3NHWXvzKIHB3+jjhHITdc/tBPntWYj3SoTjpON+dxjKqU5ohFamSHeqi5ONXkhE9Uajr5sVZXjQfUcTTzsWAA=';

describe('primitives', () => {
  it('should pad variable opaque data to a 4-byte boundary', () => {
    const bytes = getVarOpaqueCodec(64).encode(new TextEncoder().encode('Apple'));

    expect(hex(bytes)).toBe('000000054170706c65000000');
  });

  it('should not pad data that is already aligned', () => {
    const bytes = getVarOpaqueCodec(64).encode(new TextEncoder().encode('Fruit preference'));

    expect(hex(bytes)).toBe('00000010467275697420707265666572656e6365');
  });

  it('should reject opaque data over the maximum length', () => {
    expect(() => getVarOpaqueCodec(4).encode(new Uint8Array(5))).toThrow(WireCodecError);
  });

  it('should decode a padded string back to its value', () => {
    const codec = getWireStringCodec(28);

    expect(codec.decode(codec.encode('Twas brillig'))).toBe('Twas brillig');
  });
});

describe('getAccountIdCodec', () => {
  it('should prefix the key with the ed25519 key type', () => {
    const key = new Uint8Array(32).fill(0xab);
    const bytes = getAccountIdCodec().encode(key);

    expect(bytes.length).toBe(36);
    expect(hex(bytes.slice(0, 8))).toBe('00000000abababab');
  });
});

describe('getTimeBoundsCodec', () => {
  it('should encode both bounds as big-endian uint64', () => {
    const bytes = getTimeBoundsCodec().encode({ minTime: 1n, maxTime: 300n });

    expect(hex(bytes)).toBe('0000000000000001000000000000012c');
  });
});

describe('getMemoCodec', () => {
  it('should encode a text memo with its discriminant', () => {
    const bytes = getMemoCodec().encode({ __kind: 'Text', text: 'Twas brillig' });

    expect(hex(bytes)).toBe('000000010000000c54776173206272696c6c6967');
  });

  it('should encode an id memo', () => {
    const bytes = getMemoCodec().encode({ __kind: 'Id', id: 314159n });

    expect(hex(bytes)).toBe('00000002000000000004cb2f');
  });

  it('should encode the empty memo as a bare discriminant', () => {
    expect(hex(getMemoCodec().encode({ __kind: 'None' }))).toBe('00000000');
  });
});

describe('getOperationBodyCodec', () => {
  it('should encode bump sequence with discriminant 11', () => {
    const bytes = getOperationBodyCodec().encode({ __kind: 'BumpSequence', bumpTo: 9606132444168300n });

    expect(hex(bytes)).toBe('0000000b002220ba0000006c');
  });

  it('should encode a removed data entry with an absent value', () => {
    const bytes = getOperationBodyCodec().encode({
      __kind: 'ManageData',
      dataName: 'Fruit preference',
      dataValue: null,
    });

    expect(hex(bytes)).toBe('0000000a00000010467275697420707265666572656e636500000000');
  });

  it('should encode allow-trust with the code-only asset', () => {
    const bytes = getOperationBodyCodec().encode({
      __kind: 'AllowTrust',
      trustor: new Uint8Array(32),
      asset: { __kind: 'CreditAlphanum4', assetCode: new TextEncoder().encode('ABCD') },
      authorize: true,
    });

    expect(hex(bytes.slice(0, 8))).toBe('0000000700000000');
    expect(hex(bytes.slice(40))).toBe('000000014142434400000001');
  });
});

describe('getEnvelopeCodec', () => {
  it('should decode a signed envelope', () => {
    const envelope = getEnvelopeCodec().decode(getBase64Encoder().encode(INFLATION_ENVELOPE));

    expect(envelope.tx.fee).toBe(100);
    expect(envelope.tx.seqNum).toBe(3556091187167236n);
    expect(envelope.tx.timeBounds).toEqual({ minTime: 0n, maxTime: 0n });
    expect(envelope.tx.memo).toEqual({ __kind: 'None' });
    expect(envelope.tx.operations).toHaveLength(1);
    expect(envelope.tx.operations[0].sourceAccount).toBeNull();
    expect(envelope.tx.operations[0].body).toEqual({ __kind: 'Inflation' });
    expect(envelope.signatures).toHaveLength(1);
    expect(hex(envelope.signatures[0].hint)).toBe('ea2e72c5');
    expect(envelope.signatures[0].signature).toHaveLength(64);
  });

  it('should re-encode a decoded envelope to identical bytes', () => {
    const codec = getEnvelopeCodec();
    const envelope = codec.decode(getBase64Encoder().encode(INFLATION_ENVELOPE));

    expect(getBase64Decoder().decode(codec.encode(envelope))).toBe(INFLATION_ENVELOPE);
  });
});
