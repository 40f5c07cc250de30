/**
 * Tests for envelope encoding and decoding.
 */

import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import { EncodingError } from '../../errors/index.js';
import { decodeEnvelope, encodeEnvelope, envelopeToBase64, exportEnvelope } from '../envelope.js';

const envelopes: Record<string, string> = JSON.parse(
  readFileSync(new URL('../../__tests__/fixtures/envelopes.json', import.meta.url), 'utf8')
);

describe('envelope', () => {
  it('should decode a base64 envelope', () => {
    const envelope = decodeEnvelope(envelopes.multipleOperations);

    expect(envelope.tx.fee).toBe(200);
    expect(envelope.tx.seqNum).toBe(9606132444168200n);
    expect(envelope.tx.timeBounds).toBeNull();
    expect(envelope.tx.operations.map((op) => op.body.__kind)).toEqual(['Inflation', 'BumpSequence']);
    expect(envelope.signatures).toHaveLength(1);
  });

  it('should re-encode a decoded envelope to the same bytes', () => {
    for (const [name, base64] of Object.entries(envelopes)) {
      expect(envelopeToBase64(decodeEnvelope(base64)), name).toBe(base64);
    }
  });

  it('should decode raw bytes as well as base64', () => {
    const bytes = encodeEnvelope(decodeEnvelope(envelopes.inflation));

    expect(decodeEnvelope(bytes).tx.seqNum).toBe(3556091187167236n);
  });

  it('should export in both formats', () => {
    const envelope = decodeEnvelope(envelopes.inflation);

    expect(exportEnvelope(envelope, 'base64')).toEqual({ format: 'base64', data: envelopes.inflation });
    expect(exportEnvelope(envelope, 'bytes').data).toEqual(encodeEnvelope(envelope));
  });

  it('should reject truncated input', () => {
    const bytes = encodeEnvelope(decodeEnvelope(envelopes.inflation));

    expect(() => decodeEnvelope(bytes.slice(0, 40))).toThrow(EncodingError);
  });

  it('should reject trailing bytes', () => {
    const bytes = encodeEnvelope(decodeEnvelope(envelopes.inflation));
    const padded = new Uint8Array(bytes.length + 4);
    padded.set(bytes);

    expect(() => decodeEnvelope(padded)).toThrow('trailing bytes');
  });
});
