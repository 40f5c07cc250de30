/**
 * Envelope serialization.
 *
 * @packageDocumentation
 */

import type { ReadonlyUint8Array } from '@solana/codecs';
import { getBase64Codec } from '@solana/codecs-strings';
import { getEnvelopeCodec, type WireEnvelope } from '@txnkit/wire';
import { EncodingError } from '../errors/index.js';

/**
 * Supported transaction export formats.
 * - `base64`: what the network accepts for submission
 * - `bytes`: raw canonical bytes
 */
export type ExportFormat = 'base64' | 'bytes';

/**
 * Exported transaction in various formats.
 */
export type ExportedTransaction =
  | { format: 'base64'; data: string }
  | { format: 'bytes'; data: Uint8Array };

const base64 = getBase64Codec();

/**
 * Canonical binary encoding of an envelope.
 */
export function encodeEnvelope(envelope: WireEnvelope): Uint8Array {
  try {
    return new Uint8Array(getEnvelopeCodec().encode(envelope));
  } catch (error) {
    throw new EncodingError('Failed to marshal envelope', { cause: error });
  }
}

export function envelopeToBase64(envelope: WireEnvelope): string {
  return base64.decode(encodeEnvelope(envelope));
}

/**
 * Decode an envelope from bytes or a base64 string. The whole input must be consumed.
 */
export function decodeEnvelope(input: ReadonlyUint8Array | string): WireEnvelope {
  let bytes: ReadonlyUint8Array;
  if (typeof input === 'string') {
    try {
      bytes = base64.encode(input);
    } catch (error) {
      throw new EncodingError('Envelope is not valid base64', { cause: error });
    }
  } else {
    bytes = input;
  }

  let envelope: WireEnvelope;
  let offset: number;
  try {
    [envelope, offset] = getEnvelopeCodec().read(bytes, 0);
  } catch (error) {
    throw new EncodingError('Failed to unmarshal envelope', { cause: error });
  }
  if (offset !== bytes.length) {
    throw new EncodingError(`Envelope has ${bytes.length - offset} trailing bytes`, {
      context: { length: bytes.length, consumed: offset },
    });
  }
  return envelope;
}

export function exportEnvelope(envelope: WireEnvelope, format: ExportFormat): ExportedTransaction {
  switch (format) {
    case 'base64':
      return { format: 'base64', data: envelopeToBase64(envelope) };
    case 'bytes':
      return { format: 'bytes', data: encodeEnvelope(envelope) };
  }
}
