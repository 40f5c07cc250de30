/**
 * Account address and seed encoding.
 *
 * A key string is base32 over `version byte ‖ 32-byte payload ‖ CRC16-XModem`
 * (checksum little-endian), so every key is exactly 56 characters.
 *
 * @packageDocumentation
 */

import { getBaseXResliceCodec } from '@solana/codecs-strings';
import type { ReadonlyUint8Array } from '@solana/codecs';
import { EncodingError } from '../errors/index.js';

const BASE32_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ234567';
const base32 = getBaseXResliceCodec(BASE32_ALPHABET, 5);

const PAYLOAD_LENGTH = 32;
const ENCODED_LENGTH = 56;

/**
 * Version bytes for each key kind. The high five bits select the leading character.
 */
export const VERSION_BYTES = {
  ed25519PublicKey: 6 << 3, // G
  ed25519SecretSeed: 18 << 3, // S
  preAuthTx: 19 << 3, // T
  sha256Hash: 23 << 3, // X
} as const;

export type StrKeyType = keyof typeof VERSION_BYTES;

function crc16Xmodem(bytes: ArrayLike<number>): number {
  let crc = 0;
  for (let i = 0; i < bytes.length; i++) {
    crc ^= bytes[i] << 8;
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 0x8000 ? ((crc << 1) ^ 0x1021) & 0xffff : (crc << 1) & 0xffff;
    }
  }
  return crc;
}

/**
 * Encode a 32-byte payload as a key string of the given type.
 */
export function encodeStrKey(type: StrKeyType, payload: ReadonlyUint8Array): string {
  if (payload.length !== PAYLOAD_LENGTH) {
    throw new EncodingError(`Invalid ${type} payload: expected ${PAYLOAD_LENGTH} bytes, got ${payload.length}`);
  }
  const versioned = new Uint8Array(1 + PAYLOAD_LENGTH + 2);
  versioned[0] = VERSION_BYTES[type];
  versioned.set(payload, 1);
  const checksum = crc16Xmodem(versioned.subarray(0, 1 + PAYLOAD_LENGTH));
  versioned[1 + PAYLOAD_LENGTH] = checksum & 0xff;
  versioned[2 + PAYLOAD_LENGTH] = checksum >> 8;
  return base32.decode(versioned);
}

/**
 * Decode a key string, checking its type, length and checksum.
 */
export function decodeStrKey(type: StrKeyType, value: string): Uint8Array {
  if (typeof value !== 'string' || value.length !== ENCODED_LENGTH) {
    throw new EncodingError(`Invalid ${type} key: expected ${ENCODED_LENGTH} characters`, {
      context: { value },
    });
  }

  let raw: ReadonlyUint8Array;
  try {
    raw = base32.encode(value);
  } catch (error) {
    throw new EncodingError(`Invalid ${type} key: not base32`, { cause: error, context: { value } });
  }

  if (raw[0] !== VERSION_BYTES[type]) {
    throw new EncodingError(`Invalid ${type} key: unexpected version byte`, { context: { value } });
  }

  const body = raw.slice(0, 1 + PAYLOAD_LENGTH);
  const expected = crc16Xmodem(body);
  const actual = raw[1 + PAYLOAD_LENGTH] | (raw[2 + PAYLOAD_LENGTH] << 8);
  if (expected !== actual) {
    throw new EncodingError(`Invalid ${type} key: checksum mismatch`, { context: { value } });
  }

  return body.slice(1);
}

/**
 * Check whether a string is a well-formed key of the given type.
 */
export function isValidStrKey(type: StrKeyType, value: unknown): value is string {
  if (typeof value !== 'string') return false;
  try {
    decodeStrKey(type, value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Decode an account address (`G…`) to its 32-byte public key.
 */
export function decodeAddress(address: string): Uint8Array {
  return decodeStrKey('ed25519PublicKey', address);
}

/**
 * Encode a 32-byte public key as an account address.
 */
export function encodeAddress(publicKey: ReadonlyUint8Array): string {
  return encodeStrKey('ed25519PublicKey', publicKey);
}

/**
 * Check if a value is a valid account address.
 */
export function isValidAddress(value: unknown): value is string {
  return isValidStrKey('ed25519PublicKey', value);
}
