/**
 * Network identity and transaction hashing.
 *
 * A signature commits to the network it is meant for: the signed payload is
 * `sha256(networkId ‖ envelopeType ‖ body)` where `networkId` is the SHA-256
 * of the network passphrase.
 *
 * @packageDocumentation
 */

import type { ReadonlyUint8Array } from '@solana/codecs';
import { ENVELOPE_TYPE_TX, getTransactionCodec, getUint32Codec, type WireTransaction } from '@txnkit/wire';
import { CryptoError, EncodingError } from '../errors/index.js';

/**
 * Well-known network passphrases.
 */
export const Networks = {
  PUBLIC: 'Public Global Stellar Network ; September 2015',
  TESTNET: 'Test SDF Network ; September 2015',
} as const;

export type NetworkPassphrase = string;

async function sha256(data: ReadonlyUint8Array): Promise<Uint8Array> {
  try {
    return new Uint8Array(await crypto.subtle.digest('SHA-256', new Uint8Array(data)));
  } catch (error) {
    throw new CryptoError('Failed to compute SHA-256 digest', { cause: error });
  }
}

/**
 * Network id: SHA-256 of the passphrase.
 */
export async function networkId(passphrase: NetworkPassphrase): Promise<Uint8Array> {
  return sha256(new TextEncoder().encode(passphrase));
}

/**
 * Canonical bytes of a transaction body.
 */
export function encodeTransaction(tx: WireTransaction): Uint8Array {
  try {
    return new Uint8Array(getTransactionCodec().encode(tx));
  } catch (error) {
    throw new EncodingError('Failed to encode transaction body', { cause: error });
  }
}

/**
 * Bytes a signer commits to for the given body and network.
 */
export async function signaturePayload(
  body: WireTransaction | ReadonlyUint8Array,
  passphrase: NetworkPassphrase
): Promise<Uint8Array> {
  const bodyBytes = 'seqNum' in body ? encodeTransaction(body) : body;
  const id = await networkId(passphrase);
  const tag = getUint32Codec().encode(ENVELOPE_TYPE_TX);

  const payload = new Uint8Array(id.length + tag.length + bodyBytes.length);
  payload.set(id, 0);
  payload.set(tag, id.length);
  payload.set(bodyBytes, id.length + tag.length);
  return payload;
}

/**
 * Hash a transaction for signing on the given network.
 *
 * Accepts either the wire body or its already-encoded canonical bytes.
 */
export async function hashTransaction(
  body: WireTransaction | ReadonlyUint8Array,
  passphrase: NetworkPassphrase
): Promise<Uint8Array> {
  return sha256(await signaturePayload(body, passphrase));
}
