/**
 * Ed25519 keypairs backed by WebCrypto through @solana/keys.
 *
 * @packageDocumentation
 */

import { createKeyPairFromPrivateKeyBytes, signBytes } from '@solana/keys';
import type { ReadonlyUint8Array } from '@solana/codecs';
import type { DecoratedSignature } from '@txnkit/wire';
import { CryptoError, EncodingError } from '../errors/index.js';
import { decodeStrKey, encodeAddress, encodeStrKey } from './strkey.js';

/**
 * Anything able to produce a decorated signature over a transaction hash.
 */
export interface Signer {
  /**
   * Account address of the signing key.
   */
  readonly address: string;
  signDecorated(data: ReadonlyUint8Array): Promise<DecoratedSignature>;
}

/**
 * A full keypair: public key, address and the private key needed to sign.
 *
 * @example
 * ```ts
 * const keypair = await Keypair.fromSecret('S...');
 * const signed = await built.sign(keypair);
 * ```
 */
export class Keypair implements Signer {
  private constructor(
    public readonly address: string,
    public readonly publicKey: Uint8Array,
    private readonly seed: Uint8Array,
    private readonly keys: CryptoKeyPair
  ) {}

  /**
   * Create a keypair from a secret seed string (`S…`).
   */
  static async fromSecret(secret: string): Promise<Keypair> {
    return Keypair.fromRawSeed(decodeStrKey('ed25519SecretSeed', secret));
  }

  /**
   * Create a keypair from a raw 32-byte seed.
   */
  static async fromRawSeed(seed: ReadonlyUint8Array): Promise<Keypair> {
    if (seed.length !== 32) {
      throw new EncodingError(`Invalid seed: expected 32 bytes, got ${seed.length}`);
    }
    let keys: CryptoKeyPair;
    let publicKey: Uint8Array;
    try {
      keys = await createKeyPairFromPrivateKeyBytes(seed);
      publicKey = new Uint8Array(await crypto.subtle.exportKey('raw', keys.publicKey));
    } catch (error) {
      throw new CryptoError('Failed to import ed25519 seed', { cause: error });
    }
    return new Keypair(encodeAddress(publicKey), publicKey, Uint8Array.from(seed), keys);
  }

  /**
   * Generate a new random keypair.
   */
  static async random(): Promise<Keypair> {
    return Keypair.fromRawSeed(crypto.getRandomValues(new Uint8Array(32)));
  }

  /**
   * The secret seed string (`S…`) of this keypair.
   */
  secret(): string {
    return encodeStrKey('ed25519SecretSeed', this.seed);
  }

  /**
   * Last four bytes of the public key, used to match signatures to signers.
   */
  hint(): Uint8Array {
    return this.publicKey.slice(-4);
  }

  async sign(data: ReadonlyUint8Array): Promise<Uint8Array> {
    try {
      return new Uint8Array(await signBytes(this.keys.privateKey, data));
    } catch (error) {
      throw new CryptoError('Failed to sign data', { cause: error });
    }
  }

  async signDecorated(data: ReadonlyUint8Array): Promise<DecoratedSignature> {
    return { hint: this.hint(), signature: await this.sign(data) };
  }

  async verify(data: ReadonlyUint8Array, signature: ReadonlyUint8Array): Promise<boolean> {
    if (signature.length !== 64) return false;
    return crypto.subtle.verify('Ed25519', this.keys.publicKey, new Uint8Array(signature), new Uint8Array(data));
  }
}
