/**
 * Tests for key encoding and keypairs.
 */

import { describe, it, expect } from 'vitest';
import { getBase16Decoder } from '@solana/codecs-strings';
import { EncodingError } from '../../errors/index.js';
import { decodeAddress, decodeStrKey, encodeAddress, encodeStrKey, isValidAddress } from '../strkey.js';
import { Keypair } from '../keypair.js';

const hex = (bytes: ArrayLike<number>) => getBase16Decoder().decode(Uint8Array.from(bytes));

const SEED = 'SBPQUZ6G4FZNWFHKUWC5BEYWF6R52E3SEP7R3GWYSM2XTKGF5LNTWW4R';
const ADDRESS = 'GDQNY3PBOJOKYZSRMK2S7LHHGWZIUISD4QORETLMXEWXBI7KFZZMKTL3';

describe('strkey', () => {
  it('should decode an address to its public key', () => {
    expect(hex(decodeAddress(ADDRESS))).toBe('e0dc6de1725cac665162b52face735b28a2243e41d124d6cb92d70a3ea2e72c5');
  });

  it('should encode a public key back to the same address', () => {
    expect(encodeAddress(decodeAddress(ADDRESS))).toBe(ADDRESS);
  });

  it('should encode pre-auth-tx and hash-x keys with their prefixes', () => {
    expect(encodeStrKey('preAuthTx', new Uint8Array(32))).toBe(
      'TAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAABLVU'
    );
    expect(encodeStrKey('sha256Hash', new Uint8Array(32).fill(1))).toBe(
      'XAAQCAIBAEAQCAIBAEAQCAIBAEAQCAIBAEAQCAIBAEAQCAIBAEAQDAIP'
    );
  });

  it('should reject a key with a bad checksum', () => {
    const corrupted = ADDRESS.slice(0, -1) + (ADDRESS.endsWith('A') ? 'B' : 'A');
    expect(() => decodeAddress(corrupted)).toThrow(EncodingError);
  });

  it('should reject a seed where an address is expected', () => {
    expect(() => decodeAddress(SEED)).toThrow('unexpected version byte');
  });

  it('should reject keys of the wrong length', () => {
    expect(() => decodeStrKey('ed25519PublicKey', 'GABC')).toThrow(EncodingError);
    expect(isValidAddress('GABC')).toBe(false);
    expect(isValidAddress(ADDRESS)).toBe(true);
  });
});

describe('Keypair', () => {
  it('should derive the address from a secret seed', async () => {
    const keypair = await Keypair.fromSecret(SEED);

    expect(keypair.address).toBe(ADDRESS);
    expect(keypair.secret()).toBe(SEED);
    expect(hex(keypair.hint())).toBe('ea2e72c5');
  });

  it('should produce signatures that verify', async () => {
    const keypair = await Keypair.fromSecret(SEED);
    const data = new TextEncoder().encode('test-message');
    const signature = await keypair.sign(data);

    expect(signature).toHaveLength(64);
    expect(await keypair.verify(data, signature)).toBe(true);
    expect(await keypair.verify(new TextEncoder().encode('other'), signature)).toBe(false);
  });

  it('should decorate signatures with the key hint', async () => {
    const keypair = await Keypair.fromSecret(SEED);
    const decorated = await keypair.signDecorated(new Uint8Array(32));

    expect(hex(decorated.hint)).toBe('ea2e72c5');
    expect(decorated.signature).toHaveLength(64);
  });

  it('should generate distinct random keypairs', async () => {
    const a = await Keypair.random();
    const b = await Keypair.random();

    expect(isValidAddress(a.address)).toBe(true);
    expect(a.address).not.toBe(b.address);
  });

  it('should reject a malformed seed', async () => {
    await expect(Keypair.fromSecret('not-a-seed')).rejects.toThrow(EncodingError);
  });
});
