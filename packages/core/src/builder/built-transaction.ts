/**
 * Built and signed transactions.
 *
 * A {@link BuiltTransaction} is immutable: its wire body is frozen and its
 * canonical bytes are fixed at build time, so every signature covers exactly
 * what is later serialized. Signing never mutates; it returns a new
 * {@link SignedTransaction} with the signatures appended in call order.
 *
 * @packageDocumentation
 */

import type { ReadonlyUint8Array } from '@solana/codecs';
import { MAX_SIGNATURES, type DecoratedSignature, type WireEnvelope, type WireTransaction } from '@txnkit/wire';
import { CryptoError, ValidationError, isCryptoError } from '../errors/index.js';
import type { Signer } from '../keys/index.js';
import { hashTransaction, type NetworkPassphrase } from '../network/index.js';
import { createLogger, type PipelineLogger } from '../logging/index.js';
import {
  encodeEnvelope,
  envelopeToBase64,
  exportEnvelope,
  type ExportFormat,
  type ExportedTransaction,
} from '../envelope/index.js';

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !ArrayBuffer.isView(value) && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function checkSignature(signature: DecoratedSignature): DecoratedSignature {
  if (signature.hint.length !== 4) {
    throw new ValidationError(`signature hint must be 4 bytes, got ${signature.hint.length}`);
  }
  if (signature.signature.length > 64) {
    throw new ValidationError(`signature must be at most 64 bytes, got ${signature.signature.length}`);
  }
  return deepFreeze({ hint: Uint8Array.from(signature.hint), signature: Uint8Array.from(signature.signature) });
}

/**
 * A transaction that has been built and not yet signed.
 */
export class BuiltTransaction {
  /**
   * Frozen wire body.
   */
  readonly tx: Readonly<WireTransaction>;
  private readonly bytes: Uint8Array;

  constructor(
    tx: WireTransaction,
    bytes: ReadonlyUint8Array,
    /**
     * Passphrase of the network the builder was configured for.
     */
    readonly network: NetworkPassphrase,
    private readonly log: PipelineLogger = createLogger('silent')
  ) {
    this.tx = deepFreeze(tx);
    this.bytes = Uint8Array.from(bytes);
  }

  get fee(): number {
    return this.tx.fee;
  }

  get sequenceNumber(): bigint {
    return this.tx.seqNum;
  }

  /**
   * Canonical bytes of the transaction body.
   */
  bodyBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  /**
   * Hash signers commit to. Defaults to the builder's network.
   */
  async hash(network: NetworkPassphrase = this.network): Promise<Uint8Array> {
    try {
      return await hashTransaction(this.bytes, network);
    } catch (error) {
      if (isCryptoError(error)) throw error;
      throw new CryptoError('Failed to hash transaction', { cause: error });
    }
  }

  /**
   * Sign with each signer in order.
   *
   * @example
   * ```ts
   * const signed = await built.sign(keypair0, keypair1);
   * const base64 = signed.toBase64();
   * ```
   */
  async sign(...signers: readonly Signer[]): Promise<SignedTransaction> {
    return new SignedTransaction(this, [], this.log).sign(...signers);
  }

  /**
   * Attach a signature produced elsewhere.
   */
  addSignature(signature: DecoratedSignature): SignedTransaction {
    return new SignedTransaction(this, [], this.log).addSignature(signature);
  }

  /**
   * Envelope with no signatures.
   */
  envelope(): WireEnvelope {
    return { tx: this.tx, signatures: [] };
  }

  toXdr(): Uint8Array {
    return encodeEnvelope(this.envelope());
  }

  toBase64(): string {
    return envelopeToBase64(this.envelope());
  }

  export(format: ExportFormat = 'base64'): ExportedTransaction {
    return exportEnvelope(this.envelope(), format);
  }
}

/**
 * A built transaction together with the signatures collected so far.
 */
export class SignedTransaction {
  readonly signatures: readonly DecoratedSignature[];

  constructor(
    readonly transaction: BuiltTransaction,
    signatures: readonly DecoratedSignature[],
    private readonly log: PipelineLogger = createLogger('silent')
  ) {
    if (signatures.length > MAX_SIGNATURES) {
      throw new ValidationError(`a transaction carries at most ${MAX_SIGNATURES} signatures`, {
        count: signatures.length,
      });
    }
    this.signatures = Object.freeze(signatures.map(checkSignature));
  }

  get tx(): Readonly<WireTransaction> {
    return this.transaction.tx;
  }

  hash(network?: NetworkPassphrase): Promise<Uint8Array> {
    return this.transaction.hash(network);
  }

  /**
   * Sign again; the new signatures follow the existing ones.
   */
  async sign(...signers: readonly Signer[]): Promise<SignedTransaction> {
    const hash = await this.transaction.hash();
    const added: DecoratedSignature[] = [];
    for (const signer of signers) {
      try {
        added.push(await signer.signDecorated(hash));
      } catch (error) {
        this.log.failure('Signing failed', { signer: signer.address, error });
        if (isCryptoError(error)) throw error;
        throw new CryptoError(`Failed to sign transaction with ${signer.address}`, { cause: error });
      }
      this.log.stage('Signed transaction', { signer: signer.address });
    }
    return new SignedTransaction(this.transaction, [...this.signatures, ...added], this.log);
  }

  addSignature(signature: DecoratedSignature): SignedTransaction {
    return new SignedTransaction(this.transaction, [...this.signatures, signature], this.log);
  }

  envelope(): WireEnvelope {
    return { tx: this.transaction.tx, signatures: [...this.signatures] };
  }

  toXdr(): Uint8Array {
    return encodeEnvelope(this.envelope());
  }

  toBase64(): string {
    return envelopeToBase64(this.envelope());
  }

  export(format: ExportFormat = 'base64'): ExportedTransaction {
    return exportEnvelope(this.envelope(), format);
  }
}
