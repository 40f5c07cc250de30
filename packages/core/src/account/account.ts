/**
 * Source accounts.
 *
 * @packageDocumentation
 */

import { SequenceError } from '../errors/index.js';
import { MAX_INT64 } from '../amounts/index.js';

/**
 * The parts of an account needed to build a transaction.
 *
 * `incrementSequenceNumber` advances the account's own state and returns the
 * sequence number the next transaction must carry.
 */
export interface Account {
  getAccountId(): string;
  incrementSequenceNumber(): bigint | Promise<bigint>;
}

/**
 * In-memory account holding an address and its current sequence number.
 *
 * @example
 * ```ts
 * const account = new SimpleAccount('G...', '9605939170639897');
 * await builder.setSourceAccount(account).build(); // carries 9605939170639898
 * ```
 */
export class SimpleAccount implements Account {
  private sequence: bigint;

  constructor(
    private readonly accountId: string,
    sequence: bigint | string
  ) {
    this.sequence = parseSequence(sequence, accountId);
  }

  getAccountId(): string {
    return this.accountId;
  }

  /**
   * Current sequence number, as last used.
   */
  sequenceNumber(): bigint {
    return this.sequence;
  }

  incrementSequenceNumber(): bigint {
    if (this.sequence >= MAX_INT64) {
      throw new SequenceError('sequence number overflow', this.accountId);
    }
    this.sequence += 1n;
    return this.sequence;
  }
}

function parseSequence(sequence: bigint | string, accountId: string): bigint {
  if (typeof sequence === 'bigint') {
    if (sequence < 0n || sequence > MAX_INT64) {
      throw new SequenceError(`sequence number out of range: ${sequence}`, accountId);
    }
    return sequence;
  }
  if (!/^\d+$/.test(sequence)) {
    throw new SequenceError(`Failed to parse sequence number: ${sequence}`, accountId);
  }
  return parseSequence(BigInt(sequence), accountId);
}
