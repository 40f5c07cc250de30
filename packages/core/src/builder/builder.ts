/**
 * Immutable transaction builder with type-safe state tracking.
 *
 * Features:
 * - Compile-time check that a source account and a timebounds decision were supplied
 * - Sequence number taken from the source account at build time
 * - Default fee from a configurable per-operation base fee
 * - Leveled logging of each pipeline stage
 *
 * @example
 * ```ts
 * const built = await new TransactionBuilder({ network: Networks.TESTNET })
 *   .setSourceAccount(account)
 *   .addOperation(payment({ destination, asset: nativeAsset(), amount: '10' }))
 *   .setTimeout(300)
 *   .build();
 *
 * const signed = await built.sign(keypair);
 * const base64 = signed.toBase64();
 * ```
 *
 * @packageDocumentation
 */

import { pipe } from '@solana/functional';
import type { AccountId } from '@txnkit/wire';
import { EncodingError, SequenceError, isEncodingError, isSequenceError } from '../errors/index.js';
import { MAX_INT64 } from '../amounts/index.js';
import type { Account } from '../account/index.js';
import { computeFee, DEFAULT_FEE_POLICY, type FeePolicyConfig } from '../fees/index.js';
import { decodeAddress } from '../keys/index.js';
import { createLogger, type Logger, type LogLevel, type PipelineLogger } from '../logging/index.js';
import type { Memo } from '../memo/index.js';
import { encodeTransaction, type NetworkPassphrase } from '../network/index.js';
import type { Operation } from '../operations/index.js';
import { setTimeout as timeoutTimebounds, type Clock, type Timebounds } from '../timebounds/index.js';
import type { BuilderState, RequiredState } from '../types.js';
import { validateTransaction, type TransactionDraft } from '../validation/index.js';
import { BuiltTransaction } from './built-transaction.js';
import { appendOperations, createTransactionBody, setBodyFee, setBodyMemo, setBodyTimebounds } from './stages.js';

/**
 * Configuration for transaction builder.
 */
export interface TransactionBuilderConfig {
  /**
   * Passphrase of the network the transaction is for.
   */
  network: NetworkPassphrase;

  /**
   * Fee policy applied when no explicit fee is set.
   */
  feePolicy?: FeePolicyConfig;

  /**
   * Logging level.
   */
  logLevel?: LogLevel;

  /**
   * Custom logger function.
   */
  logger?: Logger;

  /**
   * Time source for {@link TransactionBuilder.setTimeout}.
   */
  clock?: Clock;
}

/**
 * Immutable transaction builder with type-safe state tracking.
 */
export class TransactionBuilder<TState extends BuilderState = BuilderState> {
  // Type-only: ties TState to the instance so build() can check it.
  private readonly state: TState | undefined = undefined;
  private sourceAccount?: Account;
  private operations: Operation[] = [];
  private memo?: Memo;
  // null: built without timebounds
  private timebounds?: Timebounds | null;
  private fee?: number;

  private readonly config: Required<Omit<TransactionBuilderConfig, 'logger'>> & { logger?: Logger };
  private readonly log: PipelineLogger;

  constructor(config: TransactionBuilderConfig) {
    this.config = {
      network: config.network,
      feePolicy: config.feePolicy ?? DEFAULT_FEE_POLICY,
      logLevel: config.logLevel ?? 'minimal',
      clock: config.clock ?? Date.now,
      ...(config.logger && { logger: config.logger }),
    };
    this.log = createLogger(this.config.logLevel, this.config.logger);
  }

  /**
   * Set the account the transaction is sent from. Its sequence number is
   * requested when the transaction is built.
   */
  setSourceAccount(account: Account): TransactionBuilder<TState & { sourceAccount: true }> {
    const builder = this.clone();
    builder.sourceAccount = account;
    return builder as TransactionBuilder<TState & { sourceAccount: true }>;
  }

  /**
   * Add a single operation to the transaction.
   */
  addOperation(operation: Operation): TransactionBuilder<TState> {
    const builder = this.clone();
    builder.operations.push(operation);
    return builder;
  }

  /**
   * Add multiple operations to the transaction, keeping their order.
   */
  addOperations(operations: readonly Operation[]): TransactionBuilder<TState> {
    const builder = this.clone();
    builder.operations.push(...operations);
    return builder;
  }

  setMemo(memo: Memo): TransactionBuilder<TState> {
    const builder = this.clone();
    builder.memo = memo;
    return builder;
  }

  /**
   * Set the validity window. Use one of `setTimebounds()`, `setTimeout()` or
   * `setNoTimeout()` to construct it.
   */
  setTimebounds(timebounds: Timebounds): TransactionBuilder<TState & { timebounds: true }> {
    const builder = this.clone();
    builder.timebounds = timebounds;
    return builder as TransactionBuilder<TState & { timebounds: true }>;
  }

  /**
   * Expire the transaction `timeoutSeconds` from now, reading the configured clock once.
   */
  setTimeout(timeoutSeconds: number, minTime = 0): TransactionBuilder<TState & { timebounds: true }> {
    return this.setTimebounds(timeoutTimebounds(minTime, timeoutSeconds, this.config.clock));
  }

  /**
   * Build the transaction without timebounds. It stays valid until its
   * sequence number is used.
   */
  withoutTimebounds(): TransactionBuilder<TState & { timebounds: true }> {
    const builder = this.clone();
    builder.timebounds = null;
    return builder as TransactionBuilder<TState & { timebounds: true }>;
  }

  /**
   * Set an explicit fee in stroops, overriding the fee policy.
   */
  setFee(fee: number): TransactionBuilder<TState> {
    const builder = this.clone();
    builder.fee = fee;
    return builder;
  }

  /**
   * Build the transaction.
   * Only available when the source account and timebounds have been set.
   *
   * Requests the next sequence number from the source account, converts
   * every operation in order, then attaches timebounds, memo and fee.
   * Nothing is kept on the builder, so a failed build can be retried.
   */
  async build(this: TransactionBuilder<RequiredState>): Promise<BuiltTransaction> {
    try {
      return await this.assemble();
    } catch (error) {
      this.log.failure('Build failed', { error });
      throw error;
    }
  }

  private async assemble(): Promise<BuiltTransaction> {
    const draft: TransactionDraft = {
      sourceAccount: this.sourceAccount,
      timebounds: this.timebounds,
      operations: this.operations,
    };
    validateTransaction(draft);
    const { sourceAccount, timebounds, operations } = draft;

    const accountId = this.resolveAccountId(sourceAccount);
    const seqNum = await this.nextSequenceNumber(sourceAccount);
    this.log.stage('Assigned sequence number', { account: sourceAccount.getAccountId(), seqNum });

    const body = pipe(
      createTransactionBody(accountId, seqNum),
      (tx) => appendOperations(operations, tx),
      (tx) => setBodyTimebounds(timebounds, tx),
      (tx) => setBodyMemo(this.memo, tx),
      (tx) => setBodyFee(computeFee(tx.operations.length, this.config.feePolicy, this.fee), tx)
    );
    this.log.stage('Built transaction', { operations: body.operations.length, fee: body.fee });

    return new BuiltTransaction(body, encodeTransaction(body), this.config.network, this.log);
  }

  private resolveAccountId(account: Account): AccountId {
    try {
      return decodeAddress(account.getAccountId());
    } catch (error) {
      if (isEncodingError(error)) throw error;
      throw new EncodingError('Failed to set source account address', { cause: error });
    }
  }

  private async nextSequenceNumber(account: Account): Promise<bigint> {
    let seqNum: bigint;
    try {
      seqNum = await account.incrementSequenceNumber();
    } catch (error) {
      if (isSequenceError(error)) throw error;
      throw new SequenceError('Failed to parse sequence number', account.getAccountId(), { cause: error });
    }
    if (typeof seqNum !== 'bigint' || seqNum < 0n || seqNum > MAX_INT64) {
      throw new SequenceError(`sequence number out of range: ${String(seqNum)}`, account.getAccountId());
    }
    return seqNum;
  }

  /**
   * Clone the builder for immutability.
   */
  private clone(): TransactionBuilder<TState> {
    const builder = new TransactionBuilder<TState>({
      network: this.config.network,
      feePolicy: this.config.feePolicy,
      logLevel: this.config.logLevel,
      clock: this.config.clock,
      ...(this.config.logger && { logger: this.config.logger }),
    });
    if (this.sourceAccount !== undefined) {
      builder.sourceAccount = this.sourceAccount;
    }
    if (this.memo !== undefined) {
      builder.memo = this.memo;
    }
    if (this.timebounds !== undefined) {
      builder.timebounds = this.timebounds;
    }
    if (this.fee !== undefined) {
      builder.fee = this.fee;
    }
    builder.operations = [...this.operations];
    return builder;
  }
}
