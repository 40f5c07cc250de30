/**
 * Helper functions for common transaction flows.
 *
 * @packageDocumentation
 */

import { PipelineError } from './errors/index.js';
import type { Signer } from './keys/index.js';
import type { TransactionBuilder } from './builder/builder.js';
import type { BuiltTransaction, SignedTransaction } from './builder/built-transaction.js';
import type { RequiredState } from './types.js';

/**
 * Build, sign and base64-encode a transaction in one step.
 * A failure is reported as a {@link PipelineError} naming the stage.
 *
 * @example
 * ```ts
 * const base64 = await buildSignEncode(
 *   new TransactionBuilder({ network: Networks.TESTNET })
 *     .setSourceAccount(account)
 *     .addOperation(inflation())
 *     .setTimebounds(setNoTimeout(0)),
 *   keypair
 * );
 * ```
 */
export async function buildSignEncode(
  builder: TransactionBuilder<RequiredState>,
  ...signers: readonly Signer[]
): Promise<string> {
  let built: BuiltTransaction;
  try {
    built = await builder.build();
  } catch (error) {
    throw new PipelineError('build', error);
  }

  let signed: SignedTransaction;
  try {
    signed = await built.sign(...signers);
  } catch (error) {
    throw new PipelineError('sign', error);
  }

  try {
    return signed.toBase64();
  } catch (error) {
    throw new PipelineError('encode', error);
  }
}
