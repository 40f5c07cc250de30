/**
 * Pre-build transaction validation.
 *
 * @packageDocumentation
 */

import { MAX_OPERATIONS } from '@txnkit/wire';
import { ConfigError, ValidationError } from '../errors/index.js';
import type { Account } from '../account/index.js';
import type { Operation } from '../operations/index.js';
import type { Timebounds } from '../timebounds/index.js';

/**
 * What a builder has collected when `build()` is called.
 * `timebounds` is `null` when the caller opted out of timebounds.
 */
export interface TransactionDraft {
  sourceAccount?: Account;
  timebounds?: Timebounds | null;
  operations: readonly Operation[];
}

export type ValidatedDraft = TransactionDraft & {
  sourceAccount: Account;
  timebounds: Timebounds | null;
};

/**
 * Validate that a draft has all required fields, valid timebounds and an
 * acceptable number of operations.
 */
export function validateTransaction(draft: TransactionDraft): asserts draft is ValidatedDraft {
  const missing: string[] = [];
  if (!draft.sourceAccount) missing.push('sourceAccount');
  if (draft.timebounds === undefined) missing.push('timebounds');
  if (missing.length > 0) {
    throw new ConfigError(`Transaction is missing required fields: ${missing.join(', ')}`, missing);
  }

  draft.timebounds?.validate();
  validateOperationCount(draft.operations.length);
}

/**
 * Validate operation count does not exceed maximum.
 */
export function validateOperationCount(count: number): void {
  if (count < 1) {
    throw new ValidationError('Transaction must contain at least one operation', { count });
  }
  if (count > MAX_OPERATIONS) {
    throw new ValidationError(`Transaction has ${count} operations, maximum is ${MAX_OPERATIONS}`, {
      count,
      limit: MAX_OPERATIONS,
    });
  }
}
