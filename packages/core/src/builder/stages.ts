/**
 * Pure assembly steps for a transaction body. Each takes a body and returns a
 * new one, so they compose with `pipe`.
 *
 * @packageDocumentation
 */

import type { AccountId, WireOperation, WireTimeBounds, WireTransaction } from '@txnkit/wire';
import { EncodingError, OperationError, isEncodingError } from '../errors/index.js';
import { memoToWire, type Memo } from '../memo/index.js';
import { toWireOperation, type Operation } from '../operations/index.js';
import type { Timebounds } from '../timebounds/index.js';

export function createTransactionBody(sourceAccount: AccountId, seqNum: bigint): WireTransaction {
  return {
    sourceAccount,
    fee: 0,
    seqNum,
    timeBounds: null,
    memo: { __kind: 'None' },
    operations: [],
    ext: { __kind: 'V0' },
  };
}

/**
 * Convert operations in order; the first failure aborts with its position.
 */
export function appendOperations(operations: readonly Operation[], tx: WireTransaction): WireTransaction {
  const converted: WireOperation[] = [];
  operations.forEach((operation, index) => {
    try {
      converted.push(toWireOperation(operation));
    } catch (error) {
      throw new OperationError(index, operation.type, error);
    }
  });
  return { ...tx, operations: [...tx.operations, ...converted] };
}

/**
 * Attach timebounds. `null` leaves the body without them.
 */
export function setBodyTimebounds(timebounds: Timebounds | null, tx: WireTransaction): WireTransaction {
  const timeBounds: WireTimeBounds | null = timebounds ? timebounds.toWire() : null;
  return { ...tx, timeBounds };
}

export function setBodyMemo(memo: Memo | undefined, tx: WireTransaction): WireTransaction {
  if (!memo) return tx;
  try {
    return { ...tx, memo: memoToWire(memo) };
  } catch (error) {
    if (isEncodingError(error)) throw error;
    throw new EncodingError("Couldn't build memo", { cause: error });
  }
}

export function setBodyFee(fee: number, tx: WireTransaction): WireTransaction {
  return { ...tx, fee };
}
