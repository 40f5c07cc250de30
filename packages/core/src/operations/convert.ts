/**
 * Wire conversion for operations.
 *
 * Each variant has exactly one converter; the table is keyed by the variant
 * tag so a new variant without a converter does not compile.
 *
 * @packageDocumentation
 */

import type { WireOperation, WireOperationBody } from '@txnkit/wire';
import { convertAccountMerge } from './account-merge.js';
import { convertAllowTrust } from './allow-trust.js';
import { convertBumpSequence } from './bump-sequence.js';
import { convertChangeTrust } from './change-trust.js';
import { convertCreateAccount } from './create-account.js';
import { convertCreatePassiveOffer } from './create-passive-offer.js';
import { convertInflation } from './inflation.js';
import { convertManageData } from './manage-data.js';
import { convertManageOffer } from './manage-offer.js';
import { convertPathPayment } from './path-payment.js';
import { convertPayment } from './payment.js';
import { convertSetOptions } from './set-options.js';
import { requireAccountId } from './shared.js';
import type { Operation, OperationMap, OperationType } from './types.js';

type ConverterTable = { [K in OperationType]: (op: OperationMap[K]) => WireOperationBody };

const converters: ConverterTable = {
  createAccount: convertCreateAccount,
  payment: convertPayment,
  pathPayment: convertPathPayment,
  manageOffer: convertManageOffer,
  createPassiveOffer: convertCreatePassiveOffer,
  setOptions: convertSetOptions,
  changeTrust: convertChangeTrust,
  allowTrust: convertAllowTrust,
  accountMerge: convertAccountMerge,
  inflation: convertInflation,
  manageData: convertManageData,
  bumpSequence: convertBumpSequence,
};

function convertBody<K extends OperationType>(type: K, op: OperationMap[K]): WireOperationBody {
  return converters[type](op);
}

/**
 * Validate an operation and convert it to its wire body.
 */
export function toWireBody(op: Operation): WireOperationBody {
  return convertBody(op.type, op);
}

/**
 * Validate an operation and convert it to a wire operation, including its
 * optional source account.
 */
export function toWireOperation(op: Operation): WireOperation {
  const body = toWireBody(op);
  return {
    sourceAccount: op.sourceAccount === undefined ? null : requireAccountId(op.sourceAccount, 'sourceAccount'),
    body,
  };
}
