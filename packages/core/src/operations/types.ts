/**
 * The closed set of operations a transaction can carry.
 *
 * @packageDocumentation
 */

import type { AccountMergeOperation } from './account-merge.js';
import type { AllowTrustOperation } from './allow-trust.js';
import type { BumpSequenceOperation } from './bump-sequence.js';
import type { ChangeTrustOperation } from './change-trust.js';
import type { CreateAccountOperation } from './create-account.js';
import type { CreatePassiveOfferOperation } from './create-passive-offer.js';
import type { InflationOperation } from './inflation.js';
import type { ManageDataOperation } from './manage-data.js';
import type { ManageOfferOperation } from './manage-offer.js';
import type { PathPaymentOperation } from './path-payment.js';
import type { PaymentOperation } from './payment.js';
import type { SetOptionsOperation } from './set-options.js';

export type Operation =
  | CreateAccountOperation
  | PaymentOperation
  | PathPaymentOperation
  | ManageOfferOperation
  | CreatePassiveOfferOperation
  | SetOptionsOperation
  | ChangeTrustOperation
  | AllowTrustOperation
  | AccountMergeOperation
  | InflationOperation
  | ManageDataOperation
  | BumpSequenceOperation;

export type OperationType = Operation['type'];

/**
 * Operation variant by tag.
 */
export type OperationMap = { [O in Operation as O['type']]: O };
