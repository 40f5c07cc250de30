/**
 * Transaction fee policy.
 *
 * @packageDocumentation
 */

import { ValidationError } from '../errors/index.js';

/**
 * Default fee per operation, in stroops.
 */
export const DEFAULT_BASE_FEE = 100;

const MAX_UINT32 = 0xffff_ffff;

export interface FeePolicyConfig {
  /**
   * Fee charged per operation, in stroops.
   */
  baseFee: number;
}

export const DEFAULT_FEE_POLICY: FeePolicyConfig = { baseFee: DEFAULT_BASE_FEE };

function isUint32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_UINT32;
}

/**
 * Check an explicit fee before it is stored on a builder.
 */
export function validateExplicitFee(fee: number): number {
  if (!isUint32(fee) || fee === 0) {
    throw new ValidationError(`fee must be a positive 32-bit integer, got ${fee}`, { fee });
  }
  return fee;
}

/**
 * Resolve the fee for a transaction: the explicit fee if one was set,
 * otherwise `baseFee * operationCount`.
 *
 * @example
 * ```ts
 * computeFee(3);                    // 300
 * computeFee(3, { baseFee: 200 });  // 600
 * computeFee(3, undefined, 1000);   // 1000
 * ```
 */
export function computeFee(
  operationCount: number,
  policy: FeePolicyConfig = DEFAULT_FEE_POLICY,
  explicitFee?: number
): number {
  if (explicitFee !== undefined) {
    return validateExplicitFee(explicitFee);
  }
  if (!isUint32(policy.baseFee)) {
    throw new ValidationError(`baseFee must be a 32-bit unsigned integer, got ${policy.baseFee}`, {
      baseFee: policy.baseFee,
    });
  }
  const fee = policy.baseFee * operationCount;
  if (fee > MAX_UINT32) {
    throw new ValidationError(`fee ${fee} exceeds the 32-bit maximum`, { fee, operationCount });
  }
  return fee;
}
