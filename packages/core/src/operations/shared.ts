/**
 * Field checks shared by operation converters.
 */

import type { AccountId } from '@txnkit/wire';
import { EncodingError, ValidationError } from '../errors/index.js';
import { decodeAddress } from '../keys/index.js';
import { MAX_INT64 } from '../amounts/index.js';

export interface BaseOperation<TType extends string> {
  readonly type: TType;
  /**
   * Account the operation acts on, when it differs from the transaction source.
   */
  readonly sourceAccount?: string;
}

export function requireAccountId(address: string, field: string): AccountId {
  try {
    return decodeAddress(address);
  } catch (error) {
    throw new EncodingError(`Failed to set ${field} address`, { cause: error, context: { [field]: address } });
  }
}

export function requireByte(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new ValidationError(`${field} must be an integer between 0 and 255`, { [field]: value });
  }
  return value;
}

export function requireInt64(value: bigint | number | string, field: string): bigint {
  let parsed: bigint;
  try {
    parsed = BigInt(value);
  } catch {
    throw new ValidationError(`${field} must be an integer`, { [field]: String(value) });
  }
  if (parsed < 0n || parsed > MAX_INT64) {
    throw new ValidationError(`${field} must be between 0 and ${MAX_INT64}`, { [field]: String(value) });
  }
  return parsed;
}

export function utf8Length(value: string): number {
  return new TextEncoder().encode(value).length;
}
