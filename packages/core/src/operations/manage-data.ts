import type { ReadonlyUint8Array } from '@solana/codecs';
import { MAX_DATA_NAME_BYTES, MAX_DATA_VALUE_BYTES, type WireOperationBody } from '@txnkit/wire';
import { ValidationError } from '../errors/index.js';
import { utf8Length, type BaseOperation } from './shared.js';

/**
 * Sets, modifies or (without a value) deletes a named data entry on the account.
 */
export interface ManageDataOperation extends BaseOperation<'manageData'> {
  readonly name: string;
  readonly value?: string | ReadonlyUint8Array | null;
}

export function manageData(params: Omit<ManageDataOperation, 'type'>): ManageDataOperation {
  return { type: 'manageData', ...params };
}

export function convertManageData(op: ManageDataOperation): WireOperationBody {
  const nameLength = utf8Length(op.name);
  if (nameLength < 1 || nameLength > MAX_DATA_NAME_BYTES) {
    throw new ValidationError(`data name must be 1 to ${MAX_DATA_NAME_BYTES} bytes`, { name: op.name });
  }

  const value =
    typeof op.value === 'string' ? new TextEncoder().encode(op.value) : op.value ? Uint8Array.from(op.value) : null;
  if (value && value.length > MAX_DATA_VALUE_BYTES) {
    throw new ValidationError(`data value must be at most ${MAX_DATA_VALUE_BYTES} bytes`, { length: value.length });
  }

  return { __kind: 'ManageData', dataName: op.name, dataValue: value };
}
