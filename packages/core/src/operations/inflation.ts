import type { WireOperationBody } from '@txnkit/wire';
import type { BaseOperation } from './shared.js';

export type InflationOperation = BaseOperation<'inflation'>;

export function inflation(params: Omit<InflationOperation, 'type'> = {}): InflationOperation {
  return { type: 'inflation', ...params };
}

export function convertInflation(_op: InflationOperation): WireOperationBody {
  return { __kind: 'Inflation' };
}
