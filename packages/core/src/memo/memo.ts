/**
 * Transaction memos.
 *
 * Factories only record the value; size and shape are checked when the memo
 * is converted at build time.
 *
 * @packageDocumentation
 */

import { getBase16Codec } from '@solana/codecs-strings';
import type { ReadonlyUint8Array } from '@solana/codecs';
import { MAX_MEMO_TEXT_BYTES, type WireMemo } from '@txnkit/wire';
import { EncodingError } from '../errors/index.js';

const MAX_UINT64 = 18_446_744_073_709_551_615n;
const HASH_LENGTH = 32;

export type Memo =
  | { readonly type: 'none' }
  | { readonly type: 'text'; readonly value: string }
  | { readonly type: 'id'; readonly value: bigint | number | string }
  | { readonly type: 'hash'; readonly value: ReadonlyUint8Array | string }
  | { readonly type: 'return'; readonly value: ReadonlyUint8Array | string };

export type MemoType = Memo['type'];

export function memoNone(): Memo {
  return { type: 'none' };
}

/**
 * Text memo of at most 28 UTF-8 bytes.
 */
export function memoText(value: string): Memo {
  return { type: 'text', value };
}

/**
 * Unsigned 64-bit id memo.
 */
export function memoId(value: bigint | number | string): Memo {
  return { type: 'id', value };
}

/**
 * 32-byte hash memo, as bytes or hex.
 */
export function memoHash(value: ReadonlyUint8Array | string): Memo {
  return { type: 'hash', value };
}

/**
 * 32-byte hash of the transaction this one refunds, as bytes or hex.
 */
export function memoReturn(value: ReadonlyUint8Array | string): Memo {
  return { type: 'return', value };
}

function toHash(value: ReadonlyUint8Array | string, type: MemoType): ReadonlyUint8Array {
  let bytes: ReadonlyUint8Array;
  if (typeof value === 'string') {
    try {
      bytes = getBase16Codec().encode(value);
    } catch (error) {
      throw new EncodingError(`${type} memo is not valid hex`, { cause: error });
    }
  } else {
    bytes = value;
  }
  if (bytes.length !== HASH_LENGTH) {
    throw new EncodingError(`${type} memo must be ${HASH_LENGTH} bytes, got ${bytes.length}`);
  }
  return Uint8Array.from(bytes);
}

function toUint64(value: bigint | number | string): bigint {
  let id: bigint;
  try {
    id = BigInt(value);
  } catch (error) {
    throw new EncodingError(`id memo is not an integer: ${String(value)}`, { cause: error });
  }
  if (id < 0n || id > MAX_UINT64) {
    throw new EncodingError(`id memo out of range: ${id}`);
  }
  return id;
}

/**
 * Convert a memo to its wire form.
 */
export function memoToWire(memo: Memo): WireMemo {
  switch (memo.type) {
    case 'none':
      return { __kind: 'None' };
    case 'text': {
      const size = new TextEncoder().encode(memo.value).length;
      if (size > MAX_MEMO_TEXT_BYTES) {
        throw new EncodingError(`text memo must be at most ${MAX_MEMO_TEXT_BYTES} bytes, got ${size}`, {
          context: { size },
        });
      }
      return { __kind: 'Text', text: memo.value };
    }
    case 'id':
      return { __kind: 'Id', id: toUint64(memo.value) };
    case 'hash':
      return { __kind: 'Hash', hash: toHash(memo.value, memo.type) };
    case 'return':
      return { __kind: 'Return', retHash: toHash(memo.value, memo.type) };
  }
}
