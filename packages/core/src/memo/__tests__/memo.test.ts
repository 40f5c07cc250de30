/**
 * Tests for memo conversion.
 */

import { describe, it, expect } from 'vitest';
import { EncodingError } from '../../errors/index.js';
import { memoHash, memoId, memoNone, memoReturn, memoText, memoToWire } from '../memo.js';

describe('memoToWire', () => {
  it('should convert an empty memo', () => {
    expect(memoToWire(memoNone())).toEqual({ __kind: 'None' });
  });

  it('should accept text up to 28 bytes', () => {
    expect(memoToWire(memoText('a'.repeat(28)))).toEqual({ __kind: 'Text', text: 'a'.repeat(28) });
  });

  it('should count text length in UTF-8 bytes', () => {
    // 10 three-byte characters
    expect(() => memoToWire(memoText('€'.repeat(10)))).toThrow(EncodingError);
  });

  it('should accept ids as numbers, strings or bigints', () => {
    expect(memoToWire(memoId(314159))).toEqual({ __kind: 'Id', id: 314159n });
    expect(memoToWire(memoId('18446744073709551615'))).toEqual({ __kind: 'Id', id: 18_446_744_073_709_551_615n });
  });

  it('should reject ids outside uint64', () => {
    expect(() => memoToWire(memoId(-1))).toThrow(EncodingError);
    expect(() => memoToWire(memoId('18446744073709551616'))).toThrow(EncodingError);
  });

  it('should accept hashes as hex', () => {
    const wire = memoToWire(memoHash('01'.padEnd(64, '0')));

    expect(wire.__kind === 'Hash' && Array.from(wire.hash.slice(0, 2))).toEqual([1, 0]);
  });

  it('should reject hashes that are not 32 bytes', () => {
    expect(() => memoToWire(memoHash(new Uint8Array(31)))).toThrow(EncodingError);
    expect(() => memoToWire(memoReturn('abcd'))).toThrow(EncodingError);
  });
});
