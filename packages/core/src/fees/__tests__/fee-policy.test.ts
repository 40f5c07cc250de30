/**
 * Tests for the fee policy.
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../errors/index.js';
import { computeFee, DEFAULT_BASE_FEE } from '../fee-policy.js';

describe('computeFee', () => {
  it('should charge the default base fee per operation', () => {
    expect(DEFAULT_BASE_FEE).toBe(100);
    expect(computeFee(1)).toBe(100);
    expect(computeFee(3)).toBe(300);
  });

  it('should use a configured base fee', () => {
    expect(computeFee(2, { baseFee: 250 })).toBe(500);
  });

  it('should preserve an explicit fee', () => {
    expect(computeFee(5, { baseFee: 100 }, 1234)).toBe(1234);
  });

  it('should reject an explicit fee of zero', () => {
    expect(() => computeFee(1, undefined, 0)).toThrow(ValidationError);
  });

  it('should reject a computed fee above 32 bits', () => {
    expect(() => computeFee(100, { baseFee: 0xffff_ffff })).toThrow(ValidationError);
  });
});
