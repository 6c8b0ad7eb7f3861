import { describe, it, expect } from 'vitest';
import { add } from '../../../src/arith/add.js';

describe('add', () => {
  it('should add small integers', () => {
    expect(add(2, 3)).toBe(5);
    expect(add(-5, 10)).toBe(5);
    expect(add(0, 0)).toBe(0);
  });

  it('should wrap past the int32 maximum', () => {
    expect(add(2147483647, 1)).toBe(-2147483648);
  });

  it('should wrap past the int32 minimum', () => {
    expect(add(-2147483648, -1)).toBe(2147483647);
  });

  it('should keep the extremes when they cancel out', () => {
    expect(add(2147483647, -2147483648)).toBe(-1);
  });
});
