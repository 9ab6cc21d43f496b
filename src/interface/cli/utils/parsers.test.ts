import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseCrc, parseNonNegativeInt, parsePositiveInt } from './parsers.js';

describe('parseCrc', () => {
  it('should accept decimal and hex checksums', () => {
    expect(parseCrc('111')).toBe(111);
    expect(parseCrc('0xDEADBEEF')).toBe(0xdeadbeef);
    expect(parseCrc('4294967295')).toBe(4294967295);
  });

  it('should reject values that do not fit in 32 bits', () => {
    expect(() => parseCrc('4294967296')).toThrow('Must fit in 32 bits.');
    expect(() => parseCrc('0x123456789')).toThrow(InvalidArgumentError);
  });

  it('should reject other text', () => {
    expect(() => parseCrc('-1')).toThrow('Must be a decimal or 0x-prefixed hex checksum.');
    expect(() => parseCrc('abc')).toThrow(InvalidArgumentError);
  });
});

describe('parsePositiveInt', () => {
  it('should accept positive integers only', () => {
    expect(parsePositiveInt('3')).toBe(3);
    expect(() => parsePositiveInt('0')).toThrow('Must be a positive integer.');
    expect(() => parsePositiveInt('1.5')).toThrow(InvalidArgumentError);
  });
});

describe('parseNonNegativeInt', () => {
  it('should accept zero', () => {
    expect(parseNonNegativeInt('0')).toBe(0);
    expect(() => parseNonNegativeInt('-2')).toThrow('Must be a non-negative integer.');
  });
});
