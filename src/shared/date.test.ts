import { describe, it, expect } from 'vitest';
import { isCalendarDate, toCalendarDate } from './date.js';

describe('isCalendarDate', () => {
  it('should accept real calendar dates', () => {
    expect(isCalendarDate('2024-01-31')).toBe(true);
    expect(isCalendarDate('2024-02-29')).toBe(true);
  });

  it('should accept years below 100', () => {
    expect(isCalendarDate('0024-01-01')).toBe(true);
    expect(isCalendarDate('0000-02-29')).toBe(true);
    expect(isCalendarDate('0001-02-29')).toBe(false);
  });

  it('should reject dates that do not exist', () => {
    expect(isCalendarDate('2023-02-29')).toBe(false);
    expect(isCalendarDate('2024-13-01')).toBe(false);
    expect(isCalendarDate('2024-04-31')).toBe(false);
  });

  it('should reject other formats', () => {
    expect(isCalendarDate('2024-1-01')).toBe(false);
    expect(isCalendarDate('2024/01/01')).toBe(false);
    expect(isCalendarDate('2024-01-01T00:00:00Z')).toBe(false);
    expect(isCalendarDate('')).toBe(false);
  });
});

describe('toCalendarDate', () => {
  it('should return the UTC date of the given instant', () => {
    expect(toCalendarDate(new Date('2024-05-06T23:59:59Z'))).toBe('2024-05-06');
  });
});
