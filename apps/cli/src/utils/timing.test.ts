import { describe, expect, test } from 'vitest';

import { formatElapsedSeconds, formatTimestamp } from './timing';

describe('formatTimestamp', () => {
  test('pads every field', () => {
    expect(formatTimestamp(new Date(2024, 0, 5, 7, 3, 9))).toBe('2024-01-05_07-03-09');
  });

  test('keeps two-digit fields', () => {
    expect(formatTimestamp(new Date(2024, 11, 31, 23, 59, 58))).toBe('2024-12-31_23-59-58');
  });
});

describe('formatElapsedSeconds', () => {
  test('formats with two decimals', () => {
    expect(formatElapsedSeconds(1000, 3500)).toBe('2.50');
    expect(formatElapsedSeconds(0, 0)).toBe('0.00');
  });
});
