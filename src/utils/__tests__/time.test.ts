import { describe, it, expect } from 'vitest';
import { formatTimestamp, toEpochSeconds } from '../time';

describe('time helpers', () => {
  it('truncates to whole seconds', () => {
    expect(toEpochSeconds(1_700_000_000_999)).toBe(1_700_000_000);
  });

  it('formats in UTC with zero padding', () => {
    expect(formatTimestamp(1_700_000_000_000)).toBe('2023-11-14 22:13:20');
    expect(formatTimestamp(Date.UTC(2024, 0, 5, 3, 4, 5))).toBe('2024-01-05 03:04:05');
  });
});
