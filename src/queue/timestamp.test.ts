import { describe, it, expect } from 'vitest';
import { formatUtcTimestamp, utcNow } from './timestamp.js';

describe('formatUtcTimestamp', () => {
  it('formats with second precision and a UTC offset', () => {
    const date = new Date(Date.UTC(2026, 0, 2, 3, 4, 5, 678));
    expect(formatUtcTimestamp(date)).toBe('2026-01-02T03:04:05+00:00');
  });
});

describe('utcNow', () => {
  it('produces the same shape', () => {
    expect(utcNow()).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\+00:00$/);
  });
});
