import { describe, it, expect } from 'vitest';
import { formatJson, formatTsvRow, summarize } from '../format.js';

describe('formatTsvRow', () => {
  it('joins fields with tabs', () => {
    expect(formatTsvRow(['a', 'b c', ''])).toBe('a\tb c\t');
  });
});

describe('formatJson', () => {
  it('pretty-prints with two spaces', () => {
    expect(formatJson({ count: 2 })).toBe('{\n  "count": 2\n}');
  });
});

describe('summarize', () => {
  it('returns a short single line unchanged', () => {
    expect(summarize('Fix the tests')).toBe('Fix the tests');
  });

  it('collapses whitespace in the first line', () => {
    expect(summarize('  Fix   the\ttests  ')).toBe('Fix the tests');
  });

  it('shows (empty) for blank content', () => {
    expect(summarize('')).toBe('(empty)');
    expect(summarize('   ')).toBe('(empty)');
  });

  it('ignores a single trailing newline', () => {
    expect(summarize('one line\n')).toBe('one line');
  });

  it('marks further lines', () => {
    expect(summarize('first\nsecond')).toBe('first …');
  });

  it('truncates long lines with an ellipsis', () => {
    expect(summarize('abcdefghij', 5)).toBe('abcd…');
  });

  it('truncates instead of marking when there is no room', () => {
    expect(summarize('abcd\nmore', 5)).toBe('abcd…');
    expect(summarize('abc\nmore', 5)).toBe('abc …');
  });
});
