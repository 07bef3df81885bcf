import { describe, it, expect } from 'vitest';
import { exitCodeFor, EXIT_NOT_FOUND } from '../errors.js';
import { GitError } from '../../git.js';
import { QueueCorruptError, TopicValidationError } from '../../queue/errors.js';

describe('exitCodeFor', () => {
  it('exits 1 when no topic can be derived from git', () => {
    expect(exitCodeFor(new GitError('not in a git worktree'))).toBe(
      EXIT_NOT_FOUND,
    );
  });

  it('exits 2 for everything else', () => {
    expect(exitCodeFor(new TopicValidationError())).toBe(2);
    expect(exitCodeFor(new QueueCorruptError('t', '/tmp/t.json'))).toBe(2);
    expect(exitCodeFor('boom')).toBe(2);
  });
});
