import { GitError } from '../git.js';
import { formatJson } from './format.js';

/** Exit status for a message that was not found or a queue that is empty. */
export const EXIT_NOT_FOUND = 1;

/**
 * Missing git context exits 1 like "nothing to do"; validation, corrupt
 * queue files, editor failures and I/O errors exit 2.
 */
export function exitCodeFor(err: unknown): number {
  return err instanceof GitError ? 1 : 2;
}

export function handleError(err: unknown, prog: string, json?: boolean): never {
  const message = err instanceof Error ? err.message : String(err);
  if (json) {
    console.error(formatJson({ error: message }));
  } else {
    console.error(`${prog}: ${message}`);
  }
  process.exit(exitCodeFor(err));
}
