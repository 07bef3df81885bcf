import type { QueueStore } from '../queue/store.js';

export const QPUT_PREFIX = '=qput';

/** What a hook process should print and exit with. */
export interface HookResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface HookContext {
  store: Pick<QueueStore, 'append' | 'popFirst'>;
  /** Throws GitError when the working directory names no topic. */
  deriveTopic: () => string;
  /** Report blocks on stderr with exit code 2 instead of JSON on stdout. */
  useExit2?: boolean;
}

export const ALLOW: HookResult = { exitCode: 0, stdout: '', stderr: '' };

export function blockWithMessage(message: string, useExit2 = false): HookResult {
  if (useExit2) {
    return { exitCode: 2, stdout: '', stderr: `${message}\n` };
  }
  return {
    exitCode: 0,
    stdout: JSON.stringify({
      decision: 'block',
      reason: message,
      suppressOutput: true,
    }),
    stderr: '',
  };
}

/**
 * Body of a `=qput` prompt, or null if the prompt is not one. The prefix
 * must be followed by whitespace or the end of the prompt.
 *
 * Example: extractQputBody('=qput Fix the flaky test') => 'Fix the flaky test'
 */
export function extractQputBody(
  prompt: string,
  prefix: string = QPUT_PREFIX,
): string | null {
  const stripped = prompt.trimStart();
  if (!stripped.startsWith(prefix)) return null;

  const next = stripped.charAt(prefix.length);
  if (next !== '' && !' \t\r\n'.includes(next)) return null;

  const body = stripped.slice(prefix.length);
  if (body.startsWith(' ') || body.startsWith('\t')) return body.slice(1);
  return body.replace(/^[\r\n]+/, '');
}

export function formatDequeueReason(topic: string, content: string): string {
  return (
    `Dequeued a queued task from topic '${topic}'. ` +
    "Treat the following as the user's next prompt and complete it.\n\n" +
    '--- BEGIN QUEUED MESSAGE ---\n' +
    `${content}\n` +
    '--- END QUEUED MESSAGE ---\n'
  );
}
