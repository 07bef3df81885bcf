import { GitError } from '../git.js';
import {
  ALLOW,
  formatDequeueReason,
  type HookContext,
  type HookResult,
} from './common.js';

/**
 * Stop hook. When the current repository's topic has a queued message,
 * the stop is blocked and the message handed back as the next prompt.
 * Queue errors are reported on stderr and let the session stop.
 */
export async function runStopHook(ctx: HookContext): Promise<HookResult> {
  let topic: string;
  try {
    topic = ctx.deriveTopic();
  } catch (err) {
    if (err instanceof GitError) return ALLOW;
    throw err;
  }

  let content: string;
  try {
    const message = await ctx.store.popFirst(topic);
    if (message === null) return ALLOW;
    content = message.content;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { ...ALLOW, stderr: `q stop hook: ${reason}\n` };
  }

  return {
    exitCode: 0,
    stdout: JSON.stringify({
      decision: 'block',
      reason: formatDequeueReason(topic, content),
    }),
    stderr: '',
  };
}
