import { z } from 'zod';
import { GitError } from '../git.js';
import {
  ALLOW,
  blockWithMessage,
  extractQputBody,
  type HookContext,
  type HookResult,
} from './common.js';

const promptPayloadSchema = z
  .object({ prompt: z.string().nullish() })
  .passthrough();

function parsePrompt(input: string): string | null {
  let data: unknown;
  try {
    data = JSON.parse(input);
  } catch {
    return null;
  }
  const parsed = promptPayloadSchema.safeParse(data);
  return parsed.success ? (parsed.data.prompt ?? '') : null;
}

/**
 * Prompt-submit hook. A prompt starting with `=qput` is enqueued on the
 * current repository's topic and blocked; anything else passes through.
 */
export async function runPromptHook(
  input: string,
  ctx: HookContext,
): Promise<HookResult> {
  const prompt = parsePrompt(input);
  if (prompt === null) return ALLOW;

  const body = extractQputBody(prompt);
  if (body === null) return ALLOW;

  let topic: string;
  try {
    topic = ctx.deriveTopic();
  } catch (err) {
    if (err instanceof GitError) {
      return blockWithMessage(`qput: ${err.message}`, ctx.useExit2);
    }
    throw err;
  }

  if (!body.trim()) {
    return blockWithMessage(
      "qput: nothing to enqueue. Use '=qput <message>' or '=qput\\n<multi-line message>'.",
      ctx.useExit2,
    );
  }

  try {
    await ctx.store.append(topic, body);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return blockWithMessage(
      `qput: failed to enqueue to '${topic}': ${message}`,
      ctx.useExit2,
    );
  }

  return blockWithMessage(`Queued to '${topic}'.`, ctx.useExit2);
}
