import { setTimeout as sleep } from 'node:timers/promises';
import type { QueueStore } from '../../queue/store.js';
import type { Message } from '../../queue/types.js';
import { validateTopic } from '../../queue/topic.js';
import { splitTopicAndBody } from '../input.js';

export interface GetOptions {
  block?: boolean;
  /** Seconds between polls while blocking. */
  poll?: number;
}

export type EditOutcome = 'replaced' | 'not-found' | 'changed';

/**
 * Resolve the topic for a new message. Without an explicit topic, the first
 * line of the text names it and the rest is the body.
 */
export function topicAndBody(
  topic: string | undefined,
  text: string,
): { topic: string; body: string } {
  if (topic !== undefined) {
    return { topic: validateTopic(topic), body: text };
  }
  return splitTopicAndBody(text);
}

export async function runPut(
  store: QueueStore,
  topic: string | undefined,
  edit: (initial: string) => string,
): Promise<string> {
  const explicit = topic !== undefined ? validateTopic(topic) : undefined;
  const resolved = topicAndBody(explicit, edit(''));
  return store.append(resolved.topic, resolved.body);
}

export async function runReadTo(
  store: QueueStore,
  topic: string | undefined,
  text: string,
): Promise<string> {
  const resolved = topicAndBody(topic, text);
  return store.append(resolved.topic, resolved.body);
}

/**
 * Pop the oldest message. With `block`, poll until one arrives.
 */
export async function runGet(
  store: QueueStore,
  topic: string,
  opts: GetOptions = {},
): Promise<Message | null> {
  const t = validateTopic(topic);
  const pollMs = Math.max(1, Math.round((opts.poll ?? 0.2) * 1000));
  for (;;) {
    const message = await store.popFirst(t);
    if (message !== null || !opts.block) return message;
    await sleep(pollMs);
  }
}

export async function runPeek(
  store: QueueStore,
  topic: string,
  uuid?: string,
): Promise<Message | null> {
  const t = validateTopic(topic);
  return uuid ? store.getByUuid(t, uuid) : store.peekFirst(t);
}

export async function runList(
  store: QueueStore,
  topic: string,
): Promise<Message[]> {
  return store.listMessages(validateTopic(topic));
}

export async function runCount(
  store: QueueStore,
  topic: string,
): Promise<number> {
  return store.count(validateTopic(topic));
}

export async function runDelete(
  store: QueueStore,
  topic: string,
  uuid: string,
): Promise<boolean> {
  return store.deleteByUuid(validateTopic(topic), uuid);
}

/**
 * Edit a message in the editor. No lock is held while the editor is open,
 * so the message may be popped or deleted meanwhile; the edit is then
 * discarded and reported as 'changed'.
 */
export async function runEdit(
  store: QueueStore,
  topic: string,
  uuid: string,
  edit: (initial: string) => string,
): Promise<EditOutcome> {
  const t = validateTopic(topic);
  const message = await store.getByUuid(t, uuid);
  if (message === null) return 'not-found';

  const edited = edit(message.content);
  const replaced = await store.replaceByUuid(t, uuid, edited);
  return replaced ? 'replaced' : 'changed';
}

export async function runReplace(
  store: QueueStore,
  topic: string,
  uuid: string,
  text: string,
): Promise<boolean> {
  return store.replaceByUuid(validateTopic(topic), uuid, text);
}
