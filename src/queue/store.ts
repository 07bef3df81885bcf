import crypto from 'node:crypto';
import { loadUnlocked, saveUnlocked, toMessage } from './file.js';
import { TopicLocks, type LockMode } from './lock.js';
import { utcNow } from './timestamp.js';
import { topicPaths, validateTopic, type TopicPaths } from './topic.js';
import type { Message, StoredEntry } from './types.js';

/**
 * File-backed FIFO queues, one JSON file per topic under `baseDir`.
 *
 * Every operation takes the topic's lock for its whole load/modify/save
 * cycle. Reads take a shared lock, writes an exclusive one. Several
 * processes may point a store at the same directory.
 *
 * ```ts
 * const store = new QueueStore(baseDir);
 * await store.append('origin:main', 'Follow up on tests');
 * const next = await store.popFirst('origin:main');
 * ```
 */
export class QueueStore {
  private readonly locks = new TopicLocks();

  constructor(readonly baseDir: string) {}

  topicPaths(topic: string): TopicPaths {
    return topicPaths(this.baseDir, topic);
  }

  private async withTopic<T>(
    topic: string,
    mode: LockMode,
    body: (paths: TopicPaths, topic: string) => Promise<T>,
  ): Promise<T> {
    const t = validateTopic(topic);
    const paths = this.topicPaths(t);
    return this.locks.withLock(paths.lock, mode, () => body(paths, t));
  }

  /** Enqueue `content` and return the new message's uuid. */
  async append(topic: string, content: string): Promise<string> {
    const uuid = crypto.randomUUID();
    const entry: StoredEntry = { uuid, created: utcNow(), content };
    await this.withTopic(topic, 'exclusive', async (paths, t) => {
      const entries = await loadUnlocked(paths, t);
      entries.push(entry);
      await saveUnlocked(paths, t, entries);
    });
    return uuid;
  }

  /** Remove and return the oldest message, or null when the queue is empty. */
  async popFirst(topic: string): Promise<Message | null> {
    return this.withTopic(topic, 'exclusive', async (paths, t) => {
      const entries = await loadUnlocked(paths, t);
      const first = entries.shift();
      if (!first) return null;
      await saveUnlocked(paths, t, entries);
      return toMessage(first);
    });
  }

  async peekFirst(topic: string): Promise<Message | null> {
    return this.withTopic(topic, 'shared', async (paths, t) => {
      const [first] = await loadUnlocked(paths, t);
      return first ? toMessage(first) : null;
    });
  }

  async getByUuid(topic: string, uuid: string): Promise<Message | null> {
    return this.withTopic(topic, 'shared', async (paths, t) => {
      const entries = await loadUnlocked(paths, t);
      const match = entries.find((e) => e.uuid === uuid);
      return match ? toMessage(match) : null;
    });
  }

  /** All messages, oldest first. */
  async listMessages(topic: string): Promise<Message[]> {
    return this.withTopic(topic, 'shared', async (paths, t) => {
      const entries = await loadUnlocked(paths, t);
      return entries.map(toMessage);
    });
  }

  async count(topic: string): Promise<number> {
    return this.withTopic(topic, 'shared', async (paths, t) => {
      const entries = await loadUnlocked(paths, t);
      return entries.length;
    });
  }

  /** Returns false, without touching the file, when no message matches. */
  async deleteByUuid(topic: string, uuid: string): Promise<boolean> {
    return this.withTopic(topic, 'exclusive', async (paths, t) => {
      const entries = await loadUnlocked(paths, t);
      const remaining = entries.filter((e) => e.uuid !== uuid);
      if (remaining.length === entries.length) return false;
      await saveUnlocked(paths, t, remaining);
      return true;
    });
  }

  /**
   * Swap a message's content in place, keeping its uuid, created time and
   * position, and stamp `updated`.
   */
  async replaceByUuid(
    topic: string,
    uuid: string,
    content: string,
  ): Promise<boolean> {
    return this.withTopic(topic, 'exclusive', async (paths, t) => {
      const entries = await loadUnlocked(paths, t);
      const match = entries.find((e) => e.uuid === uuid);
      if (!match) return false;
      match.content = content;
      match.updated = utcNow();
      await saveUnlocked(paths, t, entries);
      return true;
    });
  }
}
