import crypto from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { QueueCorruptError } from './errors.js';
import { ensureDir } from './lock.js';
import type { TopicPaths } from './topic.js';
import {
  QUEUE_FILE_VERSION,
  type Message,
  type QueueDocument,
  type QueueEnvelope,
  type StoredEntry,
} from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStoredEntry(value: unknown): value is StoredEntry {
  return isRecord(value) && 'uuid' in value && 'content' in value;
}

function isMissing(err: unknown): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    (err.code === 'ENOENT' || err.code === 'ENOTDIR')
  );
}

/**
 * Classify the raw text of a queue file. Throws QueueCorruptError for
 * anything that is neither blank, an envelope, nor a bare message list.
 */
export function parseQueueDocument(
  raw: string,
  topic: string,
  filePath: string,
): QueueDocument {
  if (!raw.trim()) return { kind: 'empty' };

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new QueueCorruptError(topic, filePath, undefined, { cause: err });
  }

  if (isRecord(data) && 'messages' in data) {
    if (!Array.isArray(data.messages)) {
      throw new QueueCorruptError(topic, filePath, 'messages not a list');
    }
    return { kind: 'envelope', entries: data.messages };
  }
  if (Array.isArray(data)) {
    return { kind: 'legacy', entries: data };
  }
  throw new QueueCorruptError(topic, filePath);
}

/** Keep entries that carry both `uuid` and `content`; drop the rest. */
export function entriesOf(doc: QueueDocument): StoredEntry[] {
  if (doc.kind === 'empty') return [];
  return doc.entries.filter(isStoredEntry);
}

export function toMessage(entry: StoredEntry): Message {
  const { created, updated, ...rest } = entry;
  const message: Message = {
    ...rest,
    uuid: String(entry.uuid),
    content:
      typeof entry.content === 'string' ? entry.content : String(entry.content),
  };
  if (typeof created === 'string') {
    message.created = created;
  }
  if (typeof updated === 'string') {
    message.updated = updated;
  }
  return message;
}

/**
 * Read a topic's entries. The caller must hold at least a shared lock.
 * A missing or blank file is an empty queue.
 */
export async function loadUnlocked(
  paths: TopicPaths,
  topic: string,
): Promise<StoredEntry[]> {
  let raw: string;
  try {
    raw = await fs.readFile(paths.data, 'utf-8');
  } catch (err) {
    if (isMissing(err)) return [];
    throw err;
  }
  return entriesOf(parseQueueDocument(raw, topic, paths.data));
}

/**
 * Replace a topic's data file with a new envelope. The caller must hold the
 * exclusive lock. The content is written to a temp file in the same
 * directory, synced, then renamed over the data file.
 */
export async function saveUnlocked(
  paths: TopicPaths,
  topic: string,
  entries: StoredEntry[],
): Promise<void> {
  const dir = path.dirname(paths.data);
  await ensureDir(dir);

  const envelope: QueueEnvelope = {
    version: QUEUE_FILE_VERSION,
    topic,
    messages: entries,
  };
  const tmpPath = path.join(
    dir,
    `${path.basename(paths.data)}.${crypto.randomBytes(6).toString('hex')}.tmp`,
  );

  const handle = await fs.open(tmpPath, 'wx', 0o600);
  try {
    try {
      await handle.writeFile(JSON.stringify(envelope, null, 2) + '\n', 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    try {
      await fs.chmod(tmpPath, 0o600);
    } catch {
      // Permissions are tightened where the filesystem allows it.
    }
    await fs.rename(tmpPath, paths.data);
  } catch (err) {
    await fs.rm(tmpPath, { force: true }).catch(() => undefined);
    throw err;
  }
}
