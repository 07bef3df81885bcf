export const QUEUE_FILE_VERSION = 1;

export interface Message {
  uuid: string;
  content: string;
  /** Absent on entries written without one. */
  created?: string;
  /** Set each time the content is replaced. */
  updated?: string;
  /** Fields written by other versions are kept as they are. */
  [field: string]: unknown;
}

/**
 * A message entry exactly as read from disk. Only the presence of `uuid`
 * and `content` is checked, not their values.
 */
export interface StoredEntry {
  uuid: unknown;
  content: unknown;
  [field: string]: unknown;
}

export interface QueueEnvelope {
  version: typeof QUEUE_FILE_VERSION;
  topic: string;
  messages: StoredEntry[];
}

/**
 * Parsed shape of a queue file before entries are filtered.
 * `legacy` is the bare-array form written by early versions.
 */
export type QueueDocument =
  | { kind: 'empty' }
  | { kind: 'envelope'; entries: unknown[] }
  | { kind: 'legacy'; entries: unknown[] };
