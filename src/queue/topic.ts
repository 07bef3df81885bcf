import crypto from 'node:crypto';
import path from 'node:path';
import { TopicValidationError } from './errors.js';

const MAX_ENCODED_LENGTH = 180;
const TRUNCATED_PREFIX_LENGTH = 150;
const SAFE_CHAR = /^[A-Za-z0-9._-]$/;
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export interface TopicPaths {
  data: string;
  lock: string;
}

/**
 * Returns the trimmed topic. Throws if nothing is left, or if the topic
 * holds a lone surrogate that has no UTF-8 encoding.
 */
export function validateTopic(topic: string): string {
  const trimmed = topic.trim();
  if (!trimmed) {
    throw new TopicValidationError();
  }
  if (LONE_SURROGATE.test(trimmed)) {
    throw new TopicValidationError('topic is not valid unicode');
  }
  return trimmed;
}

function shortDigest(topic: string): string {
  return crypto
    .createHash('sha256')
    .update(topic, 'utf-8')
    .digest('hex')
    .slice(0, 16);
}

function percentEncode(char: string): string {
  if (SAFE_CHAR.test(char)) return char;
  return Array.from(Buffer.from(char, 'utf-8'))
    .map((byte) => `%${byte.toString(16).toUpperCase().padStart(2, '0')}`)
    .join('');
}

/**
 * Convert a topic into a filesystem-safe filename component.
 * Example: encodeTopic('origin:main') => 'origin%3Amain'
 *
 * Leading and trailing dots are stripped so '.' and '..' can never be
 * produced. Long results are cut to 150 chars and suffixed with a digest
 * of the full topic.
 */
export function encodeTopic(topic: string): string {
  const t = validateTopic(topic);

  let safe = Array.from(t, percentEncode)
    .join('')
    .replace(/^\.+|\.+$/g, '');
  if (!safe) {
    safe = shortDigest(t);
  }

  if (safe.length > MAX_ENCODED_LENGTH) {
    safe = `${safe.slice(0, TRUNCATED_PREFIX_LENGTH)}__${shortDigest(t)}`;
  }
  return safe;
}

export function topicPaths(baseDir: string, topic: string): TopicPaths {
  const safe = encodeTopic(topic);
  return {
    data: path.join(baseDir, `${safe}.json`),
    lock: path.join(baseDir, `${safe}.lock`),
  };
}
