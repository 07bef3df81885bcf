import fs from 'node:fs';
import { validateTopic } from '../queue/topic.js';

/** All of stdin, unmodified. */
export function readStdinText(): string {
  return fs.readFileSync(0, 'utf-8');
}

/**
 * Split text whose first line names the topic from the body that follows.
 * Example: splitTopicAndBody('origin:main\nFix tests\n')
 *   => { topic: 'origin:main', body: 'Fix tests\n' }
 */
export function splitTopicAndBody(text: string): {
  topic: string;
  body: string;
} {
  const newline = text.indexOf('\n');
  const first = newline === -1 ? text : text.slice(0, newline);
  const body = newline === -1 ? '' : text.slice(newline + 1);
  return { topic: validateTopic(first), body };
}
