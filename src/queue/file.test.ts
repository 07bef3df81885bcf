import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  entriesOf,
  loadUnlocked,
  parseQueueDocument,
  saveUnlocked,
  toMessage,
} from './file.js';
import { QueueCorruptError } from './errors.js';
import { topicPaths, type TopicPaths } from './topic.js';

describe('parseQueueDocument', () => {
  it('treats blank text as an empty document', () => {
    expect(parseQueueDocument('', 't', '/f')).toEqual({ kind: 'empty' });
    expect(parseQueueDocument('  \n\t', 't', '/f')).toEqual({ kind: 'empty' });
  });

  it('recognises the envelope shape', () => {
    const raw = JSON.stringify({ version: 1, topic: 't', messages: [1] });
    expect(parseQueueDocument(raw, 't', '/f')).toEqual({
      kind: 'envelope',
      entries: [1],
    });
  });

  it('accepts a bare list', () => {
    expect(parseQueueDocument('[]', 't', '/f')).toEqual({
      kind: 'legacy',
      entries: [],
    });
  });

  it('wraps JSON syntax errors', () => {
    let caught: unknown;
    try {
      parseQueueDocument('{not json', 'main', '/q/main.json');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(QueueCorruptError);
    const err = caught as QueueCorruptError;
    expect(err.message).toBe('corrupt queue file for topic "main": /q/main.json');
    expect(err.cause).toBeInstanceOf(SyntaxError);
    expect(err.topic).toBe('main');
    expect(err.path).toBe('/q/main.json');
  });

  it('rejects an envelope whose messages field is not a list', () => {
    expect(() =>
      parseQueueDocument('{"messages": {"a": 1}}', 'main', '/q/main.json'),
    ).toThrow(
      'corrupt queue file for topic "main": /q/main.json (messages not a list)',
    );
  });

  it('rejects other top-level shapes', () => {
    expect(() => parseQueueDocument('{"items": []}', 't', '/f')).toThrow(
      QueueCorruptError,
    );
    expect(() => parseQueueDocument('42', 't', '/f')).toThrow(
      QueueCorruptError,
    );
    expect(() => parseQueueDocument('"text"', 't', '/f')).toThrow(
      QueueCorruptError,
    );
  });
});

describe('entriesOf', () => {
  it('drops entries without both uuid and content', () => {
    const entries = entriesOf({
      kind: 'envelope',
      entries: [
        { uuid: '1', content: 'keep' },
        { uuid: '2' },
        { content: 'no id' },
        'text',
        null,
        ['uuid', 'content'],
        { uuid: 3, content: null },
      ],
    });
    expect(entries).toEqual([
      { uuid: '1', content: 'keep' },
      { uuid: 3, content: null },
    ]);
  });

  it('keeps unknown fields on retained entries', () => {
    const entries = entriesOf({
      kind: 'legacy',
      entries: [{ uuid: '1', content: 'x', priority: 'high' }],
    });
    expect(entries[0]).toEqual({ uuid: '1', content: 'x', priority: 'high' });
  });
});

describe('toMessage', () => {
  it('passes well-formed entries through', () => {
    expect(
      toMessage({
        uuid: 'u1',
        created: '2026-01-01T00:00:00+00:00',
        content: 'hello',
        updated: '2026-01-02T00:00:00+00:00',
        source: 'hook',
      }),
    ).toEqual({
      uuid: 'u1',
      created: '2026-01-01T00:00:00+00:00',
      content: 'hello',
      updated: '2026-01-02T00:00:00+00:00',
      source: 'hook',
    });
  });

  it('omits timestamps that are missing or not strings', () => {
    const message = toMessage({ uuid: 'u1', content: 'x', updated: 5 });
    expect(message).toEqual({ uuid: 'u1', content: 'x' });
    expect('created' in message).toBe(false);
    expect('updated' in message).toBe(false);
  });
});

describe('loadUnlocked / saveUnlocked', () => {
  let tmpDir: string;
  let paths: TopicPaths;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'q-file-test-'));
    paths = topicPaths(tmpDir, 'origin:main');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns no entries when the file does not exist', async () => {
    expect(await loadUnlocked(paths, 'origin:main')).toEqual([]);
  });

  it('returns no entries when the base directory does not exist', async () => {
    const missing = topicPaths(path.join(tmpDir, 'nope'), 'origin:main');
    expect(await loadUnlocked(missing, 'origin:main')).toEqual([]);
  });

  it('returns no entries for a whitespace-only file', async () => {
    fs.writeFileSync(paths.data, '\n   \n');
    expect(await loadUnlocked(paths, 'origin:main')).toEqual([]);
  });

  it('reads a legacy bare list', async () => {
    fs.writeFileSync(
      paths.data,
      JSON.stringify([{ uuid: 'a', content: 'one', created: 'c' }]),
    );
    expect(await loadUnlocked(paths, 'origin:main')).toEqual([
      { uuid: 'a', content: 'one', created: 'c' },
    ]);
  });

  it('throws QueueCorruptError for unparseable bytes', async () => {
    fs.writeFileSync(paths.data, '\u0000\u0001garbage');
    await expect(loadUnlocked(paths, 'origin:main')).rejects.toBeInstanceOf(
      QueueCorruptError,
    );
  });

  it('writes the envelope with a trailing newline', async () => {
    const entries = [{ uuid: 'a', created: 'c', content: 'one' }];
    await saveUnlocked(paths, 'origin:main', entries);
    const raw = fs.readFileSync(paths.data, 'utf-8');
    expect(raw).toBe(
      JSON.stringify(
        { version: 1, topic: 'origin:main', messages: entries },
        null,
        2,
      ) + '\n',
    );
    expect(await loadUnlocked(paths, 'origin:main')).toEqual(entries);
  });

  it('writes non-ASCII content without escaping', async () => {
    await saveUnlocked(paths, 't', [{ uuid: 'a', content: 'naïve ✓' }]);
    expect(fs.readFileSync(paths.data, 'utf-8')).toContain('"naïve ✓"');
  });

  it('leaves no temp files behind', async () => {
    await saveUnlocked(paths, 't', [{ uuid: 'a', content: 'x' }]);
    await saveUnlocked(paths, 't', [{ uuid: 'b', content: 'y' }]);
    expect(fs.readdirSync(tmpDir)).toEqual(['origin%3Amain.json']);
  });

  it('creates the base directory when missing', async () => {
    const nested = topicPaths(path.join(tmpDir, 'a', 'b'), 't');
    await saveUnlocked(nested, 't', []);
    expect(fs.existsSync(nested.data)).toBe(true);
  });

  it.skipIf(process.platform === 'win32')(
    'restricts the data file to its owner',
    async () => {
      await saveUnlocked(paths, 't', []);
      expect(fs.statSync(paths.data).mode & 0o777).toBe(0o600);
    },
  );

  it('removes the temp file and rethrows when the rename fails', async () => {
    fs.mkdirSync(paths.data);
    fs.writeFileSync(path.join(paths.data, 'occupied'), '');
    await expect(
      saveUnlocked(paths, 't', [{ uuid: 'a', content: 'x' }]),
    ).rejects.toThrow();
    expect(fs.readdirSync(tmpDir)).toEqual(['origin%3Amain.json']);
  });
});
