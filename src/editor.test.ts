import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import { spawnSync } from 'node:child_process';
import { editText, editorCommand, EditorError } from './editor.js';

vi.mock('node:child_process', () => ({
  spawnSync: vi.fn(),
}));

const mockSpawnSync = vi.mocked(spawnSync);

/** Stand in for an editor that writes `text` to the file it was given. */
function fakeEditor(text: string, status = 0): void {
  mockSpawnSync.mockImplementation((_command, args) => {
    const file = args?.[0];
    if (typeof file === 'string') fs.writeFileSync(file, text);
    return {
      pid: 1,
      output: [],
      stdout: Buffer.from(''),
      stderr: Buffer.from(''),
      status,
      signal: null,
    };
  });
}

describe('editorCommand', () => {
  it('prefers VISUAL over EDITOR', () => {
    expect(editorCommand({ VISUAL: 'code --wait', EDITOR: 'nano' })).toBe(
      'code --wait',
    );
  });

  it('falls back to EDITOR, then vi', () => {
    expect(editorCommand({ EDITOR: 'nano' })).toBe('nano');
    expect(editorCommand({ VISUAL: '', EDITOR: '' })).toBe('vi');
    expect(editorCommand({})).toBe('vi');
  });
});

describe('editText', () => {
  const savedVisual = process.env['VISUAL'];

  beforeEach(() => {
    process.env['VISUAL'] = 'test-editor';
  });

  afterEach(() => {
    vi.clearAllMocks();
    if (savedVisual === undefined) delete process.env['VISUAL'];
    else process.env['VISUAL'] = savedVisual;
  });

  it('returns what the editor saved and removes the temp file', () => {
    fakeEditor('edited text\n');
    expect(editText('start')).toBe('edited text\n');

    const call = mockSpawnSync.mock.calls[0];
    expect(call?.[0]).toBe('test-editor');
    const file = call?.[1]?.[0];
    expect(typeof file).toBe('string');
    expect(fs.existsSync(String(file))).toBe(false);
  });

  it('seeds the file with the initial text', () => {
    let seen = '';
    mockSpawnSync.mockImplementation((_command, args) => {
      seen = fs.readFileSync(String(args?.[0]), 'utf-8');
      return {
        pid: 1,
        output: [],
        stdout: Buffer.from(''),
        stderr: Buffer.from(''),
        status: 0,
        signal: null,
      };
    });
    expect(editText('draft')).toBe('draft');
    expect(seen).toBe('draft');
  });

  it('throws EditorError when the editor exits non-zero', () => {
    fakeEditor('ignored', 3);
    expect(() => editText()).toThrow(EditorError);
    expect(() => editText()).toThrow(/^editor exited with status 3: test-editor /);
  });
});
