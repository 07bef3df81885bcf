import { spawnSync } from 'node:child_process';
import crypto from 'node:crypto';
import { readFileSync, unlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export class EditorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EditorError';
  }
}

/**
 * The user's editor command line. May carry arguments, e.g. `code --wait`.
 */
export function editorCommand(
  env: Record<string, string | undefined> = process.env,
): string {
  return env['VISUAL'] || env['EDITOR'] || 'vi';
}

/**
 * Opens the user's preferred editor with the given content.
 * Returns the edited content when the editor closes.
 */
export function editText(initial = ''): string {
  const editor = editorCommand();
  const tmpFile = join(
    tmpdir(),
    `q.${crypto.randomBytes(6).toString('hex')}.txt`,
  );

  try {
    writeFileSync(tmpFile, initial, { encoding: 'utf-8', mode: 0o600 });

    const result = spawnSync(editor, [tmpFile], {
      stdio: 'inherit',
      shell: true,
    });

    if (result.error) {
      throw new EditorError(
        `could not start editor: ${editor} (${result.error.message})`,
      );
    }
    if (result.status !== 0) {
      throw new EditorError(
        `editor exited with status ${result.status}: ${editor} ${tmpFile}`,
      );
    }

    return readFileSync(tmpFile, 'utf-8');
  } finally {
    try {
      unlinkSync(tmpFile);
    } catch {
      // Ignore cleanup errors
    }
  }
}
