import type { HookResult } from '../hooks/common.js';
import type { Message } from '../queue/types.js';
import { formatJson } from './format.js';

export function printMessage(message: Message, json?: boolean): void {
  if (json) {
    console.log(formatJson(message));
  } else {
    process.stdout.write(message.content);
  }
}

export function emitHookResult(result: HookResult): void {
  if (result.stdout) process.stdout.write(result.stdout);
  if (result.stderr) process.stderr.write(result.stderr);
  process.exitCode = result.exitCode;
}
