export function formatTsvRow(fields: string[]): string {
  return fields.join('\t');
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * One-line preview of a message: the first line with whitespace collapsed,
 * cut to `width` with an ellipsis. A trailing ' …' marks further lines.
 */
export function summarize(content: string, width = 80): string {
  const lines = content.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') lines.pop();

  const first = (lines[0] ?? '').trim().replace(/\s+/g, ' ') || '(empty)';
  const more = lines.length > 1;

  if (first.length > width) {
    return first.slice(0, Math.max(0, width - 1)) + '…';
  }
  if (more && first.length <= width - 2) {
    return `${first} …`;
  }
  if (more) {
    return first.slice(0, Math.max(0, width - 1)) + '…';
  }
  return first;
}
