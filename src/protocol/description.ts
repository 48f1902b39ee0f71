import type { PromptText } from '../prompt/types.js';

// Runs of escapes are decoded together so multi-byte UTF-8 sequences survive.
const ESCAPE_RUN = /(?:%[0-9A-Fa-f]{2})+/g;

/**
 * Undoes the form encoding used by SETDESC: `+` becomes a space, then each
 * `%XY` becomes the byte it names. A `%` without two hex digits after it is
 * kept as is.
 */
export function percentDecode(raw: string): string {
  return raw
    .replace(/\+/g, ' ')
    .replace(ESCAPE_RUN, (run) => Buffer.from(run.replace(/%/g, ''), 'hex').toString('utf8'));
}

function unquote(line: string): string {
  if (line.length >= 2 && line.startsWith('"') && line.endsWith('"')) {
    return line.slice(1, -1);
  }
  return line;
}

/**
 * Splits a SETDESC payload into the launcher's prompt label (first line, with
 * a colon appended) and its message body (second line, unquoted, without a
 * trailing colon).
 */
export function decodeDescription(raw: string): PromptText {
  const [label = '', body = ''] = percentDecode(raw).split('\n', 2);

  return {
    prompt: `${label}:`,
    message: unquote(body).replace(/:$/, ''),
  };
}
