// msg="..." with backslash escapes, followed by whitespace or end of line
const MSG_PATTERN = /msg="((?:[^"\\]|\\.)*)"\s*(?:\s|$)/;

const ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  n: '\n',
  t: '\t',
};

/**
 * Undo logfmt escaping in one pass, so `\\n` stays a backslash followed by `n`.
 * Unknown escapes are kept as written.
 */
export function unescapeLogValue(value: string): string {
  return value.replace(/\\(.)/g, (sequence: string, char: string) => ESCAPES[char] ?? sequence);
}

/**
 * Extract the message from compose's own structured status lines
 * (`time="…" level=… msg="…"`). Anything else, container output included,
 * is returned unchanged.
 */
export function parseComposeLogLine(line: string): string {
  const match = MSG_PATTERN.exec(line);
  if (!match) {
    return line;
  }
  return unescapeLogValue(match[1]);
}
