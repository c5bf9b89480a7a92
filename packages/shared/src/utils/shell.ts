/**
 * @opsdeck/shared - Shell Escaping
 * Escapes a string so a POSIX shell reads it back as one word.
 */

const SAFE_CHAR = /[A-Za-z0-9_\-.,:+/@\n]/;

/**
 * Backslash-escape every character outside the safe set. Newlines are
 * wrapped in single quotes because a backslash-newline is a line
 * continuation. An empty string becomes ''.
 */
export function shellEscape(value: string): string {
  if (value.length === 0) return "''";

  let escaped = '';
  for (const char of value) {
    if (char === '\n') {
      escaped += "'\n'";
    } else if (SAFE_CHAR.test(char)) {
      escaped += char;
    } else {
      escaped += `\\${char}`;
    }
  }
  return escaped;
}

export function shellJoin(args: readonly string[]): string {
  return args.map(shellEscape).join(' ');
}
