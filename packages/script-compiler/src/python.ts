/**
 * Python literal formatting for slot values.
 *
 * Every value that enters a script goes through one of these, so the
 * generated program never contains raw agent text outside a literal.
 */

/** Float literal: `40` becomes `40.0`, `1e21` stays `1e+21`. */
export function pythonFloat(value: number): string {
  const text = Object.is(value, -0) ? '0' : String(value);
  return /[.eE]/.test(text) ? text : `${text}.0`;
}

export function pythonInt(value: number): string {
  return String(value);
}

/** Double-quoted string literal; JSON escapes are valid Python escapes. */
export function pythonString(value: string): string {
  return JSON.stringify(value);
}

export function indent(block: string, spaces: number): string {
  const pad = ' '.repeat(spaces);
  return block
    .split('\n')
    .map((line) => (line.length > 0 ? pad + line : line))
    .join('\n');
}

/** Single-line text safe for a `#` comment. */
export function commentText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
