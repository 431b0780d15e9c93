export const INDENT_WIDTH = 4;

export const DIVIDER = '-----------------------------------------------------------------';

/** Indent every non-empty line of a block, the first one included. Blank lines stay blank. */
export function indent(text: string, spaces: number = INDENT_WIDTH): string {
  const pad = ' '.repeat(spaces);
  return text
    .split('\n')
    .map((line) => (line.length > 0 ? pad + line : line))
    .join('\n');
}

/** Standardize all newline chars: CRLF and lone CR become LF. */
export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}
