import type { BufferView } from "../models/BufferView";
import { lastLine, lineAt, lineLength } from "../models/BufferView";
import type { EditRequest, Position } from "../types";

/**
 * Join lines the way `J` does: the next line loses its indent and one space
 * separates the parts, unless the first part already ends in whitespace,
 * the next line is empty or starts with `)`. `gJ` keeps text as it is.
 * Returns the joined text and the column of the last join point.
 */
export function joinLineTexts(lines: readonly string[], keepSpace: boolean): { text: string; column: number } {
  let text = lines[0] ?? '';
  let column = 0;
  for (const next of lines.slice(1)) {
    if (keepSpace) {
      column = text.length;
      text += next;
      continue;
    }
    const stripped = next.replace(/^\s+/, '');
    const separator = stripped === '' || /\s$/.test(text) || text === '' || stripped.startsWith(')') ? '' : ' ';
    column = separator ? text.length : Math.max(0, text.length - 1);
    text += separator + stripped;
  }
  return { text, column };
}

/** `J` / `gJ` with a count: join `count` lines (at least two) starting at `line`. */
export function joinLines(view: BufferView, line: number, count: number, keepSpace: boolean): EditRequest | null {
  if (line >= lastLine(view)) {
    return null;
  }
  const last = Math.min(lastLine(view), line + Math.max(2, count) - 1);
  const { text, column } = joinLineTexts(view.slice(line, last + 1), keepSpace);
  const cursor = { line, column };
  return {
    kind: 'join',
    edits: [{ start: { line, column: 0 }, end: { line: last, column: lineLength(view, last) }, text }],
    shape: 'linewise',
    cursor,
  };
}

/** `r{char}` with a count. A line break replaces all counted characters with one newline. */
export function replaceChars(view: BufferView, pos: Position, char: string, count: number): EditRequest | null {
  const text = lineAt(view, pos.line);
  if (pos.column + count > text.length) {
    return null;
  }
  const end = { line: pos.line, column: pos.column + count };
  if (char === '\n') {
    const cursor = { line: pos.line + 1, column: 0 };
    return { kind: 'replace', edits: [{ start: pos, end, text: '\n' }], shape: 'charwise', cursor };
  }
  const cursor = { line: pos.line, column: pos.column + count - 1 };
  return { kind: 'replace', edits: [{ start: pos, end, text: char.repeat(count) }], shape: 'charwise', cursor };
}

/** `~`: swap the case of `count` characters and move past them. */
export function toggleCase(view: BufferView, pos: Position, count: number): EditRequest | null {
  const text = lineAt(view, pos.line);
  if (text.length === 0) {
    return null;
  }
  const endColumn = Math.min(text.length, pos.column + count);
  const original = text.slice(pos.column, endColumn);
  const swapped = Array.from(original)
    .map(char => (char === char.toUpperCase() ? char.toLowerCase() : char.toUpperCase()))
    .join('');
  const cursor = { line: pos.line, column: Math.min(endColumn, text.length - 1) };
  return {
    kind: 'swap-case',
    edits: [{ start: pos, end: { line: pos.line, column: endColumn }, text: swapped }],
    shape: 'charwise',
    cursor,
  };
}
