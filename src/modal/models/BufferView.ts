import type { Position, TextEdit } from "../types";

/** Read-only line view of a host snapshot. */
export type BufferView = readonly string[];

export function lineCount(view: BufferView): number {
  return Math.max(1, view.length);
}

export function lineAt(view: BufferView, line: number): string {
  return view[line] ?? '';
}

export function lineLength(view: BufferView, line: number): number {
  return lineAt(view, line).length;
}

export function lastLine(view: BufferView): number {
  return lineCount(view) - 1;
}

export function isBlankLine(view: BufferView, line: number): boolean {
  return lineAt(view, line).trim() === '';
}

export function firstNonBlank(text: string): number {
  const index = text.search(/\S/);
  return index >= 0 ? index : Math.max(0, text.length - 1);
}

export function leadingWhitespace(text: string): string {
  const match = text.match(/^\s*/);
  return match ? match[0] : '';
}

export function comparePositions(a: Position, b: Position): number {
  return a.line !== b.line ? a.line - b.line : a.column - b.column;
}

export function samePosition(a: Position, b: Position): boolean {
  return comparePositions(a, b) === 0;
}

export function orderPositions(a: Position, b: Position): [Position, Position] {
  return comparePositions(a, b) <= 0 ? [a, b] : [b, a];
}

/**
 * Clamp a position into the document. Normal mode keeps the cursor on a
 * character; insert-like positions may sit one past the end of the line.
 */
export function clampPosition(view: BufferView, pos: Position, allowPastEnd = false): Position {
  const line = Math.min(Math.max(0, pos.line), lastLine(view));
  const length = lineLength(view, line);
  const maxColumn = allowPastEnd ? length : Math.max(0, length - 1);
  return { line, column: Math.min(Math.max(0, pos.column), maxColumn) };
}

export function endOfDocument(view: BufferView): Position {
  const line = lastLine(view);
  return { line, column: lineLength(view, line) };
}

/** Text of the end-exclusive range, lines joined with newlines. */
export function textInRange(view: BufferView, start: Position, end: Position): string {
  if (start.line === end.line) {
    return lineAt(view, start.line).slice(start.column, end.column);
  }
  const parts = [lineAt(view, start.line).slice(start.column)];
  for (let line = start.line + 1; line < end.line; line++) {
    parts.push(lineAt(view, line));
  }
  parts.push(lineAt(view, end.line).slice(0, end.column));
  return parts.join('\n');
}

export function documentText(view: BufferView): string {
  return view.join('\n');
}

export function offsetOf(view: BufferView, pos: Position): number {
  let offset = 0;
  for (let line = 0; line < pos.line; line++) {
    offset += lineLength(view, line) + 1;
  }
  return offset + pos.column;
}

export function positionAt(view: BufferView, offset: number): Position {
  let remaining = Math.max(0, offset);
  for (let line = 0; line < lineCount(view); line++) {
    const length = lineLength(view, line);
    if (remaining <= length) {
      return { line, column: remaining };
    }
    remaining -= length + 1;
  }
  return endOfDocument(view);
}

/** Position after `text` is inserted at `at`. */
export function advancePosition(at: Position, text: string): Position {
  const parts = text.split('\n');
  if (parts.length === 1) {
    return { line: at.line, column: at.column + text.length };
  }
  return { line: at.line + parts.length - 1, column: parts[parts.length - 1].length };
}

/**
 * Apply non-overlapping edits to a copy of the lines. Used to predict where
 * the cursor lands and by hosts that keep their content as a line array.
 */
export function applyEdits(view: BufferView, edits: readonly TextEdit[]): string[] {
  const sorted = [...edits].sort((a, b) => comparePositions(b.start, a.start));
  let lines = view.length === 0 ? [''] : [...view];
  for (const edit of sorted) {
    const before = lineAt(lines, edit.start.line).slice(0, edit.start.column);
    const after = lineAt(lines, edit.end.line).slice(edit.end.column);
    const inserted = (before + edit.text + after).split('\n');
    lines = [
      ...lines.slice(0, edit.start.line),
      ...inserted,
      ...lines.slice(edit.end.line + 1),
    ];
  }
  return lines;
}

/**
 * A single edit that turns `oldLines` into `newLines`, covering only the
 * lines between the common prefix and the common suffix.
 */
export function linesReplacementEdit(oldLines: BufferView, newLines: BufferView): TextEdit | null {
  const before = oldLines.length === 0 ? [''] : oldLines;
  const after = newLines.length === 0 ? [''] : newLines;

  let prefix = 0;
  while (prefix < before.length && prefix < after.length && before[prefix] === after[prefix]) {
    prefix++;
  }
  let suffix = 0;
  while (
    suffix < before.length - prefix &&
    suffix < after.length - prefix &&
    before[before.length - 1 - suffix] === after[after.length - 1 - suffix]
  ) {
    suffix++;
  }
  if (prefix === before.length && prefix === after.length) {
    return null;
  }

  const middle = after.slice(prefix, after.length - suffix);
  if (suffix > 0) {
    return {
      start: { line: prefix, column: 0 },
      end: { line: before.length - suffix, column: 0 },
      text: middle.map(line => line + '\n').join(''),
    };
  }
  const end = { line: before.length - 1, column: before[before.length - 1].length };
  if (prefix > 0) {
    return {
      start: { line: prefix - 1, column: before[prefix - 1].length },
      end,
      text: middle.map(line => '\n' + line).join(''),
    };
  }
  return { start: { line: 0, column: 0 }, end, text: middle.join('\n') };
}
