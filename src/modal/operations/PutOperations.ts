import type { BufferView } from "../models/BufferView";
import { firstNonBlank, lastLine, lineAt, lineLength, linesReplacementEdit } from "../models/BufferView";
import { registerLines } from "../models/RegisterStore";
import type { EditRequest, Position, Register } from "../types";

export interface PutResult {
  request: EditRequest;
  cursor: Position;
}

/**
 * `p` / `P`: paste register content `count` times after or before the
 * cursor, in the register's shape.
 */
export function putRegister(
  view: BufferView,
  cursor: Position,
  register: Register,
  after: boolean,
  count: number
): PutResult | null {
  if (register.text.length === 0) {
    return null;
  }
  switch (register.shape) {
    case 'charwise':
      return putCharwise(view, cursor, register.text.repeat(count), after);
    case 'linewise':
      return putLinewise(view, cursor.line, registerLines(register), after, count);
    case 'blockwise':
      return putBlockwise(view, cursor, register.text.split('\n'), after, count);
  }
}

function putCharwise(view: BufferView, cursor: Position, text: string, after: boolean): PutResult {
  const length = lineLength(view, cursor.line);
  const column = after && length > 0 ? Math.min(cursor.column + 1, length) : Math.min(cursor.column, length);
  const at = { line: cursor.line, column };
  const landing = text.includes('\n') ? at : { line: cursor.line, column: column + text.length - 1 };
  return {
    request: { kind: 'put', edits: [{ start: at, end: at, text }], shape: 'charwise', cursor: landing },
    cursor: landing,
  };
}

/** Insert whole lines below (or above) `line`. */
export function putLinewise(view: BufferView, line: number, lines: string[], after: boolean, count: number): PutResult {
  const block: string[] = [];
  for (let i = 0; i < count; i++) {
    block.push(...lines);
  }
  const body = block.join('\n');

  let request: EditRequest;
  let target: number;
  if (!after) {
    const at = { line, column: 0 };
    target = line;
    request = { kind: 'put', edits: [{ start: at, end: at, text: body + '\n' }], shape: 'linewise', cursor: at };
  } else if (line < lastLine(view)) {
    const at = { line: line + 1, column: 0 };
    target = line + 1;
    request = { kind: 'put', edits: [{ start: at, end: at, text: body + '\n' }], shape: 'linewise', cursor: at };
  } else {
    const at = { line, column: lineLength(view, line) };
    target = line + 1;
    request = { kind: 'put', edits: [{ start: at, end: at, text: '\n' + body }], shape: 'linewise', cursor: at };
  }

  const cursor = { line: target, column: firstNonBlank(block[0] ?? '') };
  request.cursor = cursor;
  return { request, cursor };
}

function putBlockwise(view: BufferView, cursor: Position, rows: string[], after: boolean, count: number): PutResult | null {
  const length = lineLength(view, cursor.line);
  const column = after && length > 0 ? cursor.column + 1 : cursor.column;
  const width = Math.max(...rows.map(row => row.length));

  const lines = [...view];
  while (lines.length < cursor.line + rows.length) {
    lines.push('');
  }
  rows.forEach((row, index) => {
    const line = cursor.line + index;
    const current = lineAt(lines, line).padEnd(column, ' ');
    const rest = current.slice(column);
    const padded = row.padEnd(width, ' ');
    const piece = rest === '' ? padded.repeat(count - 1) + row : padded.repeat(count);
    lines[line] = current.slice(0, column) + piece + rest;
  });

  const edit = linesReplacementEdit(view, lines);
  if (!edit) {
    return null;
  }
  const landing = { line: cursor.line, column };
  return {
    request: { kind: 'put', edits: [edit], shape: 'blockwise', cursor: landing },
    cursor: landing,
  };
}
