import type { BufferView } from "../models/BufferView";
import { advancePosition, lastLine, leadingWhitespace, lineAt, lineLength } from "../models/BufferView";
import type { EditRequest, Position } from "../types";

export interface InsertEdit {
  request: EditRequest;
  cursor: Position;
}

export function insertText(at: Position, text: string): InsertEdit {
  const cursor = advancePosition(at, text);
  return {
    request: { kind: 'insert', edits: [{ start: at, end: at, text }], shape: 'charwise', cursor },
    cursor,
  };
}

function removeRange(start: Position, end: Position, cursor: Position): InsertEdit {
  return {
    request: { kind: 'insert', edits: [{ start, end, text: '' }], shape: 'charwise', cursor },
    cursor,
  };
}

/** `<BS>` in Insert mode; joins with the previous line at column 0. */
export function backspace(view: BufferView, at: Position): InsertEdit | null {
  if (at.column > 0) {
    const start = { line: at.line, column: at.column - 1 };
    return removeRange(start, at, start);
  }
  if (at.line > 0) {
    const start = { line: at.line - 1, column: lineLength(view, at.line - 1) };
    return removeRange(start, at, start);
  }
  return null;
}

/** `<Del>` in Insert mode; joins with the next line at the end of a line. */
export function deleteForward(view: BufferView, at: Position): InsertEdit | null {
  if (at.column < lineLength(view, at.line)) {
    return removeRange(at, { line: at.line, column: at.column + 1 }, at);
  }
  if (at.line < lastLine(view)) {
    return removeRange(at, { line: at.line + 1, column: 0 }, at);
  }
  return null;
}

/** `o` / `O`: a new line below or above, indented like `line`. */
export function openLine(view: BufferView, line: number, below: boolean): InsertEdit {
  const indent = leadingWhitespace(lineAt(view, line));
  if (below) {
    const at = { line, column: lineLength(view, line) };
    const cursor = { line: line + 1, column: indent.length };
    return {
      request: { kind: 'insert', edits: [{ start: at, end: at, text: '\n' + indent }], shape: 'linewise', cursor },
      cursor,
    };
  }
  const at = { line, column: 0 };
  const cursor = { line, column: indent.length };
  return {
    request: { kind: 'insert', edits: [{ start: at, end: at, text: indent + '\n' }], shape: 'linewise', cursor },
    cursor,
  };
}

/**
 * Replace mode: overwrite the character under the cursor, or append at the
 * end of the line. Returns the character that was overwritten, if any.
 */
export function overwriteChar(view: BufferView, at: Position, char: string): InsertEdit & { replaced?: string } {
  const text = lineAt(view, at.line);
  const cursor = { line: at.line, column: at.column + char.length };
  if (at.column < text.length) {
    return {
      request: {
        kind: 'replace',
        edits: [{ start: at, end: { line: at.line, column: at.column + 1 }, text: char }],
        shape: 'charwise',
        cursor,
      },
      cursor,
      replaced: text[at.column],
    };
  }
  return {
    request: { kind: 'replace', edits: [{ start: at, end: at, text: char }], shape: 'charwise', cursor },
    cursor,
  };
}

/** Replace mode `<BS>`: put back what was overwritten, or remove what was appended. */
export function restoreChar(at: Position, original: string | undefined): InsertEdit | null {
  if (at.column === 0) {
    return null;
  }
  const start = { line: at.line, column: at.column - 1 };
  return {
    request: { kind: 'replace', edits: [{ start, end: at, text: original ?? '' }], shape: 'charwise', cursor: start },
    cursor: start,
  };
}
