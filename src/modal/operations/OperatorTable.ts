import type { BufferView } from "../models/BufferView";
import {
  applyEdits,
  clampPosition,
  comparePositions,
  firstNonBlank,
  lastLine,
  leadingWhitespace,
  lineAt,
  lineLength,
  orderPositions,
  textInRange,
} from "../models/BufferView";
import type { OperatorToken } from "../models/PendingCommand";
import type { ModalConfig } from "../config";
import type { EditKind, EditRequest, Position, Register, RegisterShape, Span, SpanClass, TextEdit } from "../types";

export type OperatorKind = 'delete' | 'change' | 'yank' | 'indent' | 'outdent' | 'swap-case' | 'upper' | 'lower';

export interface OperatorSpec {
  kind: OperatorKind;
  /** Whether the operator writes the operated text to a register. */
  writesRegister: boolean;
  entersInsert: boolean;
}

export const OPERATORS: Record<OperatorToken, OperatorSpec> = {
  'd': { kind: 'delete', writesRegister: true, entersInsert: false },
  'c': { kind: 'change', writesRegister: true, entersInsert: true },
  'y': { kind: 'yank', writesRegister: true, entersInsert: false },
  '>': { kind: 'indent', writesRegister: false, entersInsert: false },
  '<': { kind: 'outdent', writesRegister: false, entersInsert: false },
  'g~': { kind: 'swap-case', writesRegister: false, entersInsert: false },
  'gu': { kind: 'lower', writesRegister: false, entersInsert: false },
  'gU': { kind: 'upper', writesRegister: false, entersInsert: false },
};

export function isOperatorToken(key: string): key is OperatorToken {
  return Object.prototype.hasOwnProperty.call(OPERATORS, key);
}

export interface OperatorOptions {
  config: Pick<ModalConfig, 'shiftWidth' | 'expandTab' | 'tabStop'>;
  cursor: Position;
  /** Shift levels for `>` and `<` (a count in Visual mode). */
  shifts?: number;
}

export interface OperatorResult {
  request?: EditRequest;
  register?: Register;
  /** The operated text lies within one line; deletes then also write "-. */
  small: boolean;
  cursor: Position;
  entersInsert: boolean;
}

/**
 * Order the ends of a span. An exclusive span ending at column 0 of a
 * later line ends at the end of the previous line instead, and becomes
 * linewise when it starts at or before the first non-blank.
 */
export function normalizeSpan(view: BufferView, from: Position, to: Position, spanClass: SpanClass): Span {
  const [start, end] = orderPositions(from, to);
  if (spanClass === 'exclusive' && end.column === 0 && end.line > start.line) {
    const previous = end.line - 1;
    if (start.column <= firstNonBlank(lineAt(view, start.line)) || lineAt(view, start.line).trim() === '') {
      return { start: { line: start.line, column: 0 }, end: { line: previous, column: 0 }, class: 'linewise' };
    }
    return { start, end: { line: previous, column: lineLength(view, previous) }, class: 'exclusive' };
  }
  if (spanClass === 'blockwise') {
    return {
      start: { line: start.line, column: Math.min(from.column, to.column) },
      end: { line: end.line, column: Math.max(from.column, to.column) },
      class: 'blockwise',
    };
  }
  return { start, end, class: spanClass };
}

/** End-exclusive end of a charwise span. */
export function exclusiveEnd(view: BufferView, span: Span): Position {
  if (span.class === 'inclusive') {
    return { line: span.end.line, column: Math.min(span.end.column + 1, lineLength(view, span.end.line)) };
  }
  return { line: span.end.line, column: Math.min(span.end.column, lineLength(view, span.end.line)) };
}

interface Segment {
  line: number;
  start: number;
  end: number;
}

/** The part of each covered line a span touches, end-exclusive. */
export function spanSegments(view: BufferView, span: Span): Segment[] {
  const segments: Segment[] = [];
  if (span.class === 'linewise') {
    for (let line = span.start.line; line <= span.end.line; line++) {
      segments.push({ line, start: 0, end: lineLength(view, line) });
    }
    return segments;
  }
  if (span.class === 'blockwise') {
    const right = span.end.column === Infinity ? Infinity : span.end.column + 1;
    for (let line = span.start.line; line <= span.end.line; line++) {
      const length = lineLength(view, line);
      if (span.start.column < length) {
        segments.push({ line, start: span.start.column, end: Math.min(right, length) });
      }
    }
    return segments;
  }
  const end = exclusiveEnd(view, span);
  for (let line = span.start.line; line <= end.line; line++) {
    segments.push({
      line,
      start: line === span.start.line ? span.start.column : 0,
      end: line === end.line ? end.column : lineLength(view, line),
    });
  }
  return segments;
}

export function spanRegister(view: BufferView, span: Span): Register {
  switch (span.class) {
    case 'linewise': {
      const lines = view.slice(span.start.line, span.end.line + 1);
      return { text: lines.join('\n') + '\n', shape: 'linewise' };
    }
    case 'blockwise': {
      const rows: string[] = [];
      const right = span.end.column === Infinity ? Infinity : span.end.column + 1;
      for (let line = span.start.line; line <= span.end.line; line++) {
        rows.push(lineAt(view, line).slice(span.start.column, right));
      }
      return { text: rows.join('\n'), shape: 'blockwise' };
    }
    case 'inclusive':
    case 'exclusive':
      return { text: textInRange(view, span.start, exclusiveEnd(view, span)), shape: 'charwise' };
  }
}

function isEmptySpan(view: BufferView, span: Span): boolean {
  if (span.class === 'linewise') return false;
  if (span.class === 'blockwise') return spanSegments(view, span).every(s => s.start === s.end);
  return comparePositions(span.start, exclusiveEnd(view, span)) >= 0;
}

function shapeOf(spanClass: SpanClass): RegisterShape {
  if (spanClass === 'linewise') return 'linewise';
  if (spanClass === 'blockwise') return 'blockwise';
  return 'charwise';
}

function request(kind: EditKind, edits: TextEdit[], shape: RegisterShape, cursor: Position): EditRequest {
  return { kind, edits, shape, cursor };
}

/** Edits that remove whole lines, and the line the cursor lands on afterwards. */
export function deleteLinesEdit(view: BufferView, first: number, last: number): { edit: TextEdit; line: number } {
  if (last < lastLine(view)) {
    return { edit: { start: { line: first, column: 0 }, end: { line: last + 1, column: 0 }, text: '' }, line: first };
  }
  if (first > 0) {
    return {
      edit: {
        start: { line: first - 1, column: lineLength(view, first - 1) },
        end: { line: last, column: lineLength(view, last) },
        text: '',
      },
      line: first - 1,
    };
  }
  return { edit: { start: { line: 0, column: 0 }, end: { line: last, column: lineLength(view, last) }, text: '' }, line: 0 };
}

function indentWidth(whitespace: string, tabStop: number): number {
  let width = 0;
  for (const char of whitespace) {
    width = char === '\t' ? (Math.floor(width / tabStop) + 1) * tabStop : width + 1;
  }
  return width;
}

function renderIndent(width: number, config: OperatorOptions['config']): string {
  if (config.expandTab) {
    return ' '.repeat(width);
  }
  return '\t'.repeat(Math.floor(width / config.tabStop)) + ' '.repeat(width % config.tabStop);
}

function transformCase(kind: 'swap-case' | 'upper' | 'lower', text: string): string {
  switch (kind) {
    case 'upper':
      return text.toUpperCase();
    case 'lower':
      return text.toLowerCase();
    case 'swap-case':
      return Array.from(text)
        .map(char => (char === char.toUpperCase() ? char.toLowerCase() : char.toUpperCase()))
        .join('');
  }
}

function linewiseCursor(span: Span, cursor: Position): Position {
  return cursor.line === span.start.line ? cursor : { line: span.start.line, column: cursor.column };
}

/** Predict where the cursor lands once `edits` apply, kept on a character. */
function settle(view: BufferView, edits: TextEdit[], cursor: Position): Position {
  return clampPosition(applyEdits(view, edits), cursor);
}

/**
 * Turn an operator and the span it acts on into an edit request and the
 * register content it produces. Pure: nothing is applied or stored here.
 */
export function applyOperator(
  view: BufferView,
  operator: OperatorToken,
  span: Span,
  options: OperatorOptions
): OperatorResult {
  const definition = OPERATORS[operator];
  const small = (span.class === 'inclusive' || span.class === 'exclusive') && span.start.line === span.end.line;

  if (isEmptySpan(view, span)) {
    return { small, cursor: span.start, entersInsert: definition.entersInsert };
  }

  const register = definition.writesRegister ? spanRegister(view, span) : undefined;
  const shape = shapeOf(span.class);

  switch (definition.kind) {
    case 'yank': {
      const cursor = span.class === 'linewise'
        ? clampPosition(view, linewiseCursor(span, options.cursor))
        : span.start;
      return { register, small, cursor, entersInsert: false };
    }

    case 'delete':
    case 'change': {
      if (span.class === 'linewise') {
        if (definition.kind === 'change') {
          const indent = leadingWhitespace(lineAt(view, span.start.line));
          const edit: TextEdit = {
            start: { line: span.start.line, column: 0 },
            end: { line: span.end.line, column: lineLength(view, span.end.line) },
            text: indent,
          };
          const cursor = { line: span.start.line, column: indent.length };
          return { request: request('change', [edit], shape, cursor), register, small, cursor, entersInsert: true };
        }
        const { edit, line } = deleteLinesEdit(view, span.start.line, span.end.line);
        const after = applyEdits(view, [edit]);
        const cursor = { line, column: firstNonBlank(lineAt(after, line)) };
        return { request: request('delete', [edit], shape, cursor), register, small, cursor, entersInsert: false };
      }

      const edits: TextEdit[] = span.class === 'blockwise'
        ? spanSegments(view, span).map(segment => ({
          start: { line: segment.line, column: segment.start },
          end: { line: segment.line, column: segment.end },
          text: '',
        }))
        : [{ start: span.start, end: exclusiveEnd(view, span), text: '' }];
      const cursor = definition.kind === 'change' ? span.start : settle(view, edits, span.start);
      return {
        request: request(definition.kind, edits, shape, cursor),
        register,
        small,
        cursor,
        entersInsert: definition.kind === 'change',
      };
    }

    case 'indent':
    case 'outdent': {
      const levels = options.shifts ?? 1;
      const edits: TextEdit[] = [];
      for (let line = span.start.line; line <= span.end.line; line++) {
        const text = lineAt(view, line);
        if (definition.kind === 'indent' && text.trim() === '') continue;
        const current = leadingWhitespace(text);
        const width = indentWidth(current, options.config.tabStop);
        const delta = options.config.shiftWidth * levels;
        const target = definition.kind === 'indent' ? width + delta : Math.max(0, width - delta);
        const indent = renderIndent(target, options.config);
        if (indent !== current) {
          edits.push({ start: { line, column: 0 }, end: { line, column: current.length }, text: indent });
        }
      }
      const after = applyEdits(view, edits);
      const cursor = { line: span.start.line, column: firstNonBlank(lineAt(after, span.start.line)) };
      if (edits.length === 0) {
        return { small, cursor, entersInsert: false };
      }
      return { request: request(definition.kind, edits, 'linewise', cursor), small, cursor, entersInsert: false };
    }

    case 'swap-case':
    case 'upper':
    case 'lower': {
      const caseKind = definition.kind;
      const edits: TextEdit[] = [];
      for (const segment of spanSegments(view, span)) {
        const original = lineAt(view, segment.line).slice(segment.start, segment.end);
        const changed = transformCase(caseKind, original);
        if (changed !== original) {
          edits.push({
            start: { line: segment.line, column: segment.start },
            end: { line: segment.line, column: segment.end },
            text: changed,
          });
        }
      }
      const cursor = span.class === 'linewise'
        ? clampPosition(view, linewiseCursor(span, options.cursor))
        : span.start;
      if (edits.length === 0) {
        return { small, cursor, entersInsert: false };
      }
      return { request: request(caseKind, edits, shape, cursor), small, cursor, entersInsert: false };
    }
  }
}
