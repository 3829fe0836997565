import type { BufferView } from "../models/BufferView";
import {
  clampPosition,
  comparePositions,
  endOfDocument,
  firstNonBlank,
  lastLine,
  lineAt,
  lineLength,
} from "../models/BufferView";
import { ExSyntaxError, InvalidStateError } from "../errors";
import type { Position, SpanClass } from "../types";

export type FindMotion = 'f' | 'F' | 't' | 'T';

export interface FindState {
  motion: FindMotion;
  char: string;
}

export interface SearchState {
  pattern: string;
  forward: boolean;
}

export type MotionToken =
  | { kind: 'simple'; key: string }
  | { kind: 'find'; motion: FindMotion; char: string }
  | { kind: 'repeat-find'; reverse: boolean }
  | { kind: 'search'; pattern: string; forward: boolean }
  | { kind: 'search-next'; reverse: boolean }
  | { kind: 'search-word'; forward: boolean }
  | { kind: 'mark'; name: string; linewise: boolean };

export interface SearchOptions {
  ignoreCase: boolean;
  smartCase: boolean;
  wrapScan: boolean;
}

export interface MotionContext {
  /** Whether a count was typed; `G`, `gg` and `%` treat it as an address. */
  hasCount: boolean;
  operatorPending: boolean;
  /** The operator waiting for this motion, for the `cw` rule. */
  operator?: string;
  desiredColumn?: number;
  lastFind?: FindState;
  lastSearch?: SearchState;
  search: SearchOptions;
  mark?: (name: string) => Position | undefined;
}

export interface MotionResult {
  position: Position;
  class: SpanClass;
  /** Column vertical motions aim for; `Infinity` means end of line. */
  desiredColumn?: number;
  find?: FindState;
  search?: SearchState;
}

/** Keys that start a motion without further arguments. */
export const SIMPLE_MOTIONS = new Set([
  'h', 'l', '<BS>', ' ', '<Left>', '<Right>', 'j', 'k', '<Up>', '<Down>', '+', '-', '<CR>', '_',
  'w', 'W', 'b', 'B', 'e', 'E', 'ge', 'gE', '0', '^', '$', 'g_', '|', 'gg', 'G', '{', '}', '%',
  '<Home>', '<End>',
]);

const BRACKET_PAIRS: Record<string, string> = {
  '(': ')', ')': '(',
  '[': ']', ']': '[',
  '{': '}', '}': '{',
};

/** 0 for blanks and line ends, 1 for punctuation, 2 for keyword characters. */
export function charClass(char: string | undefined, bigWord: boolean): number {
  if (char === undefined || /\s/.test(char)) return 0;
  if (bigWord) return 1;
  return /\w/.test(char) ? 2 : 1;
}

function classAt(view: BufferView, pos: Position, bigWord: boolean): number {
  return charClass(lineAt(view, pos.line)[pos.column], bigWord);
}

/** Next character position, treating each line end as one position. */
function next(view: BufferView, pos: Position): Position | null {
  if (pos.column < lineLength(view, pos.line)) {
    return { line: pos.line, column: pos.column + 1 };
  }
  if (pos.line < lastLine(view)) {
    return { line: pos.line + 1, column: 0 };
  }
  return null;
}

function prev(view: BufferView, pos: Position): Position | null {
  if (pos.column > 0) {
    return { line: pos.line, column: pos.column - 1 };
  }
  if (pos.line > 0) {
    return { line: pos.line - 1, column: lineLength(view, pos.line - 1) };
  }
  return null;
}

function isEmptyLineStart(view: BufferView, pos: Position): boolean {
  return pos.column === 0 && lineLength(view, pos.line) === 0;
}

export function nextWordStart(view: BufferView, pos: Position, bigWord: boolean): Position {
  let p = pos;
  const startClass = classAt(view, p, bigWord);
  if (startClass !== 0) {
    for (;;) {
      const n = next(view, p);
      if (!n) return endOfDocument(view);
      p = n;
      if (classAt(view, p, bigWord) !== startClass) break;
    }
  }
  while (classAt(view, p, bigWord) === 0) {
    if (isEmptyLineStart(view, p) && comparePositions(p, pos) > 0) {
      return p;
    }
    const n = next(view, p);
    if (!n) return endOfDocument(view);
    p = n;
  }
  return p;
}

export function nextWordEnd(view: BufferView, pos: Position, bigWord: boolean): Position {
  let p = next(view, pos);
  while (p && classAt(view, p, bigWord) === 0) {
    p = next(view, p);
  }
  if (!p) {
    return clampPosition(view, endOfDocument(view));
  }
  return currentWordEnd(view, p, bigWord);
}

/** Last character of the run that contains `pos`. */
export function currentWordEnd(view: BufferView, pos: Position, bigWord: boolean): Position {
  const cls = classAt(view, pos, bigWord);
  let p = pos;
  while (p.column + 1 < lineLength(view, p.line) && classAt(view, { line: p.line, column: p.column + 1 }, bigWord) === cls) {
    p = { line: p.line, column: p.column + 1 };
  }
  return p;
}

export function prevWordStart(view: BufferView, pos: Position, bigWord: boolean): Position {
  let p = prev(view, pos);
  while (p && classAt(view, p, bigWord) === 0) {
    if (isEmptyLineStart(view, p)) return p;
    p = prev(view, p);
  }
  if (!p) {
    return { line: 0, column: 0 };
  }
  const cls = classAt(view, p, bigWord);
  while (p.column > 0 && classAt(view, { line: p.line, column: p.column - 1 }, bigWord) === cls) {
    p = { line: p.line, column: p.column - 1 };
  }
  return p;
}

export function prevWordEnd(view: BufferView, pos: Position, bigWord: boolean): Position {
  let p: Position | null = pos;
  const cls = classAt(view, pos, bigWord);
  if (cls !== 0) {
    while (p.column > 0 && classAt(view, { line: p.line, column: p.column - 1 }, bigWord) === cls) {
      p = { line: p.line, column: p.column - 1 };
    }
  }
  p = prev(view, p);
  while (p && classAt(view, p, bigWord) === 0) {
    if (isEmptyLineStart(view, p)) return p;
    p = prev(view, p);
  }
  return p ?? { line: 0, column: 0 };
}

/** `cw` on a non-blank stops at the end of the word instead of the next word start. */
export function changeWordEnd(view: BufferView, pos: Position, count: number, bigWord: boolean): Position {
  let p = currentWordEnd(view, pos, bigWord);
  for (let i = 1; i < count; i++) {
    p = nextWordEnd(view, p, bigWord);
  }
  return p;
}

/** Column of the target character on the line, or null if it does not occur. */
export function findCharOnLine(
  text: string,
  column: number,
  motion: FindMotion,
  char: string,
  count: number,
  isRepeat: boolean
): number | null {
  const forward = motion === 'f' || motion === 't';
  const till = motion === 't' || motion === 'T';
  let index = column;
  for (let i = 0; i < count; i++) {
    const skipAdjacent = till && isRepeat && i === 0 ? 1 : 0;
    let found = -1;
    if (forward) {
      found = text.indexOf(char, index + 1 + skipAdjacent);
    } else {
      const from = index - 1 - skipAdjacent;
      found = from >= 0 ? text.lastIndexOf(char, from) : -1;
    }
    if (found < 0) {
      return null;
    }
    index = found;
  }
  if (!till) return index;
  return forward ? index - 1 : index + 1;
}

function reverseFind(motion: FindMotion): FindMotion {
  switch (motion) {
    case 'f':
      return 'F';
    case 'F':
      return 'f';
    case 't':
      return 'T';
    case 'T':
      return 't';
  }
}

function resolveFind(
  view: BufferView,
  pos: Position,
  motion: FindMotion,
  char: string,
  count: number,
  isRepeat: boolean
): MotionResult | null {
  const column = findCharOnLine(lineAt(view, pos.line), pos.column, motion, char, count, isRepeat);
  if (column === null) {
    return null;
  }
  const forward = motion === 'f' || motion === 't';
  return { position: { line: pos.line, column }, class: forward ? 'inclusive' : 'exclusive' };
}

/** Position of the bracket matching the one at `pos`. */
export function findMatchingBracket(view: BufferView, pos: Position): Position | null {
  const char = lineAt(view, pos.line)[pos.column];
  const match = char === undefined ? undefined : BRACKET_PAIRS[char];
  if (char === undefined || match === undefined) {
    return null;
  }
  const forward = '([{'.includes(char);
  let depth = 1;
  let p: Position | null = forward ? next(view, pos) : prev(view, pos);
  while (p) {
    const c = lineAt(view, p.line)[p.column];
    if (c === char) {
      depth++;
    } else if (c === match) {
      depth--;
      if (depth === 0) return p;
    }
    p = forward ? next(view, p) : prev(view, p);
  }
  return null;
}

function resolvePercent(view: BufferView, pos: Position): Position | null {
  const text = lineAt(view, pos.line);
  for (let column = pos.column; column < text.length; column++) {
    if (BRACKET_PAIRS[text[column]] !== undefined) {
      return findMatchingBracket(view, { line: pos.line, column });
    }
  }
  return null;
}

function isEmptyLine(view: BufferView, line: number): boolean {
  return lineLength(view, line) === 0;
}

function paragraphForward(view: BufferView, pos: Position, count: number): Position {
  let line = pos.line;
  for (let i = 0; i < count; i++) {
    line++;
    while (line <= lastLine(view) && isEmptyLine(view, line)) line++;
    while (line <= lastLine(view) && !isEmptyLine(view, line)) line++;
    if (line > lastLine(view)) {
      return endOfDocument(view);
    }
  }
  return { line, column: 0 };
}

function paragraphBackward(view: BufferView, pos: Position, count: number): Position {
  let line = pos.line;
  for (let i = 0; i < count; i++) {
    line--;
    while (line >= 0 && isEmptyLine(view, line)) line--;
    while (line >= 0 && !isEmptyLine(view, line)) line--;
    if (line < 0) {
      return { line: 0, column: 0 };
    }
  }
  return { line, column: 0 };
}

function lastNonBlank(text: string): number {
  const index = text.search(/\s*$/);
  return Math.max(0, index - 1);
}

function lineStart(view: BufferView, line: number): Position {
  const target = Math.min(Math.max(0, line), lastLine(view));
  return { line: target, column: firstNonBlank(lineAt(view, target)) };
}

export function compileSearchPattern(pattern: string, options: SearchOptions, flags = ''): RegExp {
  const ignore = options.ignoreCase && !(options.smartCase && /[A-Z]/.test(pattern));
  try {
    return new RegExp(pattern, flags + (ignore ? 'i' : ''));
  } catch (e) {
    throw new ExSyntaxError(`Invalid pattern: ${pattern}`);
  }
}

/** The next match of `regex` strictly after (or before) `pos`. */
export function searchFrom(
  view: BufferView,
  pos: Position,
  regex: RegExp,
  forward: boolean,
  wrapScan: boolean
): Position | null {
  const global = new RegExp(regex.source, regex.flags.includes('g') ? regex.flags : regex.flags + 'g');
  const matchesOn = (line: number): number[] => {
    const columns: number[] = [];
    const text = lineAt(view, line);
    global.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = global.exec(text)) !== null) {
      columns.push(match.index);
      if (match[0].length === 0) {
        global.lastIndex++;
      }
    }
    return columns;
  };

  const total = lastLine(view) + 1;
  if (forward) {
    for (let step = 0; step <= total; step++) {
      const line = pos.line + step;
      if (line >= total && !wrapScan) return null;
      const actual = line % total;
      const columns = matchesOn(actual);
      const candidate = step === 0
        ? columns.find(column => column > pos.column)
        : step === total
          ? columns.find(column => column <= pos.column)
          : columns[0];
      if (candidate !== undefined) {
        return { line: actual, column: candidate };
      }
    }
    return null;
  }

  for (let step = 0; step <= total; step++) {
    const line = pos.line - step;
    if (line < 0 && !wrapScan) return null;
    const actual = ((line % total) + total) % total;
    const columns = matchesOn(actual).reverse();
    const candidate = step === 0
      ? columns.find(column => column < pos.column)
      : step === total
        ? columns.find(column => column >= pos.column)
        : columns[0];
    if (candidate !== undefined) {
      return { line: actual, column: candidate };
    }
  }
  return null;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Keyword under or after the cursor on its line, for `*` and `#`. */
export function wordUnderCursor(view: BufferView, pos: Position): { word: string; start: Position } | null {
  const text = lineAt(view, pos.line);
  const pattern = /\w+/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null) {
    if (match.index + match[0].length > pos.column) {
      return { word: match[0], start: { line: pos.line, column: match.index } };
    }
  }
  return null;
}

function resolveSearch(
  view: BufferView,
  pos: Position,
  pattern: string,
  forward: boolean,
  count: number,
  options: SearchOptions
): Position | null {
  const regex = compileSearchPattern(pattern, options);
  let p: Position | null = pos;
  for (let i = 0; i < count && p; i++) {
    p = searchFrom(view, p, regex, forward, options.wrapScan);
  }
  return p;
}

/**
 * Resolve a motion from `pos`. Pure: returns the target position and how an
 * operator should treat the span, or null when the motion has no target.
 */
export function resolveMotion(
  view: BufferView,
  pos: Position,
  motion: MotionToken,
  count: number,
  ctx: MotionContext
): MotionResult | null {
  switch (motion.kind) {
    case 'find': {
      const result = resolveFind(view, pos, motion.motion, motion.char, count, false);
      return result ? { ...result, find: { motion: motion.motion, char: motion.char } } : null;
    }
    case 'repeat-find': {
      if (!ctx.lastFind) return null;
      const direction = motion.reverse ? reverseFind(ctx.lastFind.motion) : ctx.lastFind.motion;
      return resolveFind(view, pos, direction, ctx.lastFind.char, count, true);
    }
    case 'search': {
      const target = resolveSearch(view, pos, motion.pattern, motion.forward, count, ctx.search);
      if (!target) return null;
      return { position: target, class: 'exclusive', search: { pattern: motion.pattern, forward: motion.forward } };
    }
    case 'search-next': {
      if (!ctx.lastSearch) return null;
      const forward = motion.reverse ? !ctx.lastSearch.forward : ctx.lastSearch.forward;
      const target = resolveSearch(view, pos, ctx.lastSearch.pattern, forward, count, ctx.search);
      return target ? { position: target, class: 'exclusive' } : null;
    }
    case 'search-word': {
      const word = wordUnderCursor(view, pos);
      if (!word) return null;
      const pattern = `\\b${escapeRegExp(word.word)}\\b`;
      const from = motion.forward ? pos : word.start;
      const target = resolveSearch(view, from, pattern, motion.forward, count, ctx.search);
      if (!target) return null;
      return { position: target, class: 'exclusive', search: { pattern, forward: motion.forward } };
    }
    case 'mark': {
      const mark = ctx.mark?.(motion.name);
      if (!mark) {
        throw new InvalidStateError(`Mark '${motion.name} not set`);
      }
      if (motion.linewise) {
        return { position: lineStart(view, mark.line), class: 'linewise' };
      }
      return { position: clampPosition(view, mark, true), class: 'exclusive' };
    }
    case 'simple':
      return resolveSimple(view, pos, motion.key, count, ctx);
  }
}

function resolveSimple(
  view: BufferView,
  pos: Position,
  key: string,
  count: number,
  ctx: MotionContext
): MotionResult | null {
  const text = lineAt(view, pos.line);
  switch (key) {
    case 'h':
    case '<Left>':
      return { position: { line: pos.line, column: Math.max(0, pos.column - count) }, class: 'exclusive' };
    case 'l':
    case '<Right>':
      return { position: { line: pos.line, column: Math.min(text.length, pos.column + count) }, class: 'exclusive' };
    case ' ': {
      let p = pos;
      for (let i = 0; i < count; i++) {
        if (p.column + 1 < lineLength(view, p.line)) {
          p = { line: p.line, column: p.column + 1 };
        } else if (p.line < lastLine(view)) {
          p = { line: p.line + 1, column: 0 };
        } else {
          p = { line: p.line, column: ctx.operatorPending ? lineLength(view, p.line) : p.column };
          break;
        }
      }
      return { position: p, class: 'exclusive' };
    }
    case '<BS>': {
      let p = pos;
      for (let i = 0; i < count; i++) {
        if (p.column > 0) {
          p = { line: p.line, column: p.column - 1 };
        } else if (p.line > 0) {
          p = { line: p.line - 1, column: Math.max(0, lineLength(view, p.line - 1) - 1) };
        }
      }
      return { position: p, class: 'exclusive' };
    }
    case 'j':
    case '<Down>':
    case 'k':
    case '<Up>': {
      const down = key === 'j' || key === '<Down>';
      const line = Math.min(Math.max(0, pos.line + (down ? count : -count)), lastLine(view));
      const desired = ctx.desiredColumn ?? pos.column;
      const column = Math.min(desired, Math.max(0, lineLength(view, line) - 1));
      return { position: { line, column }, class: 'linewise', desiredColumn: desired };
    }
    case '+':
    case '<CR>':
      return { position: lineStart(view, pos.line + count), class: 'linewise' };
    case '-':
      return { position: lineStart(view, pos.line - count), class: 'linewise' };
    case '_':
      return { position: lineStart(view, pos.line + count - 1), class: 'linewise' };
    case 'w':
    case 'W':
      return resolveWordForward(view, pos, count, key === 'W', ctx);
    case 'e':
    case 'E': {
      let p = pos;
      for (let i = 0; i < count; i++) p = nextWordEnd(view, p, key === 'E');
      return { position: p, class: 'inclusive' };
    }
    case 'b':
    case 'B': {
      let p = pos;
      for (let i = 0; i < count; i++) p = prevWordStart(view, p, key === 'B');
      return { position: p, class: 'exclusive' };
    }
    case 'ge':
    case 'gE': {
      let p = pos;
      for (let i = 0; i < count; i++) p = prevWordEnd(view, p, key === 'gE');
      return { position: p, class: 'inclusive' };
    }
    case '0':
    case '<Home>':
      return { position: { line: pos.line, column: 0 }, class: 'exclusive' };
    case '^':
      return { position: { line: pos.line, column: firstNonBlank(text) }, class: 'exclusive' };
    case '$':
    case '<End>': {
      const line = Math.min(pos.line + count - 1, lastLine(view));
      return {
        position: { line, column: Math.max(0, lineLength(view, line) - 1) },
        class: 'inclusive',
        desiredColumn: Infinity,
      };
    }
    case 'g_': {
      const line = Math.min(pos.line + count - 1, lastLine(view));
      return { position: { line, column: lastNonBlank(lineAt(view, line)) }, class: 'inclusive' };
    }
    case '|':
      return {
        position: { line: pos.line, column: Math.min(count - 1, Math.max(0, text.length - 1)) },
        class: 'exclusive',
        desiredColumn: count - 1,
      };
    case 'gg':
      return { position: lineStart(view, ctx.hasCount ? count - 1 : 0), class: 'linewise' };
    case 'G':
      return { position: lineStart(view, ctx.hasCount ? count - 1 : lastLine(view)), class: 'linewise' };
    case '}':
      return { position: paragraphForward(view, pos, count), class: 'exclusive' };
    case '{':
      return { position: paragraphBackward(view, pos, count), class: 'exclusive' };
    case '%': {
      if (ctx.hasCount) {
        if (count > 100) return null;
        const line = Math.ceil((count * (lastLine(view) + 1)) / 100) - 1;
        return { position: lineStart(view, line), class: 'linewise' };
      }
      const target = resolvePercent(view, pos);
      return target ? { position: target, class: 'inclusive' } : null;
    }
    default:
      return null;
  }
}

function resolveWordForward(
  view: BufferView,
  pos: Position,
  count: number,
  bigWord: boolean,
  ctx: MotionContext
): MotionResult {
  if (ctx.operator === 'c' && classAt(view, pos, bigWord) !== 0) {
    return { position: changeWordEnd(view, pos, count, bigWord), class: 'inclusive' };
  }
  let before = pos;
  let p = pos;
  for (let i = 0; i < count; i++) {
    before = p;
    p = nextWordStart(view, p, bigWord);
  }
  if (ctx.operatorPending && p.line > before.line) {
    // The operated text ends with the last word, not on the next line.
    const line = isEmptyLineStart(view, before) ? before.line : Math.max(before.line, p.line - 1);
    return { position: { line, column: lineLength(view, line) }, class: 'exclusive' };
  }
  return { position: p, class: 'exclusive' };
}
