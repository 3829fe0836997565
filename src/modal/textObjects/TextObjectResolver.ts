import type { BufferView } from "../models/BufferView";
import {
  documentText,
  isBlankLine,
  lastLine,
  lineAt,
  lineLength,
  offsetOf,
  positionAt,
} from "../models/BufferView";
import { charClass } from "../motions/MotionResolver";
import type { Position, Span } from "../types";

export type TextObjectScope = 'inner' | 'around';

interface PairDelimiters {
  open: string;
  close: string;
}

const PAIRS: Record<string, PairDelimiters> = {
  '(': { open: '(', close: ')' },
  ')': { open: '(', close: ')' },
  'b': { open: '(', close: ')' },
  '[': { open: '[', close: ']' },
  ']': { open: '[', close: ']' },
  '{': { open: '{', close: '}' },
  '}': { open: '{', close: '}' },
  'B': { open: '{', close: '}' },
  '<': { open: '<', close: '>' },
  '>': { open: '<', close: '>' },
};

const QUOTES = new Set(['"', "'", '`']);

/**
 * Resolve a text object around `pos`. Returns null when there is nothing
 * to select, for example `i(` outside any parentheses.
 */
export function resolveTextObject(
  view: BufferView,
  pos: Position,
  object: string,
  scope: TextObjectScope,
  count: number
): Span | null {
  const pair = PAIRS[object];
  if (pair !== undefined) {
    return pairObject(view, pos, pair, scope, count);
  }
  if (QUOTES.has(object)) {
    return quoteObject(view, pos, object, scope);
  }
  switch (object) {
    case 'w':
    case 'W':
      return wordObject(view, pos, scope, count, object === 'W');
    case 's':
      return sentenceObject(view, pos, scope, count);
    case 'p':
      return paragraphObject(view, pos, scope, count);
    case 't':
      return tagObject(view, pos, scope, count);
    default:
      return null;
  }
}

interface Run {
  start: number;
  end: number;
  cls: number;
}

function splitRuns(text: string, bigWord: boolean): Run[] {
  const runs: Run[] = [];
  for (let i = 0; i < text.length; i++) {
    const cls = charClass(text[i], bigWord);
    const last = runs[runs.length - 1];
    if (last && last.cls === cls) {
      last.end = i + 1;
    } else {
      runs.push({ start: i, end: i + 1, cls });
    }
  }
  return runs;
}

function wordObject(view: BufferView, pos: Position, scope: TextObjectScope, count: number, bigWord: boolean): Span | null {
  const text = lineAt(view, pos.line);
  if (text.length === 0) {
    return null;
  }
  const column = Math.min(pos.column, text.length - 1);
  const runs = splitRuns(text, bigWord);
  const index = runs.findIndex(run => column >= run.start && column < run.end);
  const at = (first: number, last: number): Span => ({
    start: { line: pos.line, column: runs[first].start },
    end: { line: pos.line, column: runs[last].end - 1 },
    class: 'inclusive',
  });

  if (scope === 'inner') {
    return at(index, Math.min(index + count - 1, runs.length - 1));
  }

  if (runs[index].cls === 0) {
    // Leading whitespace plus the word(s) after it
    return at(index, Math.min(index + 2 * count - 1, runs.length - 1));
  }

  const lastWord = Math.min(index + 2 * (count - 1), runs.length - 1);
  const following = runs[lastWord + 1];
  if (following && following.cls === 0) {
    return at(index, lastWord + 1);
  }
  const preceding = runs[index - 1];
  if (preceding && preceding.cls === 0) {
    return at(index - 1, lastWord);
  }
  return at(index, lastWord);
}

function paragraphBounds(view: BufferView, line: number): [number, number] {
  let start = line;
  while (start > 0 && !isBlankLine(view, start - 1)) start--;
  let end = line;
  while (end < lastLine(view) && !isBlankLine(view, end + 1)) end++;
  return [start, end];
}

interface Sentence {
  start: number;
  /** End of the sentence text, exclusive. */
  end: number;
  /** End of the whitespace that follows, exclusive. */
  gapEnd: number;
}

function splitSentences(text: string): Sentence[] {
  const sentences: Sentence[] = [];
  const leading = text.search(/\S/);
  if (leading < 0) {
    return sentences;
  }
  let start = leading;
  const boundary = /[.!?][)\]"']*(\s+)/g;
  let match: RegExpExecArray | null;
  while ((match = boundary.exec(text)) !== null) {
    const end = match.index + match[0].length - match[1].length;
    const gapEnd = match.index + match[0].length;
    if (gapEnd >= text.length) {
      break;
    }
    sentences.push({ start, end, gapEnd });
    start = gapEnd;
  }
  const trimmedEnd = text.replace(/\s+$/, '').length;
  sentences.push({ start, end: Math.max(start, trimmedEnd), gapEnd: text.length });
  return sentences;
}

function sentenceObject(view: BufferView, pos: Position, scope: TextObjectScope, count: number): Span | null {
  if (isBlankLine(view, pos.line)) {
    return null;
  }
  const [first, last] = paragraphBounds(view, pos.line);
  const lines = view.slice(first, last + 1);
  const text = lines.join('\n');
  const offset = offsetOf(lines, { line: pos.line - first, column: pos.column });
  const sentences = splitSentences(text);
  if (sentences.length === 0) {
    return null;
  }

  const toSpan = (start: number, end: number): Span => {
    const from = positionAt(lines, start);
    const to = positionAt(lines, end);
    return {
      start: { line: from.line + first, column: from.column },
      end: { line: to.line + first, column: to.column },
      class: 'exclusive',
    };
  };

  let index = sentences.findIndex(sentence => offset < sentence.gapEnd);
  if (index < 0) index = sentences.length - 1;
  const current = sentences[index];
  const lastIndex = Math.min(index + count - 1, sentences.length - 1);

  if (offset < current.start || offset >= current.end) {
    // On the whitespace between two sentences
    const gapStart = offset < current.start ? 0 : current.end;
    const gapEnd = offset < current.start ? current.start : current.gapEnd;
    if (scope === 'inner') {
      return toSpan(gapStart, gapEnd);
    }
    const nextSentence = sentences[offset < current.start ? index : index + 1];
    return toSpan(gapStart, nextSentence ? nextSentence.end : gapEnd);
  }

  if (scope === 'inner') {
    return toSpan(current.start, sentences[lastIndex].end);
  }
  const tail = sentences[lastIndex];
  if (tail.gapEnd > tail.end) {
    return toSpan(current.start, tail.gapEnd);
  }
  const previous = sentences[index - 1];
  if (previous && previous.gapEnd > previous.end) {
    return toSpan(previous.end, tail.end);
  }
  return toSpan(current.start, tail.end);
}

function paragraphObject(view: BufferView, pos: Position, scope: TextObjectScope, count: number): Span {
  const blankAt = (line: number) => isBlankLine(view, line);
  const runEnd = (line: number): number => {
    const blank = blankAt(line);
    let end = line;
    while (end < lastLine(view) && blankAt(end + 1) === blank) end++;
    return end;
  };

  let start = pos.line;
  const blank = blankAt(start);
  while (start > 0 && blankAt(start - 1) === blank) start--;

  let end = runEnd(pos.line);
  const units = scope === 'inner' ? count : count * 2;
  for (let i = 1; i < units && end < lastLine(view); i++) {
    end = runEnd(end + 1);
  }

  if (scope === 'around' && !blank && !blankAt(end)) {
    // No blank lines after the paragraph: take the ones before it
    while (start > 0 && blankAt(start - 1)) start--;
  }

  return { start: { line: start, column: 0 }, end: { line: end, column: 0 }, class: 'linewise' };
}

function nextChar(view: BufferView, pos: Position): Position | null {
  if (pos.column + 1 < lineLength(view, pos.line)) {
    return { line: pos.line, column: pos.column + 1 };
  }
  for (let line = pos.line + 1; line <= lastLine(view); line++) {
    if (lineLength(view, line) > 0) return { line, column: 0 };
  }
  return null;
}

function prevChar(view: BufferView, pos: Position): Position | null {
  if (pos.column > 0) {
    return { line: pos.line, column: Math.min(pos.column - 1, lineLength(view, pos.line) - 1) };
  }
  for (let line = pos.line - 1; line >= 0; line--) {
    const length = lineLength(view, line);
    if (length > 0) return { line, column: length - 1 };
  }
  return null;
}

function charAtPosition(view: BufferView, pos: Position): string | undefined {
  return lineAt(view, pos.line)[pos.column];
}

/** Innermost unmatched `open` before `pos`, skipping balanced pairs. */
function findEnclosingOpen(view: BufferView, pos: Position, pair: PairDelimiters, includeCurrent: boolean): Position | null {
  const current = charAtPosition(view, pos);
  if (includeCurrent && current === pair.open) {
    return pos;
  }
  let depth = 0;
  let p = prevChar(view, pos);
  while (p) {
    const c = charAtPosition(view, p);
    if (c === pair.close) {
      depth++;
    } else if (c === pair.open) {
      if (depth === 0) return p;
      depth--;
    }
    p = prevChar(view, p);
  }
  return null;
}

function findClose(view: BufferView, open: Position, pair: PairDelimiters): Position | null {
  let depth = 1;
  let p = nextChar(view, open);
  while (p) {
    const c = charAtPosition(view, p);
    if (c === pair.open) {
      depth++;
    } else if (c === pair.close) {
      depth--;
      if (depth === 0) return p;
    }
    p = nextChar(view, p);
  }
  return null;
}

function pairObject(view: BufferView, pos: Position, pair: PairDelimiters, scope: TextObjectScope, count: number): Span | null {
  let open = findEnclosingOpen(view, pos, pair, true);
  for (let i = 1; i < count && open; i++) {
    open = findEnclosingOpen(view, open, pair, false);
  }
  if (!open) {
    return null;
  }
  const close = findClose(view, open, pair);
  if (!close) {
    return null;
  }

  if (scope === 'around') {
    return { start: open, end: close, class: 'inclusive' };
  }

  const openAtLineEnd = open.column === lineLength(view, open.line) - 1;
  const closeAtLineStart = lineAt(view, close.line).slice(0, close.column).trim() === '';
  if (openAtLineEnd && closeAtLineStart && close.line - open.line >= 2) {
    return {
      start: { line: open.line + 1, column: 0 },
      end: { line: close.line - 1, column: 0 },
      class: 'linewise',
    };
  }
  return { start: { line: open.line, column: open.column + 1 }, end: close, class: 'exclusive' };
}

function quotePositions(text: string, quote: string): number[] {
  const positions: number[] = [];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\\') {
      i++;
      continue;
    }
    if (text[i] === quote) {
      positions.push(i);
    }
  }
  return positions;
}

function quoteObject(view: BufferView, pos: Position, quote: string, scope: TextObjectScope): Span | null {
  const text = lineAt(view, pos.line);
  const quotes = quotePositions(text, quote);
  let pair: [number, number] | null = null;
  for (let i = 0; i + 1 < quotes.length; i += 2) {
    if (pos.column >= quotes[i] && pos.column <= quotes[i + 1]) {
      pair = [quotes[i], quotes[i + 1]];
      break;
    }
  }
  if (!pair) {
    for (let i = 0; i + 1 < quotes.length; i += 2) {
      if (quotes[i] > pos.column) {
        pair = [quotes[i], quotes[i + 1]];
        break;
      }
    }
  }
  if (!pair) {
    return null;
  }

  const [open, close] = pair;
  if (scope === 'inner') {
    return {
      start: { line: pos.line, column: open + 1 },
      end: { line: pos.line, column: close },
      class: 'exclusive',
    };
  }

  let start = open;
  let end = close + 1;
  const trailing = text.slice(end).match(/^[ \t]+/);
  if (trailing) {
    end += trailing[0].length;
  } else {
    const leading = text.slice(0, start).match(/[ \t]+$/);
    if (leading && leading.index !== undefined && leading.index > 0) {
      start = leading.index;
    }
  }
  return { start: { line: pos.line, column: start }, end: { line: pos.line, column: end }, class: 'exclusive' };
}

interface TagPair {
  openStart: number;
  openEnd: number;
  closeStart: number;
  closeEnd: number;
}

function collectTagPairs(text: string): TagPair[] {
  const pairs: TagPair[] = [];
  const stack: Array<{ name: string; start: number; end: number }> = [];
  const tagPattern = /<(\/?)([A-Za-z][\w:.-]*)[^<>]*?(\/?)>/g;
  let match: RegExpExecArray | null;
  while ((match = tagPattern.exec(text)) !== null) {
    const [whole, closing, name, selfClosing] = match;
    if (selfClosing) continue;
    if (!closing) {
      stack.push({ name, start: match.index, end: match.index + whole.length });
      continue;
    }
    for (let i = stack.length - 1; i >= 0; i--) {
      if (stack[i].name === name) {
        const open = stack[i];
        stack.length = i;
        pairs.push({ openStart: open.start, openEnd: open.end, closeStart: match.index, closeEnd: match.index + whole.length });
        break;
      }
    }
  }
  return pairs;
}

function tagObject(view: BufferView, pos: Position, scope: TextObjectScope, count: number): Span | null {
  const text = documentText(view);
  const offset = offsetOf(view, pos);
  const enclosing = collectTagPairs(text)
    .filter(pair => pair.openStart <= offset && offset < pair.closeEnd)
    .sort((a, b) => (a.closeEnd - a.openStart) - (b.closeEnd - b.openStart));
  const pair = enclosing[count - 1];
  if (!pair) {
    return null;
  }
  const start = scope === 'inner' ? pair.openEnd : pair.openStart;
  const end = scope === 'inner' ? pair.closeStart : pair.closeEnd;
  return { start: positionAt(view, start), end: positionAt(view, end), class: 'exclusive' };
}
