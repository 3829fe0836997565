import type { BufferView } from "../models/BufferView";
import { lastLine, lineAt } from "../models/BufferView";
import { ExSyntaxError, InvalidStateError } from "../errors";
import { compileSearchPattern } from "../motions/MotionResolver";
import type { SearchOptions } from "../motions/MotionResolver";

export type LineReference =
  | { kind: 'number'; line: number }
  | { kind: 'current' }
  | { kind: 'last' }
  | { kind: 'mark'; name: string }
  | { kind: 'pattern'; pattern: string; forward: boolean };

/** A line reference plus its `+N`/`-N` offsets. */
export interface Address {
  base: LineReference;
  offset: number;
}

export type ExRange =
  | { kind: 'all' }
  | { kind: 'addresses'; start: Address; end?: Address; separator: ',' | ';' };

export interface RangeEnvironment {
  view: BufferView;
  cursorLine: number;
  mark(name: string): number | undefined;
  lastSearch?: string;
  search: SearchOptions;
}

/** Zero-based lines; `-1` stands for address 0 (before the first line). */
export interface LineRange {
  start: number;
  end: number;
}

function readDelimited(text: string, from: number, delimiter: string): { value: string; next: number } {
  let value = '';
  let i = from;
  while (i < text.length && text[i] !== delimiter) {
    if (text[i] === '\\' && text[i + 1] === delimiter) {
      value += delimiter;
      i += 2;
      continue;
    }
    value += text[i];
    i++;
  }
  return { value, next: i < text.length ? i + 1 : i };
}

function parseOffsets(text: string, from: number): { offset: number; next: number; found: boolean } {
  let offset = 0;
  let i = from;
  let found = false;
  for (;;) {
    const match = text.slice(i).match(/^\s*([+-])(\d*)/);
    if (!match) break;
    const amount = match[2] ? parseInt(match[2], 10) : 1;
    offset += match[1] === '+' ? amount : -amount;
    i += match[0].length;
    found = true;
  }
  return { offset, next: i, found };
}

/** Parse one address at `from`, or return null when none starts there. */
export function parseAddress(text: string, from: number): { address: Address; next: number } | null {
  let i = from;
  while (text[i] === ' ') i++;
  let base: LineReference | undefined;
  const char = text[i];

  const digits = text.slice(i).match(/^\d+/);
  if (digits) {
    base = { kind: 'number', line: parseInt(digits[0], 10) };
    i += digits[0].length;
  } else if (char === '.') {
    base = { kind: 'current' };
    i++;
  } else if (char === '$') {
    base = { kind: 'last' };
    i++;
  } else if (char === "'") {
    const name = text[i + 1];
    if (name === undefined || !/^[a-z<>]$/.test(name)) {
      throw new ExSyntaxError(`Invalid mark: '${name ?? ''}`);
    }
    base = { kind: 'mark', name };
    i += 2;
  } else if (char === '/' || char === '?') {
    const { value, next } = readDelimited(text, i + 1, char);
    base = { kind: 'pattern', pattern: value, forward: char === '/' };
    i = next;
  }

  const offsets = parseOffsets(text, i);
  if (!base && !offsets.found) {
    return null;
  }
  return { address: { base: base ?? { kind: 'current' }, offset: offsets.offset }, next: offsets.next };
}

/** Split `text` into its leading range and the command that follows. */
export function parseRangePrefix(text: string): { range?: ExRange; rest: string } {
  let i = 0;
  while (text[i] === ' ' || text[i] === ':') i++;

  if (text[i] === '%') {
    return { range: { kind: 'all' }, rest: text.slice(i + 1) };
  }

  const first = parseAddress(text, i);
  let start: Address | undefined = first?.address;
  i = first ? first.next : i;
  while (text[i] === ' ') i++;

  const separator = text[i];
  if (separator === ',' || separator === ';') {
    const second = parseAddress(text, i + 1);
    const current: Address = { base: { kind: 'current' }, offset: 0 };
    start = start ?? current;
    const end = second ? second.address : current;
    i = second ? second.next : i + 1;
    return { range: { kind: 'addresses', start, end, separator }, rest: text.slice(i) };
  }

  if (start) {
    return { range: { kind: 'addresses', start, separator: ',' }, rest: text.slice(i) };
  }
  return { rest: text.slice(i) };
}

function searchLine(env: RangeEnvironment, from: number, pattern: string, forward: boolean): number {
  const source = pattern === '' ? env.lastSearch : pattern;
  if (source === undefined) {
    throw new InvalidStateError('No previous regular expression');
  }
  const regex = compileSearchPattern(source, env.search);
  const total = lastLine(env.view) + 1;
  for (let step = 1; step <= total; step++) {
    const raw = forward ? from + step : from - step;
    if (!env.search.wrapScan && (raw < 0 || raw >= total)) break;
    const line = ((raw % total) + total) % total;
    if (regex.test(lineAt(env.view, line))) {
      return line;
    }
  }
  throw new InvalidStateError(`Pattern not found: ${source}`);
}

export function resolveAddress(address: Address, env: RangeEnvironment, cursorLine = env.cursorLine): number {
  let line: number;
  const base = address.base;
  switch (base.kind) {
    case 'number':
      line = base.line - 1;
      break;
    case 'current':
      line = cursorLine;
      break;
    case 'last':
      line = lastLine(env.view);
      break;
    case 'mark': {
      const marked = env.mark(base.name);
      if (marked === undefined) {
        throw new InvalidStateError(`Mark '${base.name} not set`);
      }
      line = marked;
      break;
    }
    case 'pattern':
      line = searchLine(env, cursorLine, base.pattern, base.forward);
      break;
  }
  line += address.offset;
  if (line < -1 || line > lastLine(env.view)) {
    throw new InvalidStateError('Invalid range');
  }
  return line;
}

/** Resolve a range to zero-based lines; without one, the cursor line. */
export function resolveRange(range: ExRange | undefined, env: RangeEnvironment): LineRange {
  if (!range) {
    return { start: env.cursorLine, end: env.cursorLine };
  }
  if (range.kind === 'all') {
    return { start: 0, end: lastLine(env.view) };
  }

  const start = resolveAddress(range.start, env);
  if (!range.end) {
    return { start, end: start };
  }
  const end = resolveAddress(range.end, env, range.separator === ';' ? Math.max(0, start) : env.cursorLine);
  if (end < start) {
    throw new InvalidStateError(`End line ${end + 1} cannot be less than start line ${start + 1}`);
  }
  return { start, end };
}
