import { ExSyntaxError } from "../errors";
import { RegisterStore } from "../models/RegisterStore";
import { parseAddress, parseRangePrefix } from "../utils/RangeParser";
import type { Address, ExRange } from "../utils/RangeParser";
import type { HostCommandName } from "../types";

export interface SubstituteFlags {
  global: boolean;
  /** `i` forces ignore-case, `I` forces match-case; otherwise the configured case rules apply. */
  ignoreCase?: boolean;
  countOnly: boolean;
}

export type ExCommand =
  | {
    name: 'substitute';
    range?: ExRange;
    /** Undefined for `:&` and a bare `:s`, which repeat the last substitute. */
    pattern?: string;
    replacement?: string;
    flags: SubstituteFlags;
    keepFlags: boolean;
    count?: number;
  }
  | { name: 'global'; range?: ExRange; pattern: string; invert: boolean; command: ExCommand }
  | { name: 'delete'; range?: ExRange; register?: string; count?: number }
  | { name: 'yank'; range?: ExRange; register?: string; count?: number }
  | { name: 'put'; range?: ExRange; register?: string; above: boolean }
  | { name: 'move'; range?: ExRange; target: Address }
  | { name: 'copy'; range?: ExRange; target: Address }
  | { name: 'join'; range?: ExRange; count?: number; keepSpace: boolean }
  | { name: 'shift'; range?: ExRange; direction: '>' | '<'; levels: number; count?: number }
  | { name: 'normal'; range?: ExRange; keys: string }
  | { name: 'goto'; range: ExRange }
  | { name: 'registers' }
  | { name: 'marks' }
  | { name: 'mark'; range?: ExRange; mark: string }
  | { name: 'nohlsearch' }
  | { name: 'host'; range?: ExRange; command: HostCommandName; force: boolean; argument?: string };

interface CommandEntry {
  full: string;
  /** Shortest accepted abbreviation. */
  min: number;
}

const COMMANDS: CommandEntry[] = [
  { full: 'substitute', min: 1 },
  { full: 'global', min: 1 },
  { full: 'vglobal', min: 1 },
  { full: 'delete', min: 1 },
  { full: 'yank', min: 1 },
  { full: 'put', min: 2 },
  { full: 'move', min: 1 },
  { full: 'mark', min: 2 },
  { full: 'marks', min: 5 },
  { full: 'copy', min: 2 },
  { full: 't', min: 1 },
  { full: 'join', min: 1 },
  { full: 'normal', min: 4 },
  { full: 'registers', min: 3 },
  { full: 'display', min: 2 },
  { full: 'k', min: 1 },
  { full: 'nohlsearch', min: 3 },
  { full: 'write', min: 1 },
  { full: 'wq', min: 2 },
  { full: 'wall', min: 2 },
  { full: 'wqall', min: 3 },
  { full: 'xit', min: 1 },
  { full: 'xall', min: 2 },
  { full: 'quit', min: 1 },
  { full: 'qall', min: 2 },
  { full: 'update', min: 2 },
  { full: 'edit', min: 1 },
  { full: 'undo', min: 1 },
  { full: 'redo', min: 3 },
];

const GLOBAL_SUBCOMMANDS = new Set<ExCommand['name']>([
  'substitute', 'delete', 'yank', 'put', 'move', 'copy', 'join', 'shift', 'normal', 'mark',
]);

const HOST_COMMANDS: Record<string, HostCommandName> = {
  write: 'write',
  wq: 'write-quit',
  wall: 'write-all',
  wqall: 'write-quit-all',
  xit: 'write-quit',
  xall: 'write-quit-all',
  quit: 'quit',
  qall: 'quit-all',
  update: 'update',
  edit: 'edit',
  undo: 'undo',
  redo: 'redo',
};

function lookupCommand(word: string): string | undefined {
  // Exact names win over abbreviations ("marks" is not "mark" + "s")
  const exact = COMMANDS.find(entry => entry.full === word);
  if (exact) {
    return exact.full;
  }
  const candidates = COMMANDS.filter(entry => word.length >= entry.min && entry.full.startsWith(word));
  return candidates.length > 0 ? candidates[0].full : undefined;
}

/** Reads a pattern or replacement up to an unescaped delimiter. */
function readUntil(text: string, from: number, delimiter: string): { value: string; next: number; closed: boolean } {
  let value = '';
  let i = from;
  while (i < text.length) {
    const char = text[i];
    if (char === '\\' && i + 1 < text.length) {
      value += text[i + 1] === delimiter ? delimiter : char + text[i + 1];
      i += 2;
      continue;
    }
    if (char === delimiter) {
      return { value, next: i + 1, closed: true };
    }
    value += char;
    i++;
  }
  return { value, next: i, closed: false };
}

function isValidDelimiter(char: string | undefined): char is string {
  return char !== undefined && !/[a-zA-Z0-9\s\\"|]/.test(char);
}

function parseTrailingCount(args: string, command: string): number | undefined {
  const trimmed = args.trim();
  if (!trimmed) {
    return undefined;
  }
  if (!/^\d+$/.test(trimmed)) {
    throw new ExSyntaxError(`Trailing characters: ${trimmed}`);
  }
  const count = parseInt(trimmed, 10);
  if (count < 1) {
    throw new ExSyntaxError(`Positive count required: ${command} ${trimmed}`);
  }
  return count;
}

/** `[x] [count]` arguments of `:d` and `:y`. */
function parseRegisterAndCount(args: string, command: string): { register?: string; count?: number } {
  const trimmed = args.trim();
  const first = trimmed[0];
  if (first !== undefined && !/\d/.test(first) && RegisterStore.isValidName(first)) {
    if (!RegisterStore.isWritable(first)) {
      throw new ExSyntaxError(`Invalid register name: ${first}`);
    }
    return { register: first, count: parseTrailingCount(trimmed.slice(1), command) };
  }
  return { count: parseTrailingCount(trimmed, command) };
}

function parseSubstitute(range: ExRange | undefined, args: string, repeatOnly: boolean): ExCommand {
  const delimiter = args[0];
  if (repeatOnly || !isValidDelimiter(delimiter)) {
    // `:s [flags] [count]` and `:& [flags] [count]` repeat the last substitute
    const match = args.trim().match(/^(&?)([giIn]*)\s*(\d*)$/);
    if (!match) {
      throw new ExSyntaxError(`Trailing characters: ${args.trim()}`);
    }
    return {
      name: 'substitute',
      range,
      flags: parseFlags(match[2]),
      keepFlags: match[1] === '&',
      count: match[3] ? parseInt(match[3], 10) : undefined,
    };
  }

  const pattern = readUntil(args, 1, delimiter);
  const replacement = pattern.closed ? readUntil(args, pattern.next, delimiter) : { value: '', next: pattern.next, closed: false };
  const tail = args.slice(replacement.next);
  const match = tail.match(/^(&?)([a-zA-Z]*)\s*(\d*)\s*$/);
  if (!match) {
    throw new ExSyntaxError(`Trailing characters: ${tail}`);
  }
  return {
    name: 'substitute',
    range,
    pattern: pattern.value,
    replacement: replacement.value,
    flags: parseFlags(match[2]),
    keepFlags: match[1] === '&',
    count: match[3] ? parseInt(match[3], 10) : undefined,
  };
}

function parseFlags(flags: string): SubstituteFlags {
  const result: SubstituteFlags = { global: false, countOnly: false };
  for (const flag of flags) {
    switch (flag) {
      case 'g':
        result.global = !result.global;
        break;
      case 'i':
        result.ignoreCase = true;
        break;
      case 'I':
        result.ignoreCase = false;
        break;
      case 'n':
        result.countOnly = true;
        break;
      default:
        throw new ExSyntaxError(`Invalid flag: ${flag}`);
    }
  }
  return result;
}

function parseGlobal(range: ExRange | undefined, args: string, invert: boolean): ExCommand {
  let rest = args;
  if (rest.startsWith('!')) {
    invert = !invert;
    rest = rest.slice(1);
  }
  const delimiter = rest[0];
  if (!isValidDelimiter(delimiter)) {
    throw new ExSyntaxError('Regular expression missing from :global');
  }
  const pattern = readUntil(rest, 1, delimiter);
  const subcommand = rest.slice(pattern.next).trim();
  if (!subcommand) {
    throw new ExSyntaxError('Missing command for :global');
  }
  const command = parseExCommand(subcommand);
  if (command.name === 'global') {
    throw new ExSyntaxError('Cannot do :global recursive');
  }
  if (!GLOBAL_SUBCOMMANDS.has(command.name)) {
    throw new ExSyntaxError(`Not allowed in :global: ${subcommand}`);
  }
  return { name: 'global', range: range ?? { kind: 'all' }, pattern: pattern.value, invert, command };
}

function parseTarget(args: string, command: string): Address {
  const trimmed = args.trim();
  const parsed = parseAddress(trimmed, 0);
  if (!parsed) {
    throw new ExSyntaxError(`Destination required: ${command}`);
  }
  if (trimmed.slice(parsed.next).trim()) {
    throw new ExSyntaxError(`Trailing characters: ${trimmed.slice(parsed.next).trim()}`);
  }
  return parsed.address;
}

/**
 * Parse one command line (without the leading `:`). Throws ExSyntaxError
 * for malformed input, so nothing runs unless the whole line is valid.
 */
export function parseExCommand(line: string): ExCommand {
  const { range, rest } = parseRangePrefix(line);
  const text = rest.trimStart();

  if (!text) {
    if (!range) {
      throw new ExSyntaxError('Empty command');
    }
    return { name: 'goto', range };
  }

  if (text.startsWith('&&')) {
    return parseSubstitute(range, '&' + text.slice(2), true);
  }
  if (text.startsWith('&')) {
    return parseSubstitute(range, text.slice(1), true);
  }

  const shift = text.match(/^([<>])(\1*)\s*(\d*)\s*$/);
  if (shift) {
    const direction = shift[1] === '>' ? '>' : '<';
    return {
      name: 'shift',
      range,
      direction,
      levels: 1 + shift[2].length,
      count: shift[3] ? parseTrailingCount(shift[3], direction) : undefined,
    };
  }

  const wordMatch = text.match(/^[a-zA-Z]+/);
  if (!wordMatch) {
    throw new ExSyntaxError(`Unsupported Ex command: ${text}`);
  }
  const word = wordMatch[0];
  let args = text.slice(word.length);

  // `:kx` sets mark x without a space
  const markShorthand = word.match(/^k([a-z])$/);
  if (markShorthand && !lookupCommand(word)) {
    return { name: 'mark', range, mark: markShorthand[1] };
  }

  // Substitute and global take a delimiter straight after the name: `:s#a#b#`
  const name = lookupCommand(word);
  if (!name) {
    throw new ExSyntaxError(`Unsupported Ex command: ${word}`);
  }

  let bang = false;
  if (args.startsWith('!')) {
    bang = true;
    args = args.slice(1);
  }

  switch (name) {
    case 'substitute':
      if (bang) throw new ExSyntaxError('Trailing characters: !');
      return parseSubstitute(range, args, false);

    case 'global':
      return parseGlobal(range, bang ? '!' + args : args, false);

    case 'vglobal':
      return parseGlobal(range, args, true);

    case 'delete':
      return { name: 'delete', range, ...parseRegisterAndCount(args, name) };

    case 'yank':
      return { name: 'yank', range, ...parseRegisterAndCount(args, name) };

    case 'put': {
      const register = args.trim();
      if (register && (register.length !== 1 || !RegisterStore.isValidName(register))) {
        throw new ExSyntaxError(`Invalid register name: ${register}`);
      }
      return { name: 'put', range, register: register || undefined, above: bang };
    }

    case 'move':
      return { name: 'move', range, target: parseTarget(args, name) };

    case 'copy':
    case 't':
      return { name: 'copy', range, target: parseTarget(args, name) };

    case 'join':
      return { name: 'join', range, keepSpace: bang, count: parseTrailingCount(args, name) };

    case 'normal': {
      const keys = args.replace(/^\s/, '');
      if (!keys) {
        throw new ExSyntaxError('Argument required: normal');
      }
      return { name: 'normal', range, keys };
    }

    case 'registers':
    case 'display':
      return { name: 'registers' };

    case 'marks':
      return { name: 'marks' };

    case 'mark':
    case 'k': {
      const mark = args.trim();
      if (!/^[a-z<>]$/.test(mark)) {
        throw new ExSyntaxError(mark ? `Invalid mark: ${mark}` : 'Argument required: mark');
      }
      return { name: 'mark', range, mark };
    }

    case 'nohlsearch':
      return { name: 'nohlsearch' };

    default: {
      const command = HOST_COMMANDS[name];
      if (command === undefined) {
        throw new ExSyntaxError(`Unsupported Ex command: ${word}`);
      }
      const argument = args.trim();
      return { name: 'host', range, command, force: bang, argument: argument || undefined };
    }
  }
}
