import type { KeyEvent } from "./types";

const NAMED_KEYS = new Set([
  '<Esc>', '<CR>', '<BS>', '<Tab>', '<Del>',
  '<Up>', '<Down>', '<Left>', '<Right>', '<Home>', '<End>',
]);

const ALIASES: Record<string, KeyEvent> = {
  '\x1b': '<Esc>',
  'Esc': '<Esc>',
  'Escape': '<Esc>',
  '\r': '<CR>',
  '\n': '<CR>',
  'Enter': '<CR>',
  'Return': '<CR>',
  '\b': '<BS>',
  '\x7f': '<BS>',
  'Backspace': '<BS>',
  '\t': '<Tab>',
  'Tab': '<Tab>',
  'Delete': '<Del>',
  'ArrowUp': '<Up>',
  'ArrowDown': '<Down>',
  'ArrowLeft': '<Left>',
  'ArrowRight': '<Right>',
  'Home': '<Home>',
  'End': '<End>',
  'Space': ' ',
};

const TOKEN_PATTERN = /^<(Esc|CR|BS|Tab|Del|Up|Down|Left|Right|Home|End|lt|C-[a-z\[\]])>/i;

/**
 * Normalize a raw key from the host (a character, a DOM-style key name or a
 * control character) into the notation the composer matches on.
 */
export function normalizeKey(raw: string): KeyEvent {
  const alias = ALIASES[raw];
  if (alias !== undefined) {
    return alias;
  }
  if (raw.length === 1) {
    const code = raw.charCodeAt(0);
    if (code >= 1 && code <= 26) {
      return `<C-${String.fromCharCode(code + 96)}>`;
    }
    return raw;
  }
  const token = raw.match(TOKEN_PATTERN);
  if (token && token[0].length === raw.length) {
    return canonicalToken(token[1]);
  }
  return raw;
}

function canonicalToken(name: string): KeyEvent {
  if (name.toLowerCase() === 'lt') {
    return '<';
  }
  if (/^c-/i.test(name)) {
    return `<C-${name[2].toLowerCase()}>`;
  }
  for (const known of NAMED_KEYS) {
    if (known.slice(1, -1).toLowerCase() === name.toLowerCase()) {
      return known;
    }
  }
  return `<${name}>`;
}

/** Split a key script such as `d2w` or `ihello<Esc>` into key events. */
export function parseKeys(script: string): KeyEvent[] {
  const keys: KeyEvent[] = [];
  let i = 0;
  while (i < script.length) {
    if (script[i] === '<') {
      const token = script.slice(i).match(TOKEN_PATTERN);
      if (token) {
        keys.push(canonicalToken(token[1]));
        i += token[0].length;
        continue;
      }
    }
    const codePoint = script.codePointAt(i) ?? 0;
    const char = String.fromCodePoint(codePoint);
    keys.push(normalizeKey(char));
    i += char.length;
  }
  return keys;
}

export function serializeKeys(keys: readonly KeyEvent[]): string {
  return keys.map(key => (key === '<' ? '<lt>' : key)).join('');
}

/** A key that inserts itself as text. */
export function isPrintable(key: KeyEvent): boolean {
  return Array.from(key).length === 1 && key >= ' ';
}
