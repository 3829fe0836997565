export type ReplacementPart =
  | { kind: 'text'; text: string }
  | { kind: 'group'; index: number }
  | { kind: 'case'; mode: 'u' | 'l' | 'U' | 'L' | 'E' };

/** Number of capture groups in `regex`. */
export function countGroups(regex: RegExp): number {
  const match = new RegExp(`${regex.source}|`).exec('');
  return match ? match.length - 1 : 0;
}

/**
 * Parse a `:substitute` replacement: `&` and `\0` are the whole match,
 * `\1`-`\9` groups, `\r` and `\n` a line break, `\u \l \U \L \E` change case.
 */
export function parseReplacement(template: string, groupCount: number): ReplacementPart[] {
  const parts: ReplacementPart[] = [];
  const pushText = (text: string) => {
    const last = parts[parts.length - 1];
    if (last && last.kind === 'text') {
      last.text += text;
    } else {
      parts.push({ kind: 'text', text });
    }
  };

  for (let i = 0; i < template.length; i++) {
    const char = template[i];
    if (char === '&') {
      parts.push({ kind: 'group', index: 0 });
      continue;
    }
    if (char !== '\\' || i + 1 >= template.length) {
      pushText(char);
      continue;
    }

    const escaped = template[++i];
    if (/[0-9]/.test(escaped)) {
      const index = Number(escaped);
      if (index <= groupCount) {
        parts.push({ kind: 'group', index });
      } else {
        pushText(`\\${escaped}`);
      }
    } else if (escaped === 'r' || escaped === 'n') {
      pushText('\n');
    } else if (escaped === 't') {
      pushText('\t');
    } else if (escaped === 'u' || escaped === 'l' || escaped === 'U' || escaped === 'L') {
      parts.push({ kind: 'case', mode: escaped });
    } else if (escaped === 'E' || escaped === 'e') {
      parts.push({ kind: 'case', mode: 'E' });
    } else {
      pushText(escaped);
    }
  }
  return parts;
}

/** Build the replacement text for one match. Groups that did not take part are empty. */
export function expandReplacement(parts: readonly ReplacementPart[], match: RegExpExecArray): string {
  let result = '';
  let oneShot: 'u' | 'l' | undefined;
  let persistent: 'U' | 'L' | undefined;

  const append = (text: string) => {
    for (const char of text) {
      let next = char;
      if (persistent === 'U') next = next.toUpperCase();
      if (persistent === 'L') next = next.toLowerCase();
      if (oneShot === 'u') next = next.toUpperCase();
      if (oneShot === 'l') next = next.toLowerCase();
      oneShot = undefined;
      result += next;
    }
  };

  for (const part of parts) {
    switch (part.kind) {
      case 'text':
        append(part.text);
        break;
      case 'group':
        append(match[part.index] ?? '');
        break;
      case 'case':
        if (part.mode === 'u' || part.mode === 'l') {
          oneShot = part.mode;
        } else if (part.mode === 'E') {
          persistent = undefined;
        } else {
          persistent = part.mode;
        }
        break;
    }
  }
  return result;
}
