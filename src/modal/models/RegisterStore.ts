// src/modal/models/RegisterStore.ts
import { InvalidStateError } from "../errors";
import type { Register } from "../types";

const READ_ONLY = new Set(['.', ':', '/']);
const CLIPBOARD = new Set(['+', '*']);

export interface ClipboardAccess {
  read(): string | undefined;
  write(text: string): void;
}

/**
 * Registers shared by every editing context.
 *
 * - `"` unnamed: points at whatever the last yank, delete or change wrote
 * - `0` last yank, `1`-`9` delete history (`1` is the most recent)
 * - `a`-`z` named, `A`-`Z` append to the named register
 * - `-` small delete, `_` black hole, `+`/`*` clipboard
 * - `.` `:` `/` read-only: last insert, last command line, last search
 */
export class RegisterStore {
  private named = new Map<string, Register>();
  private history: Register[] = [];
  private yanked?: Register;
  private unnamed?: Register;
  private smallDelete?: Register;
  private clipboardFallback = new Map<string, Register>();
  private readOnly = new Map<string, Register>();

  constructor(
    private readonly depth: number = 9,
    private readonly clipboard?: ClipboardAccess
  ) {}

  static isValidName(name: string): boolean {
    return /^[a-zA-Z0-9"\-_+*.:/]$/.test(name);
  }

  static isWritable(name: string): boolean {
    return RegisterStore.isValidName(name) && !READ_ONLY.has(name);
  }

  get(name: string = '"'): Register | undefined {
    if (name === '"') return this.unnamed;
    if (name === '0') return this.yanked;
    if (/^[1-9]$/.test(name)) return this.history[Number(name) - 1];
    if (/^[a-zA-Z]$/.test(name)) return this.named.get(name.toLowerCase());
    if (name === '-') return this.smallDelete;
    if (name === '_') return undefined;
    if (CLIPBOARD.has(name)) return this.readClipboard(name);
    return this.readOnly.get(name);
  }

  /** A yank writes the target register and "0 (only when no register was named). */
  recordYank(name: string | undefined, register: Register): void {
    if (name === '_') return;
    if (name === undefined || name === '"') {
      this.yanked = { ...register };
      this.unnamed = { ...register };
      return;
    }
    this.write(name, register);
  }

  /**
   * A delete or change pushes onto the numbered history, shifting older
   * entries down and dropping the oldest; deletes within one line also
   * land in "-.
   */
  recordDelete(name: string | undefined, register: Register, small: boolean): void {
    if (name === '_') return;
    this.history = [{ ...register }, ...this.history].slice(0, this.depth);
    if (small) {
      this.smallDelete = { ...register };
    }
    if (name === undefined || name === '"') {
      this.unnamed = { ...register };
      return;
    }
    this.write(name, register);
  }

  /** Explicit write. Uppercase names append to their lowercase register. */
  write(name: string, register: Register): void {
    if (!RegisterStore.isValidName(name)) {
      throw new InvalidStateError(`Invalid register name: ${name}`);
    }
    if (READ_ONLY.has(name)) {
      throw new InvalidStateError(`Register ${name} is read-only`);
    }
    if (name === '_') return;

    let stored = { ...register };
    if (/^[A-Z]$/.test(name)) {
      const existing = this.named.get(name.toLowerCase());
      stored = existing ? appendRegister(existing, register) : stored;
      this.named.set(name.toLowerCase(), stored);
    } else if (/^[a-z]$/.test(name)) {
      this.named.set(name, stored);
    } else if (name === '0') {
      this.yanked = stored;
    } else if (/^[1-9]$/.test(name)) {
      const index = Number(name) - 1;
      if (index < this.depth) {
        const history = [...this.history];
        history[index] = stored;
        this.history = Array.from({ length: Math.max(history.length, index + 1) }, (_, i) => history[i])
          .filter((entry): entry is Register => entry !== undefined);
      }
    } else if (name === '-') {
      this.smallDelete = stored;
    } else if (CLIPBOARD.has(name)) {
      this.writeClipboard(name, stored);
    }
    this.unnamed = { ...stored };
  }

  setReadOnly(name: '.' | ':' | '/', text: string): void {
    this.readOnly.set(name, { text, shape: 'charwise' });
  }

  /** Non-empty registers in display order: `"`, `0`-`9`, `a`-`z`, then the rest. */
  entries(): Array<[string, Register]> {
    const names = ['"', '0', '1', '2', '3', '4', '5', '6', '7', '8', '9'];
    for (let i = 0; i < 26; i++) {
      names.push(String.fromCharCode(97 + i));
    }
    names.push('-', '+', '*', '.', ':', '/');

    const result: Array<[string, Register]> = [];
    for (const name of names) {
      const register = this.get(name);
      if (register && register.text.length > 0) {
        result.push([name, register]);
      }
    }
    return result;
  }

  format(): string {
    const lines: string[] = [];
    for (const [name, register] of this.entries()) {
      let contentStr = register.text.substring(0, 50);
      if (register.text.length > 50) {
        contentStr = register.text.substring(0, 47) + '...';
      }
      // Show newlines the way a register listing does
      contentStr = contentStr.replace(/\n/g, '^J');
      lines.push(`"${name}   ${contentStr}`);
    }
    return lines.length === 0 ? 'No registers' : lines.join('\n');
  }

  private readClipboard(name: string): Register | undefined {
    if (this.clipboard) {
      const text = this.clipboard.read();
      if (text === undefined) return undefined;
      return { text, shape: text.endsWith('\n') ? 'linewise' : 'charwise' };
    }
    return this.clipboardFallback.get(name);
  }

  private writeClipboard(name: string, register: Register): void {
    if (this.clipboard) {
      this.clipboard.write(register.text);
      return;
    }
    this.clipboardFallback.set(name, register);
  }
}

/** Appending anything linewise makes the result linewise. */
export function appendRegister(existing: Register, addition: Register): Register {
  if (existing.shape === 'linewise' || addition.shape === 'linewise') {
    const head = existing.text.endsWith('\n') ? existing.text : existing.text + '\n';
    const tail = addition.text.endsWith('\n') ? addition.text : addition.text + '\n';
    return { text: head + tail, shape: 'linewise' };
  }
  if (existing.shape === 'blockwise' || addition.shape === 'blockwise') {
    return { text: `${existing.text}\n${addition.text}`, shape: 'blockwise' };
  }
  return { text: existing.text + addition.text, shape: 'charwise' };
}

/** Register content as lines, without the trailing newline of linewise text. */
export function registerLines(register: Register): string[] {
  const text = register.shape === 'linewise' && register.text.endsWith('\n')
    ? register.text.slice(0, -1)
    : register.text;
  return text.split('\n');
}
