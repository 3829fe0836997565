import type { KeyEvent } from "../types";

export type OperatorToken = 'd' | 'c' | 'y' | '>' | '<' | 'g~' | 'gu' | 'gU';

export type CharPurpose =
  | { kind: 'find'; motion: 'f' | 'F' | 't' | 'T' }
  | { kind: 'replace' }
  | { kind: 'set-mark' }
  | { kind: 'jump-mark'; linewise: boolean }
  | { kind: 'record' }
  | { kind: 'play' };

/** What the composer expects from the next key. */
export type Awaiting =
  | { kind: 'command' }
  | { kind: 'register' }
  | { kind: 'prefix'; prefix: 'g' | 'Z' }
  | { kind: 'char'; purpose: CharPurpose }
  | { kind: 'text-object'; scope: 'inner' | 'around' };

export interface PendingCommand {
  /** Count factors already closed off by a register or operator key. */
  counts: number[];
  /** Digits typed for the count currently being built. */
  digits: string;
  register?: string;
  operator?: OperatorToken;
  awaiting: Awaiting;
  /** Command keys without count digits or register selection, kept for `.`. */
  keys: KeyEvent[];
}

export function createPendingCommand(): PendingCommand {
  return { counts: [], digits: '', awaiting: { kind: 'command' }, keys: [] };
}

export function hasCount(pending: PendingCommand): boolean {
  return pending.counts.length > 0 || pending.digits.length > 0;
}

/** Product of every count factor, or 1 when none was typed. */
export function effectiveCount(pending: PendingCommand): number {
  const factors = pending.digits ? [...pending.counts, Number(pending.digits)] : pending.counts;
  return factors.reduce((product, factor) => product * factor, 1);
}

/** Closes the count being typed so the next digits start a new factor. */
export function closeCount(pending: PendingCommand): void {
  if (pending.digits) {
    pending.counts.push(Number(pending.digits));
    pending.digits = '';
  }
}

export function isEmpty(pending: PendingCommand): boolean {
  return !hasCount(pending) &&
    pending.register === undefined &&
    pending.operator === undefined &&
    pending.awaiting.kind === 'command';
}
