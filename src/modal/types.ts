import type { ModalError } from "./errors";

export interface Position {
  line: number;
  column: number;
}

/**
 * How a span is interpreted by an operator. `inclusive` spans include the
 * character at `end`; `exclusive` spans stop just before it.
 */
export type SpanClass = 'exclusive' | 'inclusive' | 'linewise' | 'blockwise';

export interface Span {
  start: Position;
  end: Position;
  class: SpanClass;
}

export type RegisterShape = 'charwise' | 'linewise' | 'blockwise';

export interface Register {
  /** Linewise text always ends with a newline; blockwise rows are joined with newlines. */
  text: string;
  shape: RegisterShape;
}

export type Mode =
  | 'normal'
  | 'insert'
  | 'replace'
  | 'visual'
  | 'visual-line'
  | 'visual-block'
  | 'operator-pending'
  | 'command-line';

/** A single key in normalized notation: a printable character or `<Esc>`, `<CR>`, `<C-v>`, ... */
export type KeyEvent = string;

export interface Selection {
  anchor: Position;
  head: Position;
}

export interface HostSnapshot {
  lines: readonly string[];
  cursor: Position;
  selection?: Selection;
  linewiseVisual: boolean;
}

/** Replaces the end-exclusive range `[start, end)` with `text`. */
export interface TextEdit {
  start: Position;
  end: Position;
  text: string;
}

export type EditKind =
  | 'delete'
  | 'change'
  | 'indent'
  | 'outdent'
  | 'swap-case'
  | 'upper'
  | 'lower'
  | 'insert'
  | 'replace'
  | 'put'
  | 'join'
  | 'substitute'
  | 'lines';

/** Edits in one request never overlap and are applied as one undoable step. */
export interface EditRequest {
  kind: EditKind;
  edits: TextEdit[];
  shape: RegisterShape;
  cursor: Position;
}

export type SelectionShape = 'cursor' | 'char' | 'line' | 'block';

export interface SelectionRequest {
  anchor: Position;
  head: Position;
  shape: SelectionShape;
}

export type HostCommandName =
  | 'write'
  | 'quit'
  | 'write-quit'
  | 'write-all'
  | 'quit-all'
  | 'write-quit-all'
  | 'update'
  | 'edit'
  | 'undo'
  | 'redo'
  | 'clear-highlight';

export interface HostCommand {
  name: HostCommandName;
  force: boolean;
  count: number;
  argument?: string;
  range?: { start: number; end: number };
}

export type EditResult = { ok: true; cursor: Position } | { ok: false; reason: string };

export type HostResult = { ok: true; message?: string } | { ok: false; reason: string };

export type ModalRequest =
  | { type: 'edit'; request: EditRequest }
  | { type: 'selection'; request: SelectionRequest }
  | { type: 'mode'; mode: Mode }
  | { type: 'host-command'; command: HostCommand };

export type CancelReason = 'escape' | 'no-match' | 'invalid-key';

export type Outcome =
  | { kind: 'consumed' }
  | { kind: 'dispatched'; requests: ModalRequest[]; message?: string }
  | { kind: 'cancelled'; reason: CancelReason }
  | { kind: 'error'; error: ModalError };

/** A palette action. `argument` carries an action's parameter, such as the mode for `modal.switchMode`. */
export type ActionHandler = (contextId: string, argument?: string) => Outcome;

/**
 * The narrow capability surface the core needs from the host editor.
 * The core never mutates buffer storage itself.
 */
export interface HostAdapter {
  readSnapshot(contextId: string): HostSnapshot;
  submitEdit(contextId: string, request: EditRequest): EditResult;
  submitSelection(contextId: string, request: SelectionRequest): void;
  notifyModeChanged(contextId: string, mode: Mode): void;
  registerAction(name: string, handler: ActionHandler): void;
  submitHostCommand(contextId: string, command: HostCommand): HostResult;
  readClipboard?(): string | undefined;
  writeClipboard?(text: string): void;
}

export interface ModalLogger {
  debug(...args: unknown[]): void;
  warn(...args: unknown[]): void;
}
