// src/modal/commands/KeyComposer.ts
import type { BufferView } from "../models/BufferView";
import {
  clampPosition,
  comparePositions,
  firstNonBlank,
  lastLine,
  lineAt,
  lineLength,
  orderPositions,
  samePosition,
} from "../models/BufferView";
import { InvalidStateError, NoMatchError, toModalError } from "../errors";
import type { ModalError } from "../errors";
import { isPrintable, normalizeKey, parseKeys } from "../keys";
import { CommandLineBuffer } from "../models/CommandLineBuffer";
import type { CommandLinePrompt } from "../models/CommandLineBuffer";
import { MarkStore } from "../models/MarkStore";
import {
  closeCount,
  createPendingCommand,
  effectiveCount,
  hasCount,
  isEmpty,
} from "../models/PendingCommand";
import type { CharPurpose, OperatorToken, PendingCommand } from "../models/PendingCommand";
import { RegisterStore } from "../models/RegisterStore";
import { resolveMotion, SIMPLE_MOTIONS } from "../motions/MotionResolver";
import type { FindState, MotionToken, SearchState } from "../motions/MotionResolver";
import { backspace, deleteForward, insertText, openLine, overwriteChar, restoreChar } from "../operations/InsertOperations";
import type { InsertEdit } from "../operations/InsertOperations";
import { joinLines, replaceChars, toggleCase } from "../operations/LineOperations";
import { applyOperator, isOperatorToken, normalizeSpan, OPERATORS } from "../operations/OperatorTable";
import { putRegister } from "../operations/PutOperations";
import { resolveTextObject } from "../textObjects/TextObjectResolver";
import type { TextObjectScope } from "../textObjects/TextObjectResolver";
import type {
  CancelReason,
  EditRequest,
  HostSnapshot,
  KeyEvent,
  Mode,
  Outcome,
  Position,
  SelectionShape,
  Span,
  TextEdit,
} from "../types";
import type { CommandContext } from "./CommandContext";
import { searchOptions } from "./CommandContext";
import type { ExCommandExecutor, ExEnvironment } from "./ExCommandExecutor";
import { RequestSink } from "./RequestSink";

type VisualMode = 'visual' | 'visual-line' | 'visual-block';

type StepResult =
  | { kind: 'ok' }
  | { kind: 'cancelled'; reason: CancelReason }
  | { kind: 'error'; error: ModalError };

interface QueuedKey {
  key: KeyEvent;
  /** Whether an active macro recording takes this key. */
  capture: boolean;
}

/** Keys of the last change; count and register are kept apart so `.` can replace them. */
interface ChangeRecord {
  keys: KeyEvent[];
  count?: number;
  register?: string;
}

/** Lines a blockwise insert is copied to when Insert mode ends. */
interface BlockInsert {
  firstLine: number;
  lastLine: number;
  /** `Infinity` inserts at the end of each line. */
  column: number;
  /** Pad lines shorter than `column` instead of skipping them. */
  pad: boolean;
  origin: Position;
}

interface InsertSession {
  kind: 'insert' | 'replace';
  count: number;
  /** `open-below` opens a new line before each repetition. */
  repeat: 'text' | 'open-below';
  typed: KeyEvent[];
  inserted: string;
  multiline: boolean;
  /** Characters Replace mode overwrote, for `<BS>`. */
  replaced: Array<string | undefined>;
  block?: BlockInsert;
}

interface VisualState {
  anchor: Position;
  head: Position;
}

const VISUAL_KEYS: Record<string, VisualMode> = {
  'v': 'visual',
  'V': 'visual-line',
  '<C-v>': 'visual-block',
};

/** Keys that enter a mode from Normal mode. */
const MODE_KEYS: Partial<Record<string, KeyEvent>> = {
  'insert': 'i',
  'replace': 'R',
  'visual': 'v',
  'visual-line': 'V',
  'visual-block': '<C-v>',
  'command-line': ':',
};

const ALIASES: Record<string, KeyEvent[]> = {
  'x': ['d', 'l'],
  'X': ['d', 'h'],
  'D': ['d', '$'],
  'C': ['c', '$'],
  's': ['c', 'l'],
  'S': ['c', 'c'],
  'Y': ['y', 'y'],
};

const VISUAL_OPERATORS: Record<string, OperatorToken> = {
  'd': 'd',
  'x': 'd',
  'c': 'c',
  's': 'c',
  'y': 'y',
  '>': '>',
  '<': '<',
  '~': 'g~',
  'u': 'gu',
  'U': 'gU',
};

const INSERT_MOVES = new Set(['<Left>', '<Right>', '<Up>', '<Down>', '<Home>', '<End>']);

export function isVisualMode(mode: string): mode is VisualMode {
  return mode === 'visual' || mode === 'visual-line' || mode === 'visual-block';
}

function isFailure(result: StepResult): boolean {
  return result.kind === 'error' || (result.kind === 'cancelled' && result.reason === 'no-match');
}

/** Inclusive last position of a span, for placing a visual head on it. */
function inclusiveEnd(view: BufferView, span: Span): Position {
  if (span.class !== 'exclusive') {
    return span.end;
  }
  if (span.end.column > 0) {
    return { line: span.end.line, column: span.end.column - 1 };
  }
  if (span.end.line > span.start.line) {
    const line = span.end.line - 1;
    return { line, column: Math.max(0, lineLength(view, line) - 1) };
  }
  return span.end;
}

/**
 * Per-context modal state machine. Keys are queued and processed one at a
 * time; macro playback and `.` put their keys at the front of the same
 * queue. Every key reads a fresh snapshot from the host.
 */
export class KeyComposer {
  private static readonly LOG_PREFIX = "[KeyComposer]";

  readonly marks = new MarkStore();

  private mode: Mode = 'normal';
  private pending: PendingCommand = createPendingCommand();
  private visual?: VisualState;
  private desiredColumn?: number;
  private lastFind?: FindState;
  private lastChange?: ChangeRecord;
  /** The change an Insert session belongs to, completed on `<Esc>`. */
  private change?: ChangeRecord;
  private insert?: InsertSession;
  private commandLine?: CommandLineBuffer;
  private searchReturn?: { mode: Mode; pending: PendingCommand };
  private queue: QueuedKey[] = [];
  private sink?: RequestSink;
  private commandMark = 0;
  private skipCapture = false;

  constructor(
    private readonly ctx: CommandContext,
    readonly contextId: string,
    private readonly executor: ExCommandExecutor
  ) {}

  getMode(): Mode {
    return this.mode;
  }

  /** The command line being typed, if any. */
  getCommandLine(): { prompt: CommandLinePrompt; text: string; cursor: number } | undefined {
    const line = this.commandLine;
    return line ? { prompt: line.prompt, text: line.text, cursor: line.cursor } : undefined;
  }

  feed(key: KeyEvent): Outcome {
    return this.session(() => this.drain([{ key: normalizeKey(key), capture: true }]));
  }

  /** Feed a key script such as `d2w` or `ihello<Esc>` as one batch. */
  feedKeys(script: string): Outcome {
    return this.session(() => this.drain(parseKeys(script).map(key => ({ key, capture: true }))));
  }

  repeatLastChange(): Outcome {
    return this.session(() => this.drain([{ key: '.', capture: false }]));
  }

  playMacro(register: string, count = 1): Outcome {
    const keys: KeyEvent[] = count > 1 ? [...String(count), '@', register] : ['@', register];
    return this.session(() => this.drain(keys.map(key => ({ key, capture: false }))));
  }

  enterNormalMode(): Outcome {
    return this.session(() => this.drain([{ key: '<Esc>', capture: false }]));
  }

  /** Run a command line as if it was typed after `:`. */
  executeEx(line: string): Outcome {
    return this.session(() => this.guard(() => {
      this.ctx.commandHistory.add(line);
      this.runExLine(line);
    }));
  }

  startRecording(register: string): Outcome {
    return this.session(() => this.guard(() => {
      this.ctx.macros.startRecording(register);
      this.requests.message(`recording @${register}`);
    }));
  }

  /** Enter `mode` the way its key does, leaving the current mode first where needed. */
  switchMode(mode: string): Outcome {
    return this.runAction(() => {
      if (mode === this.mode) {
        return [];
      }
      if (mode === 'normal') {
        return ['<Esc>'];
      }
      const key = MODE_KEYS[mode];
      if (key === undefined) {
        throw new InvalidStateError(`Cannot switch to mode '${mode}'`);
      }
      const direct = this.mode === 'normal' || (isVisualMode(this.mode) && (isVisualMode(mode) || mode === 'command-line'));
      return direct ? [key] : ['<Esc>', key];
    });
  }

  /** Select whole lines; a linewise selection stays as it is. */
  selectLine(): Outcome {
    return this.runAction(() => {
      if (this.mode === 'visual-line') {
        return [];
      }
      return this.mode === 'normal' || isVisualMode(this.mode) ? ['V'] : ['<Esc>', 'V'];
    });
  }

  /**
   * Put the clipboard above or below. Text ending in a newline goes on
   * lines of its own; other text goes before or after the cursor.
   */
  pasteClipboard(above: boolean): Outcome {
    return this.runAction(() => {
      const keys: KeyEvent[] = ['"', '+', above ? 'P' : 'p'];
      if (this.mode === 'normal') {
        return keys;
      }
      if (isVisualMode(this.mode)) {
        return ['<Esc>', ...keys];
      }
      throw new InvalidStateError(`Cannot paste in ${this.mode} mode`);
    });
  }

  /** Collapse a Visual selection to its start or end, or else move to the line start or end. */
  moveToLineBoundary(toEnd: boolean): Outcome {
    return this.runAction(() => {
      const visual = this.visual;
      if (visual) {
        const [start, end] = orderPositions(visual.anchor, visual.head);
        const snap = this.snapshot();
        this.leaveVisual();
        this.pending = createPendingCommand();
        this.setMode('normal');
        this.requests.moveCursor(clampPosition(snap.lines, toEnd ? end : start));
        return [];
      }
      switch (this.mode) {
        case 'normal':
          return [toEnd ? '$' : '^'];
        case 'insert':
        case 'replace':
        case 'command-line':
          return [toEnd ? '<End>' : '<Home>'];
      }
      throw new InvalidStateError(`Cannot move to the line ${toEnd ? 'end' : 'start'} in ${this.mode} mode`);
    });
  }

  /** Stop recording; without an active recording this only logs. */
  stopRecording(): Outcome {
    return this.session(() => this.guard(() => {
      if (!this.ctx.macros.isRecording()) {
        this.ctx.config.logger.warn(KeyComposer.LOG_PREFIX, 'Not recording');
        return;
      }
      const register = this.ctx.macros.stopRecording();
      this.requests.message(`Recorded @${register}`);
    }));
  }

  /** Run `body` with a request sink and turn what happened into an outcome. */
  private session(body: () => StepResult): Outcome {
    const sink = new RequestSink(this.ctx.host, this.contextId, request => this.marks.adjust(request.edits));
    const outer = this.sink;
    this.sink = sink;
    let result: StepResult;
    try {
      result = body();
    } finally {
      this.sink = outer;
    }
    if (result.kind === 'error') {
      return { kind: 'error', error: result.error };
    }
    // An <Esc> or stray key after edits in the same batch does not hide them
    const edited = sink.requests.some(request => request.type === 'edit');
    if (result.kind === 'cancelled' && (result.reason === 'no-match' || !edited)) {
      return { kind: 'cancelled', reason: result.reason };
    }
    if (sink.requests.length > 0 || sink.text !== undefined) {
      return { kind: 'dispatched', requests: sink.requests, message: sink.text };
    }
    return { kind: 'consumed' };
  }

  /** Run the keys a host action chooses, or report why it cannot run. */
  private runAction(plan: () => KeyEvent[]): Outcome {
    return this.session(() => {
      let keys: KeyEvent[];
      try {
        keys = plan();
      } catch (e) {
        const error = toModalError(e);
        this.ctx.config.logger.warn(KeyComposer.LOG_PREFIX, error.message);
        return { kind: 'error', error };
      }
      return this.drain(keys.map(key => ({ key, capture: false })));
    });
  }

  /** Turn errors thrown by `action` into step results. */
  private guard(action: () => CancelReason | void): StepResult {
    try {
      const reason = action();
      return reason ? { kind: 'cancelled', reason } : { kind: 'ok' };
    } catch (e) {
      const error = toModalError(e);
      this.abandonCommand();
      if (error.kind === 'no-match') {
        this.ctx.config.logger.debug(KeyComposer.LOG_PREFIX, error.message);
        return { kind: 'cancelled', reason: 'no-match' };
      }
      this.ctx.config.logger.warn(KeyComposer.LOG_PREFIX, error.message);
      return { kind: 'error', error };
    }
  }

  private get requests(): RequestSink {
    if (!this.sink) {
      throw new InvalidStateError('No key is being processed');
    }
    return this.sink;
  }

  // Queue

  private drain(items: QueuedKey[]): StepResult {
    this.queue.unshift(...items);
    let last: StepResult = { kind: 'ok' };
    for (let item = this.queue.shift(); item; item = this.queue.shift()) {
      const result = this.process(item);
      if (isFailure(result)) {
        // The first failure ends macro playback and anything else queued
        this.queue = [];
        return result;
      }
      last = result;
    }
    return last;
  }

  private process(item: QueuedKey): StepResult {
    const macros = this.ctx.macros;
    const recording = macros.isRecording();
    if (isEmpty(this.pending) && (this.mode === 'normal' || isVisualMode(this.mode))) {
      this.commandMark = macros.mark();
    }
    this.skipCapture = false;
    const result = this.guard(() => this.dispatchKey(item.key));
    if (item.capture && recording && macros.isRecording() && !this.skipCapture) {
      macros.capture([item.key]);
    }
    return result;
  }

  /** Run keys to completion right now, then make sure Normal mode is back. */
  private runNested(keys: KeyEvent[]): void {
    const saved = this.queue;
    this.queue = [];
    const result = this.drain(keys.map(key => ({ key, capture: false })));
    if (this.mode !== 'normal' || !isEmpty(this.pending)) {
      this.drain([{ key: '<Esc>', capture: false }]);
    }
    this.queue = saved;
    if (result.kind === 'error') {
      this.ctx.config.logger.warn(KeyComposer.LOG_PREFIX, `:normal stopped: ${result.error.message}`);
    }
  }

  private dispatchKey(key: KeyEvent): CancelReason | void {
    switch (this.mode) {
      case 'command-line':
        return this.commandLineKey(key);
      case 'insert':
      case 'replace':
        return this.insertKey(key);
      default:
        return this.commandKey(key);
    }
  }

  // State helpers

  private snapshot(): HostSnapshot {
    return this.ctx.host.readSnapshot(this.contextId);
  }

  private setMode(mode: Mode): void {
    if (this.mode === mode) {
      return;
    }
    this.ctx.config.logger.debug(KeyComposer.LOG_PREFIX, `${this.contextId}: ${this.mode} -> ${mode}`);
    this.mode = mode;
    this.requests.mode(mode);
  }

  private resetPending(): void {
    this.pending = createPendingCommand();
    if (this.mode === 'operator-pending') {
      this.setMode('normal');
    }
  }

  private invalid(): CancelReason {
    this.resetPending();
    return 'invalid-key';
  }

  private abandonCommand(): void {
    this.pending = createPendingCommand();
    if (this.mode === 'operator-pending' || this.mode === 'command-line') {
      this.commandLine = undefined;
      this.searchReturn = undefined;
      this.setMode('normal');
    }
  }

  private edit(request: EditRequest): Position {
    this.desiredColumn = undefined;
    return this.requests.edit(request);
  }

  private recordOf(pending: PendingCommand): ChangeRecord {
    return {
      keys: [...pending.keys],
      count: hasCount(pending) ? effectiveCount(pending) : undefined,
      register: pending.register,
    };
  }

  private rememberSearch(search: SearchState): void {
    this.ctx.session.lastSearch = search;
    this.ctx.registers.setReadOnly('/', search.pattern);
  }

  // Normal, Visual and Operator-pending keys

  private commandKey(key: KeyEvent): CancelReason | void {
    const pending = this.pending;
    if (key === '<Esc>') {
      return this.escape();
    }

    const awaiting = pending.awaiting;
    switch (awaiting.kind) {
      case 'register':
        if (!RegisterStore.isValidName(key)) {
          return this.invalid();
        }
        pending.register = key;
        pending.awaiting = { kind: 'command' };
        return;
      case 'char':
        pending.keys.push(key);
        pending.awaiting = { kind: 'command' };
        return this.charArgument(key, awaiting.purpose);
      case 'prefix':
        pending.keys.push(key);
        pending.awaiting = { kind: 'command' };
        return awaiting.prefix === 'g' ? this.gCommand(key) : this.zCommand(key);
      case 'text-object':
        pending.keys.push(key);
        pending.awaiting = { kind: 'command' };
        return this.textObject(key, awaiting.scope);
      case 'command':
        break;
    }

    if (/^[1-9]$/.test(key) || (key === '0' && pending.digits !== '')) {
      pending.digits += key;
      return;
    }
    if (key === '"') {
      if (pending.operator) {
        return this.invalid();
      }
      closeCount(pending);
      pending.awaiting = { kind: 'register' };
      return;
    }

    pending.keys.push(key);
    if (key === 'g' || key === 'Z') {
      if (key === 'Z' && (pending.operator || this.visual)) {
        return this.invalid();
      }
      pending.awaiting = { kind: 'prefix', prefix: key };
      return;
    }
    return this.visual ? this.visualCommand(key) : this.normalCommand(key);
  }

  private escape(): CancelReason | void {
    if (this.visual) {
      this.exitVisual();
      return;
    }
    this.resetPending();
    return 'escape';
  }

  private isLineShorthand(operator: OperatorToken, key: string): boolean {
    return key === operator ||
      (operator === 'gu' && key === 'u') ||
      (operator === 'gU' && key === 'U') ||
      (operator === 'g~' && key === '~');
  }

  private normalCommand(key: KeyEvent): CancelReason | void {
    const pending = this.pending;
    const operator = pending.operator;

    if (operator) {
      if (this.isLineShorthand(operator, key)) {
        return this.operateOnLines(operator);
      }
      if (key === 'i' || key === 'a') {
        pending.awaiting = { kind: 'text-object', scope: key === 'i' ? 'inner' : 'around' };
        return;
      }
    }
    if (isOperatorToken(key)) {
      return operator ? this.invalid() : this.startOperator(key);
    }
    const motion = this.motionToken(key);
    if (motion === 'await') {
      return;
    }
    if (motion) {
      return this.motion(motion);
    }
    if (operator) {
      return this.invalid();
    }

    const alias = ALIASES[key];
    if (alias) {
      pending.keys.pop();
      for (const aliased of alias) {
        const reason = this.commandKey(aliased);
        if (reason) return reason;
      }
      return;
    }

    const visualMode = VISUAL_KEYS[key];
    if (visualMode) {
      return this.enterVisual(visualMode);
    }

    switch (key) {
      case 'i':
      case 'a':
      case 'I':
      case 'A':
      case 'o':
      case 'O':
      case 'R':
        return this.beginInsert(key);
      case 'p':
      case 'P':
        return this.put(key === 'p');
      case 'J':
        return this.join(false);
      case '~':
        return this.swapCase();
      case 'r':
        pending.awaiting = { kind: 'char', purpose: { kind: 'replace' } };
        return;
      case 'm':
        pending.awaiting = { kind: 'char', purpose: { kind: 'set-mark' } };
        return;
      case 'q':
        if (this.ctx.macros.isRecording()) {
          const register = this.ctx.macros.stopRecording();
          this.resetPending();
          this.requests.message(`Recorded @${register}`);
          return;
        }
        pending.awaiting = { kind: 'char', purpose: { kind: 'record' } };
        return;
      case '@':
        pending.awaiting = { kind: 'char', purpose: { kind: 'play' } };
        return;
      case '.':
        return this.repeat();
      case 'u':
      case '<C-r>':
        this.requests.hostCommand({ name: key === 'u' ? 'undo' : 'redo', force: false, count: effectiveCount(pending) });
        this.resetPending();
        return;
      case '&':
        this.resetPending();
        this.runExLine('s');
        return;
      case ':': {
        const count = effectiveCount(pending);
        this.resetPending();
        this.openCommandLine(':', count > 1 ? `.,.+${count - 1}` : '');
        return;
      }
    }
    return this.invalid();
  }

  private gCommand(key: KeyEvent): CancelReason | void {
    const combo = `g${key}`;
    const operator = this.pending.operator;
    if (combo === 'g~' || combo === 'gu' || combo === 'gU') {
      if (operator) {
        return operator === combo ? this.operateOnLines(combo) : this.invalid();
      }
      return this.visual ? this.visualOperator(combo) : this.startOperator(combo);
    }
    if (SIMPLE_MOTIONS.has(combo)) {
      return this.motion({ kind: 'simple', key: combo });
    }
    if (combo === 'gJ' && !operator) {
      return this.visual ? this.visualJoin(true) : this.join(true);
    }
    return this.invalid();
  }

  private zCommand(key: KeyEvent): CancelReason | void {
    this.resetPending();
    if (key === 'Z') {
      this.requests.hostCommand({ name: 'write-quit', force: false, count: 1 });
      return;
    }
    if (key === 'Q') {
      this.requests.hostCommand({ name: 'quit', force: true, count: 1 });
      return;
    }
    return 'invalid-key';
  }

  private motionToken(key: KeyEvent): MotionToken | 'await' | undefined {
    if (SIMPLE_MOTIONS.has(key)) {
      return { kind: 'simple', key };
    }
    switch (key) {
      case 'f':
      case 'F':
      case 't':
      case 'T':
        this.pending.awaiting = { kind: 'char', purpose: { kind: 'find', motion: key } };
        return 'await';
      case ';':
      case ',':
        return { kind: 'repeat-find', reverse: key === ',' };
      case 'n':
      case 'N':
        return { kind: 'search-next', reverse: key === 'N' };
      case '*':
      case '#':
        return { kind: 'search-word', forward: key === '*' };
      case "'":
      case '`':
        this.pending.awaiting = { kind: 'char', purpose: { kind: 'jump-mark', linewise: key === "'" } };
        return 'await';
      case '/':
      case '?':
        this.searchReturn = { mode: this.mode, pending: this.pending };
        this.openCommandLine(key, '');
        return 'await';
    }
    return undefined;
  }

  private charArgument(key: KeyEvent, purpose: CharPurpose): CancelReason | void {
    switch (purpose.kind) {
      case 'find':
        if (!isPrintable(key)) {
          return this.invalid();
        }
        return this.motion({ kind: 'find', motion: purpose.motion, char: key });
      case 'jump-mark':
        return this.motion({ kind: 'mark', name: key, linewise: purpose.linewise });
      case 'replace':
        return this.replaceUnderCursor(key);
      case 'set-mark': {
        if (!/^[a-z]$/.test(key)) {
          return this.invalid();
        }
        const snap = this.snapshot();
        this.marks.set(key, clampPosition(snap.lines, snap.cursor));
        this.resetPending();
        return;
      }
      case 'record':
        this.resetPending();
        this.ctx.macros.startRecording(key);
        this.requests.message(`recording @${key}`);
        return;
      case 'play':
        return this.playRegister(key);
    }
  }

  private startOperator(operator: OperatorToken): void {
    closeCount(this.pending);
    this.pending.operator = operator;
    this.setMode('operator-pending');
  }

  /** `dd`, `3yy`, `>>`: the operator over `count` lines from the cursor line. */
  private operateOnLines(operator: OperatorToken): void {
    const snap = this.snapshot();
    const view = snap.lines;
    const cursor = clampPosition(view, snap.cursor);
    const last = Math.min(lastLine(view), cursor.line + effectiveCount(this.pending) - 1);
    const span: Span = {
      start: { line: cursor.line, column: 0 },
      end: { line: last, column: 0 },
      class: 'linewise',
    };
    this.operate(operator, span, view, cursor);
  }

  private motion(token: MotionToken): CancelReason | void {
    const pending = this.pending;
    const snap = this.snapshot();
    const view = snap.lines;
    const from = this.visual ? clampPosition(view, this.visual.head) : clampPosition(view, snap.cursor);
    const result = resolveMotion(view, from, token, effectiveCount(pending), {
      hasCount: hasCount(pending),
      operatorPending: pending.operator !== undefined,
      operator: pending.operator,
      desiredColumn: this.desiredColumn,
      lastFind: this.lastFind,
      lastSearch: this.ctx.session.lastSearch,
      search: searchOptions(this.ctx.config),
      mark: name => this.marks.get(name),
    });
    if (!result) {
      throw new NoMatchError(token.kind === 'search' ? `Pattern not found: ${token.pattern}` : 'Motion has no target');
    }
    if (result.find) {
      this.lastFind = result.find;
    }
    if (result.search) {
      this.rememberSearch(result.search);
    }
    this.desiredColumn = result.desiredColumn;

    if (pending.operator) {
      const span = normalizeSpan(view, from, result.position, result.class);
      this.operate(pending.operator, span, view, from);
      return;
    }
    const target = clampPosition(view, result.position);
    this.resetPending();
    if (this.visual) {
      this.visual.head = target;
      this.selectVisual();
      return;
    }
    this.requests.moveCursor(target);
  }

  private textObject(object: string, scope: TextObjectScope): CancelReason | void {
    const snap = this.snapshot();
    const view = snap.lines;
    const from = this.visual ? clampPosition(view, this.visual.head) : clampPosition(view, snap.cursor);
    const span = resolveTextObject(view, from, object, scope, effectiveCount(this.pending));
    if (!span) {
      throw new NoMatchError(`No ${scope === 'inner' ? 'i' : 'a'}${object} object here`);
    }
    const operator = this.pending.operator;
    if (operator) {
      this.operate(operator, span, view, from);
      return;
    }
    const visual = this.visual;
    if (!visual) {
      return this.invalid();
    }
    this.resetPending();
    const end = inclusiveEnd(view, span);
    if (samePosition(visual.anchor, visual.head) || span.class === 'linewise') {
      visual.anchor = span.start;
      visual.head = end;
    } else if (comparePositions(visual.anchor, visual.head) < 0) {
      visual.head = end;
    } else {
      visual.head = span.start;
    }
    if (span.class === 'linewise' && this.mode === 'visual') {
      this.setMode('visual-line');
    }
    this.selectVisual();
  }

  /**
   * Apply an operator to a span. Register writes follow the host accepting
   * the edit; a change continues in Insert mode.
   */
  private operate(
    operator: OperatorToken,
    span: Span,
    view: BufferView,
    cursor: Position,
    options: { shifts?: number; block?: BlockInsert } = {}
  ): void {
    const pending = this.pending;
    const definition = OPERATORS[operator];
    const result = applyOperator(view, operator, span, { config: this.ctx.config, cursor, shifts: options.shifts });

    if (result.request) {
      this.edit(result.request);
    } else if (!result.entersInsert) {
      this.requests.moveCursor(clampPosition(view, result.cursor));
    }
    if (result.register) {
      if (definition.kind === 'yank') {
        this.ctx.registers.recordYank(pending.register, result.register);
      } else {
        this.ctx.registers.recordDelete(pending.register, result.register, result.small);
      }
    }

    const record = this.recordOf(pending);
    const fromVisual = this.visual !== undefined;
    this.leaveVisual();
    this.pending = createPendingCommand();

    if (result.entersInsert) {
      if (!result.request) {
        this.requests.moveCursor(result.cursor);
      }
      this.startInsert({ count: 1, repeat: 'text', block: options.block, change: fromVisual ? undefined : record });
      return;
    }
    if (definition.kind !== 'yank' && result.request && !fromVisual) {
      this.lastChange = record;
    }
    this.setMode('normal');
  }

  private put(after: boolean): void {
    const pending = this.pending;
    const name = pending.register ?? '"';
    const register = this.ctx.registers.get(name);
    if (!register || register.text.length === 0) {
      throw new InvalidStateError(`Nothing in register ${name}`);
    }
    const snap = this.snapshot();
    const result = putRegister(snap.lines, clampPosition(snap.lines, snap.cursor), register, after, effectiveCount(pending));
    const record = this.recordOf(pending);
    this.resetPending();
    if (result) {
      this.edit(result.request);
      this.lastChange = record;
    }
  }

  private join(keepSpace: boolean): void {
    const snap = this.snapshot();
    const request = joinLines(snap.lines, clampPosition(snap.lines, snap.cursor).line, effectiveCount(this.pending), keepSpace);
    const record = this.recordOf(this.pending);
    this.resetPending();
    if (!request) {
      throw new NoMatchError('Cannot join the last line');
    }
    this.edit(request);
    this.lastChange = record;
  }

  private swapCase(): void {
    const snap = this.snapshot();
    const request = toggleCase(snap.lines, clampPosition(snap.lines, snap.cursor), effectiveCount(this.pending));
    const record = this.recordOf(this.pending);
    this.resetPending();
    if (request) {
      this.edit(request);
      this.lastChange = record;
    }
  }

  private replaceUnderCursor(key: KeyEvent): CancelReason | void {
    const char = key === '<CR>' ? '\n' : key;
    if (char !== '\n' && !isPrintable(char)) {
      return this.invalid();
    }
    const snap = this.snapshot();
    const request = replaceChars(snap.lines, clampPosition(snap.lines, snap.cursor), char, effectiveCount(this.pending));
    const record = this.recordOf(this.pending);
    this.resetPending();
    if (!request) {
      throw new NoMatchError('Not enough characters to replace');
    }
    this.edit(request);
    this.lastChange = record;
  }

  /** `.`: queue the last change again, with a new count when one was typed. */
  private repeat(): void {
    const pending = this.pending;
    const change = this.lastChange;
    this.resetPending();
    if (!change) {
      return;
    }
    const count = hasCount(pending) ? effectiveCount(pending) : change.count;
    let register = pending.register ?? change.register;
    // "1p... walks back through the delete history
    if (pending.register === undefined && register !== undefined && /^[1-8]$/.test(register) &&
      (change.keys[0] === 'p' || change.keys[0] === 'P')) {
      register = String(Number(register) + 1);
    }
    const keys: KeyEvent[] = [
      ...(register !== undefined ? ['"', register] : []),
      ...(count !== undefined ? [...String(count)] : []),
      ...change.keys,
    ];
    this.queue.unshift(...keys.map(key => ({ key, capture: false })));
  }

  private playRegister(name: string): void {
    const count = effectiveCount(this.pending);
    this.resetPending();
    const { keys } = this.ctx.macros.keysFor(name);
    // While recording, the expanded keys replace `@x` in the recording
    this.ctx.macros.truncate(this.commandMark);
    this.skipCapture = true;
    const items: QueuedKey[] = [];
    for (let i = 0; i < count; i++) {
      items.push(...keys.map(key => ({ key, capture: true })));
    }
    this.queue.unshift(...items);
  }

  // Visual mode

  private enterVisual(mode: VisualMode): void {
    const snap = this.snapshot();
    const cursor = clampPosition(snap.lines, snap.cursor);
    this.visual = { anchor: cursor, head: cursor };
    this.resetPending();
    this.setMode(mode);
    this.selectVisual();
  }

  private selectVisual(): void {
    if (!this.visual) return;
    const shape: SelectionShape = this.mode === 'visual-line' ? 'line' : this.mode === 'visual-block' ? 'block' : 'char';
    this.requests.select({ anchor: this.visual.anchor, head: this.visual.head, shape });
  }

  /** Remember the selection in `'<` and `'>` and drop it. */
  private leaveVisual(): void {
    if (!this.visual) return;
    const [start, end] = orderPositions(this.visual.anchor, this.visual.head);
    this.marks.setVisual(start, end);
    this.visual = undefined;
  }

  private exitVisual(): void {
    const head = this.visual?.head;
    this.leaveVisual();
    this.resetPending();
    this.setMode('normal');
    if (head) {
      const snap = this.snapshot();
      this.requests.moveCursor(clampPosition(snap.lines, head));
    }
  }

  private visualSpan(view: BufferView, visual: VisualState): Span {
    const anchor = clampPosition(view, visual.anchor);
    const head = clampPosition(view, visual.head);
    switch (this.mode) {
      case 'visual-line':
        return normalizeSpan(view, anchor, head, 'linewise');
      case 'visual-block': {
        const span = normalizeSpan(view, anchor, head, 'blockwise');
        return this.desiredColumn === Infinity ? { ...span, end: { line: span.end.line, column: Infinity } } : span;
      }
      default:
        return normalizeSpan(view, anchor, head, 'inclusive');
    }
  }

  private visualCommand(key: KeyEvent): CancelReason | void {
    const pending = this.pending;
    const visual = this.visual;
    if (!visual) {
      return this.invalid();
    }
    if (key === 'i' || key === 'a') {
      pending.awaiting = { kind: 'text-object', scope: key === 'i' ? 'inner' : 'around' };
      return;
    }
    const motion = this.motionToken(key);
    if (motion === 'await') {
      return;
    }
    if (motion) {
      return this.motion(motion);
    }

    const operator = VISUAL_OPERATORS[key];
    if (operator) {
      return this.visualOperator(operator);
    }
    const visualMode = VISUAL_KEYS[key];
    if (visualMode) {
      if (visualMode === this.mode) {
        this.exitVisual();
        return;
      }
      this.resetPending();
      this.setMode(visualMode);
      this.selectVisual();
      return;
    }

    switch (key) {
      case 'o':
        this.visual = { anchor: visual.head, head: visual.anchor };
        this.resetPending();
        this.selectVisual();
        return;
      case 'J':
        return this.visualJoin(false);
      case 'I':
      case 'A':
        return this.mode === 'visual-block' ? this.blockInsert(key === 'A') : this.invalid();
      case ':':
        this.leaveVisual();
        this.resetPending();
        this.openCommandLine(':', "'<,'>");
        return;
    }
    return this.invalid();
  }

  private visualOperator(operator: OperatorToken): void {
    const visual = this.visual;
    if (!visual) return;
    const view = this.snapshot().lines;
    const span = this.visualSpan(view, visual);
    const shifts = operator === '>' || operator === '<' ? effectiveCount(this.pending) : undefined;
    const block: BlockInsert | undefined = span.class === 'blockwise' && operator === 'c'
      ? { firstLine: span.start.line + 1, lastLine: span.end.line, column: span.start.column, pad: false, origin: span.start }
      : undefined;
    this.operate(operator, span, view, span.start, { shifts, block });
  }

  private visualJoin(keepSpace: boolean): void {
    const visual = this.visual;
    if (!visual) return;
    const view = this.snapshot().lines;
    const span = this.visualSpan(view, visual);
    this.leaveVisual();
    this.resetPending();
    this.setMode('normal');
    const request = joinLines(view, span.start.line, Math.max(2, span.end.line - span.start.line + 1), keepSpace);
    if (!request) {
      throw new NoMatchError('Cannot join the last line');
    }
    this.edit(request);
  }

  /** `<C-v>` + `I`/`A`: type on the first line, copied to the others on `<Esc>`. */
  private blockInsert(append: boolean): void {
    const visual = this.visual;
    if (!visual) return;
    const view = this.snapshot().lines;
    const span = this.visualSpan(view, visual);
    const column = append
      ? (span.end.column === Infinity ? Infinity : span.end.column + 1)
      : span.start.column;
    const first = span.start.line;
    const length = lineLength(view, first);
    const at = { line: first, column: column === Infinity ? length : column };

    this.leaveVisual();
    this.resetPending();
    if (length < at.column) {
      const pad = ' '.repeat(at.column - length);
      this.edit(insertText({ line: first, column: length }, pad).request);
    } else {
      this.requests.moveCursor(at);
    }
    this.startInsert({
      count: 1,
      repeat: 'text',
      block: { firstLine: first + 1, lastLine: span.end.line, column, pad: append, origin: at },
    });
  }

  // Insert and Replace mode

  private beginInsert(key: 'i' | 'a' | 'I' | 'A' | 'o' | 'O' | 'R'): void {
    const pending = this.pending;
    const snap = this.snapshot();
    const view = snap.lines;
    const cursor = clampPosition(view, snap.cursor);
    const count = effectiveCount(pending);
    const change: ChangeRecord = { keys: [...pending.keys], count: hasCount(pending) ? count : undefined };
    const text = lineAt(view, cursor.line);
    this.resetPending();

    if (key === 'o' || key === 'O') {
      this.edit(openLine(view, cursor.line, key === 'o').request);
      this.startInsert({ count, repeat: 'open-below', change });
      return;
    }

    let column = cursor.column;
    if (key === 'a') {
      column = Math.min(text.length, cursor.column + 1);
    } else if (key === 'I') {
      column = /\S/.test(text) ? firstNonBlank(text) : text.length;
    } else if (key === 'A') {
      column = text.length;
    }
    this.requests.moveCursor({ line: cursor.line, column });
    this.startInsert({ kind: key === 'R' ? 'replace' : 'insert', count, repeat: 'text', change });
  }

  private startInsert(options: {
    kind?: 'insert' | 'replace';
    count: number;
    repeat: InsertSession['repeat'];
    block?: BlockInsert;
    change?: ChangeRecord;
  }): void {
    const kind = options.kind ?? 'insert';
    this.insert = {
      kind,
      count: options.count,
      repeat: options.repeat,
      typed: [],
      inserted: '',
      multiline: false,
      replaced: [],
      block: options.block,
    };
    this.change = options.change;
    this.desiredColumn = undefined;
    this.setMode(kind);
  }

  private insertKey(key: KeyEvent): CancelReason | void {
    const session = this.insert;
    if (!session) {
      this.setMode('normal');
      throw new InvalidStateError('No insert in progress');
    }
    if (key === '<Esc>') {
      this.finishInsert(session);
      return;
    }
    if (this.typeKey(session, key)) {
      session.typed.push(key);
      return;
    }
    if (INSERT_MOVES.has(key)) {
      this.moveInInsert(session, key);
      return;
    }
    return 'invalid-key';
  }

  private tabText(column: number): string {
    const { expandTab, tabStop } = this.ctx.config;
    return expandTab ? ' '.repeat(tabStop - (column % tabStop)) : '\t';
  }

  /** Apply one Insert or Replace mode key. False when the key does not edit. */
  private typeKey(session: InsertSession, key: KeyEvent): boolean {
    const snap = this.snapshot();
    const view = snap.lines;
    const at = clampPosition(view, snap.cursor, true);
    let edit: InsertEdit | null;

    if (key === '<BS>') {
      if (session.kind === 'replace') {
        if (session.replaced.length === 0) {
          if (at.column > 0) {
            this.requests.moveCursor({ line: at.line, column: at.column - 1 });
          }
          return true;
        }
        edit = restoreChar(at, session.replaced.pop());
      } else {
        edit = backspace(view, at);
      }
      session.inserted = session.inserted.slice(0, -1);
    } else if (key === '<Del>') {
      edit = deleteForward(view, at);
    } else {
      const text = key === '<CR>' ? '\n' : key === '<Tab>' ? this.tabText(at.column) : isPrintable(key) ? key : undefined;
      if (text === undefined) {
        return false;
      }
      if (session.kind === 'replace' && text !== '\n') {
        const result = overwriteChar(view, at, text);
        session.replaced.push(result.replaced);
        edit = result;
      } else {
        edit = insertText(at, text);
        session.replaced = [];
      }
      session.inserted += text;
      session.multiline = session.multiline || text === '\n';
    }

    if (edit) {
      this.edit(edit.request);
    }
    return true;
  }

  /** Arrow keys move the cursor; typing after that counts as a new insert. */
  private moveInInsert(session: InsertSession, key: KeyEvent): void {
    const snap = this.snapshot();
    const view = snap.lines;
    const at = clampPosition(view, snap.cursor, true);
    let target = at;
    switch (key) {
      case '<Left>':
        target = { line: at.line, column: Math.max(0, at.column - 1) };
        break;
      case '<Right>':
        target = { line: at.line, column: Math.min(lineLength(view, at.line), at.column + 1) };
        break;
      case '<Up>':
      case '<Down>':
        target = clampPosition(view, { line: at.line + (key === '<Up>' ? -1 : 1), column: at.column }, true);
        break;
      case '<Home>':
        target = { line: at.line, column: 0 };
        break;
      case '<End>':
        target = { line: at.line, column: lineLength(view, at.line) };
        break;
    }
    this.requests.moveCursor(target);
    session.typed = [];
    session.inserted = '';
    session.multiline = false;
    session.count = 1;
    session.repeat = 'text';
    session.block = undefined;
    this.change = this.change ? { keys: [session.kind === 'replace' ? 'R' : 'i'] } : undefined;
  }

  private finishInsert(session: InsertSession): void {
    const inserted = session.inserted;
    for (let i = 1; i < session.count; i++) {
      if (session.repeat === 'open-below') {
        const snap = this.snapshot();
        this.edit(openLine(snap.lines, clampPosition(snap.lines, snap.cursor).line, true).request);
      }
      for (const key of session.typed) {
        this.typeKey(session, key);
      }
    }

    const block = session.block;
    const replicated = block !== undefined && !session.multiline && inserted.length > 0;
    if (block && replicated) {
      const view = this.snapshot().lines;
      const edits: TextEdit[] = [];
      for (let line = block.firstLine; line <= Math.min(block.lastLine, lastLine(view)); line++) {
        const length = lineLength(view, line);
        const column = block.column === Infinity ? length : block.column;
        if (length < column) {
          if (!block.pad) continue;
          const at = { line, column: length };
          edits.push({ start: at, end: at, text: ' '.repeat(column - length) + inserted });
        } else {
          const at = { line, column };
          edits.push({ start: at, end: at, text: inserted });
        }
      }
      if (edits.length > 0) {
        this.edit({ kind: 'insert', edits, shape: 'blockwise', cursor: block.origin });
      }
    }

    this.ctx.registers.setReadOnly('.', inserted);
    const snap = this.snapshot();
    const end = snap.cursor;
    const cursor = block && replicated ? block.origin : { line: end.line, column: Math.max(0, end.column - 1) };
    this.requests.moveCursor(clampPosition(snap.lines, cursor));

    if (this.change) {
      this.lastChange = { ...this.change, keys: [...this.change.keys, ...session.typed, '<Esc>'] };
    }
    this.change = undefined;
    this.insert = undefined;
    this.setMode('normal');
  }

  // Command-line mode

  private openCommandLine(prompt: CommandLinePrompt, initial: string): void {
    const history = prompt === ':' ? this.ctx.commandHistory : this.ctx.searchHistory;
    this.commandLine = new CommandLineBuffer(prompt, history, initial);
    this.setMode('command-line');
  }

  private commandLineKey(key: KeyEvent): CancelReason | void {
    const line = this.commandLine;
    if (!line) {
      this.setMode('normal');
      throw new InvalidStateError('No command line open');
    }
    switch (key) {
      case '<Esc>':
        return this.closeCommandLine();
      case '<CR>':
        return this.submitCommandLine(line);
      case '<BS>':
        return line.backspace() ? undefined : this.closeCommandLine();
      case '<Del>':
        line.deleteForward();
        return;
      case '<Left>':
        line.left();
        return;
      case '<Right>':
        line.right();
        return;
      case '<Home>':
        line.home();
        return;
      case '<End>':
        line.end();
        return;
      case '<Up>':
        line.historyPrevious();
        return;
      case '<Down>':
        line.historyNext();
        return;
      case '<C-u>':
        line.deleteToStart();
        return;
      case '<C-w>':
        line.deleteWordBefore();
        return;
      case '<Tab>':
        line.insert('\t');
        return;
    }
    if (isPrintable(key)) {
      line.insert(key);
      return;
    }
    return 'invalid-key';
  }

  private closeCommandLine(): CancelReason {
    const back = this.searchReturn;
    this.commandLine = undefined;
    this.searchReturn = undefined;
    this.pending = createPendingCommand();
    this.setMode(back && isVisualMode(back.mode) ? back.mode : 'normal');
    return 'escape';
  }

  private submitCommandLine(line: CommandLineBuffer): CancelReason | void {
    this.commandLine = undefined;
    const text = line.text;

    if (line.prompt === ':') {
      this.ctx.commandHistory.add(text);
      this.setMode('normal');
      if (text.trim() !== '') {
        this.runExLine(text);
      }
      return;
    }

    if (text) {
      this.ctx.searchHistory.add(text);
    }
    const back: { mode: Mode; pending: PendingCommand } = this.searchReturn ?? { mode: 'normal', pending: createPendingCommand() };
    this.searchReturn = undefined;
    this.pending = back.pending;
    this.setMode(back.mode);
    const pattern = text || this.ctx.session.lastSearch?.pattern;
    if (pattern === undefined) {
      throw new InvalidStateError('No previous regular expression');
    }
    this.pending.keys.push(...Array.from(text).map(normalizeKey), '<CR>');
    return this.motion({ kind: 'search', pattern, forward: line.prompt === '/' });
  }

  private runExLine(text: string): void {
    const message = this.executor.execute(text, this.exEnvironment());
    if (message) {
      this.requests.message(message);
    }
  }

  private exEnvironment(): ExEnvironment {
    const snap = this.snapshot();
    return {
      view: snap.lines,
      cursor: clampPosition(snap.lines, snap.cursor),
      marks: this.marks,
      sink: this.requests,
      runNormal: (keys, line) => {
        this.requests.moveCursor({ line, column: 0 });
        this.runNested(parseKeys(keys));
      },
      readView: () => this.snapshot().lines,
    };
  }
}
