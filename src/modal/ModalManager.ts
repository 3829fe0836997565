import { createModalConfig } from "./config";
import type { ModalConfig } from "./config";
import { ExCommandExecutor } from "./commands/ExCommandExecutor";
import { KeyComposer } from "./commands/KeyComposer";
import type { CommandContext } from "./commands/CommandContext";
import { MacroRecorder } from "./macros/MacroRecorder";
import { CommandHistory } from "./models/CommandLineBuffer";
import { RegisterStore } from "./models/RegisterStore";
import type { ClipboardAccess } from "./models/RegisterStore";
import type { HostAdapter, KeyEvent, Mode, Outcome } from "./types";

/** Actions the manager registers with the host on construction. */
export const MODAL_ACTIONS = {
  repeatLastChange: 'modal.repeatLastChange',
  playLastMacro: 'modal.playLastMacro',
  stopRecording: 'modal.stopRecording',
  enterNormalMode: 'modal.enterNormalMode',
  switchMode: 'modal.switchMode',
  selectLine: 'modal.selectLine',
  pasteAbove: 'modal.pasteAbove',
  pasteBelow: 'modal.pasteBelow',
  moveToLineStart: 'modal.moveToLineStart',
  moveToLineEnd: 'modal.moveToLineEnd',
} as const;

function clipboardOf(host: HostAdapter): ClipboardAccess | undefined {
  if (!host.readClipboard || !host.writeClipboard) {
    return undefined;
  }
  return {
    read: () => host.readClipboard?.(),
    write: text => host.writeClipboard?.(text),
  };
}

/**
 * Entry point for a host editor. Keeps one composer per editing context;
 * registers, macros, histories and the last search are shared by all of
 * them.
 */
export class ModalManager {
  private static readonly LOG_PREFIX = "[ModalManager]";

  readonly config: Readonly<ModalConfig>;
  readonly registers: RegisterStore;
  readonly macros: MacroRecorder;

  private composers: Map<string, KeyComposer> = new Map();
  private ctx: CommandContext;
  private executor: ExCommandExecutor;

  constructor(private readonly host: HostAdapter, overrides: Partial<ModalConfig> = {}) {
    this.config = createModalConfig(overrides);
    this.registers = new RegisterStore(this.config.numberedRegisterDepth, clipboardOf(host));
    this.macros = new MacroRecorder(this.registers, this.config.logger);

    this.ctx = {
      host,
      config: this.config,
      registers: this.registers,
      macros: this.macros,
      commandHistory: new CommandHistory(this.config.historySize),
      searchHistory: new CommandHistory(this.config.historySize),
      session: {},
    };
    this.executor = new ExCommandExecutor(this.ctx);

    host.registerAction(MODAL_ACTIONS.repeatLastChange, contextId => this.repeatLastChange(contextId));
    host.registerAction(MODAL_ACTIONS.playLastMacro, contextId => this.playMacro(contextId, '@'));
    host.registerAction(MODAL_ACTIONS.stopRecording, contextId => this.stopRecording(contextId));
    host.registerAction(MODAL_ACTIONS.enterNormalMode, contextId => this.composer(contextId).enterNormalMode());
    host.registerAction(MODAL_ACTIONS.switchMode, (contextId, mode) => this.switchMode(contextId, mode ?? ''));
    host.registerAction(MODAL_ACTIONS.selectLine, contextId => this.composer(contextId).selectLine());
    host.registerAction(MODAL_ACTIONS.pasteAbove, contextId => this.composer(contextId).pasteClipboard(true));
    host.registerAction(MODAL_ACTIONS.pasteBelow, contextId => this.composer(contextId).pasteClipboard(false));
    host.registerAction(MODAL_ACTIONS.moveToLineStart, contextId => this.composer(contextId).moveToLineBoundary(false));
    host.registerAction(MODAL_ACTIONS.moveToLineEnd, contextId => this.composer(contextId).moveToLineBoundary(true));
  }

  /** The composer for a context, created on first use. */
  composer(contextId: string): KeyComposer {
    let composer = this.composers.get(contextId);
    if (!composer) {
      this.config.logger.debug(ModalManager.LOG_PREFIX, `Opening context ${contextId}`);
      composer = new KeyComposer(this.ctx, contextId, this.executor);
      this.composers.set(contextId, composer);
    }
    return composer;
  }

  feed(contextId: string, key: KeyEvent): Outcome {
    return this.composer(contextId).feed(key);
  }

  feedKeys(contextId: string, script: string): Outcome {
    return this.composer(contextId).feedKeys(script);
  }

  getMode(contextId: string): Mode {
    return this.composers.get(contextId)?.getMode() ?? 'normal';
  }

  /** Forget a context's mode, marks and pending command. Shared state stays. */
  closeContext(contextId: string): void {
    if (this.composers.delete(contextId)) {
      this.config.logger.debug(ModalManager.LOG_PREFIX, `Closed context ${contextId}`);
    }
  }

  startRecording(contextId: string, register: string): Outcome {
    return this.composer(contextId).startRecording(register);
  }

  stopRecording(contextId: string): Outcome {
    return this.composer(contextId).stopRecording();
  }

  playMacro(contextId: string, register: string, count = 1): Outcome {
    return this.composer(contextId).playMacro(register, count);
  }

  switchMode(contextId: string, mode: string): Outcome {
    return this.composer(contextId).switchMode(mode);
  }

  repeatLastChange(contextId: string): Outcome {
    return this.composer(contextId).repeatLastChange();
  }

  executeEx(contextId: string, line: string): Outcome {
    return this.composer(contextId).executeEx(line.replace(/^:/, ''));
  }

  get commandHistory(): readonly string[] {
    return this.ctx.commandHistory.list();
  }

  get searchHistory(): readonly string[] {
    return this.ctx.searchHistory.list();
  }
}
