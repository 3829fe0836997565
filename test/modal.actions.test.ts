// test/modal.actions.test.ts
import { MODAL_ACTIONS } from "../src/modal/ModalManager";
import type { Outcome } from "../src/modal/types";
import { createHarness } from "./helpers/MemoryHost";
import type { MemoryHost } from "./helpers/MemoryHost";

function run(host: MemoryHost, name: string, argument?: string): Outcome | undefined {
  const action = host.actions.get(name);
  return action?.('main', argument);
}

describe("Switch Mode Action", () => {
  it("should enter the named mode", () => {
    const { host, manager } = createHarness('abc');
    expect(run(host, MODAL_ACTIONS.switchMode, 'insert')?.kind).toBe('dispatched');
    expect(manager.getMode('main')).toBe('insert');

    run(host, MODAL_ACTIONS.switchMode, 'visual-line');
    expect(manager.getMode('main')).toBe('visual-line');

    run(host, MODAL_ACTIONS.switchMode, 'normal');
    expect(manager.getMode('main')).toBe('normal');
  });

  it("should do nothing when already in the mode", () => {
    const { host, manager } = createHarness('abc');
    run(host, MODAL_ACTIONS.switchMode, 'insert');
    expect(run(host, MODAL_ACTIONS.switchMode, 'insert')).toEqual({ kind: 'consumed' });
    expect(manager.getMode('main')).toBe('insert');
  });

  it("should reject an unknown mode", () => {
    const { host, manager, logger } = createHarness('abc');
    const outcome = run(host, MODAL_ACTIONS.switchMode, 'hover');
    expect(outcome?.kind).toBe('error');
    if (outcome?.kind === 'error') {
      expect(outcome.error.message).toBe("Cannot switch to mode 'hover'");
    }
    expect(logger.warn.calledWith('[KeyComposer]', "Cannot switch to mode 'hover'")).toBe(true);
    expect(manager.getMode('main')).toBe('normal');
  });
});

describe("Select Line Action", () => {
  it("should select the line and keep the selection on a second call", () => {
    const { host, manager } = createHarness('one\ntwo', { line: 0, column: 1 });
    expect(run(host, MODAL_ACTIONS.selectLine)?.kind).toBe('dispatched');
    expect(manager.getMode('main')).toBe('visual-line');
    expect(host.selection()).toEqual({ anchor: { line: 0, column: 1 }, head: { line: 0, column: 1 } });

    expect(run(host, MODAL_ACTIONS.selectLine)).toEqual({ kind: 'consumed' });
    expect(manager.getMode('main')).toBe('visual-line');
  });

  it("should turn a characterwise selection into a linewise one", () => {
    const { host, manager, feed } = createHarness('one\ntwo');
    feed('vl');
    run(host, MODAL_ACTIONS.selectLine);
    expect(manager.getMode('main')).toBe('visual-line');
  });
});

describe("Paste Actions", () => {
  it("should put clipboard lines below or above the cursor line", () => {
    const below = createHarness('a\nb');
    below.host.clipboard = 'new\n';
    run(below.host, MODAL_ACTIONS.pasteBelow);
    expect(below.host.text()).toBe('a\nnew\nb');

    const above = createHarness('a\nb');
    above.host.clipboard = 'new\n';
    run(above.host, MODAL_ACTIONS.pasteAbove);
    expect(above.host.text()).toBe('new\na\nb');
  });

  it("should put clipboard text without a newline beside the cursor", () => {
    const below = createHarness('abc', { line: 0, column: 1 });
    below.host.clipboard = 'X';
    run(below.host, MODAL_ACTIONS.pasteBelow);
    expect(below.host.text()).toBe('abXc');

    const above = createHarness('abc', { line: 0, column: 1 });
    above.host.clipboard = 'X';
    run(above.host, MODAL_ACTIONS.pasteAbove);
    expect(above.host.text()).toBe('aXbc');
  });

  it("should refuse to paste in Insert mode", () => {
    const { host, feed } = createHarness('abc');
    host.clipboard = 'X';
    feed('i');
    const outcome = run(host, MODAL_ACTIONS.pasteBelow);
    expect(outcome?.kind).toBe('error');
    if (outcome?.kind === 'error') {
      expect(outcome.error.message).toBe('Cannot paste in insert mode');
    }
    expect(host.text()).toBe('abc');
  });
});

describe("Line Boundary Actions", () => {
  it("should move to the first non-blank and the last character in Normal mode", () => {
    const { host } = createHarness('  abc def', { line: 0, column: 5 });
    run(host, MODAL_ACTIONS.moveToLineStart);
    expect(host.cursor()).toEqual({ line: 0, column: 2 });
    run(host, MODAL_ACTIONS.moveToLineEnd);
    expect(host.cursor()).toEqual({ line: 0, column: 8 });
  });

  it("should collapse a selection to its start or end", () => {
    const start = createHarness('abc def', { line: 0, column: 1 });
    start.feed('vll');
    run(start.host, MODAL_ACTIONS.moveToLineStart);
    expect(start.manager.getMode('main')).toBe('normal');
    expect(start.host.cursor()).toEqual({ line: 0, column: 1 });
    expect(start.host.selection()).toBeUndefined();

    const end = createHarness('abc def', { line: 0, column: 4 });
    end.feed('vhh');
    run(end.host, MODAL_ACTIONS.moveToLineEnd);
    expect(end.manager.getMode('main')).toBe('normal');
    expect(end.host.cursor()).toEqual({ line: 0, column: 4 });
  });

  it("should move within the line in Insert mode", () => {
    const { host, manager, feed } = createHarness('abc', { line: 0, column: 1 });
    feed('i');
    run(host, MODAL_ACTIONS.moveToLineEnd);
    expect(host.cursor()).toEqual({ line: 0, column: 3 });
    expect(manager.getMode('main')).toBe('insert');
  });
});
