// test/modal.visual.test.ts
import { createHarness } from "./helpers/MemoryHost";

describe("Visual Mode", () => {
  it("should select with a motion and yank the selection", () => {
    const { host, manager, feed } = createHarness('hello world');
    feed('ve');
    expect(manager.getMode('main')).toBe('visual');
    expect(host.selection()).toEqual({ anchor: { line: 0, column: 0 }, head: { line: 0, column: 4 } });

    feed('y');
    expect(manager.getMode('main')).toBe('normal');
    expect(manager.registers.get('0')).toEqual({ text: 'hello', shape: 'charwise' });
    expect(manager.composer('main').marks.get('>')).toEqual({ line: 0, column: 4 });
  });

  it("should delete an inclusive charwise selection across lines", () => {
    const { host, feed } = createHarness('abc\ndef', { line: 0, column: 1 });
    feed('vjd');
    expect(host.text()).toBe('af');
    expect(host.cursor()).toEqual({ line: 0, column: 1 });
  });

  it("should delete whole lines from Visual line mode", () => {
    const { host, manager, feed } = createHarness('a\nb\nc\nd', { line: 1, column: 0 });
    feed('Vjd');
    expect(host.text()).toBe('a\nd');
    expect(manager.registers.get('"')).toEqual({ text: 'b\nc\n', shape: 'linewise' });
  });

  it("should select a text object and delete it", () => {
    const { host, feed } = createHarness('foo bar', { line: 0, column: 5 });
    feed('viwd');
    expect(host.text()).toBe('foo ');
    expect(host.cursor()).toEqual({ line: 0, column: 3 });
  });

  it("should swap the ends of the selection with o", () => {
    const { host, feed } = createHarness('abcdef', { line: 0, column: 1 });
    feed('vllo');
    expect(host.selection()).toEqual({ anchor: { line: 0, column: 3 }, head: { line: 0, column: 1 } });
  });

  it("should switch selection kinds and leave on the same key", () => {
    const { manager, feed } = createHarness('a\nb');
    feed('vV');
    expect(manager.getMode('main')).toBe('visual-line');
    const outcome = feed('V');
    expect(outcome.kind).toBe('dispatched');
    expect(manager.getMode('main')).toBe('normal');
  });

  it("should leave Visual mode on <Esc> without cancelling", () => {
    const { host, manager, feed } = createHarness('abc');
    feed('vl');
    const outcome = feed('<Esc>');
    expect(outcome.kind).toBe('dispatched');
    expect(manager.getMode('main')).toBe('normal');
    expect(host.selection()).toBeUndefined();
  });

  it("should upper-case the selection with U", () => {
    const { host, feed } = createHarness('abc def');
    feed('veU');
    expect(host.text()).toBe('ABC def');
  });

  it("should insert on every line of a block with I", () => {
    const { host, feed } = createHarness('ab\ncd\nef');
    feed('<C-v>jI#<Esc>');
    expect(host.text()).toBe('#ab\n#cd\nef');
    expect(host.cursor()).toEqual({ line: 0, column: 0 });
  });

  it("should append after a ragged block with $A", () => {
    const { host, feed } = createHarness('a\nbcd');
    feed('<C-v>j$A;<Esc>');
    expect(host.text()).toBe('a;\nbcd;');
  });

  it("should open the command line on the selected lines", () => {
    const { host, manager, feed } = createHarness('a\nb\nc\nd', { line: 1, column: 0 });
    feed('Vj:');
    expect(manager.composer('main').getCommandLine()).toEqual({ prompt: ':', text: "'<,'>", cursor: 5 });

    const outcome = feed('d<CR>');
    expect(host.text()).toBe('a\nd');
    expect(outcome.kind).toBe('dispatched');
    if (outcome.kind === 'dispatched') {
      expect(outcome.message).toBe('Deleted 2 line(s) to register "');
    }
    expect(manager.commandHistory).toEqual(["'<,'>d"]);
  });

  it("should not record a Visual change for repeat", () => {
    const { host, feed } = createHarness('abc\nwxyz');
    feed('xjvld');
    expect(host.text()).toBe('bc\nyz');
    feed('.');
    expect(host.text()).toBe('bc\nz');
  });
});
