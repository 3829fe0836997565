// test/modal.commandLine.test.ts
import { CommandHistory, CommandLineBuffer } from "../src/modal/models/CommandLineBuffer";
import { createHarness } from "./helpers/MemoryHost";

describe("Command History", () => {
  it("should keep the newest entries without duplicates", () => {
    const history = new CommandHistory(3);
    for (const entry of ['a', 'b', 'a', 'c', 'd']) {
      history.add(entry);
    }
    expect(history.list()).toEqual(['a', 'c', 'd']);
  });

  it("should ignore empty lines", () => {
    const history = new CommandHistory(3);
    history.add('');
    expect(history.size).toBe(0);
  });
});

describe("Command Line Buffer", () => {
  let history: CommandHistory;

  beforeEach(() => {
    history = new CommandHistory(10);
    history.add('registers');
    history.add('marks');
  });

  it("should browse entries starting with the typed prefix", () => {
    const line = new CommandLineBuffer(':', history);
    line.insert('r');
    expect(line.historyPrevious()).toBe(true);
    expect(line.text).toBe('registers');
    expect(line.historyNext()).toBe(true);
    expect(line.text).toBe('r');
  });

  it("should edit around the cursor", () => {
    const line = new CommandLineBuffer(':', history, 'foo bar');
    line.deleteWordBefore();
    expect(line.text).toBe('foo ');
    line.home();
    line.insert('x');
    expect(line.text).toBe('xfoo ');
    line.deleteToStart();
    expect(line.text).toBe('foo ');
    expect(line.cursor).toBe(0);
  });
});

describe("Command Line Mode", () => {
  it("should run a typed command and remember it", () => {
    const { host, manager, feed } = createHarness('a\nb\nc');
    const outcome = feed(':2d<CR>');
    expect(host.text()).toBe('a\nc');
    expect(manager.getMode('main')).toBe('normal');
    expect(manager.commandHistory).toEqual(['2d']);
    expect(manager.registers.get(':')).toEqual({ text: '2d', shape: 'charwise' });
    expect(outcome.kind).toBe('dispatched');
  });

  it("should prefill a range for a count", () => {
    const { manager, feed } = createHarness('a\nb\nc\nd\ne\nf');
    feed('5:');
    expect(manager.composer('main').getCommandLine()?.text).toBe('.,.+4');
  });

  it("should cancel on <Esc> and on <BS> in an empty line", () => {
    const { manager, feed } = createHarness('abc');
    feed(':');
    expect(manager.getMode('main')).toBe('command-line');
    expect(feed('<Esc>')).toEqual({ kind: 'cancelled', reason: 'escape' });
    expect(manager.getMode('main')).toBe('normal');

    feed(':x');
    feed('<BS>');
    expect(manager.getMode('main')).toBe('command-line');
    expect(feed('<BS>')).toEqual({ kind: 'cancelled', reason: 'escape' });
    expect(manager.composer('main').getCommandLine()).toBeUndefined();
  });

  it("should recall history with <Up> and <Down>", () => {
    const { manager, feed } = createHarness('abc');
    feed(':registers<CR>:marks<CR>');
    const composer = manager.composer('main');

    feed(':<Up>');
    expect(composer.getCommandLine()?.text).toBe('marks');
    feed('<Up>');
    expect(composer.getCommandLine()?.text).toBe('registers');
    feed('<Down><Down>');
    expect(composer.getCommandLine()?.text).toBe('');
  });

  it("should report a malformed command without changing the buffer", () => {
    const { host, manager, logger, feed } = createHarness('abc');
    const outcome = feed(':frobnicate<CR>');
    expect(outcome.kind).toBe('error');
    if (outcome.kind === 'error') {
      expect(outcome.error.kind).toBe('syntax');
      expect(outcome.error.message).toBe('Unsupported Ex command: frobnicate');
    }
    expect(host.edits).toHaveLength(0);
    expect(manager.getMode('main')).toBe('normal');
    expect(logger.warn.calledOnce).toBe(true);
  });
});

describe("Search", () => {
  it("should move to matches with / n and N", () => {
    const { host, manager, feed } = createHarness('foo\nbar\nbaz');
    feed('/ba<CR>');
    expect(host.cursor()).toEqual({ line: 1, column: 0 });
    expect(manager.searchHistory).toEqual(['ba']);
    expect(manager.registers.get('/')?.text).toBe('ba');

    feed('n');
    expect(host.cursor()).toEqual({ line: 2, column: 0 });
    feed('N');
    expect(host.cursor()).toEqual({ line: 1, column: 0 });
  });

  it("should search backwards with ?", () => {
    const { host, feed } = createHarness('one\ntwo\none', { line: 2, column: 0 });
    feed('?one<CR>');
    expect(host.cursor()).toEqual({ line: 0, column: 0 });
  });

  it("should work as the motion of an operator", () => {
    const { host, manager, feed } = createHarness('foo bar baz');
    feed('d/ba<CR>');
    expect(host.text()).toBe('bar baz');
    expect(manager.getMode('main')).toBe('normal');
  });

  it("should cancel when the pattern is not found", () => {
    const { host, manager, feed } = createHarness('foo');
    expect(feed('/zzz<CR>')).toEqual({ kind: 'cancelled', reason: 'no-match' });
    expect(host.cursor()).toEqual({ line: 0, column: 0 });
    expect(manager.getMode('main')).toBe('normal');
  });

  it("should find the word under the cursor with *", () => {
    const { host, feed } = createHarness('foo x\nfoobar\nfoo');
    feed('*');
    expect(host.cursor()).toEqual({ line: 2, column: 0 });
  });
});
