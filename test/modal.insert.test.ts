// test/modal.insert.test.ts
import { createHarness } from "./helpers/MemoryHost";

describe("Insert and Replace Mode", () => {
  it("should repeat the typed text for a count", () => {
    const { host, manager, feed } = createHarness('');
    feed('3ihi<Esc>');
    expect(host.text()).toBe('hihihi');
    expect(host.cursor()).toEqual({ line: 0, column: 5 });
    expect(manager.registers.get('.')).toEqual({ text: 'hi', shape: 'charwise' });
    expect(manager.getMode('main')).toBe('normal');
  });

  it("should append after the cursor with a and at the line end with A", () => {
    const { host, feed } = createHarness('ac');
    feed('ab<Esc>');
    expect(host.text()).toBe('abc');
    feed('A!<Esc>');
    expect(host.text()).toBe('abc!');
    expect(host.cursor()).toEqual({ line: 0, column: 3 });
  });

  it("should insert before the first non-blank with I", () => {
    const { host, feed } = createHarness('   x', { line: 0, column: 3 });
    feed('I- <Esc>');
    expect(host.text()).toBe('   - x');
  });

  it("should open an indented line below with o", () => {
    const { host, feed } = createHarness('  a');
    feed('ohi<Esc>');
    expect(host.text()).toBe('  a\n  hi');
    expect(host.cursor()).toEqual({ line: 1, column: 3 });
  });

  it("should open a line for every repetition of 2o", () => {
    const { host, feed } = createHarness('a');
    feed('2ox<Esc>');
    expect(host.text()).toBe('a\nx\nx');
  });

  it("should split the line on <CR> and join it again on <BS>", () => {
    const { host, feed } = createHarness('ab', { line: 0, column: 1 });
    feed('i<CR>');
    expect(host.text()).toBe('a\nb');
    feed('<BS><Esc>');
    expect(host.text()).toBe('ab');
  });

  it("should overwrite characters in Replace mode and restore them on <BS>", () => {
    const { host, manager, feed } = createHarness('abc');
    feed('Rxy');
    expect(manager.getMode('main')).toBe('replace');
    expect(host.text()).toBe('xyc');
    feed('<BS><Esc>');
    expect(host.text()).toBe('xbc');
    expect(host.cursor()).toEqual({ line: 0, column: 0 });
  });

  it("should extend the line when Replace mode runs past its end", () => {
    const { host, feed } = createHarness('ab', { line: 0, column: 1 });
    feed('Rxyz<Esc>');
    expect(host.text()).toBe('axyz');
  });

  it("should insert spaces for <Tab> when expandtab is set", () => {
    const { host, feed } = createHarness('x', { line: 0, column: 0 }, { tabStop: 4 });
    feed('i<Tab><Esc>');
    expect(host.text()).toBe('    x');
  });

  it("should report an unknown key in Insert mode as invalid", () => {
    const { host, feed } = createHarness('abc');
    feed('i');
    expect(feed('<C-x>')).toEqual({ kind: 'cancelled', reason: 'invalid-key' });
    expect(host.text()).toBe('abc');
  });

  it("should start a new repeatable insert after an arrow key", () => {
    const { host, feed } = createHarness('abc\nxyz');
    feed('3i1<Right>2<Esc>');
    expect(host.text()).toBe('1a2bc\nxyz');
    feed('j0.');
    expect(host.text()).toBe('1a2bc\n2xyz');
  });
});
