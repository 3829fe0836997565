// test/modal.exCommands.test.ts
import { createHarness } from "./helpers/MemoryHost";

describe("Ex Substitute", () => {
  it("should replace every match on the addressed lines", () => {
    const { host, ex } = createHarness('foo foo\nx foo\nfoo\nfoo');
    const outcome = ex('1,3s/foo/bar/g');
    expect(host.text()).toBe('bar bar\nx bar\nbar\nfoo');
    expect(host.cursor()).toEqual({ line: 2, column: 0 });
    expect(host.edits).toHaveLength(1);
    expect(outcome.kind).toBe('dispatched');
    if (outcome.kind === 'dispatched') {
      expect(outcome.message).toBe('Substituted 4 occurrences on 3 line(s)');
    }
  });

  it("should succeed without edits when nothing matches", () => {
    const { host, ex } = createHarness('abc');
    expect(ex('s/zzz/y/')).toEqual({
      kind: 'dispatched',
      requests: [],
      message: 'Substituted 0 occurrences on 0 line(s)',
    });
    expect(host.edits).toHaveLength(0);
  });

  it("should expand groups in the replacement", () => {
    const { host, ex } = createHarness('xab');
    ex('s/(a)(b)/\\2\\1/');
    expect(host.text()).toBe('xba');
  });

  it("should split the line on \\r", () => {
    const { host, ex } = createHarness('abc');
    ex('s/b/\\r/');
    expect(host.text()).toBe('a\nc');
    expect(host.cursor()).toEqual({ line: 1, column: 0 });
  });

  it("should change the case of the match", () => {
    const { host, ex } = createHarness('foo');
    ex('s/foo/\\u&/');
    expect(host.text()).toBe('Foo');
  });

  it("should only count matches with the n flag", () => {
    const { host, ex } = createHarness('aa\nba');
    const outcome = ex('%s/a//gn');
    expect(host.text()).toBe('aa\nba');
    expect(outcome.kind).toBe('dispatched');
    if (outcome.kind === 'dispatched') {
      expect(outcome.message).toBe('3 matches on 2 line(s)');
    }
  });

  it("should repeat the last substitute with &", () => {
    const { host, feed, ex } = createHarness('foo x\nfoo y');
    ex('s/foo/bar/');
    feed('j&');
    expect(host.text()).toBe('bar x\nbar y');
  });

  it("should fail to repeat before any substitute", () => {
    const { ex } = createHarness('abc');
    const outcome = ex('s');
    expect(outcome.kind).toBe('error');
    if (outcome.kind === 'error') {
      expect(outcome.error.kind).toBe('invalid-state');
      expect(outcome.error.message).toBe('No previous substitute regular expression');
    }
  });
});

describe("Ex Global", () => {
  it("should delete every matching line", () => {
    const { host, manager, ex } = createHarness('x1\na\nx2\nb');
    const outcome = ex('g/x/d');
    expect(host.text()).toBe('a\nb');
    expect(manager.registers.get('1')?.text).toBe('x2\n');
    expect(manager.registers.get('2')?.text).toBe('x1\n');
    expect(outcome.kind).toBe('dispatched');
    if (outcome.kind === 'dispatched') {
      expect(outcome.message).toBe('Executed command on 2 matching line(s)');
    }
  });

  it.each(['g!/x/d', 'v/x/d'])("should delete the lines not matching with %s", line => {
    const { host, ex } = createHarness('x1\na\nx2\nb');
    ex(line);
    expect(host.text()).toBe('x1\nx2');
  });

  it("should use its own pattern for an empty sub-command pattern", () => {
    const { host, manager, ex } = createHarness('foo 1\nbar\nfoo 2');
    const outcome = ex('g/foo/s//baz/');
    expect(host.text()).toBe('baz 1\nbar\nbaz 2');
    expect(manager.registers.get('/')?.text).toBe('foo');
    expect(outcome.kind).toBe('dispatched');
    if (outcome.kind === 'dispatched') {
      expect(outcome.message).toBe('Executed command on 2 matching line(s)');
    }
  });

  it("should run Normal mode keys on the marked lines", () => {
    const { host, ex } = createHarness('x\na\nx');
    ex('g/x/normal dd');
    expect(host.text()).toBe('a');
  });
});

describe("Ex Line Commands", () => {
  it("should run Normal mode keys on every line of the range", () => {
    const { host, manager, ex } = createHarness('a\nb');
    const outcome = ex('%norm A!');
    expect(host.text()).toBe('a!\nb!');
    expect(manager.getMode('main')).toBe('normal');
    expect(outcome.kind).toBe('dispatched');
    if (outcome.kind === 'dispatched') {
      expect(outcome.message).toBe('Executed normal command on 2 line(s)');
    }
  });

  it("should move lines to the top", () => {
    const { host, ex } = createHarness('a\nb\nc\nd');
    ex('2,3m0');
    expect(host.text()).toBe('b\nc\na\nd');
    expect(host.cursor()).toEqual({ line: 1, column: 0 });
  });

  it("should refuse to move lines into themselves", () => {
    const { host, ex } = createHarness('a\nb\nc\nd');
    const outcome = ex('2,3m2');
    expect(outcome.kind).toBe('error');
    if (outcome.kind === 'error') {
      expect(outcome.error.message).toBe('Cannot move a range of lines into itself');
    }
    expect(host.edits).toHaveLength(0);
  });

  it("should copy, join and shift lines", () => {
    const copied = createHarness('a\nb\nc\nd');
    copied.ex('1t$');
    expect(copied.host.text()).toBe('a\nb\nc\nd\na');

    const joined = createHarness('a\nb\nc\nd');
    joined.ex('1,2j');
    expect(joined.host.text()).toBe('a b\nc\nd');

    const shifted = createHarness('a\nb\nc\nd');
    shifted.ex('2>');
    expect(shifted.host.text()).toBe('a\n  b\nc\nd');
  });

  it("should yank into a register and put it below a line", () => {
    const { host, ex } = createHarness('a\nb\nc\nd');
    ex('2y a');
    expect(host.edits).toHaveLength(0);
    const outcome = ex('$pu a');
    expect(host.text()).toBe('a\nb\nc\nd\nb');
    expect(outcome.kind).toBe('dispatched');
    if (outcome.kind === 'dispatched') {
      expect(outcome.message).toBe('Put 1 line(s) from register a');
    }
  });

  it("should fail to put an empty register", () => {
    const { ex } = createHarness('a');
    const outcome = ex('pu z');
    expect(outcome.kind).toBe('error');
    if (outcome.kind === 'error') {
      expect(outcome.error.message).toBe('Register z is empty');
    }
  });

  it("should reject a backwards range", () => {
    const { host, ex } = createHarness('a\nb\nc');
    const outcome = ex('3,1d');
    expect(outcome.kind).toBe('error');
    if (outcome.kind === 'error') {
      expect(outcome.error.message).toBe('End line 1 cannot be less than start line 3');
    }
    expect(host.text()).toBe('a\nb\nc');
  });
});

describe("Ex Host Commands and Marks", () => {
  it("should pass file commands to the host", () => {
    const { host, ex } = createHarness('abc');
    ex('w');
    ex('wq!');
    expect(host.hostCommands).toEqual([
      { name: 'write', force: false, count: 1 },
      { name: 'write-quit', force: true, count: 1 },
    ]);
  });

  it("should set a mark that a later range can use", () => {
    const { host, ex } = createHarness('a\nb\nc');
    const outcome = ex('2mark b');
    expect(outcome.kind).toBe('dispatched');
    if (outcome.kind === 'dispatched') {
      expect(outcome.message).toBe("Mark 'b set at line 2");
    }
    ex("'b d");
    expect(host.text()).toBe('a\nc');
  });

  it("should list the registers", () => {
    const { ex } = createHarness('abc');
    const outcome = ex('registers');
    expect(outcome.kind).toBe('dispatched');
    if (outcome.kind === 'dispatched') {
      expect(outcome.message).toBe('":   registers');
    }
  });
});
