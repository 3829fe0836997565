// test/modal.repeat.test.ts
import { MODAL_ACTIONS } from "../src/modal/ModalManager";
import { createHarness } from "./helpers/MemoryHost";

describe("Repeat Last Change", () => {
  it("should repeat a delete with its count or a new one", () => {
    const { host, feed } = createHarness('abcdefgh');
    feed('3x');
    expect(host.text()).toBe('defgh');
    feed('2.');
    expect(host.text()).toBe('fgh');
    feed('.');
    expect(host.text()).toBe('h');
  });

  it("should repeat dw with a new count", () => {
    const { host, feed } = createHarness('a b c d e');
    feed('dw2.');
    expect(host.text()).toBe('d e');
  });

  it("should repeat a change including the inserted text", () => {
    const { host, feed } = createHarness('a "one" b "two"', { line: 0, column: 3 });
    feed('ci"X<Esc>');
    expect(host.text()).toBe('a "X" b "two"');
    expect(host.cursor()).toEqual({ line: 0, column: 3 });

    feed('ft.');
    expect(host.text()).toBe('a "X" b "X"');
  });

  it("should repeat an append on another line", () => {
    const { host, feed } = createHarness('a\nb');
    feed('A!<Esc>j.');
    expect(host.text()).toBe('a!\nb!');
  });

  it("should walk back through the delete history with \"1p.", () => {
    const { host, feed } = createHarness('a\nb\nc');
    feed('dddddd');
    expect(host.text()).toBe('');
    feed('"1p..');
    expect(host.text()).toBe('\nc\nb\na');
  });

  it("should not treat motions and yanks as changes", () => {
    const { host, feed } = createHarness('abc def');
    feed('xwyw.');
    expect(host.text()).toBe('bc ef');
  });

  it("should do nothing before the first change", () => {
    const { host, feed } = createHarness('abc');
    expect(feed('.')).toEqual({ kind: 'consumed' });
    expect(host.text()).toBe('abc');
  });

  it("should repeat through the registered host action", () => {
    const { host, feed } = createHarness('abc');
    feed('x');
    const action = host.actions.get(MODAL_ACTIONS.repeatLastChange);
    expect(action).toBeDefined();
    const outcome = action?.('main');
    expect(outcome?.kind).toBe('dispatched');
    expect(host.text()).toBe('c');
  });
});
