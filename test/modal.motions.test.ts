// test/modal.motions.test.ts
import { InvalidStateError } from "../src/modal/errors";
import { resolveMotion } from "../src/modal/motions/MotionResolver";
import type { MotionContext, MotionToken } from "../src/modal/motions/MotionResolver";
import type { Position } from "../src/modal/types";

function context(overrides: Partial<MotionContext> = {}): MotionContext {
  return {
    hasCount: false,
    operatorPending: false,
    search: { ignoreCase: false, smartCase: false, wrapScan: true },
    ...overrides,
  };
}

function simple(key: string): MotionToken {
  return { kind: 'simple', key };
}

function at(line: number, column: number): Position {
  return { line, column };
}

describe("Motion Resolver", () => {
  describe("word motions", () => {
    const view = ['foo bar.baz'];

    it("should stop at each word and punctuation run with w", () => {
      expect(resolveMotion(view, at(0, 0), simple('w'), 1, context())?.position).toEqual(at(0, 4));
      expect(resolveMotion(view, at(0, 0), simple('w'), 2, context())?.position).toEqual(at(0, 7));
    });

    it("should land on the last character of the word with e", () => {
      const result = resolveMotion(view, at(0, 0), simple('e'), 1, context());
      expect(result).toEqual({ position: at(0, 2), class: 'inclusive' });
    });

    it("should move back to the previous run with b", () => {
      expect(resolveMotion(view, at(0, 8), simple('b'), 1, context())?.position).toEqual(at(0, 7));
    });

    it("should not carry an operated w onto the next line", () => {
      const result = resolveMotion(['foo', 'bar'], at(0, 0), simple('w'), 1, context({ operatorPending: true, operator: 'd' }));
      expect(result).toEqual({ position: at(0, 3), class: 'exclusive' });
    });

    it("should treat cw on a word like ce", () => {
      const result = resolveMotion(['foo bar'], at(0, 0), simple('w'), 1, context({ operatorPending: true, operator: 'c' }));
      expect(result).toEqual({ position: at(0, 2), class: 'inclusive' });
    });
  });

  describe("line motions", () => {
    it("should go to the last character with $ and remember the line end", () => {
      const result = resolveMotion(['foo bar.baz'], at(0, 0), simple('$'), 1, context());
      expect(result).toEqual({ position: at(0, 10), class: 'inclusive', desiredColumn: Infinity });
    });

    it("should keep the desired column across short lines with j", () => {
      const view = ['abcdef', 'ab', 'abcdef'];
      const first = resolveMotion(view, at(0, 4), simple('j'), 1, context());
      expect(first).toEqual({ position: at(1, 1), class: 'linewise', desiredColumn: 4 });

      const second = resolveMotion(view, at(1, 1), simple('j'), 1, context({ desiredColumn: first?.desiredColumn }));
      expect(second?.position).toEqual(at(2, 4));
    });

    it("should read the count of G and gg as a line number", () => {
      const view = ['one', '  two', 'three'];
      expect(resolveMotion(view, at(0, 0), simple('G'), 1, context())?.position).toEqual(at(2, 0));
      expect(resolveMotion(view, at(2, 0), simple('gg'), 2, context({ hasCount: true }))?.position).toEqual(at(1, 2));
    });

    it("should jump to the matching bracket with %", () => {
      const result = resolveMotion(['if (a[1]) x'], at(0, 0), simple('%'), 1, context());
      expect(result).toEqual({ position: at(0, 8), class: 'inclusive' });
    });
  });

  describe("find motions", () => {
    it("should find the count-th occurrence with f", () => {
      const result = resolveMotion(['banana'], at(0, 0), { kind: 'find', motion: 'f', char: 'a' }, 2, context());
      expect(result?.position).toEqual(at(0, 3));
      expect(result?.find).toEqual({ motion: 'f', char: 'a' });
    });

    it("should stop before the character with t", () => {
      const result = resolveMotion(['banana'], at(0, 0), { kind: 'find', motion: 't', char: 'n' }, 1, context());
      expect(result?.position).toEqual(at(0, 1));
    });

    it("should skip the adjacent match when repeating t", () => {
      const result = resolveMotion(['banana'], at(0, 1), { kind: 'repeat-find', reverse: false }, 1, context({
        lastFind: { motion: 't', char: 'n' },
      }));
      expect(result?.position).toEqual(at(0, 3));
    });

    it("should have no target when the character is missing", () => {
      expect(resolveMotion(['banana'], at(0, 0), { kind: 'find', motion: 'f', char: 'z' }, 1, context())).toBeNull();
    });
  });

  describe("search motions", () => {
    const view = ['alpha', 'beta', 'alphabet'];

    it("should find the next match after the cursor", () => {
      const result = resolveMotion(view, at(0, 0), { kind: 'search', pattern: 'alp', forward: true }, 1, context());
      expect(result?.position).toEqual(at(2, 0));
      expect(result?.search).toEqual({ pattern: 'alp', forward: true });
    });

    it("should wrap around the end of the buffer", () => {
      const result = resolveMotion(view, at(2, 0), { kind: 'search', pattern: 'alp', forward: true }, 1, context());
      expect(result?.position).toEqual(at(0, 0));
    });

    it("should stop at the end without wrapscan", () => {
      const noWrap = context({ search: { ignoreCase: false, smartCase: false, wrapScan: false } });
      expect(resolveMotion(view, at(2, 0), { kind: 'search', pattern: 'alp', forward: true }, 1, noWrap)).toBeNull();
    });

    it("should search for the whole word under the cursor with *", () => {
      const result = resolveMotion(['foo bar', 'foobar foo'], at(0, 0), { kind: 'search-word', forward: true }, 1, context());
      expect(result?.position).toEqual(at(1, 7));
      expect(result?.search).toEqual({ pattern: '\\bfoo\\b', forward: true });
    });
  });

  it("should fail on a mark that was never set", () => {
    const motion: MotionToken = { kind: 'mark', name: 'q', linewise: true };
    expect(() => resolveMotion(['a'], at(0, 0), motion, 1, context({ mark: () => undefined }))).toThrow(InvalidStateError);
  });
});
