// test/modal.textObjects.test.ts
import { resolveTextObject } from "../src/modal/textObjects/TextObjectResolver";
import { createHarness } from "./helpers/MemoryHost";

describe("Text Objects", () => {
  describe("quotes", () => {
    const view = ['say "hello world" now'];

    it("should select between the quotes for i\"", () => {
      expect(resolveTextObject(view, { line: 0, column: 6 }, '"', 'inner', 1)).toEqual({
        start: { line: 0, column: 5 },
        end: { line: 0, column: 16 },
        class: 'exclusive',
      });
    });

    it("should take the quotes and trailing blanks for a\"", () => {
      expect(resolveTextObject(view, { line: 0, column: 6 }, '"', 'around', 1)).toEqual({
        start: { line: 0, column: 4 },
        end: { line: 0, column: 18 },
        class: 'exclusive',
      });
    });

    it("should use the next quoted string when the cursor is before it", () => {
      const span = resolveTextObject(view, { line: 0, column: 0 }, '"', 'inner', 1);
      expect(span?.start).toEqual({ line: 0, column: 5 });
    });
  });

  describe("words", () => {
    const view = ['foo bar'];

    it("should select the word for iw", () => {
      expect(resolveTextObject(view, { line: 0, column: 1 }, 'w', 'inner', 1)).toEqual({
        start: { line: 0, column: 0 },
        end: { line: 0, column: 2 },
        class: 'inclusive',
      });
    });

    it("should add the following blanks for aw", () => {
      expect(resolveTextObject(view, { line: 0, column: 1 }, 'w', 'around', 1)?.end).toEqual({ line: 0, column: 3 });
    });

    it("should add the preceding blanks for aw on the last word", () => {
      expect(resolveTextObject(view, { line: 0, column: 5 }, 'w', 'around', 1)).toEqual({
        start: { line: 0, column: 3 },
        end: { line: 0, column: 6 },
        class: 'inclusive',
      });
    });
  });

  describe("brackets", () => {
    const view = ['f(a, (b))'];

    it("should select inside the enclosing parentheses", () => {
      expect(resolveTextObject(view, { line: 0, column: 3 }, '(', 'inner', 1)).toEqual({
        start: { line: 0, column: 2 },
        end: { line: 0, column: 8 },
        class: 'exclusive',
      });
    });

    it("should pick the innermost pair and widen with a count", () => {
      expect(resolveTextObject(view, { line: 0, column: 6 }, 'b', 'inner', 1)).toEqual({
        start: { line: 0, column: 6 },
        end: { line: 0, column: 7 },
        class: 'exclusive',
      });
      expect(resolveTextObject(view, { line: 0, column: 6 }, ')', 'inner', 2)?.start).toEqual({ line: 0, column: 2 });
    });

    it("should include the brackets for a(", () => {
      expect(resolveTextObject(view, { line: 0, column: 6 }, '(', 'around', 1)).toEqual({
        start: { line: 0, column: 5 },
        end: { line: 0, column: 7 },
        class: 'inclusive',
      });
    });

    it("should be linewise for a block spread over lines", () => {
      const block = ['if {', '  a', '  b', '}'];
      expect(resolveTextObject(block, { line: 1, column: 2 }, '{', 'inner', 1)).toEqual({
        start: { line: 1, column: 0 },
        end: { line: 2, column: 0 },
        class: 'linewise',
      });
    });

    it("should find nothing outside any pair", () => {
      expect(resolveTextObject(['abc'], { line: 0, column: 1 }, '(', 'inner', 1)).toBeNull();
    });
  });

  describe("paragraphs and tags", () => {
    it("should select the paragraph and the blank lines after it", () => {
      const view = ['a', 'b', '', 'c'];
      expect(resolveTextObject(view, { line: 0, column: 0 }, 'p', 'inner', 1)?.end).toEqual({ line: 1, column: 0 });
      expect(resolveTextObject(view, { line: 0, column: 0 }, 'p', 'around', 1)?.end).toEqual({ line: 2, column: 0 });
    });

    it("should select tag contents from the innermost pair outwards", () => {
      const view = ['<a><b>x</b></a>'];
      expect(resolveTextObject(view, { line: 0, column: 6 }, 't', 'inner', 1)).toEqual({
        start: { line: 0, column: 6 },
        end: { line: 0, column: 7 },
        class: 'exclusive',
      });
      expect(resolveTextObject(view, { line: 0, column: 6 }, 't', 'inner', 2)).toEqual({
        start: { line: 0, column: 3 },
        end: { line: 0, column: 11 },
        class: 'exclusive',
      });
    });
  });

  describe("with operators", () => {
    it("should empty the quotes and start Insert mode for ci\"", () => {
      const { host, manager, feed } = createHarness('say "hello world" now', { line: 0, column: 6 });
      feed('ci"');
      expect(host.text()).toBe('say "" now');
      expect(manager.getMode('main')).toBe('insert');
      expect(host.cursor()).toEqual({ line: 0, column: 5 });
      expect(manager.registers.get('"')).toEqual({ text: 'hello world', shape: 'charwise' });
    });

    it("should delete a word and its space with daw", () => {
      const { host, feed } = createHarness('one two three', { line: 0, column: 5 });
      feed('daw');
      expect(host.text()).toBe('one three');
      expect(host.cursor()).toEqual({ line: 0, column: 4 });
    });

    it("should cancel the operator when there is no object", () => {
      const { host, manager, feed } = createHarness('abc', { line: 0, column: 1 });
      const outcome = feed('di(');
      expect(outcome).toEqual({ kind: 'cancelled', reason: 'no-match' });
      expect(host.text()).toBe('abc');
      expect(manager.getMode('main')).toBe('normal');
    });
  });
});
