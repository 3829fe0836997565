// test/modal.exParser.test.ts
import { ExSyntaxError } from "../src/modal/errors";
import { parseExCommand } from "../src/modal/commands/ExCommandParser";

describe("Ex Command Parser", () => {
  it("should parse a substitute over the whole buffer", () => {
    expect(parseExCommand('%s/a/b/g')).toEqual({
      name: 'substitute',
      range: { kind: 'all' },
      pattern: 'a',
      replacement: 'b',
      flags: { global: true, countOnly: false },
      keepFlags: false,
      count: undefined,
    });
  });

  it("should accept another delimiter and escaped delimiters", () => {
    const command = parseExCommand('s#a\\#b#c#');
    expect(command.name).toBe('substitute');
    if (command.name === 'substitute') {
      expect(command.pattern).toBe('a#b');
      expect(command.replacement).toBe('c');
    }
  });

  it("should parse a bare :s as a repeat of the last substitute", () => {
    const command = parseExCommand('s');
    expect(command.name).toBe('substitute');
    if (command.name === 'substitute') {
      expect(command.pattern).toBeUndefined();
    }
  });

  it("should parse the visual marks range with a register", () => {
    expect(parseExCommand("'<,'>d x")).toEqual({
      name: 'delete',
      range: {
        kind: 'addresses',
        start: { base: { kind: 'mark', name: '<' }, offset: 0 },
        end: { base: { kind: 'mark', name: '>' }, offset: 0 },
        separator: ',',
      },
      register: 'x',
      count: undefined,
    });
  });

  it("should take a trailing count", () => {
    const command = parseExCommand('d 3');
    expect(command).toEqual({ name: 'delete', range: undefined, count: 3 });
  });

  it("should parse :global with its command", () => {
    const command = parseExCommand('g!/foo/s//bar/');
    expect(command.name).toBe('global');
    if (command.name === 'global') {
      expect(command.invert).toBe(true);
      expect(command.range).toEqual({ kind: 'all' });
      expect(command.command).toMatchObject({ name: 'substitute', pattern: '', replacement: 'bar' });
    }
  });

  it("should parse :v as an inverted :global", () => {
    const command = parseExCommand('v/x/d');
    expect(command).toMatchObject({ name: 'global', invert: true, pattern: 'x' });
  });

  it("should parse shifts, marks and plain line numbers", () => {
    expect(parseExCommand('>>')).toMatchObject({ name: 'shift', direction: '>', levels: 2 });
    expect(parseExCommand('ka')).toMatchObject({ name: 'mark', mark: 'a' });
    expect(parseExCommand('marks')).toEqual({ name: 'marks' });
    expect(parseExCommand('3')).toEqual({
      name: 'goto',
      range: { kind: 'addresses', start: { base: { kind: 'number', line: 3 }, offset: 0 }, separator: ',' },
    });
  });

  it("should map file commands to host commands", () => {
    expect(parseExCommand('wq!')).toEqual({
      name: 'host',
      range: undefined,
      command: 'write-quit',
      force: true,
      argument: undefined,
    });
    expect(parseExCommand('e other.txt')).toMatchObject({ name: 'host', command: 'edit', argument: 'other.txt' });
  });

  it.each([
    ['frobnicate', 'Unsupported Ex command: frobnicate'],
    ['s/a/b/z', 'Invalid flag: z'],
    ['g/a/g/b/d', 'Cannot do :global recursive'],
    ['normal', 'Argument required: normal'],
    ['d .', 'Invalid register name: .'],
    ['m', 'Destination required: move'],
    ['', 'Empty command'],
  ])("should reject %j", (line, message) => {
    expect(() => parseExCommand(line)).toThrow(ExSyntaxError);
    expect(() => parseExCommand(line)).toThrow(message);
  });
});
