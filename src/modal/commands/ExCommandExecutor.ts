// src/modal/commands/ExCommandExecutor.ts
import type { BufferView } from "../models/BufferView";
import { clampPosition, firstNonBlank, lastLine, lineAt, lineCount, linesReplacementEdit } from "../models/BufferView";
import { InvalidStateError } from "../errors";
import type { MarkStore } from "../models/MarkStore";
import { registerLines } from "../models/RegisterStore";
import { compileSearchPattern } from "../motions/MotionResolver";
import type { SearchOptions } from "../motions/MotionResolver";
import { applyOperator } from "../operations/OperatorTable";
import { joinLineTexts } from "../operations/LineOperations";
import { resolveAddress, resolveRange } from "../utils/RangeParser";
import type { ExRange, LineRange, RangeEnvironment } from "../utils/RangeParser";
import { countGroups, expandReplacement, parseReplacement } from "../utils/Replacement";
import type { ReplacementPart } from "../utils/Replacement";
import type { EditKind, Position, Register } from "../types";
import type { CommandContext } from "./CommandContext";
import { searchOptions } from "./CommandContext";
import { parseExCommand } from "./ExCommandParser";
import type { ExCommand, SubstituteFlags } from "./ExCommandParser";
import type { RequestSink } from "./RequestSink";

/** What the executor needs from the context that opened the command line. */
export interface ExEnvironment {
  view: BufferView;
  cursor: Position;
  marks: MarkStore;
  sink: RequestSink;
  /** Run Normal-mode keys with the cursor on `line`, against the live buffer. */
  runNormal(keys: string, line: number): void;
  readView(): BufferView;
}

/**
 * Lines being rewritten by one command line. Each line keeps an id so
 * `:global` can find the lines it marked after earlier lines moved.
 */
class ExWorkspace {
  lines: string[];
  private ids: number[];
  private nextId = 0;

  constructor(view: BufferView) {
    this.lines = view.length === 0 ? [''] : [...view];
    this.ids = this.lines.map(() => this.nextId++);
  }

  get last(): number {
    return this.lines.length - 1;
  }

  text(line: number): string {
    return lineAt(this.lines, line);
  }

  idAt(line: number): number {
    return this.ids[line];
  }

  indexOf(id: number): number {
    return this.ids.indexOf(id);
  }

  setLine(line: number, text: string): void {
    this.lines[line] = text;
  }

  splice(start: number, deleteCount: number, ...texts: string[]): string[] {
    const removed = this.lines.splice(start, deleteCount, ...texts);
    this.ids.splice(start, deleteCount, ...texts.map(() => this.nextId++));
    if (this.lines.length === 0) {
      this.lines.push('');
      this.ids.push(this.nextId++);
    }
    return removed;
  }

  /** Move lines `[start, end]` below `target` (-1 for the top), keeping their ids. */
  move(start: number, end: number, target: number): number {
    const count = end - start + 1;
    const texts = this.lines.splice(start, count);
    const ids = this.ids.splice(start, count);
    const destination = target > end ? target - count + 1 : target + 1;
    this.lines.splice(destination, 0, ...texts);
    this.ids.splice(destination, 0, ...ids);
    return destination;
  }
}

interface ExRun {
  env: ExEnvironment;
  base: BufferView;
  workspace: ExWorkspace;
  /** Undefined when the cursor stays where the host has it. */
  cursor?: Position;
  kind: EditKind;
  /** Register writes wait until the host accepted the edit. */
  registerWrites: Array<() => void>;
  /** Pattern of this command line, seen by its sub-commands before it is stored. */
  search?: string;
}

function plural(count: number, word: string, suffix = 's'): string {
  return `${count} ${word}${count !== 1 ? suffix : ''}`;
}

function lineStart(workspace: ExWorkspace, line: number): Position {
  return { line, column: firstNonBlank(workspace.text(line)) };
}

/** Replace matches on one line; only the first unless `global`. */
function substituteLine(
  text: string,
  regex: RegExp,
  parts: readonly ReplacementPart[],
  global: boolean
): { text: string; count: number } {
  const scanner = new RegExp(regex.source, regex.flags.replace('g', '') + 'g');
  let result = '';
  let last = 0;
  let count = 0;
  let match: RegExpExecArray | null;
  while ((match = scanner.exec(text)) !== null) {
    result += text.slice(last, match.index) + expandReplacement(parts, match);
    last = match.index + match[0].length;
    count++;
    if (!global) break;
    if (match[0].length === 0) {
      scanner.lastIndex++;
    }
  }
  return { text: result + text.slice(last), count };
}

export class ExCommandExecutor {
  private static readonly LOG_PREFIX = "[ExCommandExecutor]";

  constructor(private readonly ctx: CommandContext) {}

  /**
   * Parse and run one command line. All line changes are submitted as a
   * single edit once the command finished, so a failing command applies
   * nothing. Returns the message to show, if any.
   */
  execute(line: string, env: ExEnvironment): string | undefined {
    const command = parseExCommand(line);
    this.ctx.registers.setReadOnly(':', line);
    this.ctx.config.logger.debug(ExCommandExecutor.LOG_PREFIX, `Executing :${line} (${command.name})`);

    const run: ExRun = {
      env,
      base: env.view,
      workspace: new ExWorkspace(env.view),
      kind: command.name === 'substitute' ? 'substitute' : 'lines',
      registerWrites: [],
    };
    const message = this.dispatch(run, command, env.cursor.line);
    this.flush(run);
    return message;
  }

  private dispatch(run: ExRun, command: ExCommand, cursorLine: number): string | undefined {
    switch (command.name) {
      case 'substitute':
        return this.substitute(run, command, cursorLine);
      case 'global':
        return this.global(run, command, cursorLine);
      case 'delete':
        return this.deleteLines(run, command, cursorLine);
      case 'yank':
        return this.yankLines(run, command, cursorLine);
      case 'put':
        return this.putLines(run, command, cursorLine);
      case 'move':
      case 'copy':
        return this.transferLines(run, command, cursorLine);
      case 'join':
        return this.joinLines(run, command, cursorLine);
      case 'shift':
        return this.shiftLines(run, command, cursorLine);
      case 'normal': {
        const range = this.lineRange(run, command.range, cursorLine);
        return this.runNormal(run, command.keys, this.rangeLines(range));
      }
      case 'goto': {
        const { end } = resolveRange(command.range, this.rangeEnv(run, cursorLine));
        run.cursor = lineStart(run.workspace, Math.max(0, end));
        return undefined;
      }
      case 'mark': {
        const { end } = this.lineRange(run, command.range, cursorLine);
        run.env.marks.set(command.mark, { line: end, column: 0 });
        return `Mark '${command.mark} set at line ${end + 1}`;
      }
      case 'registers':
        return this.ctx.registers.format();
      case 'marks':
        return run.env.marks.format(run.workspace.lines);
      case 'nohlsearch':
        run.env.sink.hostCommand({ name: 'clear-highlight', force: false, count: 1 });
        return undefined;
      case 'host': {
        const range = command.range ? this.lineRange(run, command.range, cursorLine) : undefined;
        this.flush(run);
        run.env.sink.hostCommand({
          name: command.command,
          force: command.force,
          count: 1,
          argument: command.argument,
          range,
        });
        return undefined;
      }
    }
  }

  /** Submit the workspace as one edit, then perform the register writes. */
  private flush(run: ExRun): void {
    const edit = linesReplacementEdit(run.base, run.workspace.lines);
    const cursor = run.cursor ? clampPosition(run.workspace.lines, run.cursor) : undefined;
    if (edit) {
      run.env.sink.edit({
        kind: run.kind,
        edits: [edit],
        shape: 'linewise',
        cursor: cursor ?? clampPosition(run.workspace.lines, run.env.cursor),
      });
    } else if (cursor) {
      run.env.sink.moveCursor(cursor);
    }
    for (const write of run.registerWrites) {
      write();
    }
    run.registerWrites = [];
    run.base = run.workspace.lines.slice();
    run.cursor = undefined;
  }

  private rangeEnv(run: ExRun, cursorLine: number): RangeEnvironment {
    return {
      view: run.workspace.lines,
      cursorLine,
      mark: name => run.env.marks.get(name)?.line,
      lastSearch: run.search ?? this.ctx.session.lastSearch?.pattern,
      search: searchOptions(this.ctx.config),
    };
  }

  /** The addressed lines, never above the first; a count starts at the range end. */
  private lineRange(run: ExRun, range: ExRange | undefined, cursorLine: number, count?: number): LineRange {
    const resolved = resolveRange(range, this.rangeEnv(run, cursorLine));
    let start = Math.max(0, resolved.start);
    let end = Math.max(0, resolved.end);
    if (count !== undefined) {
      start = end;
      end = Math.min(run.workspace.last, end + count - 1);
    }
    return { start, end };
  }

  private rangeLines(range: LineRange): number[] {
    const lines: number[] = [];
    for (let line = range.start; line <= range.end; line++) {
      lines.push(line);
    }
    return lines;
  }

  private resolvePattern(run: ExRun, pattern: string): string {
    if (pattern !== '') {
      return pattern;
    }
    const last = run.search ?? this.ctx.session.lastSearch?.pattern;
    if (last === undefined) {
      throw new InvalidStateError('No previous regular expression');
    }
    return last;
  }

  private rememberSearch(run: ExRun, pattern: string): void {
    run.search = pattern;
    run.registerWrites.push(() => {
      this.ctx.session.lastSearch = { pattern, forward: true };
      this.ctx.registers.setReadOnly('/', pattern);
      this.ctx.searchHistory.add(pattern);
    });
  }

  private substitute(run: ExRun, command: Extract<ExCommand, { name: 'substitute' }>, cursorLine: number): string {
    const previous = this.ctx.session.lastSubstitute;
    let pattern: string;
    let replacement: string;
    let flags: SubstituteFlags = command.flags;

    if (command.pattern === undefined) {
      if (!previous) {
        throw new InvalidStateError('No previous substitute regular expression');
      }
      pattern = previous.pattern;
      replacement = previous.replacement;
    } else {
      pattern = this.resolvePattern(run, command.pattern);
      replacement = command.replacement ?? '';
    }
    if (command.keepFlags && previous) {
      flags = {
        global: previous.flags.global !== command.flags.global,
        ignoreCase: command.flags.ignoreCase ?? previous.flags.ignoreCase,
        countOnly: previous.flags.countOnly || command.flags.countOnly,
      };
    }

    const options: SearchOptions = flags.ignoreCase === undefined
      ? searchOptions(this.ctx.config)
      : { ignoreCase: flags.ignoreCase, smartCase: false, wrapScan: this.ctx.config.wrapScan };
    const regex = compileSearchPattern(pattern, options);
    const parts = parseReplacement(replacement, countGroups(regex));
    const range = this.lineRange(run, command.range, cursorLine, command.count);

    this.ctx.session.lastSubstitute = { pattern, replacement, flags };
    this.rememberSearch(run, pattern);

    const workspace = run.workspace;
    let occurrences = 0;
    let changedLines = 0;
    let end = range.end;
    for (let line = range.start; line <= end; line++) {
      const result = substituteLine(workspace.text(line), regex, parts, flags.global);
      if (result.count === 0) continue;
      occurrences += result.count;
      changedLines++;
      if (flags.countOnly) continue;

      const pieces = result.text.split('\n');
      if (pieces.length === 1) {
        workspace.setLine(line, result.text);
      } else {
        workspace.splice(line, 1, ...pieces);
        line += pieces.length - 1;
        end += pieces.length - 1;
      }
      run.cursor = lineStart(workspace, line);
    }

    if (flags.countOnly) {
      return `${plural(occurrences, 'match', 'es')} on ${changedLines} line(s)`;
    }
    return `Substituted ${plural(occurrences, 'occurrence')} on ${changedLines} line(s)`;
  }

  private global(run: ExRun, command: Extract<ExCommand, { name: 'global' }>, cursorLine: number): string {
    const pattern = this.resolvePattern(run, command.pattern);
    const regex = compileSearchPattern(pattern, searchOptions(this.ctx.config));
    const range = this.lineRange(run, command.range, cursorLine);
    this.rememberSearch(run, pattern);

    const marked: number[] = [];
    for (let line = range.start; line <= range.end; line++) {
      if (regex.test(run.workspace.text(line)) !== command.invert) {
        marked.push(run.workspace.idAt(line));
      }
    }
    if (command.command.name === 'substitute') {
      run.kind = 'substitute';
    }

    if (command.command.name === 'normal') {
      const lines = marked.map(id => run.workspace.indexOf(id));
      this.runNormal(run, command.command.keys, lines);
      return `Executed command on ${marked.length} matching line(s)`;
    }

    let executed = 0;
    for (const id of marked) {
      const line = run.workspace.indexOf(id);
      if (line < 0) continue;
      this.dispatch(run, command.command, line);
      executed++;
    }
    return `Executed command on ${executed} matching line(s)`;
  }

  /**
   * `:normal` runs against the live buffer, so pending line changes are
   * submitted first. Later target lines move by the change in line count
   * the earlier runs caused.
   */
  private runNormal(run: ExRun, keys: string, lines: readonly number[]): string {
    this.flush(run);
    let delta = 0;
    let executed = 0;
    for (const line of lines) {
      const before = run.env.readView();
      const target = line + delta;
      if (target < 0 || target > lastLine(before)) continue;
      run.env.runNormal(keys, target);
      delta += lineCount(run.env.readView()) - lineCount(before);
      executed++;
    }
    run.base = run.env.readView();
    run.workspace = new ExWorkspace(run.base);
    return `Executed normal command on ${executed} line(s)`;
  }

  private deleteLines(run: ExRun, command: Extract<ExCommand, { name: 'delete' }>, cursorLine: number): string {
    const { start, end } = this.lineRange(run, command.range, cursorLine, command.count);
    const removed = run.workspace.splice(start, end - start + 1);
    const register: Register = { text: removed.join('\n') + '\n', shape: 'linewise' };
    run.registerWrites.push(() => this.ctx.registers.recordDelete(command.register, register, false));
    run.cursor = lineStart(run.workspace, Math.min(start, run.workspace.last));
    return `Deleted ${removed.length} line(s) to register ${command.register ?? '"'}`;
  }

  private yankLines(run: ExRun, command: Extract<ExCommand, { name: 'yank' }>, cursorLine: number): string {
    const { start, end } = this.lineRange(run, command.range, cursorLine, command.count);
    const lines = run.workspace.lines.slice(start, end + 1);
    const register: Register = { text: lines.join('\n') + '\n', shape: 'linewise' };
    run.registerWrites.push(() => this.ctx.registers.recordYank(command.register, register));
    return `Yanked ${lines.length} line(s) to register ${command.register ?? '"'}`;
  }

  private putLines(run: ExRun, command: Extract<ExCommand, { name: 'put' }>, cursorLine: number): string {
    const name = command.register ?? '"';
    const content = this.ctx.registers.get(name);
    if (!content || content.text.length === 0) {
      throw new InvalidStateError(`Register ${name} is empty`);
    }
    const { end } = resolveRange(command.range, this.rangeEnv(run, cursorLine));
    const lines = registerLines(content);
    const at = command.above ? Math.max(0, end) : end + 1;
    run.workspace.splice(at, 0, ...lines);
    run.cursor = lineStart(run.workspace, at + lines.length - 1);
    return `Put ${lines.length} line(s) from register ${name}`;
  }

  private transferLines(
    run: ExRun,
    command: Extract<ExCommand, { name: 'move' | 'copy' }>,
    cursorLine: number
  ): string {
    const { start, end } = this.lineRange(run, command.range, cursorLine);
    const env = this.rangeEnv(run, cursorLine);
    const target = resolveAddress(command.target, env);
    const count = end - start + 1;

    if (command.name === 'copy') {
      const copies = run.workspace.lines.slice(start, end + 1);
      run.workspace.splice(target + 1, 0, ...copies);
      run.cursor = lineStart(run.workspace, target + count);
      return `Copied ${count} line(s)`;
    }

    if (target >= start && target < end) {
      throw new InvalidStateError('Cannot move a range of lines into itself');
    }
    const destination = target >= start - 1 && target <= end
      ? start
      : run.workspace.move(start, end, target);
    run.cursor = lineStart(run.workspace, destination + count - 1);
    return `Moved ${count} line(s)`;
  }

  private joinLines(run: ExRun, command: Extract<ExCommand, { name: 'join' }>, cursorLine: number): string | undefined {
    let { start, end } = this.lineRange(run, command.range, cursorLine);
    if (command.count !== undefined) {
      start = end;
      end = start + command.count - 1;
    } else if (start === end) {
      end = start + 1;
    }
    end = Math.min(end, run.workspace.last);
    if (end <= start) {
      return undefined;
    }
    const { text } = joinLineTexts(run.workspace.lines.slice(start, end + 1), command.keepSpace);
    run.workspace.splice(start, end - start + 1, text);
    run.cursor = lineStart(run.workspace, start);
    return `Joined ${end - start + 1} line(s)`;
  }

  private shiftLines(run: ExRun, command: Extract<ExCommand, { name: 'shift' }>, cursorLine: number): string {
    const { start, end } = this.lineRange(run, command.range, cursorLine, command.count);
    const view = run.workspace.lines.slice();
    const result = applyOperator(
      view,
      command.direction,
      { start: { line: start, column: 0 }, end: { line: end, column: 0 }, class: 'linewise' },
      { config: this.ctx.config, cursor: { line: start, column: 0 }, shifts: command.levels }
    );
    for (const edit of result.request?.edits ?? []) {
      const line = edit.start.line;
      run.workspace.setLine(line, edit.text + run.workspace.text(line).slice(edit.end.column));
    }
    run.cursor = lineStart(run.workspace, start);
    return `Shifted ${end - start + 1} line(s)`;
  }
}
