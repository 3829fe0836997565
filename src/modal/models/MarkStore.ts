import type { BufferView } from "./BufferView";
import { lineAt } from "./BufferView";
import type { Position, TextEdit } from "../types";

/** Per-context marks: `a`-`z` set by `m`, plus `<` and `>` for the last visual selection. */
export class MarkStore {
  private marks = new Map<string, Position>();

  set(name: string, position: Position): void {
    this.marks.set(name, { ...position });
  }

  get(name: string): Position | undefined {
    const mark = this.marks.get(name);
    return mark ? { ...mark } : undefined;
  }

  setVisual(start: Position, end: Position): void {
    this.set('<', start);
    this.set('>', end);
  }

  /**
   * Keep marks on the same text after an edit. Marks on lines that the
   * edit removed entirely are dropped; marks below it move with the line
   * count change.
   */
  adjust(edits: readonly TextEdit[]): void {
    const ordered = [...edits].sort((a, b) => b.start.line - a.start.line);
    for (const edit of ordered) {
      const removed = edit.end.line - edit.start.line;
      const added = edit.text.split('\n').length - 1;
      if (removed === 0 && added === 0) continue;

      for (const [name, mark] of this.marks) {
        const consumed =
          (mark.line > edit.start.line || (mark.line === edit.start.line && edit.start.column === 0)) &&
          mark.line < edit.end.line;
        if (consumed) {
          this.marks.delete(name);
        } else if (
          mark.line > edit.end.line ||
          (mark.line === edit.end.line && (mark.line > edit.start.line || mark.column >= edit.end.column))
        ) {
          this.marks.set(name, { line: mark.line + added - removed, column: mark.column });
        }
      }
    }
  }

  entries(): Array<[string, Position]> {
    return Array.from(this.marks.entries()).sort(([a], [b]) => a.localeCompare(b));
  }

  format(view: BufferView): string {
    const lines: string[] = [];
    for (const [mark, position] of this.entries()) {
      const content = lineAt(view, position.line).substring(0, 50);
      lines.push(` '${mark}  ${position.line + 1}    ${content}`);
    }
    if (lines.length === 0) {
      return 'No marks set';
    }
    return 'mark line  content\n' + lines.join('\n');
  }
}
