export type CommandLinePrompt = ':' | '/' | '?';

/** Bounded history, newest last, without adjacent or repeated duplicates. */
export class CommandHistory {
  private entries: string[] = [];

  constructor(private readonly limit: number) {}

  add(entry: string): void {
    if (!entry) return;
    this.entries = this.entries.filter(existing => existing !== entry);
    this.entries.push(entry);
    if (this.entries.length > this.limit) {
      this.entries = this.entries.slice(this.entries.length - this.limit);
    }
  }

  list(): readonly string[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }
}

/**
 * The line being typed after `:`, `/` or `?`. `<Up>`/`<Down>` walk the
 * history entries that start with the text typed before browsing began.
 */
export class CommandLineBuffer {
  text: string;
  cursor: number;
  private browseIndex: number;
  private draft?: string;

  constructor(
    readonly prompt: CommandLinePrompt,
    private readonly history: CommandHistory,
    initial = ''
  ) {
    this.text = initial;
    this.cursor = initial.length;
    this.browseIndex = history.size;
  }

  insert(value: string): void {
    this.text = this.text.slice(0, this.cursor) + value + this.text.slice(this.cursor);
    this.cursor += value.length;
    this.resetBrowse();
  }

  /** Returns false when there was nothing left to delete. */
  backspace(): boolean {
    if (this.text.length === 0) {
      return false;
    }
    if (this.cursor > 0) {
      this.text = this.text.slice(0, this.cursor - 1) + this.text.slice(this.cursor);
      this.cursor--;
    }
    this.resetBrowse();
    return true;
  }

  deleteForward(): void {
    this.text = this.text.slice(0, this.cursor) + this.text.slice(this.cursor + 1);
  }

  left(): void {
    this.cursor = Math.max(0, this.cursor - 1);
  }

  right(): void {
    this.cursor = Math.min(this.text.length, this.cursor + 1);
  }

  home(): void {
    this.cursor = 0;
  }

  end(): void {
    this.cursor = this.text.length;
  }

  /** `<C-u>`: delete everything before the cursor. */
  deleteToStart(): void {
    this.text = this.text.slice(this.cursor);
    this.cursor = 0;
    this.resetBrowse();
  }

  /** `<C-w>`: delete the word before the cursor. */
  deleteWordBefore(): void {
    const before = this.text.slice(0, this.cursor);
    const match = before.match(/(\w+|[^\w\s]+)?\s*$/);
    const removed = match ? match[0].length : 0;
    this.text = before.slice(0, before.length - removed) + this.text.slice(this.cursor);
    this.cursor -= removed;
    this.resetBrowse();
  }

  historyPrevious(): boolean {
    const entries = this.history.list();
    const prefix = this.draft ?? this.text;
    for (let i = this.browseIndex - 1; i >= 0; i--) {
      if (entries[i].startsWith(prefix)) {
        this.draft = prefix;
        this.browseIndex = i;
        this.setText(entries[i]);
        return true;
      }
    }
    return false;
  }

  historyNext(): boolean {
    if (this.draft === undefined) {
      return false;
    }
    const entries = this.history.list();
    for (let i = this.browseIndex + 1; i < entries.length; i++) {
      if (entries[i].startsWith(this.draft)) {
        this.browseIndex = i;
        this.setText(entries[i]);
        return true;
      }
    }
    this.browseIndex = entries.length;
    this.setText(this.draft);
    this.draft = undefined;
    return true;
  }

  private setText(text: string): void {
    this.text = text;
    this.cursor = text.length;
  }

  private resetBrowse(): void {
    this.draft = undefined;
    this.browseIndex = this.history.size;
  }
}
