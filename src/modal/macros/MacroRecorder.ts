import { InvalidStateError } from "../errors";
import { parseKeys, serializeKeys } from "../keys";
import type { RegisterStore } from "../models/RegisterStore";
import type { KeyEvent, ModalLogger } from "../types";

interface Recording {
  register: string;
  keys: KeyEvent[];
}

/**
 * Records key events into a register and expands registers back into key
 * events for playback. At most one recording is active, shared by all
 * contexts.
 */
export class MacroRecorder {
  private static readonly LOG_PREFIX = "[MacroRecorder]";

  private recording?: Recording;
  private lastPlayed?: string;

  constructor(
    private readonly registers: RegisterStore,
    private readonly logger: ModalLogger
  ) {}

  static isRecordable(name: string): boolean {
    return /^[a-zA-Z0-9"]$/.test(name);
  }

  get recordingRegister(): string | undefined {
    return this.recording?.register;
  }

  isRecording(): boolean {
    return this.recording !== undefined;
  }

  startRecording(register: string): void {
    if (this.recording) {
      throw new InvalidStateError(`Already recording into register ${this.recording.register}`);
    }
    if (!MacroRecorder.isRecordable(register)) {
      throw new InvalidStateError(`Invalid register name: ${register}`);
    }
    this.recording = { register, keys: [] };
    this.logger.debug(MacroRecorder.LOG_PREFIX, `Recording @${register}`);
  }

  capture(keys: readonly KeyEvent[]): void {
    this.recording?.keys.push(...keys);
  }

  /** Current length of the recording, to cut back to with `truncate`. */
  mark(): number {
    return this.recording ? this.recording.keys.length : 0;
  }

  truncate(length: number): void {
    if (this.recording) {
      this.recording.keys.length = Math.min(length, this.recording.keys.length);
    }
  }

  /** Finish the recording and store it; an uppercase register appends. */
  stopRecording(): string {
    const recording = this.recording;
    if (!recording) {
      throw new InvalidStateError('Not recording');
    }
    this.recording = undefined;
    this.registers.write(recording.register, { text: serializeKeys(recording.keys), shape: 'charwise' });
    this.logger.debug(MacroRecorder.LOG_PREFIX, `Recorded @${recording.register}: ${recording.keys.length} keys`);
    return recording.register;
  }

  /**
   * Key events stored in `register`. `@` stands for the last played
   * register. Playing the register being recorded is rejected.
   */
  keysFor(register: string): { register: string; keys: KeyEvent[] } {
    const name = register === '@' ? this.lastPlayed : register;
    if (name === undefined) {
      throw new InvalidStateError('No previously used register');
    }
    if (this.recording && this.recording.register.toLowerCase() === name.toLowerCase()) {
      throw new InvalidStateError(`Cannot play register ${name} while recording it`);
    }
    const content = this.registers.get(name);
    if (!content || content.text.length === 0) {
      throw new InvalidStateError(`Register ${name} is empty`);
    }
    this.lastPlayed = name;
    const text = content.shape === 'linewise' ? content.text.replace(/\n$/, '') : content.text;
    return { register: name, keys: parseKeys(text) };
  }
}
