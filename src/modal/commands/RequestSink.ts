import { HostRejectedError } from "../errors";
import type {
  EditRequest,
  HostAdapter,
  HostCommand,
  Mode,
  ModalRequest,
  Position,
  SelectionRequest,
} from "../types";

/**
 * Submits requests to the host for one context and keeps what was sent, so
 * the outcome of a key can report it. A rejected edit throws; nothing after
 * it is submitted.
 */
export class RequestSink {
  readonly requests: ModalRequest[] = [];
  private messages: string[] = [];

  constructor(
    private readonly host: HostAdapter,
    readonly contextId: string,
    private readonly onEdit?: (request: EditRequest) => void
  ) {}

  edit(request: EditRequest): Position {
    const result = this.host.submitEdit(this.contextId, request);
    if (!result.ok) {
      throw new HostRejectedError(result.reason);
    }
    this.requests.push({ type: 'edit', request });
    this.onEdit?.(request);
    return result.cursor;
  }

  select(request: SelectionRequest): void {
    this.host.submitSelection(this.contextId, request);
    this.requests.push({ type: 'selection', request });
  }

  moveCursor(position: Position): void {
    this.select({ anchor: position, head: position, shape: 'cursor' });
  }

  mode(mode: Mode): void {
    this.host.notifyModeChanged(this.contextId, mode);
    this.requests.push({ type: 'mode', mode });
  }

  hostCommand(command: HostCommand): void {
    const result = this.host.submitHostCommand(this.contextId, command);
    if (!result.ok) {
      throw new HostRejectedError(result.reason);
    }
    this.requests.push({ type: 'host-command', command });
    if (result.message) {
      this.message(result.message);
    }
  }

  message(text: string): void {
    this.messages.push(text);
  }

  get text(): string | undefined {
    return this.messages.length > 0 ? this.messages.join('\n') : undefined;
  }
}
