export type ModalErrorKind = 'syntax' | 'no-match' | 'invalid-state' | 'host-rejected';

export class ModalError extends Error {
  constructor(readonly kind: ModalErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed command-line input. Nothing is applied. */
export class ExSyntaxError extends ModalError {
  constructor(message: string) {
    super('syntax', message);
  }
}

/** A motion or text object had nothing to resolve to. */
export class NoMatchError extends ModalError {
  constructor(message: string) {
    super('no-match', message);
  }
}

export class InvalidStateError extends ModalError {
  constructor(message: string) {
    super('invalid-state', message);
  }
}

/** The host declined an edit, for example because the buffer is read-only. */
export class HostRejectedError extends ModalError {
  constructor(message: string) {
    super('host-rejected', message);
  }
}

export function toModalError(e: unknown): ModalError {
  if (e instanceof ModalError) {
    return e;
  }
  if (e instanceof Error) {
    return new InvalidStateError(e.message);
  }
  return new InvalidStateError(String(e));
}
