export { ModalManager, MODAL_ACTIONS } from "./ModalManager";
export { KeyComposer, isVisualMode } from "./commands/KeyComposer";
export { createModalConfig, DEFAULT_CONFIG } from "./config";
export type { ModalConfig } from "./config";
export {
  ModalError,
  ExSyntaxError,
  NoMatchError,
  InvalidStateError,
  HostRejectedError,
} from "./errors";
export type { ModalErrorKind } from "./errors";
export { normalizeKey, parseKeys, serializeKeys } from "./keys";
export { parseExCommand } from "./commands/ExCommandParser";
export type { ExCommand } from "./commands/ExCommandParser";
export { RegisterStore } from "./models/RegisterStore";
export { MarkStore } from "./models/MarkStore";
export { applyEdits } from "./models/BufferView";
export type * from "./types";
