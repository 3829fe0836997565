import type { ModalConfig } from "../config";
import type { MacroRecorder } from "../macros/MacroRecorder";
import type { CommandHistory } from "../models/CommandLineBuffer";
import type { RegisterStore } from "../models/RegisterStore";
import type { SearchOptions, SearchState } from "../motions/MotionResolver";
import type { HostAdapter } from "../types";
import type { SubstituteFlags } from "./ExCommandParser";

export interface SubstituteState {
  pattern: string;
  replacement: string;
  flags: SubstituteFlags;
}

/** Search and substitute state shared by every context. */
export interface SessionState {
  lastSearch?: SearchState;
  lastSubstitute?: SubstituteState;
}

/** What every composer of one manager shares. */
export interface CommandContext {
  host: HostAdapter;
  config: Readonly<ModalConfig>;
  registers: RegisterStore;
  macros: MacroRecorder;
  commandHistory: CommandHistory;
  searchHistory: CommandHistory;
  session: SessionState;
}

export function searchOptions(config: Readonly<ModalConfig>): SearchOptions {
  return { ignoreCase: config.ignoreCase, smartCase: config.smartCase, wrapScan: config.wrapScan };
}
