import { InvalidStateError } from "./errors";
import type { ModalLogger } from "./types";

export interface ModalConfig {
  /** Columns added or removed by `>` and `<`. */
  shiftWidth: number;
  expandTab: boolean;
  tabStop: number;
  /** How many numbered delete registers ("1 to "9) are kept. */
  numberedRegisterDepth: number;
  /** Entries kept per command-line history. */
  historySize: number;
  wrapScan: boolean;
  ignoreCase: boolean;
  smartCase: boolean;
  logger: ModalLogger;
}

export const DEFAULT_CONFIG: ModalConfig = {
  shiftWidth: 2,
  expandTab: true,
  tabStop: 8,
  numberedRegisterDepth: 9,
  historySize: 50,
  wrapScan: true,
  ignoreCase: false,
  smartCase: false,
  logger: console,
};

const POSITIVE_INTEGER_KEYS = ['shiftWidth', 'tabStop', 'numberedRegisterDepth', 'historySize'] as const;

export function createModalConfig(overrides: Partial<ModalConfig> = {}): Readonly<ModalConfig> {
  const config: ModalConfig = { ...DEFAULT_CONFIG, ...overrides };

  for (const key of POSITIVE_INTEGER_KEYS) {
    const value = config[key];
    if (!Number.isInteger(value) || value < 1) {
      throw new InvalidStateError(`Invalid ${key}: ${value} (expected a positive integer)`);
    }
  }
  if (config.numberedRegisterDepth > 9) {
    throw new InvalidStateError(`Invalid numberedRegisterDepth: ${config.numberedRegisterDepth} (at most 9)`);
  }

  return Object.freeze(config);
}
