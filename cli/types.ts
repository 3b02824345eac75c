/**
 * CLI-specific types for the board generator.
 */

import type { RandomSource } from "../shared/types";

/** Output sink; receives fully formatted text */
export interface Display {
  print(text: string): void;
  warn(text: string): void;
}

export const consoleDisplay: Display = {
  print: (text) => console.log(text),
  warn: (text) => console.warn(text),
};

export type ParsedArgs =
  | { kind: "file"; path: string }
  | { kind: "words"; words: string[] }
  | { kind: "help" };

export interface ProgramOptions {
  display?: Display;
  /** Name shown in the usage message */
  programName?: string;
  random?: RandomSource;
}

// ============================================================================
// CLI Constants
// ============================================================================

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
