/**
 * Argument handling and output for the board generator CLI.
 */

import { combineBoards, renderBoard } from "../shared/format";
import { TEAM_LABELS } from "../shared/constants";
import { CapacityError, InsufficientWordsError } from "../shared/errors";
import { generateKey } from "../shared/key";
import { buildWordBoard } from "../shared/words";
import type { RandomSource, WordBoard } from "../shared/types";
import { consoleDisplay, EXIT_OK, EXIT_USAGE } from "./types";
import type { Display, ParsedArgs, ProgramOptions } from "./types";
import { readWordArgs, readWordFile, WordFileError } from "./word-source";

const EXACT_WORD_COUNT = 25;

// ============================================================================
// Arguments
// ============================================================================

/** One argument names a word list file; exactly 25 are the board itself */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  if (argv[0] === "--help" || argv[0] === "-h") return { kind: "help" };
  if (argv.length === 1) return { kind: "file", path: argv[0] };
  if (argv.length === EXACT_WORD_COUNT) return { kind: "words", words: [...argv] };
  return { kind: "help" };
}

export function usage(programName: string): string {
  return `Usage: ${programName} [WordList] or ${programName} [List of ${EXACT_WORD_COUNT} words...]`;
}

// ============================================================================
// Output
// ============================================================================

function printKey(display: Display, board: WordBoard, random: RandomSource) {
  display.print("Key:");
  const { key, startingTeam } = generateKey({ random });
  display.print(`${TEAM_LABELS[startingTeam]} plays first`);
  display.print(renderBoard(combineBoards(board, key)));
}

function isUserError(error: unknown): error is Error {
  return (
    error instanceof WordFileError ||
    error instanceof InsufficientWordsError ||
    error instanceof CapacityError
  );
}

// ============================================================================
// Entry
// ============================================================================

/**
 * Run the generator and return the process exit code.
 * Errors the user can fix are reported on the display; anything else is thrown.
 */
export function runProgram(argv: readonly string[], options: ProgramOptions = {}): number {
  const { display = consoleDisplay, programName = "clue-boards", random = Math.random } = options;

  const args = parseArgs(argv);
  if (args.kind === "help") {
    display.warn(usage(programName));
    return EXIT_USAGE;
  }

  try {
    if (args.kind === "file") {
      const board = buildWordBoard(readWordFile(args.path), { mode: "pool", random });
      display.print("Sharable Table:");
      display.print(renderBoard(board));
      display.print("\n");
      printKey(display, board, random);
    } else {
      const board = buildWordBoard(readWordArgs(args.words), { mode: "exact", random });
      printKey(display, board, random);
    }
  } catch (error) {
    if (isUserError(error)) {
      display.warn(error.message);
      return EXIT_USAGE;
    }
    throw error;
  }

  return EXIT_OK;
}
