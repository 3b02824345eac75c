/**
 * Board generator entry point.
 *
 * Usage:
 *   tsx cli/index.ts words.csv        # shareable board + key from a word list
 *   tsx cli/index.ts W1 W2 ... W25    # key for 25 given words, in order
 */

import { runProgram } from "./program";

process.exitCode = runProgram(process.argv.slice(2));
