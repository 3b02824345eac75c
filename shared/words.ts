/**
 * Lays a word list out on the public board.
 */

import { createEmptyGrid } from "./board";
import { BOARD_CELLS, BOARD_SIZE } from "./constants";
import { InsufficientWordsError } from "./errors";
import { dedupeWords, shuffle } from "./game-utils";
import type { WordBoard, WordBoardOptions } from "./types";

/**
 * Build the 5x5 word board.
 *
 * In "pool" mode (the default) duplicates are dropped and the list is shuffled
 * before the first 25 words are taken. In "exact" mode the first 25 words are
 * placed in the order given and must all differ. Either way InsufficientWordsError
 * is thrown when fewer than 25 unique words are available.
 */
export function buildWordBoard(words: readonly string[], options: WordBoardOptions = {}): WordBoard {
  const { mode = "pool", random = Math.random } = options;

  // Exact mode places the first 25 words as given, so only those must be unique
  const candidates = mode === "exact" ? words.slice(0, BOARD_CELLS) : words;
  const unique = dedupeWords(candidates);
  if (unique.length < BOARD_CELLS) {
    throw new InsufficientWordsError(BOARD_CELLS, unique.length);
  }

  const selected = mode === "exact" ? candidates : shuffle(unique, random).slice(0, BOARD_CELLS);

  const board: WordBoard = createEmptyGrid(BOARD_SIZE);
  selected.forEach((word, i) => {
    board[Math.floor(i / BOARD_SIZE)][i % BOARD_SIZE] = word;
  });
  return board;
}
