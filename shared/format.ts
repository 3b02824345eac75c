/**
 * Plain-text rendering of boards.
 */

import type { Grid, KeyBoard, MarkerCode, WordBoard } from "./types";

/** Longest cell content on the grid, or -1 for a grid with no cells */
export function longestCellLength(grid: Grid): number {
  let longest = -1;
  for (const row of grid) {
    for (const cell of row) {
      longest = Math.max(longest, cell.length);
    }
  }
  return longest;
}

/** "WORD (B)" for an assigned tile, the bare word otherwise */
export function formatCell(word: string, marker: MarkerCode): string {
  return marker.trim() === "" ? word : `${word} (${marker})`;
}

/** Annotate each word with its key marker */
export function combineBoards(words: WordBoard, key: KeyBoard): Grid {
  const sameShape =
    words.length === key.length && words.every((row, i) => row.length === key[i].length);
  if (!sameShape) {
    throw new RangeError("Word board and key must have the same dimensions");
  }
  return words.map((row, i) => row.map((word, j) => formatCell(word, key[i][j])));
}

/**
 * Render a grid as an aligned table. Every cell is padded to the longest cell
 * on the grid, e.g. a row of AGENT and BERLIN renders as `| AGENT  | BERLIN| `.
 */
export function renderBoard(grid: Grid): string {
  const width = longestCellLength(grid);
  return grid
    .map((row) => "| " + row.map((cell) => cell.padEnd(width)).join(" | ") + "| ")
    .join("\n");
}
