/**
 * Grid construction and random tile placement.
 */

import { CapacityError } from "./errors";
import { randomIndex } from "./game-utils";
import type { Grid, RandomSource } from "./types";

// ============================================================================
// Layout
// ============================================================================

/** Create a size x size grid with every cell unfilled */
export function createEmptyGrid(size: number): Grid<""> {
  return Array.from({ length: size }, () => Array.from({ length: size }, () => "" as const));
}

export function countEmptyCells(grid: Grid): number {
  return grid.reduce((total, row) => total + row.filter((cell) => cell === "").length, 0);
}

/** Throws CapacityError when the grid has fewer than `count` empty cells */
export function ensureCapacity(grid: Grid, count: number): void {
  const available = countEmptyCells(grid);
  if (count > available) {
    throw new CapacityError(count, available);
  }
}

// ============================================================================
// Tile Assignment
// ============================================================================

/**
 * Write `marker` into `count` distinct empty cells chosen uniformly at random.
 *
 * Draws cell indices over the whole grid and discards draws that land on a
 * filled cell, so the number of draws varies from run to run. Filled cells are
 * never overwritten. Capacity is checked up front; on failure the grid is left
 * untouched.
 */
export function assignTiles<T extends string>(
  grid: Grid<T | "">,
  marker: T,
  count: number,
  random: RandomSource = Math.random
): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`Tile count must be a non-negative integer, got ${count}`);
  }
  ensureCapacity(grid, count);

  const size = grid.length;
  let placed = 0;
  while (placed < count) {
    const tile = randomIndex(size * size, random);
    const row = Math.floor(tile / size);
    const column = tile % size;
    if (grid[row][column] === "") {
      grid[row][column] = marker;
      placed++;
    }
  }
}
