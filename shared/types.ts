import type { MARKER_CODES, TEAMS } from "./constants";

export type Team = (typeof TEAMS)[number];

export type TeamMarker = Team | "assassin" | "unassigned";

export type MarkerCode = (typeof MARKER_CODES)[TeamMarker];

/** Square grid addressed as grid[row][column]; "" marks an unfilled cell */
export type Grid<T extends string = string> = T[][];

export type WordBoard = Grid<string>;

export type KeyBoard = Grid<MarkerCode>;

/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number;

export interface GeneratedKey {
  key: KeyBoard;
  /** The team holding the extra tile; it always moves first */
  startingTeam: Team;
}

export type WordBoardMode = "pool" | "exact";

export interface WordBoardOptions {
  /**
   * "pool" dedupes and shuffles a larger candidate list before taking 25 words.
   * "exact" keeps the caller's order untouched.
   */
  mode?: WordBoardMode;
  random?: RandomSource;
}

export interface KeyOptions {
  size?: number;
  random?: RandomSource;
}
