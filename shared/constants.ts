import type { Team, TeamMarker } from "./types";

// Board geometry
export const BOARD_SIZE = 5;
export const BOARD_CELLS = BOARD_SIZE * BOARD_SIZE;

// Key distribution (starting team gets the extra tile)
export const STARTING_TEAM_TILES = 9;
export const OTHER_TEAM_TILES = 8;
export const ASSASSIN_TILES = 1;

export const TEAMS = ["blue", "red"] as const;

// Single-character codes printed on the key
export const MARKER_CODES = {
  blue: "B",
  red: "R",
  assassin: "X",
  unassigned: "",
} as const satisfies Record<TeamMarker, string>;

export const TEAM_LABELS: Record<Team, string> = {
  blue: "Blue",
  red: "Red",
};
