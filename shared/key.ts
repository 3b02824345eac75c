/**
 * Secret key generation: which tile belongs to which team.
 */

import { assignTiles, createEmptyGrid } from "./board";
import {
  ASSASSIN_TILES,
  BOARD_SIZE,
  MARKER_CODES,
  OTHER_TEAM_TILES,
  STARTING_TEAM_TILES,
} from "./constants";
import { otherTeam, pickStartingTeam } from "./game-utils";
import type { GeneratedKey, KeyBoard, KeyOptions, MarkerCode, TeamMarker } from "./types";

/**
 * Build a key with 9 tiles for the starting team, 8 for the other team and
 * 1 assassin. Remaining cells stay unassigned (7 on a 5x5 board).
 *
 * Throws CapacityError if `size` is too small to hold every tile.
 */
export function generateKey(options: KeyOptions = {}): GeneratedKey {
  const { size = BOARD_SIZE, random = Math.random } = options;

  const startingTeam = pickStartingTeam(random);
  const key: KeyBoard = createEmptyGrid(size);

  assignTiles<MarkerCode>(key, MARKER_CODES[startingTeam], STARTING_TEAM_TILES, random);
  assignTiles<MarkerCode>(key, MARKER_CODES[otherTeam(startingTeam)], OTHER_TEAM_TILES, random);
  assignTiles<MarkerCode>(key, MARKER_CODES.assassin, ASSASSIN_TILES, random);

  return { key, startingTeam };
}

/** Count how many cells of a key carry each marker */
export function countMarkers(key: KeyBoard): Record<TeamMarker, number> {
  const counts: Record<TeamMarker, number> = { blue: 0, red: 0, assassin: 0, unassigned: 0 };
  for (const row of key) {
    for (const cell of row) {
      counts[markerForCode(cell)]++;
    }
  }
  return counts;
}

export function markerForCode(code: MarkerCode): TeamMarker {
  switch (code) {
    case "B":
      return "blue";
    case "R":
      return "red";
    case "X":
      return "assassin";
    case "":
      return "unassigned";
  }
}
