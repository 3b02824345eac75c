/**
 * Shared randomization and word-list helpers used by board generation.
 */

import type { RandomSource, Team } from "./types";

// ============================================================================
// Randomness
// ============================================================================

/** Uniform integer in [0, max) */
export function randomIndex(max: number, random: RandomSource = Math.random): number {
  return Math.floor(random() * max);
}

/** Fisher-Yates shuffle; returns a new array */
export function shuffle<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = randomIndex(i + 1, random);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

// ============================================================================
// Teams
// ============================================================================

/** Fair coin flip for the team that moves first */
export function pickStartingTeam(random: RandomSource = Math.random): Team {
  return random() < 0.5 ? "blue" : "red";
}

export function otherTeam(team: Team): Team {
  return team === "blue" ? "red" : "blue";
}

// ============================================================================
// Word Lists
// ============================================================================

/** Remove repeated words, keeping the first occurrence of each */
export function dedupeWords(words: readonly string[]): string[] {
  return [...new Set(words)];
}
