import { describe, it, expect } from 'vitest';
import { generateKey, countMarkers, markerForCode } from '../key';
import { CapacityError } from '../errors';
import { otherTeam } from '../game-utils';
import type { RandomSource } from '../types';

// ============================================================================
// Test Helpers
// ============================================================================

/**
 * Random source that first yields `first`, then walks every cell of a 5x5
 * board in order, forever.
 */
function scriptedRandom(first: number): RandomSource {
  const cells = Array.from({ length: 25 }, (_, i) => (i + 0.5) / 25);
  let calls = 0;
  return () => (calls++ === 0 ? first : cells[(calls - 2) % cells.length]);
}

// ============================================================================
// generateKey
// ============================================================================

describe('generateKey', () => {
  describe('card distribution', () => {
    it('always assigns 9 / 8 / 1 / 7', () => {
      for (let i = 0; i < 200; i++) {
        const { key, startingTeam } = generateKey();
        const counts = countMarkers(key);

        expect(counts[startingTeam]).toBe(9);
        expect(counts[otherTeam(startingTeam)]).toBe(8);
        expect(counts.assassin).toBe(1);
        expect(counts.unassigned).toBe(7);
      }
    });

    it('creates a 5x5 key', () => {
      const { key } = generateKey();
      expect(key).toHaveLength(5);
      key.forEach((row) => expect(row).toHaveLength(5));
    });

    it('only uses known marker codes', () => {
      const { key } = generateKey();
      key.flat().forEach((cell) => {
        expect(['B', 'R', 'X', '']).toContain(cell);
      });
    });
  });

  describe('starting team', () => {
    it('gives the extra tile to blue when blue starts', () => {
      const { key, startingTeam } = generateKey({ random: scriptedRandom(0.2) });
      expect(startingTeam).toBe('blue');
      expect(countMarkers(key).blue).toBe(9);
      expect(countMarkers(key).red).toBe(8);
    });

    it('gives the extra tile to red when red starts', () => {
      const { key, startingTeam } = generateKey({ random: scriptedRandom(0.7) });
      expect(startingTeam).toBe('red');
      expect(countMarkers(key).red).toBe(9);
      expect(countMarkers(key).blue).toBe(8);
    });

    it('places starting team, other team, then assassin in order', () => {
      const { key } = generateKey({ random: scriptedRandom(0.7) });
      expect(key).toEqual([
        ['R', 'R', 'R', 'R', 'R'],
        ['R', 'R', 'R', 'R', 'B'],
        ['B', 'B', 'B', 'B', 'B'],
        ['B', 'B', 'X', '', ''],
        ['', '', '', '', ''],
      ]);
    });

    it('picks each team roughly half the time', () => {
      const iterations = 2000;
      let blueStarts = 0;
      for (let i = 0; i < iterations; i++) {
        if (generateKey().startingTeam === 'blue') blueStarts++;
      }
      // about 6.7 standard deviations either side of 1000
      expect(blueStarts).toBeGreaterThan(850);
      expect(blueStarts).toBeLessThan(1150);
    });
  });

  describe('randomness', () => {
    it('moves the assassin between runs', () => {
      const positions = new Set<number>();
      for (let i = 0; i < 50; i++) {
        positions.add(generateKey().key.flat().indexOf('X'));
      }
      expect(positions.size).toBeGreaterThan(1);
    });
  });

  describe('board size', () => {
    it('fills larger boards with the same tile counts', () => {
      const { key } = generateKey({ size: 6 });
      const counts = countMarkers(key);
      expect(key.flat()).toHaveLength(36);
      expect(counts.unassigned).toBe(18);
      expect(counts.assassin).toBe(1);
    });

    it('throws CapacityError when the board is too small', () => {
      expect(() => generateKey({ size: 4 })).toThrow(CapacityError);
      expect(() => generateKey({ size: 4 })).toThrow(
        'Cannot fill a board with 7 empty spaces 8 times'
      );
    });
  });
});

// ============================================================================
// countMarkers / markerForCode
// ============================================================================

describe('countMarkers', () => {
  it('tallies every marker', () => {
    expect(countMarkers([
      ['B', 'R'],
      ['X', ''],
      ['B', ''],
    ])).toEqual({ blue: 2, red: 1, assassin: 1, unassigned: 2 });
  });
});

describe('markerForCode', () => {
  it('maps codes back to markers', () => {
    expect(markerForCode('B')).toBe('blue');
    expect(markerForCode('R')).toBe('red');
    expect(markerForCode('X')).toBe('assassin');
    expect(markerForCode('')).toBe('unassigned');
  });
});
