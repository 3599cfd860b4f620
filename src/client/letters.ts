/**
 * Validation for rack letters supplied from outside, e.g. a URL.
 */

import type { RackMove } from '../types.js';

export const MAX_RACK_LETTERS = 10;

const LETTERS_PATTERN = /^[A-Z]+$/;

/**
 * Upper-case and check a requested letter sequence.
 * Returns null unless it is 1 to MAX_RACK_LETTERS letters A-Z.
 */
export function parseRackLetters(raw: string): string | null {
  const letters = raw.trim().toUpperCase();
  if (letters.length === 0 || letters.length > MAX_RACK_LETTERS) return null;
  return LETTERS_PATTERN.test(letters) ? letters : null;
}

/** Human-readable summary of a drop, with 1-based slot numbers. */
export function describeMove(move: RackMove): string {
  if (move.from === move.to) {
    return `${move.letter} stayed in slot ${move.from + 1}`;
  }
  return `${move.letter} moved from slot ${move.from + 1} to slot ${move.to + 1}`;
}
