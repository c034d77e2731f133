// packages/game-core/src/hints.ts
//
// Advisory labels for renderers. Nothing here affects game state.
//
// The hint table keys on the literal exact count; color matches only matter
// when there are no exact matches at all.

import type { Feedback, HintTier } from '@ciphermind/protocol';

/**
 * hintFor picks the hint tier for a feedback pair.
 *
 *   exact = length        → solved
 *   exact = 0, color = 0  → no_match
 *   exact = 0, color > 0  → right_colors
 *   exact = 1 / 2 / 3     → one_placed / two_placed / three_placed
 *   otherwise             → keep_analyzing
 */
export function hintFor(feedback: Feedback, length: number): HintTier {
  const { exact, color } = feedback;
  if (exact === length) return 'solved';
  if (exact === 0) return color === 0 ? 'no_match' : 'right_colors';
  if (exact === 1) return 'one_placed';
  if (exact === 2) return 'two_placed';
  if (exact === 3) return 'three_placed';
  return 'keep_analyzing';
}

/** True once the player is within two guesses of the limit. */
export function isRunningLow(attempt: number, attemptLimit: number): boolean {
  return attempt < attemptLimit && attempt >= attemptLimit - 2;
}

export type Rating = 'hole_in_one' | 'master' | 'excellent' | 'well_done';

/** Rates a win by how many guesses it took. */
export function ratingFor(attempts: number): Rating {
  if (attempts <= 1) return 'hole_in_one';
  if (attempts <= 3) return 'master';
  if (attempts <= 6) return 'excellent';
  return 'well_done';
}
