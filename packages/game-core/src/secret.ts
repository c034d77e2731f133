// packages/game-core/src/secret.ts
//
// Secret generation: independent uniform draws from the alphabet.
// Repeats are allowed, so every code in alphabet^length is equally likely.

import type { Code, CodeSymbol } from '@ciphermind/protocol';
import { GameContractError } from './errors.js';
import { defaultRandom, type RandomSource } from './random.js';

/**
 * generateSecret draws `length` symbols from `alphabet`.
 *
 * Throws GameContractError for a non-positive or fractional length or an
 * empty alphabet.
 */
export function generateSecret(
  length: number,
  alphabet: readonly CodeSymbol[],
  random: RandomSource = defaultRandom,
): Code {
  if (!Number.isInteger(length) || length < 1) {
    throw new GameContractError(`Code length must be a positive integer, got ${length}`);
  }
  if (alphabet.length === 0) {
    throw new GameContractError('Alphabet must not be empty');
  }

  return Array.from({ length }, () => {
    // Clamp in case a substituted source returns exactly 1
    const index = Math.min(Math.floor(random() * alphabet.length), alphabet.length - 1);
    return alphabet[index];
  });
}
