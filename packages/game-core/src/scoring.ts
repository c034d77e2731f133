// packages/game-core/src/scoring.ts
//
// Feedback scoring, shared by the session state machine and any renderer
// that wants to preview a guess.
// Implements the standard two-pass algorithm to compare a guess with the secret.
//
// Feedback legend:
//   - exact: correct symbol, correct position
//   - color: correct symbol, wrong position
//
// Rules:
//   • Both codes must have the same length (checked; a mismatch is a contract breach).
//   • Symbols are compared as-is; the validator has already canonicalized them.
//   • Repeated symbols are handled by counting the non-exact secret symbols and
//     decrementing counts as matches are used, so each secret symbol satisfies
//     at most one guess symbol.

import type { Code, CodeSymbol, Feedback } from '@ciphermind/protocol';
import { GameContractError } from './errors.js';

/**
 * scoreCode compares a guess against the secret.
 *
 * @param secret - the hidden code
 * @param guess  - the player's validated guess, same length as the secret
 * @returns      - exact and color match counts, with exact + color <= length
 *
 * Example:
 *   secret = [R,G,B,Y], guess = [R,B,Y,M]
 *   → { exact: 1, color: 2 }
 */
export function scoreCode(secret: Code, guess: Code): Feedback {
  if (secret.length !== guess.length) {
    throw new GameContractError(
      `Cannot score codes of different lengths (${secret.length} vs ${guess.length})`,
    );
  }

  let exact = 0;
  const leftoverSecret = new Map<CodeSymbol, number>();
  const leftoverGuess: CodeSymbol[] = [];

  // Pass 1: count exact matches and collect the unmatched symbols
  for (let i = 0; i < secret.length; i++) {
    if (guess[i] === secret[i]) {
      exact++;
    } else {
      leftoverSecret.set(secret[i], (leftoverSecret.get(secret[i]) ?? 0) + 1);
      leftoverGuess.push(guess[i]);
    }
  }

  // Pass 2: each leftover guess symbol consumes one leftover secret symbol
  let color = 0;
  for (const symbol of leftoverGuess) {
    const remaining = leftoverSecret.get(symbol) ?? 0;
    if (remaining > 0) {
      color++;
      leftoverSecret.set(symbol, remaining - 1);
    }
  }

  return { exact, color };
}

/** True when every position matched. */
export function isSolved(feedback: Feedback, length: number): boolean {
  return feedback.exact === length;
}
