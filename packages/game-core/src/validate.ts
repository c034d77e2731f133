// packages/game-core/src/validate.ts
//
// Turns raw player input into a Code, or explains why it cannot.
//
// Tokenizing:
//   • Input is trimmed first.
//   • If it contains whitespace or commas, tokens are split on them
//     ("R G Y B", "r,g,y,b"); otherwise every character is a token ("rgyb").
//   • With any multi-character symbol in the alphabet ("Red", "Green"),
//     input is only ever split on separators, so "Red" is one token.
//   • Tokens are matched against the alphabet ignoring case and replaced by
//     the alphabet's own spelling. Order and repeats are preserved.
//
// Errors are returned, not thrown; see ValidationError in @ciphermind/protocol.

import type { Code, CodeSymbol, ValidationError } from '@ciphermind/protocol';

export type ValidationResult =
  | { ok: true; code: Code }
  | { ok: false; error: ValidationError };

const SEPARATORS = /[\s,]+/;

const isSingleChar = (symbols: readonly CodeSymbol[]) =>
  symbols.every((s) => s.length === 1);

function tokenize(raw: string, alphabet: readonly CodeSymbol[]): string[] {
  const trimmed = raw.trim();
  if (trimmed === '') return [];
  if (SEPARATORS.test(trimmed) || !isSingleChar(alphabet)) {
    return trimmed.split(SEPARATORS);
  }
  return [...trimmed];
}

/**
 * validateGuess checks a raw guess against the code length and alphabet.
 *
 * @param raw      - text as typed by the player
 * @param length   - required number of symbols
 * @param alphabet - canonical symbols, unique ignoring case
 *
 * Example:
 *   validateGuess('rgyb', 4, ['R','G','B','Y','M','C'])
 *   → { ok: true, code: ['R','G','Y','B'] }
 */
export function validateGuess(
  raw: string,
  length: number,
  alphabet: readonly CodeSymbol[],
): ValidationResult {
  const tokens = tokenize(raw, alphabet);
  if (tokens.length !== length) {
    return {
      ok: false,
      error: { kind: 'length_mismatch', expected: length, actual: tokens.length },
    };
  }

  const canonical = new Map(alphabet.map((s) => [s.toUpperCase(), s]));
  const code: CodeSymbol[] = [];
  for (const token of tokens) {
    const symbol = canonical.get(token.toUpperCase());
    if (symbol === undefined) {
      return {
        ok: false,
        error: { kind: 'unknown_symbol', symbol: token, allowed: alphabet },
      };
    }
    code.push(symbol);
  }

  return { ok: true, code };
}

/**
 * formatCode renders a code as text that validateGuess accepts again:
 * concatenated when every symbol of the alphabet is one character,
 * space-separated otherwise. The alphabet defaults to the code's own symbols.
 */
export function formatCode(code: Code, alphabet: readonly CodeSymbol[] = code): string {
  return isSingleChar(alphabet) && isSingleChar(code) ? code.join('') : code.join(' ');
}
