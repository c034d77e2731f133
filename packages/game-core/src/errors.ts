// packages/game-core/src/errors.ts
//
// Thrown when the core is used against its contract: submitting to a finished
// session, scoring codes of different lengths, generating a secret from an
// invalid config. These are bugs in the caller, not bad player input; input
// problems come back as ValidationError values instead.

import type { ValidationError } from '@ciphermind/protocol';

export class GameContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GameContractError';
  }
}

/**
 * describeValidationError turns a validator error into a player-facing line.
 *
 * Example:
 *   { kind: 'unknown_symbol', symbol: 'X', allowed: ['R','G'] }
 *   → "Invalid color 'X'. Use only: RG"
 */
export function describeValidationError(error: ValidationError): string {
  switch (error.kind) {
    case 'length_mismatch':
      return `Invalid length! Please enter exactly ${error.expected} colors (got ${error.actual}).`;
    case 'unknown_symbol': {
      const separator = error.allowed.every((s) => s.length === 1) ? '' : ' ';
      return `Invalid color '${error.symbol}'. Use only: ${error.allowed.join(separator)}`;
    }
  }
}
