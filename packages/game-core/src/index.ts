// packages/game-core/src/index.ts
//
// Entry point for the game-core package.
// Re-exports all core game logic so consumers can import from one place.
//
// Includes:
//   • scoring.ts  → feedback scoring (scoreCode, isSolved)
//   • validate.ts → raw input to Code (validateGuess, formatCode)
//   • secret.ts   → secret generation (generateSecret)
//   • random.ts   → injectable random sources (seededRandom)
//   • session.ts  → session state machine (Session, newSession)
//   • hints.ts    → advisory hint tiers and ratings
//   • errors.ts   → GameContractError, describeValidationError
//
// Example usage:
//   import { newSession, describeValidationError } from '@ciphermind/game-core';

export * from './scoring.js';
export * from './validate.js';
export * from './secret.js';
export * from './random.js';
export * from './session.js';
export * from './hints.js';
export * from './errors.js';
