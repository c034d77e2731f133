// packages/protocol/src/index.ts
//
// Shared protocol definitions for the CipherMind core and its renderers.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - Code / Feedback:  the values the scoring engine reads and produces.
//   - SessionState:     "in_progress", "won", "lost", "abandoned".
//   - HintTier:         advisory label derived from a feedback pair.
//   - SessionConfig:    parameters for starting a new session.
//   - ValidationError:  recoverable input errors returned by the validator.
//   - TurnResult:       structured result of one submitted guess.
//
// The core validates its session config here; the CLI infers its types from
// the same schemas so both ends agree on the shape of a turn.

import { z } from 'zod';

export const DEFAULT_CODE_LENGTH = 4;
export const DEFAULT_ATTEMPT_LIMIT = 10;

/** Red, Green, Blue, Yellow, Magenta, Cyan. */
export const DEFAULT_ALPHABET = ['R', 'G', 'B', 'Y', 'M', 'C'] as const;

/** A symbol is one token of input, so it cannot contain whitespace or commas. */
export const symbolSchema = z
  .string()
  .min(1)
  .regex(/^[^\s,]+$/, { message: 'Symbols cannot contain whitespace or commas' });
export type CodeSymbol = z.infer<typeof symbolSchema>;

export const codeSchema = z.array(symbolSchema).readonly();
export type Code = z.infer<typeof codeSchema>;

/**
 * Feedback schema:
 *  - exact → symbol equal at the same position
 *  - color → symbol present elsewhere, each secret symbol counted at most once
 */
export const feedbackSchema = z.object({
  exact: z.number().int().nonnegative(),
  color: z.number().int().nonnegative(),
});
export type Feedback = z.infer<typeof feedbackSchema>;

export const sessionStateSchema = z.enum([
  'in_progress',
  'won',
  'lost',
  'abandoned',
]);
export type SessionState = z.infer<typeof sessionStateSchema>;

export const hintTierSchema = z.enum([
  'no_match',
  'right_colors',
  'one_placed',
  'two_placed',
  'three_placed',
  'keep_analyzing',
  'solved',
]);
export type HintTier = z.infer<typeof hintTierSchema>;

/* -------------------------------------------------------------------------- */
/*                               Session config                               */
/* -------------------------------------------------------------------------- */

/**
 * Parameters for a new session.
 *  - length:       symbols per code (defaults to 4)
 *  - alphabet:     guessable symbols, unique ignoring case (defaults to RGBYMC)
 *  - attemptLimit: number of allowed guesses (defaults to 10)
 *  - seed:         optional string for a deterministic secret
 */
export const sessionConfigSchema = z.object({
  length: z.number().int().min(1).default(DEFAULT_CODE_LENGTH),
  alphabet: z
    .array(symbolSchema)
    .min(1)
    .refine(
      (symbols) =>
        new Set(symbols.map((s) => s.toUpperCase())).size === symbols.length,
      { message: 'Alphabet symbols must be unique (case-insensitive)' },
    )
    .default([...DEFAULT_ALPHABET]),
  attemptLimit: z.number().int().min(1).default(DEFAULT_ATTEMPT_LIMIT),
  seed: z.string().optional(),
});
export type SessionConfigInput = z.input<typeof sessionConfigSchema>;
export type SessionConfig = z.infer<typeof sessionConfigSchema>;

/* -------------------------------------------------------------------------- */
/*                              Validation errors                             */
/* -------------------------------------------------------------------------- */

/**
 * Errors the validator returns instead of throwing. Both are recoverable:
 * the caller re-prompts and the attempt counter is left alone.
 */
export const validationErrorSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('length_mismatch'),
    expected: z.number().int(),
    actual: z.number().int(),
  }),
  z.object({
    kind: z.literal('unknown_symbol'),
    symbol: z.string(),
    allowed: z.array(symbolSchema).readonly(),
  }),
]);
export type ValidationError = z.infer<typeof validationErrorSchema>;

/* -------------------------------------------------------------------------- */
/*                                 Turn result                                */
/* -------------------------------------------------------------------------- */

export const historyEntrySchema = z.object({
  guess: codeSchema,
  feedback: feedbackSchema,
});
export type HistoryEntry = z.infer<typeof historyEntrySchema>;

/**
 * Result of one accepted guess:
 *  - attempt:      attempt number (1-based, increments per accepted guess)
 *  - attemptsLeft: remaining guesses before the session is lost
 *  - secret:       present only once the session is terminal
 */
export const turnResultSchema = z.object({
  feedback: feedbackSchema,
  state: sessionStateSchema,
  attempt: z.number().int().min(1),
  attemptsLeft: z.number().int().nonnegative(),
  hint: hintTierSchema,
  history: z.array(historyEntrySchema).readonly(),
  secret: codeSchema.optional(),
});
export type TurnResult = z.infer<typeof turnResultSchema>;
