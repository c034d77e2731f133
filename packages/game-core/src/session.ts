// packages/game-core/src/session.ts
//
// One game, from secret generation to a terminal state.
//
// State machine:
//   in_progress ──submit (exact = length)──────────▶ won
//   in_progress ──submit (attempt = attemptLimit)──▶ lost
//   in_progress ──abandon──────────────────────────▶ abandoned
//
// won / lost / abandoned are terminal: submit() and abandon() throw there,
// and the caller starts a new Session instead.
//
// The session owns its secret and history. Everything it hands out is a copy,
// and the secret is only included once the game is over.

import {
  sessionConfigSchema,
  type Code,
  type CodeSymbol,
  type HistoryEntry,
  type SessionConfig,
  type SessionConfigInput,
  type SessionState,
  type TurnResult,
  type ValidationError,
} from '@ciphermind/protocol';
import { GameContractError } from './errors.js';
import { hintFor } from './hints.js';
import { defaultRandom, seededRandom, type RandomSource } from './random.js';
import { isSolved, scoreCode } from './scoring.js';
import { generateSecret } from './secret.js';
import { validateGuess } from './validate.js';

export type SubmitResult =
  | { ok: true; result: TurnResult }
  | { ok: false; error: ValidationError };

/** The config a session plays by; frozen once the session is created. */
export type SessionSettings = Readonly<
  Omit<SessionConfig, 'alphabet'> & { alphabet: readonly CodeSymbol[] }
>;

export interface SessionSnapshot {
  config: SessionSettings;
  state: SessionState;
  attempt: number;
  attemptsLeft: number;
  history: readonly HistoryEntry[];
  /** Only present once the session is terminal. */
  secret?: Code;
}

export class Session {
  readonly config: SessionSettings;
  private readonly secret: Code;
  private readonly history: HistoryEntry[] = [];
  private attempt = 0;
  private current: SessionState = 'in_progress';

  constructor(config: SessionConfig, secret: Code) {
    if (secret.length !== config.length) {
      throw new GameContractError(
        `Secret has ${secret.length} symbols, expected ${config.length}`,
      );
    }
    const allowed = new Set(config.alphabet);
    const stray = secret.find((s) => !allowed.has(s));
    if (stray !== undefined) {
      throw new GameContractError(`Secret symbol '${stray}' is not in the alphabet`);
    }
    this.config = Object.freeze({ ...config, alphabet: Object.freeze([...config.alphabet]) });
    this.secret = [...secret];
  }

  get state(): SessionState {
    return this.current;
  }

  get isTerminal(): boolean {
    return this.current !== 'in_progress';
  }

  /**
   * submit validates raw input and, if it is a valid guess, plays it.
   * Invalid input is returned as an error and costs no attempt.
   */
  submit(raw: string): SubmitResult {
    this.assertInProgress('submit');
    const parsed = validateGuess(raw, this.config.length, this.config.alphabet);
    if (!parsed.ok) return parsed;
    return { ok: true, result: this.submitCode(parsed.code) };
  }

  /** Plays an already validated guess. */
  submitCode(guess: Code): TurnResult {
    this.assertInProgress('submit');
    if (guess.length !== this.config.length) {
      throw new GameContractError(
        `Guess has ${guess.length} symbols, expected ${this.config.length}`,
      );
    }

    this.attempt += 1;
    const feedback = scoreCode(this.secret, guess);
    this.history.push({ guess: [...guess], feedback });

    if (isSolved(feedback, this.config.length)) {
      this.current = 'won';
    } else if (this.attempt >= this.config.attemptLimit) {
      this.current = 'lost';
    }

    return {
      feedback,
      state: this.current,
      attempt: this.attempt,
      attemptsLeft: this.config.attemptLimit - this.attempt,
      hint: hintFor(feedback, this.config.length),
      history: this.historyCopy(),
      ...(this.isTerminal ? { secret: [...this.secret] } : {}),
    };
  }

  /** Ends the game without a win or loss and reveals the secret. */
  abandon(): Code {
    this.assertInProgress('abandon');
    this.current = 'abandoned';
    return [...this.secret];
  }

  snapshot(): SessionSnapshot {
    return {
      config: this.config,
      state: this.current,
      attempt: this.attempt,
      attemptsLeft: this.config.attemptLimit - this.attempt,
      history: this.historyCopy(),
      ...(this.isTerminal ? { secret: [...this.secret] } : {}),
    };
  }

  private historyCopy(): HistoryEntry[] {
    return this.history.map((h) => ({ guess: [...h.guess], feedback: { ...h.feedback } }));
  }

  private assertInProgress(action: string): void {
    if (this.current !== 'in_progress') {
      throw new GameContractError(`Cannot ${action}: session is already ${this.current}`);
    }
  }
}

/**
 * newSession validates the config and deals a fresh secret.
 *
 * The random source defaults to a seeded one when config.seed is set, and to
 * Math.random otherwise. Passing `random` overrides both.
 *
 * Example:
 *   const session = newSession({ seed: 'demo' });
 *   session.submit('RGBY');
 */
export function newSession(
  input: SessionConfigInput = {},
  random?: RandomSource,
): Session {
  const parsed = sessionConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new GameContractError(`Invalid session config: ${parsed.error.message}`);
  }
  const config = parsed.data;
  const source = random ?? (config.seed !== undefined ? seededRandom(config.seed) : defaultRandom);
  return new Session(config, generateSecret(config.length, config.alphabet, source));
}
