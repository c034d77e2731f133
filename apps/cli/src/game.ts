// apps/cli/src/game.ts
//
// The interactive loop: welcome banner, prompt for guesses, print feedback
// and hints, reveal on loss or quit, offer another game.
//
// All I/O goes through GameIO so tests can drive the loop with scripted input.
// Game rules live in @ciphermind/game-core; this file only routes input to a
// Session and renders the TurnResult it returns.

import type { Logger } from 'pino';
import { nanoid } from 'nanoid';
import {
  describeValidationError,
  isRunningLow,
  newSession,
  ratingFor,
  type RandomSource,
} from '@ciphermind/game-core';
import type { SessionState } from '@ciphermind/protocol';
import type { CliConfig } from './config.js';
import {
  HINT_MESSAGES,
  banner,
  feedbackLine,
  guessLine,
  outcomeLines,
  revealLine,
} from './render.js';

export interface GameIO {
  /** Resolves with the typed line, or null once input has ended. */
  ask(prompt: string): Promise<string | null>;
  print(line: string): void;
}

export interface RunOptions {
  config: CliConfig;
  logger: Logger;
  color: boolean;
  /** Overrides secret generation, mainly for tests. */
  randomFor?: (gameNumber: number) => RandomSource;
}

export interface GameSummary {
  gameId: string;
  state: SessionState;
  attempts: number;
}

const QUIT = 'quit';

/**
 * runGame plays games until the player declines a rematch, quits, or input
 * ends. Returns one summary per game played.
 */
export async function runGame(io: GameIO, opts: RunOptions): Promise<GameSummary[]> {
  const { config, logger, color } = opts;
  const summaries: GameSummary[] = [];

  for (let gameNumber = 1; ; gameNumber++) {
    const seed = config.seed !== undefined ? `${config.seed}:${gameNumber}` : undefined;
    const session = newSession({ ...config.session, seed }, opts.randomFor?.(gameNumber));
    const gameId = nanoid(10);
    const log = logger.child({ gameId, gameNumber });
    log.info({ seeded: seed !== undefined }, 'game started');

    for (const line of banner(session.config, color)) io.print(line);

    while (!session.isTerminal) {
      const input = await io.ask("\n🎯 Enter your guess (or 'quit' to exit): ");

      if (input === null || input.trim().toLowerCase() === QUIT) {
        const secret = session.abandon();
        io.print('\n👋 Thanks for playing!');
        io.print(revealLine(secret, color));
        const attempts = session.snapshot().attempt;
        log.info({ state: 'abandoned', attempts }, 'game finished');
        summaries.push({ gameId, state: 'abandoned', attempts });
        return summaries;
      }

      const res = session.submit(input);
      if (!res.ok) {
        log.debug({ error: res.error }, 'guess rejected');
        io.print(`  ❌ ${describeValidationError(res.error)}`);
        continue;
      }

      const turn = res.result;
      const { guess } = turn.history[turn.history.length - 1];
      log.info({ attempt: turn.attempt, feedback: turn.feedback }, 'guess scored');
      io.print(guessLine(turn.attempt, guess, color));
      io.print(feedbackLine(turn.feedback));

      if (turn.state === 'in_progress') {
        io.print(`  ${HINT_MESSAGES[turn.hint]}`);
        if (isRunningLow(turn.attempt, session.config.attemptLimit)) {
          io.print('  ⏰ Running out of guesses!');
        }
      }
    }

    const snapshot = session.snapshot();
    const rating = snapshot.state === 'won' ? ratingFor(snapshot.attempt) : undefined;
    for (const line of outcomeLines(snapshot, rating, color)) io.print(line);
    log.info({ state: snapshot.state, attempts: snapshot.attempt }, 'game finished');
    summaries.push({ gameId, state: snapshot.state, attempts: snapshot.attempt });

    const again = await io.ask('\n🔄 Play again? (y/n): ');
    const answer = again?.trim().toLowerCase();
    if (answer !== 'y' && answer !== 'yes') {
      io.print('\n👋 Thanks for playing CipherMind!');
      io.print('Remember: Logic conquers all codes! 🧩\n');
      return summaries;
    }
  }
}
