// apps/cli/src/__tests__/render.test.ts
//
// Unit tests for the terminal renderers. Colors are off except where a test
// checks the ANSI glyphs themselves.

import type { SessionSnapshot } from '@ciphermind/game-core';
import {
  HINT_MESSAGES,
  banner,
  feedbackLine,
  guessLine,
  outcomeLines,
  peg,
  pegs,
} from '../render.js';

const session = { length: 4, alphabet: ['R', 'G', 'B', 'Y', 'M', 'C'], attemptLimit: 10 };

function snapshot(overrides: Partial<SessionSnapshot>): SessionSnapshot {
  return {
    config: { ...session },
    state: 'in_progress',
    attempt: 0,
    attemptsLeft: 10,
    history: [],
    ...overrides,
  };
}

describe('pegs', () => {
  it('draws colored glyphs when color is on', () => {
    expect(peg('R', true)).toBe('\x1b[31m●\x1b[0m');
    expect(peg('c', true)).toBe('\x1b[36m●\x1b[0m');
    expect(peg('Q', true)).toBe('\x1b[37m●\x1b[0m');
  });

  it('falls back to plain symbols without color', () => {
    expect(pegs(['R', 'G', 'B', 'Y'], false)).toBe('R G B Y');
  });
});

describe('lines', () => {
  it('pluralizes color matches', () => {
    expect(feedbackLine({ exact: 1, color: 2 })).toBe('  → 1 exact, 2 colors');
    expect(feedbackLine({ exact: 2, color: 1 })).toBe('  → 2 exact, 1 color');
    expect(feedbackLine({ exact: 0, color: 0 })).toBe('  → 0 exact, 0 colors');
  });

  it('numbers guesses', () => {
    expect(guessLine(3, ['Y', 'B', 'G', 'R'], false)).toBe('  Guess 3: Y B G R');
  });

  it('has a message for every tier but solved', () => {
    expect(HINT_MESSAGES.right_colors).toBe(
      '💡 You have the right colors, just wrong positions!',
    );
    expect(HINT_MESSAGES.solved).toBe('');
  });
});

describe('banner', () => {
  it('lists the alphabet and an example guess', () => {
    const lines = banner(session, false);
    expect(lines).toContain('    R = R G = G B = B Y = Y M = M C = C');
    expect(lines).toContain('  • You have 10 guesses to crack it!');
    expect(lines[lines.length - 1]).toBe(
      '💡 Example: Enter your guess as 4 letters, like: RGBY',
    );
  });
});

describe('outcomeLines', () => {
  it('congratulates a single-guess win', () => {
    const lines = outcomeLines(
      snapshot({ state: 'won', attempt: 1, secret: ['R', 'G', 'B', 'Y'] }),
      'hole_in_one',
      false,
    );
    expect(lines.slice(2, 5)).toEqual([
      '🎉 CONGRATULATIONS! 🎉',
      'You cracked the code in 1 guess!',
      '🏆 INCREDIBLE! A hole-in-one!',
    ]);
  });

  it('reveals the secret on a loss', () => {
    const lines = outcomeLines(
      snapshot({ state: 'lost', attempt: 10, attemptsLeft: 0, secret: ['M', 'M', 'C', 'C'] }),
      undefined,
      false,
    );
    expect(lines).toContain("You've used all 10 attempts.");
    expect(lines).toContain('  The code was: M M C C');
  });
});
