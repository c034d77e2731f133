// apps/cli/src/render.ts
//
// Pure text renderers for the terminal. Every function returns strings; the
// game loop decides where they go. Nothing here inspects game rules beyond
// the structured results the core hands back.
//
// Pegs are drawn as colored "●" glyphs when `color` is on, and as their
// plain symbols otherwise (pipes, tests, NO_COLOR terminals).

import type { Code, CodeSymbol, Feedback, HintTier } from '@ciphermind/protocol';
import type { Rating, SessionSnapshot } from '@ciphermind/game-core';

const RESET = '\x1b[0m';
const WHITE = '\x1b[37m';
const ANSI: Record<string, string> = {
  R: '\x1b[31m',
  G: '\x1b[32m',
  Y: '\x1b[33m',
  B: '\x1b[34m',
  M: '\x1b[35m',
  C: '\x1b[36m',
};

const RULE = '═══════════════════════════════════════════';

export const HINT_MESSAGES: Record<HintTier, string> = {
  no_match: '💭 Hmm, try completely different colors!',
  right_colors: '💡 You have the right colors, just wrong positions!',
  one_placed: "🎯 Getting warmer! One's in the right spot!",
  two_placed: '🔥 Nice! Two are perfectly placed!',
  three_placed: '⚡ So close! Just one more to go!',
  keep_analyzing: '🎲 Keep analyzing the patterns...',
  solved: '',
};

const RATING_MESSAGES: Record<Rating, string> = {
  hole_in_one: '🏆 INCREDIBLE! A hole-in-one!',
  master: "⭐ AMAZING! You're a master codebreaker!",
  excellent: '✨ EXCELLENT! Great logical thinking!',
  well_done: '👍 Well done!',
};

export function peg(symbol: CodeSymbol, color: boolean): string {
  if (!color) return symbol;
  return `${ANSI[symbol.toUpperCase()] ?? WHITE}●${RESET}`;
}

export function pegs(code: Code, color: boolean): string {
  return code.map((s) => peg(s, color)).join(' ');
}

export function banner(
  session: { length: number; alphabet: readonly CodeSymbol[]; attemptLimit: number },
  color: boolean,
): string[] {
  const legend = session.alphabet.map((s) => `${peg(s, color)} = ${s}`).join(' ');
  const example = session.alphabet.slice(0, session.length).join('');
  return [
    '',
    '╔════════════════════════════════════════════╗',
    '║          🧩 CIPHERMIND 🧩                 ║',
    '║   The Ultimate Code-Breaking Challenge    ║',
    '╚════════════════════════════════════════════╝',
    '',
    '🎮 How to Play:',
    `  • I've created a secret ${session.length}-color code`,
    '  • Available colors:',
    `    ${legend}`,
    `  • You have ${session.attemptLimit} guesses to crack it!`,
    "  • After each guess, I'll tell you:",
    '    - How many are EXACT (right color, right position)',
    '    - How many are COLOR matches (right color, wrong position)',
    '',
    `💡 Example: Enter your guess as ${session.length} letters, like: ${example}`,
  ];
}

export function guessLine(attempt: number, guess: Code, color: boolean): string {
  return `  Guess ${attempt}: ${pegs(guess, color)}`;
}

export function feedbackLine({ exact, color }: Feedback): string {
  return `  → ${exact} exact, ${color} color${color === 1 ? '' : 's'}`;
}

export function revealLine(secret: Code, color: boolean): string {
  return `  The code was: ${pegs(secret, color)}`;
}

/** Closing block for a finished game. */
export function outcomeLines(
  snapshot: SessionSnapshot,
  rating: Rating | undefined,
  color: boolean,
): string[] {
  const lines = ['', RULE];
  if (snapshot.state === 'won') {
    const n = snapshot.attempt;
    lines.push(
      '🎉 CONGRATULATIONS! 🎉',
      `You cracked the code in ${n} ${n === 1 ? 'guess' : 'guesses'}!`,
    );
    if (rating) lines.push(RATING_MESSAGES[rating]);
  } else if (snapshot.state === 'lost') {
    lines.push('💥 GAME OVER!', `You've used all ${snapshot.config.attemptLimit} attempts.`);
    if (snapshot.secret) lines.push(revealLine(snapshot.secret, color));
    lines.push('', '🧠 Better luck next time! Each game is a new puzzle.');
  }
  lines.push(RULE);
  return lines;
}
