// packages/protocol/src/__tests__/schemas.test.ts
//
// Checks the defaults and constraints the core relies on when it parses a
// session config, and the shapes renderers receive.

import {
  sessionConfigSchema,
  turnResultSchema,
  validationErrorSchema,
} from '../index.js';

describe('sessionConfigSchema', () => {
  it('fills in the standard game', () => {
    expect(sessionConfigSchema.parse({})).toEqual({
      length: 4,
      alphabet: ['R', 'G', 'B', 'Y', 'M', 'C'],
      attemptLimit: 10,
    });
  });

  it('rejects duplicate symbols that differ only by case', () => {
    const res = sessionConfigSchema.safeParse({ alphabet: ['R', 'g', 'G'] });
    expect(res.success).toBe(false);
  });

  it('rejects symbols containing whitespace or commas', () => {
    for (const alphabet of [['Dark Blue', 'Red'], ['R,G', 'B'], ['R', ' ']]) {
      expect(sessionConfigSchema.safeParse({ alphabet }).success).toBe(false);
    }
    expect(sessionConfigSchema.safeParse({ alphabet: ['DarkBlue', 'Red'] }).success).toBe(true);
  });

  it('rejects empty alphabets and non-positive sizes', () => {
    expect(sessionConfigSchema.safeParse({ alphabet: [] }).success).toBe(false);
    expect(sessionConfigSchema.safeParse({ length: 0 }).success).toBe(false);
    expect(sessionConfigSchema.safeParse({ attemptLimit: 1.5 }).success).toBe(false);
  });
});

describe('validationErrorSchema', () => {
  it('discriminates on kind', () => {
    expect(
      validationErrorSchema.parse({ kind: 'length_mismatch', expected: 4, actual: 3 }),
    ).toEqual({ kind: 'length_mismatch', expected: 4, actual: 3 });
    expect(validationErrorSchema.safeParse({ kind: 'other' }).success).toBe(false);
  });
});

describe('turnResultSchema', () => {
  it('accepts a finished turn with the revealed secret', () => {
    const turn = {
      feedback: { exact: 4, color: 0 },
      state: 'won',
      attempt: 1,
      attemptsLeft: 9,
      hint: 'solved',
      history: [{ guess: ['R', 'G', 'B', 'Y'], feedback: { exact: 4, color: 0 } }],
      secret: ['R', 'G', 'B', 'Y'],
    };
    expect(turnResultSchema.parse(turn)).toEqual(turn);
  });

  it('rejects negative counts', () => {
    const res = turnResultSchema.safeParse({
      feedback: { exact: -1, color: 0 },
      state: 'in_progress',
      attempt: 1,
      attemptsLeft: 9,
      hint: 'no_match',
      history: [],
    });
    expect(res.success).toBe(false);
  });
});
