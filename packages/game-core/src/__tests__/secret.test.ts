// packages/game-core/src/__tests__/secret.test.ts
//
// Unit tests for generateSecret() and the random sources behind it.

import { DEFAULT_ALPHABET } from '@ciphermind/protocol';
import {
  GameContractError,
  generateSecret,
  hashSeed,
  seededRandom,
} from '../index.js';

describe('generateSecret', () => {
  it('draws the requested number of symbols from the alphabet', () => {
    const secret = generateSecret(4, DEFAULT_ALPHABET, seededRandom('abc'));
    expect(secret).toHaveLength(4);
    for (const s of secret) expect(DEFAULT_ALPHABET).toContain(s);
  });

  it('maps the random source onto alphabet indices', () => {
    const values = [0, 0.999, 0.5, 0.2];
    let i = 0;
    const secret = generateSecret(4, ['A', 'B', 'C', 'D'], () => values[i++]);
    expect(secret).toEqual(['A', 'D', 'C', 'A']);
  });

  it('clamps a source that returns 1', () => {
    expect(generateSecret(2, ['A', 'B'], () => 1)).toEqual(['B', 'B']);
  });

  it('allows repeated symbols', () => {
    expect(generateSecret(3, ['A', 'B'], () => 0)).toEqual(['A', 'A', 'A']);
  });

  it('fails fast on an invalid config', () => {
    expect(() => generateSecret(0, DEFAULT_ALPHABET)).toThrow(GameContractError);
    expect(() => generateSecret(2.5, DEFAULT_ALPHABET)).toThrow(GameContractError);
    expect(() => generateSecret(4, [])).toThrow('Alphabet must not be empty');
  });

  it('reaches every symbol over many draws', () => {
    const secret = generateSecret(600, DEFAULT_ALPHABET, seededRandom('coverage'));
    expect(new Set(secret).size).toBe(DEFAULT_ALPHABET.length);
  });
});

describe('seededRandom', () => {
  it('repeats for the same seed', () => {
    const a = seededRandom('daily-42');
    const b = seededRandom('daily-42');
    const seqA = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(seqA);
  });

  it('stays within [0, 1)', () => {
    const r = seededRandom('range');
    for (let i = 0; i < 1000; i++) {
      const v = r();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('hashes distinct seeds differently', () => {
    expect(hashSeed('a')).not.toBe(hashSeed('b'));
    expect(hashSeed('')).toBe(2166136261);
  });
});
