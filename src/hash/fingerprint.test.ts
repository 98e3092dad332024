/**
 * Tests for difference-hash construction and Hamming distance
 */

import { describe, it, expect } from '@jest/globals';
import {
  computeDifferenceHash,
  fingerprintBits,
  hammingDistance,
  toWords,
  wordDistance,
} from './fingerprint.js';

describe('computeDifferenceHash', () => {
  it('should set a bit where the right pixel is brighter than the left', () => {
    // row 1: 10 -> 20 -> 30 (two rising steps), row 2: 30 -> 20 -> 10 (two falling)
    const pixels = Uint8Array.from([10, 20, 30, 30, 20, 10]);

    expect(computeDifferenceHash(pixels, 3, 2)).toBe('c');
  });

  it('should treat equal neighbours as a zero bit', () => {
    const pixels = Uint8Array.from([7, 7, 7, 7, 7, 7, 7, 7, 7]);

    expect(computeDifferenceHash(pixels, 3, 3)).toBe('00');
  });

  it('should read only the first channel of multi-channel pixels', () => {
    const pixels = Uint8Array.from([5, 200, 200, 9, 0, 0, 9, 0, 0, 5, 255, 255]);

    expect(computeDifferenceHash(pixels, 2, 2, 3)).toBe('8');
  });

  it('should produce hashSize squared bits for a (hashSize + 1) x hashSize grid', () => {
    const hashSize = 16;
    const pixels = new Uint8Array((hashSize + 1) * hashSize);
    for (let y = 0; y < hashSize; y++) {
      for (let x = 0; x <= hashSize; x++) {
        pixels[y * (hashSize + 1) + x] = x * 10;
      }
    }

    const fingerprint = computeDifferenceHash(pixels, hashSize + 1, hashSize);

    expect(fingerprint).toBe('f'.repeat(64));
    expect(fingerprintBits(fingerprint)).toBe(256);
  });

  it('should reject grids that are too small', () => {
    expect(() => computeDifferenceHash(new Uint8Array(1), 1, 1)).toThrow('Grid too small');
  });

  it('should reject buffers with too few samples', () => {
    expect(() => computeDifferenceHash(new Uint8Array(3), 3, 2)).toThrow('Expected 6 samples, got 3');
  });
});

describe('hammingDistance', () => {
  it('should be zero for identical fingerprints', () => {
    expect(hammingDistance('a5a5', 'a5a5')).toBe(0);
  });

  it('should count differing bits', () => {
    expect(hammingDistance('ff', '00')).toBe(8);
    expect(hammingDistance('f0', '0f')).toBe(8);
    expect(hammingDistance('1', '3')).toBe(1);
    expect(hammingDistance('8000', '0001')).toBe(2);
  });

  it('should be symmetric', () => {
    expect(hammingDistance('0c3a', 'f1e2')).toBe(hammingDistance('f1e2', '0c3a'));
  });

  it('should reject fingerprints of different lengths', () => {
    expect(() => hammingDistance('ab', 'abc')).toThrow('Fingerprint lengths must match (2 vs 3)');
  });

  it('should reject non-hex characters', () => {
    expect(() => hammingDistance('zz', '00')).toThrow('Invalid fingerprint character: z');
  });
});

describe('toWords and wordDistance', () => {
  it('should split fingerprints into 32-bit words', () => {
    expect(Array.from(toWords('0123456789abcdef'))).toEqual([0x01234567, 0x89abcdef]);
  });

  it('should zero-pad a trailing partial word', () => {
    expect(Array.from(toWords('abc'))).toEqual([0xabc00000]);
  });

  it('should reject invalid fingerprints', () => {
    expect(() => toWords('0123456g')).toThrow('Invalid fingerprint: 0123456g');
  });

  it('should agree with hammingDistance', () => {
    const a = 'deadbeefcafebabe0123456789abcdef';
    const b = '0123456789abcdefdeadbeefcafebabe';

    expect(wordDistance(toWords(a), toWords(b))).toBe(hammingDistance(a, b));
  });

  it('should count all 32 bits of a word', () => {
    expect(wordDistance(toWords('ffffffff'), toWords('00000000'))).toBe(32);
  });
});
