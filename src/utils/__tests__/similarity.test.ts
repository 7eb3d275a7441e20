import { describe, expect, it } from 'vitest';

import { calculateSimilarity, matchingCharacters } from '../similarity';

describe('matchingCharacters', () => {
  it('counts the longest run and then the runs on either side', () => {
    expect(matchingCharacters('abxcd', 'abcd')).toBe(4);
    expect(matchingCharacters('song a (remastr)', 'song a (remaster)')).toBe(16);
  });

  it('does not match characters out of order', () => {
    expect(matchingCharacters('abcd', 'bcda')).toBe(3);
    expect(matchingCharacters('abc', 'xyz')).toBe(0);
  });
});

describe('calculateSimilarity', () => {
  it('is twice the matched characters over the combined length', () => {
    expect(calculateSimilarity('abxcd', 'abcd')).toBeCloseTo(8 / 9);
    expect(calculateSimilarity('abcd', 'bcde')).toBeCloseTo(0.75);
  });

  it('counts a rotated title as close enough for the fuzzy threshold', () => {
    expect(calculateSimilarity('abcde', 'bcdea')).toBeCloseTo(0.8);
  });

  it('handles identical and empty strings', () => {
    expect(calculateSimilarity('night drive', 'night drive')).toBe(1);
    expect(calculateSimilarity('', '')).toBe(1);
    expect(calculateSimilarity('abc', '')).toBe(0);
  });
});
