import { describe, expect, it } from 'vitest';

import { fiveNumberSummary, frequencyOfFrequencies, quantile, sortedArtistCounts } from '../statistics';

const frequency = new Map([
  ['Artist1', 3],
  ['Artist2', 1],
  ['Artist3', 1],
  ['Artist4', 2],
]);

describe('sortedArtistCounts', () => {
  it('orders ascending and keeps first-seen order for ties', () => {
    expect(sortedArtistCounts(frequency)).toEqual([
      { artist: 'Artist2', count: 1 },
      { artist: 'Artist3', count: 1 },
      { artist: 'Artist4', count: 2 },
      { artist: 'Artist1', count: 3 },
    ]);
  });
});

describe('frequencyOfFrequencies', () => {
  it('counts artists per number of songs', () => {
    expect(frequencyOfFrequencies(frequency)).toEqual([
      { songsPerArtist: 1, artists: 2 },
      { songsPerArtist: 2, artists: 1 },
      { songsPerArtist: 3, artists: 1 },
    ]);
  });

  it('is empty for an empty playlist', () => {
    expect(frequencyOfFrequencies(new Map())).toEqual([]);
  });
});

describe('quantile', () => {
  it('interpolates between neighbouring values', () => {
    const sorted = [1, 2, 3, 4];
    expect(quantile(sorted, 0.25)).toBeCloseTo(1.75);
    expect(quantile(sorted, 0.5)).toBeCloseTo(2.5);
    expect(quantile(sorted, 0.75)).toBeCloseTo(3.25);
    expect(quantile(sorted, 1)).toBe(4);
  });

  it('rejects empty samples and positions outside [0, 1]', () => {
    expect(() => quantile([], 0.5)).toThrow(RangeError);
    expect(() => quantile([1], 1.5)).toThrow(RangeError);
  });
});

describe('fiveNumberSummary', () => {
  it('computes quartiles, whiskers and outliers', () => {
    expect(fiveNumberSummary([100, 13, 10, 14, 12])).toEqual({
      min: 10,
      q1: 12,
      median: 13,
      q3: 14,
      max: 100,
      lowerWhisker: 10,
      upperWhisker: 14,
      outliers: [100],
    });
  });

  it('collapses to a single point for one value', () => {
    expect(fiveNumberSummary([200])).toEqual({
      min: 200,
      q1: 200,
      median: 200,
      q3: 200,
      max: 200,
      lowerWhisker: 200,
      upperWhisker: 200,
      outliers: [],
    });
  });

  it('returns null for no values', () => {
    expect(fiveNumberSummary([])).toBeNull();
  });
});
