import type { Playlist } from '../models/Playlist';

export interface ArtistCount {
  artist: string;
  count: number;
}

export interface FrequencyBucket {
  songsPerArtist: number;
  artists: number;
}

export interface FiveNumberSummary {
  min: number;
  q1: number;
  median: number;
  q3: number;
  max: number;
  lowerWhisker: number;
  upperWhisker: number;
  outliers: number[];
}

export const WHISKER_IQR_FACTOR = 1.5;

export function artistFrequency(playlist: Playlist): Map<string, number> {
  return playlist.artistFrequency();
}

/** Ascending by count; artists with equal counts keep first-seen order. */
export function sortedArtistCounts(frequency: ReadonlyMap<string, number>): ArtistCount[] {
  return [...frequency.entries()]
    .map(([artist, count]) => ({ artist, count }))
    .sort((a, b) => a.count - b.count);
}

/** How many artists contributed exactly N songs, ordered by N. */
export function frequencyOfFrequencies(frequency: ReadonlyMap<string, number>): FrequencyBucket[] {
  const buckets = new Map<number, number>();
  for (const count of frequency.values()) {
    buckets.set(count, (buckets.get(count) ?? 0) + 1);
  }
  return [...buckets.entries()]
    .map(([songsPerArtist, artists]) => ({ songsPerArtist, artists }))
    .sort((a, b) => a.songsPerArtist - b.songsPerArtist);
}

/** Linear-interpolated quantile of an ascending array. */
export function quantile(sorted: readonly number[], p: number): number {
  if (!sorted.length) {
    throw new RangeError('quantile of an empty sample is undefined');
  }
  if (p < 0 || p > 1) {
    throw new RangeError(`quantile position must be within [0, 1], got ${p}`);
  }
  const position = (sorted.length - 1) * p;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (position - lower) * (sorted[upper] - sorted[lower]);
}

export function fiveNumberSummary(values: readonly number[]): FiveNumberSummary | null {
  if (!values.length) {
    return null;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);
  const reach = WHISKER_IQR_FACTOR * (q3 - q1);
  const lowFence = q1 - reach;
  const highFence = q3 + reach;

  const inside = sorted.filter((value) => value >= lowFence && value <= highFence);

  return {
    min: sorted[0],
    q1,
    median: quantile(sorted, 0.5),
    q3,
    max: sorted[sorted.length - 1],
    lowerWhisker: inside[0],
    upperWhisker: inside[inside.length - 1],
    outliers: sorted.filter((value) => value < lowFence || value > highFence),
  };
}
