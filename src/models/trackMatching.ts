import { normalizeText, trackKey, type Track } from './Track';
import { calculateSimilarity } from '../utils/similarity';

export type MatchPolicy = 'exact' | 'normalized' | 'fuzzy';

export const DEFAULT_MATCH_POLICY: MatchPolicy = 'normalized';
export const FUZZY_TITLE_THRESHOLD = 0.8;

export interface TrackMatcher {
  /** Returns true when `candidate` counts as the same song as any track the matcher was built from. */
  has(candidate: Track): boolean;
}

// Builds a lookup over `pool` so repeated membership checks stay cheap for the key-based policies.
export function createTrackMatcher(pool: readonly Track[], policy: MatchPolicy = DEFAULT_MATCH_POLICY): TrackMatcher {
  switch (policy) {
    case 'exact': {
      const keys = new Set(pool.map((track) => `${track.title}\u0000${track.artist}`));
      return { has: (candidate) => keys.has(`${candidate.title}\u0000${candidate.artist}`) };
    }
    case 'normalized': {
      const keys = new Set(pool.map((track) => trackKey(track)));
      return { has: (candidate) => keys.has(trackKey(candidate)) };
    }
    case 'fuzzy': {
      const titles = pool.map((track) => normalizeText(track.title));
      return {
        has: (candidate) => {
          const title = normalizeText(candidate.title);
          return titles.some((other) => calculateSimilarity(title, other) >= FUZZY_TITLE_THRESHOLD);
        },
      };
    }
    default: {
      const unknown: never = policy;
      throw new Error(`Unknown match policy: ${String(unknown)}`);
    }
  }
}
