import type { IntersectOptions, Playlist } from '../models/Playlist';

export interface PlaylistOverlap {
  sizeA: number;
  sizeB: number;
  intersection: number;
}

export function intersectPlaylists(a: Playlist, b: Playlist, options: IntersectOptions = {}): Playlist {
  return a.intersect(b, options);
}

/**
 * Set sizes for a two-circle Venn diagram. Duplicates in `a` can match more
 * than once, so the shared count is capped at the smaller playlist.
 */
export function playlistOverlap(a: Playlist, b: Playlist, options: IntersectOptions = {}): PlaylistOverlap {
  const shared = a.intersect(b, options).length;
  return {
    sizeA: a.length,
    sizeB: b.length,
    intersection: Math.min(shared, a.length, b.length),
  };
}
