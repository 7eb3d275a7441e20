import { formatTrack, type Track } from './Track';
import { createTrackMatcher, DEFAULT_MATCH_POLICY, type MatchPolicy } from './trackMatching';

export interface IntersectOptions {
  policy?: MatchPolicy;
  tag?: string;
}

export class Playlist implements Iterable<Track> {
  readonly tracks: readonly Track[];

  constructor(tracks: readonly Track[], readonly tag: string = '') {
    this.tracks = Object.freeze([...tracks]);
  }

  get length(): number {
    return this.tracks.length;
  }

  get isEmpty(): boolean {
    return this.tracks.length === 0;
  }

  [Symbol.iterator](): Iterator<Track> {
    return this.tracks[Symbol.iterator]();
  }

  durations(): number[] {
    return this.tracks.map((track) => track.durationSeconds);
  }

  totalDurationSeconds(): number {
    return this.tracks.reduce((sum, track) => sum + track.durationSeconds, 0);
  }

  artistFrequency(): Map<string, number> {
    const counts = new Map<string, number>();
    for (const track of this.tracks) {
      counts.set(track.artist, (counts.get(track.artist) ?? 0) + 1);
    }
    return counts;
  }

  /**
   * Tracks of this playlist that also appear in `other`, in this playlist's order.
   * Neither playlist is modified.
   */
  intersect(other: Playlist, options: IntersectOptions = {}): Playlist {
    const tag = options.tag ?? `${this.tag}_${other.tag}_intersection`;
    if (this.isEmpty || other.isEmpty) {
      return new Playlist([], tag);
    }
    const matcher = createTrackMatcher(other.tracks, options.policy ?? DEFAULT_MATCH_POLICY);
    return new Playlist(
      this.tracks.filter((track) => matcher.has(track)),
      tag,
    );
  }

  withTag(tag: string): Playlist {
    return new Playlist(this.tracks, tag);
  }

  describe(): string[] {
    return this.tracks.map((track) => formatTrack(track));
  }
}
