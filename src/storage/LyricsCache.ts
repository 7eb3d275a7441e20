import type { Track } from '../models/Track';

export interface LyricsCache {
  get(track: Track): Promise<string | null>;
  set(track: Track, lyrics: string): Promise<void>;
}

const UNSAFE_CHARACTERS = /[^-\w\s]/g;

/** OS-safe, case-insensitive slug. */
export function sanitizeSlug(text: string): string {
  return text.replace(UNSAFE_CHARACTERS, '').trim().replace(/\s+/g, '_').toLowerCase();
}

export function lyricsCacheKey(track: Pick<Track, 'title' | 'artist'>): string {
  return `${sanitizeSlug(track.artist)}-${sanitizeSlug(track.title)}`;
}

export class NoopLyricsCache implements LyricsCache {
  async get(): Promise<string | null> {
    return null;
  }

  async set(): Promise<void> {}
}
