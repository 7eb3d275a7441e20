import type { LyricsQuery, LyricsResult, LyricsSource } from '../../adapters/LyricsSource';
import { AuthError, LyricsNotFound } from '../../models/PlaylistError';
import type { Track } from '../../models/Track';
import { NoopLyricsCache, type LyricsCache } from '../../storage/LyricsCache';
import { logger } from '../../utils/logger';

export const CACHE_SOURCE = 'cache';

export class LyricsService {
  constructor(
    private readonly sources: readonly LyricsSource[],
    private readonly cache: LyricsCache = new NoopLyricsCache(),
    private readonly requestTimeoutMs = 10000,
  ) {}

  /**
   * Tries the cache, then each source in priority order.
   * Rejects with `LyricsNotFound` when nothing has lyrics for the track and
   * with `AuthError` when a source's credentials are missing or rejected.
   */
  async getLyrics(track: Track): Promise<LyricsResult> {
    const cached = await this.lookupCache(track);
    if (cached !== null) {
      return { text: cached, source: CACHE_SOURCE };
    }

    const query: LyricsQuery = {
      title: track.title,
      artist: track.artist,
      album: track.album || undefined,
      durationSeconds: track.durationSeconds || undefined,
    };

    let lastError: unknown;
    for (const source of this.sources) {
      let result: LyricsResult | null;
      try {
        result = await source.fetchLyrics(query, AbortSignal.timeout(this.requestTimeoutMs));
      } catch (error) {
        if (error instanceof AuthError) {
          throw error;
        }
        logger.warn({ source: source.name, title: track.title, artist: track.artist, error }, 'Lyrics source failed');
        lastError = error;
        continue;
      }

      if (result && result.text.trim()) {
        await this.store(track, result.text);
        return result;
      }
    }

    throw new LyricsNotFound(
      track,
      lastError ? 'lookup failed' : 'no lyrics returned by any source',
      lastError,
    );
  }

  // An unreadable cache counts as a miss.
  private async lookupCache(track: Track): Promise<string | null> {
    try {
      return await this.cache.get(track);
    } catch (error) {
      logger.warn({ error, title: track.title, artist: track.artist }, 'Failed to read lyrics cache');
      return null;
    }
  }

  private async store(track: Track, text: string): Promise<void> {
    try {
      await this.cache.set(track, text);
    } catch (error) {
      logger.warn({ error, title: track.title, artist: track.artist }, 'Failed to write lyrics cache');
    }
  }
}
