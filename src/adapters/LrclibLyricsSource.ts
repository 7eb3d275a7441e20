import { z } from 'zod';

import type { LyricsQuery, LyricsResult, LyricsSource } from './LyricsSource';
import { FetchError } from '../models/PlaylistError';
import { logger } from '../utils/logger';

const SERVICE = 'lrclib';
export const LRCLIB_API_URL = 'https://lrclib.net/api/get';
const LRCLIB_CLIENT_HEADER = 'playlist-insights (lyrics word clouds)';

const lrclibResponseSchema = z.object({
  plainLyrics: z.string().nullable().optional(),
  syncedLyrics: z.string().nullable().optional(),
  instrumental: z.boolean().optional(),
});

const TIME_TAG = /\[\d+:\d+(?:\.\d+)?\]/g;

export function stripTimeTags(lrcText: string): string {
  return lrcText
    .split('\n')
    .map((line) => line.replace(TIME_TAG, '').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

export class LrclibLyricsSource implements LyricsSource {
  public readonly name = SERVICE;

  constructor(private readonly fetchImpl: typeof fetch = fetch) {}

  async fetchLyrics(query: LyricsQuery, signal?: AbortSignal): Promise<LyricsResult | null> {
    const url = new URL(LRCLIB_API_URL);
    url.searchParams.append('track_name', query.title);
    url.searchParams.append('artist_name', query.artist);
    if (query.album) {
      url.searchParams.append('album_name', query.album);
    }
    if (query.durationSeconds !== undefined) {
      url.searchParams.append('duration', String(query.durationSeconds));
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url.toString(), {
        headers: { 'Lrclib-Client': LRCLIB_CLIENT_HEADER },
        signal,
      });
    } catch (error) {
      throw new FetchError(SERVICE, 'request failed', undefined, error);
    }

    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      logger.warn({ status: response.status }, 'LRCLib API returned non-200');
      throw new FetchError(SERVICE, `lookup failed with ${response.status}`, response.status);
    }

    const parsed = lrclibResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new FetchError(SERVICE, 'unexpected response shape', response.status, parsed.error);
    }

    const { plainLyrics, syncedLyrics, instrumental } = parsed.data;
    if (instrumental) {
      return null;
    }
    const text = plainLyrics?.trim() || (syncedLyrics ? stripTimeTags(syncedLyrics) : '');
    return text ? { text, source: 'LRCLib', sourceHref: 'https://lrclib.net' } : null;
  }
}
