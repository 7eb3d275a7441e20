import { z } from 'zod';

import { extractDivs, htmlToText, removeDivs } from './htmlText';
import type { LyricsQuery, LyricsResult, LyricsSource } from './LyricsSource';
import { AuthError, FetchError } from '../models/PlaylistError';
import { normalizeText } from '../models/Track';
import { logger } from '../utils/logger';

const SERVICE = 'genius';
const API_BASE_URL = 'https://api.genius.com';
const LYRICS_CONTAINER_MARKER = 'data-lyrics-container="true"';
const EXCLUDED_MARKER = 'data-exclude-from-selection="true"';

const geniusSearchSchema = z.object({
  response: z.object({
    hits: z.array(
      z.object({
        type: z.string(),
        result: z.object({
          id: z.number(),
          title: z.string(),
          url: z.string().url(),
          primary_artist: z.object({ name: z.string() }),
        }),
      }),
    ),
  }),
});

type GeniusHit = z.infer<typeof geniusSearchSchema>['response']['hits'][number];

export class GeniusLyricsSource implements LyricsSource {
  public readonly name = SERVICE;

  constructor(
    private readonly accessToken: string,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async fetchLyrics(query: LyricsQuery, signal?: AbortSignal): Promise<LyricsResult | null> {
    if (!this.accessToken) {
      throw new AuthError(SERVICE, 'GENIUS_ACCESS_TOKEN must be set');
    }

    const hit = await this.search(query, signal);
    if (!hit) {
      return null;
    }

    const html = await this.fetchPage(hit.result.url, signal);
    const text = extractDivs(html, LYRICS_CONTAINER_MARKER)
      .map((block) => htmlToText(removeDivs(block, EXCLUDED_MARKER)))
      .filter((block) => block.length > 0)
      .join('\n');

    if (!text) {
      logger.debug({ url: hit.result.url }, 'Genius page had no lyrics container');
      return null;
    }

    return { text, source: 'Genius', sourceHref: hit.result.url };
  }

  private async search(query: LyricsQuery, signal?: AbortSignal): Promise<GeniusHit | null> {
    const url = new URL(`${API_BASE_URL}/search`);
    url.searchParams.set('q', `${query.title} ${query.artist}`);

    const response = await this.request(url.toString(), signal, {
      Authorization: `Bearer ${this.accessToken}`,
    });

    if (response.status === 401 || response.status === 403) {
      throw new AuthError(SERVICE, `search returned ${response.status}`);
    }
    if (!response.ok) {
      throw new FetchError(SERVICE, `search failed with ${response.status}`, response.status);
    }

    const parsed = geniusSearchSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new FetchError(SERVICE, 'unexpected search response shape', response.status, parsed.error);
    }

    const artist = normalizeText(query.artist);
    const songs = parsed.data.response.hits.filter((hit) => hit.type === 'song');
    return songs.find((hit) => normalizeText(hit.result.primary_artist.name) === artist) ?? null;
  }

  private async fetchPage(pageUrl: string, signal?: AbortSignal): Promise<string> {
    const response = await this.request(pageUrl, signal);
    if (!response.ok) {
      throw new FetchError(SERVICE, `lyrics page returned ${response.status}`, response.status);
    }
    return response.text();
  }

  private async request(url: string, signal?: AbortSignal, headers: Record<string, string> = {}): Promise<Response> {
    try {
      return await this.fetchImpl(url, { headers, signal });
    } catch (error) {
      throw new FetchError(SERVICE, `request to ${new URL(url).host} failed`, undefined, error);
    }
  }
}
