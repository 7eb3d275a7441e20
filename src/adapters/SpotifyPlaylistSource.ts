import type { z } from 'zod';

import type { PlaylistSource } from './PlaylistSource';
import {
  spotifyPlaylistPageSchema,
  spotifyTokenSchema,
  type SpotifyPlaylistItem,
  type SpotifyPlaylistPage,
} from './spotifyTypes';
import type { SpotifyConfig } from '../config/appConfig';
import { Playlist } from '../models/Playlist';
import { AuthError, FetchError } from '../models/PlaylistError';
import { createTrack, type Track } from '../models/Track';
import { logger } from '../utils/logger';

const SERVICE = 'spotify';
// Refresh a little before Spotify says the token expires.
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

const PLAYLIST_URL_PATTERN = /^https?:\/\/open\.spotify\.com\/(?:intl-[a-z-]+\/)?playlist\/([A-Za-z0-9]+)/i;
const PLAYLIST_URI_PATTERN = /^spotify:playlist:([A-Za-z0-9]+)$/;
const PLAYLIST_ID_PATTERN = /^[A-Za-z0-9]{22}$/;

export function parsePlaylistId(identifier: string): string {
  const value = identifier.trim();
  const match = value.match(PLAYLIST_URL_PATTERN) ?? value.match(PLAYLIST_URI_PATTERN);
  if (match) {
    return match[1];
  }
  if (PLAYLIST_ID_PATTERN.test(value)) {
    return value;
  }
  throw new FetchError(SERVICE, `${identifier} is not a Spotify playlist link`);
}

interface CachedToken {
  value: string;
  expiresAt: number;
}

export class SpotifyPlaylistSource implements PlaylistSource {
  public readonly service = SERVICE;
  private token: CachedToken | null = null;

  constructor(
    private readonly config: SpotifyConfig,
    private readonly fetchImpl: typeof fetch = fetch,
    private readonly now: () => number = Date.now,
  ) {}

  /** `tag` defaults to the playlist id. */
  async fetchPlaylist(identifier: string, tag?: string): Promise<Playlist> {
    const playlistId = parsePlaylistId(identifier);
    const label = tag || playlistId;
    const accessToken = await this.getAccessToken();

    const tracks: Track[] = [];
    let offset = 0;
    let skipped = 0;

    for (;;) {
      const page = await this.fetchPage(playlistId, offset, accessToken);
      for (const item of page.items) {
        const track = this.toTrack(item);
        if (track) {
          tracks.push(track);
        } else {
          skipped += 1;
        }
      }
      offset += page.items.length;
      if (offset >= page.total || page.next === null || page.items.length === 0) {
        break;
      }
    }

    logger.info({ playlistId, tag: label, tracks: tracks.length, skipped }, 'Fetched Spotify playlist');
    return new Playlist(tracks, label);
  }

  private async getAccessToken(): Promise<string> {
    if (this.token && this.token.expiresAt > this.now()) {
      return this.token.value;
    }

    const { clientId, clientSecret } = this.config;
    if (!clientId || !clientSecret) {
      throw new AuthError(SERVICE, 'SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET must be set');
    }

    const credentials = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');
    const response = await this.request(this.config.tokenUrl, {
      method: 'POST',
      headers: {
        Authorization: `Basic ${credentials}`,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
    });

    if (response.status === 400 || response.status === 401) {
      const text = await response.text();
      logger.error({ status: response.status, text }, 'Spotify rejected client credentials');
      throw new AuthError(SERVICE, `token request returned ${response.status}`);
    }
    if (!response.ok) {
      throw new FetchError(SERVICE, `token request failed with ${response.status}`, response.status);
    }

    const payload = await this.parseBody(response, spotifyTokenSchema, 'token response');
    this.token = {
      value: payload.access_token,
      expiresAt: this.now() + payload.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS,
    };
    return this.token.value;
  }

  private async fetchPage(playlistId: string, offset: number, accessToken: string): Promise<SpotifyPlaylistPage> {
    const url = new URL(`${this.config.apiBaseUrl}/playlists/${encodeURIComponent(playlistId)}/tracks`);
    url.searchParams.set('limit', String(this.config.pageSize));
    url.searchParams.set('offset', String(offset));
    url.searchParams.set('additional_types', 'track');

    const response = await this.request(url.toString(), {
      headers: { Authorization: `Bearer ${accessToken}` },
    });

    if (response.status === 401 || response.status === 403) {
      this.token = null;
      throw new AuthError(SERVICE, `playlist request returned ${response.status}`);
    }
    if (response.status === 404) {
      throw new FetchError(SERVICE, `playlist ${playlistId} was not found`, 404);
    }
    if (!response.ok) {
      const text = await response.text();
      logger.warn({ status: response.status, playlistId, offset }, 'Spotify playlist page request failed');
      throw new FetchError(SERVICE, `playlist page request failed: ${response.status} ${text}`, response.status);
    }

    return this.parseBody(response, spotifyPlaylistPageSchema, 'playlist page');
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchImpl(url, init);
    } catch (error) {
      throw new FetchError(SERVICE, `network request to ${new URL(url).host} failed`, undefined, error);
    }
  }

  private async parseBody<T>(response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): Promise<T> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new FetchError(SERVICE, `${what} was not valid JSON`, response.status, error);
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new FetchError(SERVICE, `unexpected ${what} shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`, response.status, parsed.error);
    }
    return parsed.data;
  }

  private toTrack(item: SpotifyPlaylistItem): Track | null {
    const track = item.track;
    if (!track || track.type !== 'track') {
      logger.debug({ name: track?.name }, 'Skipping playlist item that is not a track');
      return null;
    }

    const primaryArtist = track.artists[0]?.name;
    if (!track.name.trim() || !primaryArtist?.trim()) {
      logger.debug({ name: track.name }, 'Skipping track missing title or artist');
      return null;
    }

    return createTrack({
      title: track.name,
      artist: primaryArtist,
      album: track.album.name,
      duration: Math.trunc(track.duration_ms / 1000),
    });
  }
}
