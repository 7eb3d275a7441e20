import { createClient, type Client } from '@libsql/client';

import type { Track } from '../models/Track';
import { lyricsCacheKey, type LyricsCache } from './LyricsCache';

export interface LibSQLLyricsCacheOptions {
  url: string;
  authToken?: string;
}

export class LibSQLLyricsCache implements LyricsCache {
  private schemaReady: Promise<void> | null = null;

  constructor(
    private readonly client: Client,
    private readonly now: () => number = Date.now,
  ) {}

  static fromOptions(options: LibSQLLyricsCacheOptions): LibSQLLyricsCache {
    return new LibSQLLyricsCache(createClient({ url: options.url, authToken: options.authToken }));
  }

  async get(track: Track): Promise<string | null> {
    await this.ensureSchema();
    const result = await this.client.execute({
      sql: 'SELECT lyrics FROM lyrics_cache WHERE key = ? LIMIT 1',
      args: [lyricsCacheKey(track)],
    });
    const row = result.rows[0];
    return row ? String(row.lyrics) : null;
  }

  async set(track: Track, lyrics: string): Promise<void> {
    await this.ensureSchema();
    await this.client.execute({
      sql: `INSERT INTO lyrics_cache (key, artist, title, lyrics, fetched_at)
            VALUES (?, ?, ?, ?, ?)
            ON CONFLICT(key) DO UPDATE SET
              artist = excluded.artist,
              title = excluded.title,
              lyrics = excluded.lyrics,
              fetched_at = excluded.fetched_at`,
      args: [lyricsCacheKey(track), track.artist, track.title, lyrics, this.now()],
    });
  }

  // Created on first use; a failed attempt is retried by the next call.
  private ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.client
        .execute(
          `CREATE TABLE IF NOT EXISTS lyrics_cache (
            key TEXT PRIMARY KEY,
            artist TEXT NOT NULL,
            title TEXT NOT NULL,
            lyrics TEXT NOT NULL,
            fetched_at INTEGER NOT NULL
          )`,
        )
        .then(
          () => undefined,
          (error: unknown) => {
            this.schemaReady = null;
            throw error;
          },
        );
    }
    return this.schemaReady;
  }

  close(): void {
    this.client.close();
  }
}
