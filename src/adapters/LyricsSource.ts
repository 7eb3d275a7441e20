export interface LyricsQuery {
  title: string;
  artist: string;
  album?: string;
  durationSeconds?: number;
}

export interface LyricsResult {
  text: string;
  source: string;
  sourceHref?: string;
}

export interface LyricsSource {
  readonly name: string;
  /**
   * Resolves to `null` when the service has no lyrics for the song.
   * Rejects with `AuthError` for credential problems and `FetchError` for transport failures.
   */
  fetchLyrics(query: LyricsQuery, signal?: AbortSignal): Promise<LyricsResult | null>;
}
