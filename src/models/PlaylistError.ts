import type { Track } from './Track';

export abstract class PlaylistError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = 'PlaylistError';
  }
}

export class ParseError extends PlaylistError {
  constructor(
    errorMessage: string,
    public readonly record?: number,
    public readonly lines: readonly string[] = [],
    cause?: unknown,
  ) {
    super(record === undefined ? `Parse error: ${errorMessage}` : `Parse error in record ${record}: ${errorMessage}`, cause);
    this.name = 'ParseError';
  }
}

export class AuthError extends PlaylistError {
  constructor(public readonly service: string, reason: string, cause?: unknown) {
    super(`Authentication failed for ${service}: ${reason}`, cause);
    this.name = 'AuthError';
  }
}

export class FetchError extends PlaylistError {
  constructor(
    public readonly service: string,
    errorMessage: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(`Fetch error from ${service}: ${errorMessage}`, cause);
    this.name = 'FetchError';
  }
}

export class LyricsNotFound extends PlaylistError {
  constructor(public readonly track: Track, reason = 'no lyrics returned by any source', cause?: unknown) {
    super(`Lyrics not found for "${track.title}" by ${track.artist}: ${reason}`, cause);
    this.name = 'LyricsNotFound';
  }
}
