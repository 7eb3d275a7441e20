import { ParseError } from './PlaylistError';

export interface Track {
  readonly title: string;
  readonly artist: string;
  readonly album: string;
  readonly durationSeconds: number;
}

export interface TrackInput {
  title: string;
  artist: string;
  album: string;
  duration: string | number;
}

const DIGITS = /^\d+$/;

/**
 * Converts `M:SS` text to whole seconds. Integer input is taken as seconds already.
 */
export function parseDuration(raw: string | number): number {
  if (typeof raw === 'number') {
    if (!Number.isInteger(raw) || raw < 0) {
      throw new ParseError(`duration must be a non-negative whole number of seconds, got ${raw}`);
    }
    return raw;
  }

  const text = raw.trim();
  const segments = text.split(':');
  if (segments.length !== 2) {
    throw new ParseError(`duration "${text}" is not in M:SS form`);
  }

  const [minuteText, secondText] = segments;
  if (!DIGITS.test(minuteText) || !DIGITS.test(secondText)) {
    throw new ParseError(`duration "${text}" has a non-numeric segment`);
  }

  const minutes = Number(minuteText);
  const seconds = Number(secondText);
  if (seconds >= 60) {
    throw new ParseError(`duration "${text}" has seconds out of range`);
  }
  return minutes * 60 + seconds;
}

export function createTrack(input: TrackInput): Track {
  const track: Track = Object.freeze({
    title: input.title.trim(),
    artist: input.artist.trim(),
    album: input.album.trim(),
    durationSeconds: parseDuration(input.duration),
  });
  assertTrack(track);
  return track;
}

export function assertTrack(track: Track): void {
  if (!track.title || !track.artist) {
    throw new ParseError('track title and artist are required');
  }
  if (track.durationSeconds < 0) {
    throw new ParseError('track duration must be non-negative');
  }
}

function normalize(value: string): string {
  return value.normalize('NFKC').toLowerCase().replace(/\s+/g, ' ').trim();
}

/** Identity used for equality and de-duplication: case-folded title and artist. */
export function trackKey(track: Pick<Track, 'title' | 'artist'>): string {
  return `${normalize(track.title)}\u0000${normalize(track.artist)}`;
}

export function normalizeText(value: string): string {
  return normalize(value);
}

export function tracksEqual(a: Track, b: Track): boolean {
  return trackKey(a) === trackKey(b);
}

function column(value: string, width: number): string {
  return value.slice(0, width).padEnd(width, ' ');
}

export function formatTrack(track: Track): string {
  const duration = `${track.durationSeconds}`.padStart(5, ' ');
  return `${column(track.title, 40)} | ${column(track.artist, 20)} | ${column(track.album, 25)} | ${duration}s`;
}
