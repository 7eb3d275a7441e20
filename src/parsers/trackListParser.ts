import fs from 'node:fs/promises';
import path from 'node:path';

import { Playlist } from '../models/Playlist';
import { ParseError } from '../models/PlaylistError';
import { createTrack, type Track } from '../models/Track';
import { logger } from '../utils/logger';

export const LINES_PER_RECORD = 5;

/**
 * Parses the fixed five-line record format:
 *
 * ```
 * 1
 * Song title
 * Artist
 * Album
 * 3:45
 * ```
 *
 * Blank lines are ignored, so records may be separated by empty lines.
 */
export function parseTrackList(text: string, tag = ''): Playlist {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const tracks: Track[] = [];
  for (let offset = 0; offset < lines.length; offset += LINES_PER_RECORD) {
    const record = offset / LINES_PER_RECORD + 1;
    const chunk = lines.slice(offset, offset + LINES_PER_RECORD);
    if (chunk.length !== LINES_PER_RECORD) {
      throw new ParseError(
        `incomplete record, expected ${LINES_PER_RECORD} lines but found ${chunk.length}`,
        record,
        chunk,
      );
    }
    tracks.push(parseRecord(chunk, record));
  }

  return new Playlist(tracks, tag);
}

function parseRecord(chunk: string[], record: number): Track {
  const [, title, artist, album, duration] = chunk;
  try {
    return createTrack({ title, artist, album, duration });
  } catch (error) {
    if (error instanceof ParseError) {
      throw new ParseError(error.message.replace(/^Parse error: /, ''), record, chunk, error);
    }
    throw error;
  }
}

export async function parseTrackListFile(filePath: string, tag?: string): Promise<Playlist> {
  const resolved = path.resolve(filePath);
  let contents: string;
  try {
    contents = await fs.readFile(resolved, 'utf-8');
  } catch (error) {
    throw new ParseError(`unable to read ${resolved}`, undefined, [], error);
  }

  const playlist = parseTrackList(contents, tag ?? path.parse(resolved).name);
  logger.debug({ file: resolved, tracks: playlist.length, tag: playlist.tag }, 'Parsed track list');
  return playlist;
}
