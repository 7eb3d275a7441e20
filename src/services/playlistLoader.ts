import type { PlaylistSource } from '../adapters/PlaylistSource';
import type { Playlist } from '../models/Playlist';
import { parseTrackListFile } from '../parsers/trackListParser';

const REMOTE_PATTERN = /^(https?:\/\/|spotify:)/i;

export function isRemoteIdentifier(input: string): boolean {
  return REMOTE_PATTERN.test(input.trim());
}

/** Reads a track-list file, or fetches from `source` when given a URL or URI. */
export async function loadPlaylist(input: string, source: PlaylistSource, tag?: string): Promise<Playlist> {
  if (isRemoteIdentifier(input)) {
    return source.fetchPlaylist(input, tag);
  }
  return parseTrackListFile(input, tag);
}
