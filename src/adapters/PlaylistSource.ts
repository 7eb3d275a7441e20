import type { Playlist } from '../models/Playlist';

export interface PlaylistSource {
  readonly service: string;
  fetchPlaylist(identifier: string, tag?: string): Promise<Playlist>;
}
