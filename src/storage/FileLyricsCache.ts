import fs from 'node:fs/promises';
import path from 'node:path';

import type { Track } from '../models/Track';
import { logger } from '../utils/logger';
import { lyricsCacheKey, type LyricsCache } from './LyricsCache';

export class FileLyricsCache implements LyricsCache {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  filePathFor(track: Track): string {
    return path.join(this.directory, `${lyricsCacheKey(track)}.txt`);
  }

  async get(track: Track): Promise<string | null> {
    const filePath = this.filePathFor(track);
    try {
      const contents = await fs.readFile(filePath, 'utf-8');
      logger.debug({ filePath }, 'Lyrics cache hit');
      return contents;
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async set(track: Track, lyrics: string): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
    await fs.writeFile(this.filePathFor(track), lyrics, 'utf-8');
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
