import dotenv from 'dotenv';

import { ServiceContainer } from '../container/ServiceContainer';
import { loadPlaylist } from '../services/playlistLoader';
import { logger } from '../utils/logger';

dotenv.config();

async function analyzePlaylist(): Promise<void> {
  const args = process.argv.slice(2);
  const flags = args.filter((arg) => arg.startsWith('--'));
  const [input, tag] = args.filter((arg) => !arg.startsWith('--'));
  if (!input) {
    logger.error('Usage: analyzePlaylist <track-list file | Spotify playlist URL> [tag] [--lyrics]');
    process.exitCode = 1;
    return;
  }

  const container = ServiceContainer.initialize();
  const playlist = await loadPlaylist(input, container.getPlaylistSource(), tag);

  for (const row of playlist.describe()) {
    process.stdout.write(`${row}\n`);
  }

  const artifacts = await container.getPlaylistAnalyzer().renderStatistics(playlist);
  logger.info({ tag: playlist.tag, tracks: playlist.length, artifacts: artifacts.map((a) => a.path) }, 'Statistics rendered');

  if (flags.includes('--lyrics')) {
    const result = await container.getWordCloudService().generate(playlist);
    logger.info(
      {
        path: result.artifact.path,
        fetched: result.fetched,
        skipped: result.skipped.map((miss) => `${miss.track.artist} - ${miss.track.title}`),
      },
      'Word cloud rendered',
    );
  }
}

analyzePlaylist().catch((error: unknown) => {
  logger.error({ error }, 'Playlist analysis failed');
  process.exitCode = 1;
});
