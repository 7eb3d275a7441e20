import dotenv from 'dotenv';

import { ServiceContainer } from '../container/ServiceContainer';
import type { MatchPolicy } from '../models/trackMatching';
import { playlistOverlap } from '../services/intersection';
import { loadPlaylist } from '../services/playlistLoader';
import { logger } from '../utils/logger';

dotenv.config();

const POLICIES: readonly MatchPolicy[] = ['exact', 'normalized', 'fuzzy'];

function isMatchPolicy(value: string): value is MatchPolicy {
  const names: readonly string[] = POLICIES;
  return names.includes(value);
}

async function comparePlaylists(): Promise<void> {
  const [first, second, policyArg = 'normalized'] = process.argv.slice(2);
  if (!first || !second || !isMatchPolicy(policyArg)) {
    logger.error(`Usage: comparePlaylists <playlist A> <playlist B> [${POLICIES.join('|')}]`);
    process.exitCode = 1;
    return;
  }

  const container = ServiceContainer.initialize();
  const source = container.getPlaylistSource();
  const [a, b] = await Promise.all([loadPlaylist(first, source), loadPlaylist(second, source)]);

  const shared = a.intersect(b, { policy: policyArg });
  for (const row of shared.describe()) {
    process.stdout.write(`${row}\n`);
  }

  const artifact = await container
    .getPlaylistAnalyzer()
    .renderIntersectionVenn(playlistOverlap(a, b, { policy: policyArg }), [a.tag, b.tag]);

  logger.info({ sizeA: a.length, sizeB: b.length, shared: shared.length, path: artifact.path }, 'Playlists compared');
}

comparePlaylists().catch((error: unknown) => {
  logger.error({ error }, 'Playlist comparison failed');
  process.exitCode = 1;
});
