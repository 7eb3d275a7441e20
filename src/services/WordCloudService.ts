import { setTimeout as sleep } from 'node:timers/promises';

import { Semaphore } from 'async-mutex';

import { artifactFileName, ArtifactKind, type Artifact } from '../models/Artifact';
import type { Playlist } from '../models/Playlist';
import { AuthError, LyricsNotFound } from '../models/PlaylistError';
import { trackKey, type Track } from '../models/Track';
import type { ChartRenderer, WordWeight } from '../rendering/ChartRenderer';
import { logger } from '../utils/logger';
import { CACHE_SOURCE, LyricsService } from './lyrics/LyricsService';
import { countWords, getDefaultStopwords, tokenizeLyrics } from './lyrics/wordFrequency';

export interface WordCloudOptions {
  /** Parallel lyrics lookups. */
  concurrency?: number;
  /** Pause after each remote lookup, inside the concurrency slot. */
  requestDelayMs?: number;
  maxWords?: number;
  stopwords?: ReadonlySet<string>;
  width?: number;
  height?: number;
  background?: string;
}

export interface WordCloudResult {
  artifact: Artifact;
  /** Tracks whose lyrics were found. */
  fetched: number;
  skipped: LyricsNotFound[];
  words: WordWeight[];
}

type LookupOutcome = { track: Track; lyrics: string } | { track: Track; missing: LyricsNotFound };

export class WordCloudService {
  private readonly options: Required<Omit<WordCloudOptions, 'stopwords'>> & { stopwords: ReadonlySet<string> | null };

  constructor(
    private readonly lyricsService: LyricsService,
    private readonly renderer: ChartRenderer,
    options: WordCloudOptions = {},
  ) {
    this.options = {
      concurrency: Math.max(1, options.concurrency ?? 1),
      requestDelayMs: options.requestDelayMs ?? 0,
      maxWords: options.maxWords ?? 200,
      stopwords: options.stopwords ?? null,
      width: options.width ?? 800,
      height: options.height ?? 400,
      background: options.background ?? '#ffffff',
    };
  }

  async generate(playlist: Playlist): Promise<WordCloudResult> {
    const tracks = distinctTracks(playlist);
    const outcomes = await this.lookupAll(tracks);

    const stopwords = this.options.stopwords ?? getDefaultStopwords();
    const tokens: string[] = [];
    const skipped: LyricsNotFound[] = [];
    for (const outcome of outcomes) {
      if ('missing' in outcome) {
        skipped.push(outcome.missing);
      } else {
        tokens.push(...tokenizeLyrics(outcome.lyrics, stopwords));
      }
    }

    const words = countWords(tokens, this.options.maxWords);
    const kind = ArtifactKind.WORD_CLOUD;
    const path = await this.renderer.render(artifactFileName(playlist.tag, kind), {
      type: 'wordCloud',
      words,
      width: this.options.width,
      height: this.options.height,
      background: this.options.background,
    });

    if (skipped.length) {
      logger.warn(
        { tag: playlist.tag, skipped: skipped.length, tracks: tracks.length },
        'Some tracks had no lyrics and were left out of the word cloud',
      );
    }

    return {
      artifact: { kind, path },
      fetched: outcomes.length - skipped.length,
      skipped,
      words,
    };
  }

  // Lookups may finish in any order; Promise.all keeps results aligned with `tracks`.
  // After an AuthError, queued lookups fail with it without calling a source.
  private async lookupAll(tracks: readonly Track[]): Promise<LookupOutcome[]> {
    const semaphore = new Semaphore(this.options.concurrency);
    let abortedBy: AuthError | null = null;
    return Promise.all(
      tracks.map((track) =>
        semaphore.runExclusive(async (): Promise<LookupOutcome> => {
          if (abortedBy) {
            throw abortedBy;
          }
          let fromCache = false;
          let failed = false;
          try {
            const result = await this.lyricsService.getLyrics(track);
            fromCache = result.source === CACHE_SOURCE;
            return { track, lyrics: result.text };
          } catch (error) {
            if (error instanceof LyricsNotFound) {
              logger.warn({ title: track.title, artist: track.artist }, error.message);
              return { track, missing: error };
            }
            failed = true;
            if (error instanceof AuthError) {
              abortedBy = error;
            }
            throw error;
          } finally {
            if (this.options.requestDelayMs > 0 && !fromCache && !failed) {
              await sleep(this.options.requestDelayMs);
            }
          }
        }),
      ),
    );
  }
}

export function distinctTracks(playlist: Playlist): Track[] {
  const seen = new Set<string>();
  const tracks: Track[] = [];
  for (const track of playlist) {
    const key = trackKey(track);
    if (!seen.has(key)) {
      seen.add(key);
      tracks.push(track);
    }
  }
  return tracks;
}
