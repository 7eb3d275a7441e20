import type { LyricsSource } from '../adapters/LyricsSource';
import { GeniusLyricsSource } from '../adapters/GeniusLyricsSource';
import { LrclibLyricsSource } from '../adapters/LrclibLyricsSource';
import type { PlaylistSource } from '../adapters/PlaylistSource';
import { SpotifyPlaylistSource } from '../adapters/SpotifyPlaylistSource';
import { loadConfig, LyricsCacheDriver, LyricsProviderKey, type AppConfig } from '../config/appConfig';
import type { ChartRenderer } from '../rendering/ChartRenderer';
import { SvgChartRenderer } from '../rendering/SvgChartRenderer';
import { LyricsService } from '../services/lyrics/LyricsService';
import { PlaylistAnalyzer } from '../services/PlaylistAnalyzer';
import { WordCloudService } from '../services/WordCloudService';
import { FileLyricsCache } from '../storage/FileLyricsCache';
import { LibSQLLyricsCache } from '../storage/LibSQLLyricsCache';
import { NoopLyricsCache, type LyricsCache } from '../storage/LyricsCache';

export interface ServiceOverrides {
  fetchImpl?: typeof fetch;
  renderer?: ChartRenderer;
  lyricsCache?: LyricsCache;
  playlistSource?: PlaylistSource;
  lyricsSources?: LyricsSource[];
}

export class ServiceContainer {
  private static instance: ServiceContainer | null = null;

  static initialize(): ServiceContainer {
    if (!ServiceContainer.instance) {
      ServiceContainer.instance = new ServiceContainer(loadConfig());
    }
    return ServiceContainer.instance;
  }

  static create(config: AppConfig, overrides: ServiceOverrides = {}): ServiceContainer {
    return new ServiceContainer(config, overrides);
  }

  private readonly playlistSource: PlaylistSource;
  private readonly renderer: ChartRenderer;
  private readonly lyricsCache: LyricsCache;
  private readonly lyricsService: LyricsService;
  private readonly playlistAnalyzer: PlaylistAnalyzer;
  private readonly wordCloudService: WordCloudService;

  private constructor(
    private readonly config: AppConfig,
    overrides: ServiceOverrides = {},
  ) {
    const fetchImpl = overrides.fetchImpl ?? fetch;

    this.playlistSource = overrides.playlistSource ?? new SpotifyPlaylistSource(config.spotify, fetchImpl);
    this.renderer =
      overrides.renderer ??
      new SvgChartRenderer({ outputDirectory: config.output.directory, density: config.output.density });
    this.lyricsCache = overrides.lyricsCache ?? this.createLyricsCache();

    const lyricsSources = overrides.lyricsSources ?? this.createLyricsSources(fetchImpl);
    this.lyricsService = new LyricsService(lyricsSources, this.lyricsCache, config.lyrics.requestTimeoutMs);
    this.playlistAnalyzer = new PlaylistAnalyzer(this.renderer);
    this.wordCloudService = new WordCloudService(this.lyricsService, this.renderer, {
      concurrency: config.lyrics.concurrency,
      requestDelayMs: config.lyrics.requestDelayMs,
    });
  }

  private createLyricsCache(): LyricsCache {
    const { cache } = this.config.lyrics;
    switch (cache.driver) {
      case LyricsCacheDriver.LIBSQL:
        if (!cache.libsql) {
          throw new Error('LibSQL lyrics cache selected but no connection details were provided');
        }
        return LibSQLLyricsCache.fromOptions(cache.libsql);
      case LyricsCacheDriver.FILE:
        return new FileLyricsCache(cache.path);
      default:
        return new NoopLyricsCache();
    }
  }

  private createLyricsSources(fetchImpl: typeof fetch): LyricsSource[] {
    return this.config.lyrics.providers.map((key) => {
      switch (key) {
        case LyricsProviderKey.GENIUS:
          return new GeniusLyricsSource(this.config.lyrics.geniusAccessToken, fetchImpl);
        case LyricsProviderKey.LRCLIB:
          return new LrclibLyricsSource(fetchImpl);
        default: {
          const unknown: never = key;
          throw new Error(`Unsupported lyrics provider: ${String(unknown)}`);
        }
      }
    });
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getPlaylistSource(): PlaylistSource {
    return this.playlistSource;
  }

  getRenderer(): ChartRenderer {
    return this.renderer;
  }

  getLyricsCache(): LyricsCache {
    return this.lyricsCache;
  }

  getLyricsService(): LyricsService {
    return this.lyricsService;
  }

  getPlaylistAnalyzer(): PlaylistAnalyzer {
    return this.playlistAnalyzer;
  }

  getWordCloudService(): WordCloudService {
    return this.wordCloudService;
  }
}
