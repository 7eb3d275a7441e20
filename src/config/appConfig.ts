import fs from 'node:fs';
import path from 'node:path';

export class ConfigurationError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export interface SpotifyConfig {
  clientId: string;
  clientSecret: string;
  apiBaseUrl: string;
  tokenUrl: string;
  pageSize: number;
}

export enum LyricsProviderKey {
  GENIUS = 'genius',
  LRCLIB = 'lrclib',
}

export enum LyricsCacheDriver {
  NONE = 'none',
  FILE = 'file',
  LIBSQL = 'libsql',
}

export interface LyricsLibSQLConfig {
  url: string;
  authToken?: string;
}

export interface LyricsCacheConfig {
  driver: LyricsCacheDriver;
  path: string;
  libsql?: LyricsLibSQLConfig;
}

export interface LyricsConfig {
  geniusAccessToken: string;
  providers: LyricsProviderKey[];
  concurrency: number;
  requestDelayMs: number;
  requestTimeoutMs: number;
  cache: LyricsCacheConfig;
}

export interface OutputConfig {
  directory: string;
  density: number;
}

export interface AppConfig {
  spotify: SpotifyConfig;
  lyrics: LyricsConfig;
  output: OutputConfig;
}

interface RawConfigFile {
  playlistInsights?: {
    spotify?: Partial<SpotifyConfig>;
    lyrics?: Partial<Omit<LyricsConfig, 'cache' | 'providers'>> & {
      providers?: string[];
      cache?: Partial<Omit<LyricsCacheConfig, 'libsql'>> & {
        libsql?: Partial<LyricsLibSQLConfig>;
      };
    };
    output?: Partial<OutputConfig>;
  };
}

export const DEFAULTS: AppConfig = {
  spotify: {
    clientId: '',
    clientSecret: '',
    apiBaseUrl: 'https://api.spotify.com/v1',
    tokenUrl: 'https://accounts.spotify.com/api/token',
    pageSize: 100,
  },
  lyrics: {
    geniusAccessToken: '',
    providers: [LyricsProviderKey.GENIUS, LyricsProviderKey.LRCLIB],
    concurrency: 1,
    requestDelayMs: 0,
    requestTimeoutMs: 10000,
    cache: {
      driver: LyricsCacheDriver.FILE,
      path: './lyrics_cache',
    },
  },
  output: {
    directory: '.',
    density: 300,
  },
};

export type Environment = Record<string, string | undefined>;

export interface LoadConfigOptions {
  env?: Environment;
  configPath?: string;
}

/**
 * Merges defaults, `config/app.config.json` and environment variables (highest precedence).
 * Credentials may be empty here; adapters reject them when they are first needed.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? path.resolve(process.cwd(), 'config/app.config.json');
  let fileOverrides: RawConfigFile = {};

  if (fs.existsSync(configPath)) {
    try {
      const contents = fs.readFileSync(configPath, 'utf-8');
      fileOverrides = JSON.parse(contents) as RawConfigFile;
    } catch (error) {
      throw new ConfigurationError(`Unable to parse config file: ${configPath}`, error);
    }
  }

  const section = fileOverrides.playlistInsights ?? {};
  const lyricsOverrides = section.lyrics ?? {};
  const cacheOverrides = lyricsOverrides.cache ?? {};

  const cacheDriver = normalizeCacheDriver(env.LYRICS_CACHE_DRIVER ?? cacheOverrides.driver ?? DEFAULTS.lyrics.cache.driver);
  const libsqlUrl = String(env.LYRICS_CACHE_LIBSQL_URL ?? cacheOverrides.libsql?.url ?? '').trim();
  const libsqlAuthToken = env.LYRICS_CACHE_LIBSQL_AUTH_TOKEN ?? cacheOverrides.libsql?.authToken;

  if (cacheDriver === LyricsCacheDriver.LIBSQL && !libsqlUrl) {
    throw new ConfigurationError('LYRICS_CACHE_LIBSQL_URL is required when LYRICS_CACHE_DRIVER=libsql');
  }

  const config: AppConfig = {
    spotify: {
      clientId: String(env.SPOTIFY_CLIENT_ID ?? section.spotify?.clientId ?? DEFAULTS.spotify.clientId).trim(),
      clientSecret: String(env.SPOTIFY_CLIENT_SECRET ?? section.spotify?.clientSecret ?? DEFAULTS.spotify.clientSecret).trim(),
      apiBaseUrl: String(env.SPOTIFY_API_BASE_URL ?? section.spotify?.apiBaseUrl ?? DEFAULTS.spotify.apiBaseUrl),
      tokenUrl: String(env.SPOTIFY_TOKEN_URL ?? section.spotify?.tokenUrl ?? DEFAULTS.spotify.tokenUrl),
      pageSize: clamp(Number(env.SPOTIFY_PAGE_SIZE ?? section.spotify?.pageSize ?? DEFAULTS.spotify.pageSize), 1, 100),
    },
    lyrics: {
      geniusAccessToken: String(env.GENIUS_ACCESS_TOKEN ?? lyricsOverrides.geniusAccessToken ?? DEFAULTS.lyrics.geniusAccessToken).trim(),
      providers:
        parseProviderList(env.LYRICS_PROVIDERS) ??
        parseProviderList(lyricsOverrides.providers?.join(',')) ??
        DEFAULTS.lyrics.providers,
      concurrency: Math.max(1, Number(env.LYRICS_CONCURRENCY ?? lyricsOverrides.concurrency ?? DEFAULTS.lyrics.concurrency)),
      requestDelayMs: Math.max(0, Number(env.LYRICS_REQUEST_DELAY_MS ?? lyricsOverrides.requestDelayMs ?? DEFAULTS.lyrics.requestDelayMs)),
      requestTimeoutMs: Number(env.LYRICS_REQUEST_TIMEOUT_MS ?? lyricsOverrides.requestTimeoutMs ?? DEFAULTS.lyrics.requestTimeoutMs),
      cache: {
        driver: cacheDriver,
        path: String(env.LYRICS_CACHE_PATH ?? cacheOverrides.path ?? DEFAULTS.lyrics.cache.path),
        libsql: libsqlUrl
          ? {
            url: libsqlUrl,
            authToken: libsqlAuthToken,
          }
          : undefined,
      },
    },
    output: {
      directory: String(env.OUTPUT_DIR ?? section.output?.directory ?? DEFAULTS.output.directory),
      density: Number(env.RENDER_DENSITY ?? section.output?.density ?? DEFAULTS.output.density),
    },
  };

  for (const [key, value] of Object.entries({
    LYRICS_CONCURRENCY: config.lyrics.concurrency,
    LYRICS_REQUEST_DELAY_MS: config.lyrics.requestDelayMs,
    LYRICS_REQUEST_TIMEOUT_MS: config.lyrics.requestTimeoutMs,
    RENDER_DENSITY: config.output.density,
    SPOTIFY_PAGE_SIZE: config.spotify.pageSize,
  })) {
    if (Number.isNaN(value)) {
      throw new ConfigurationError(`${key} must be a number`);
    }
  }

  return config;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function parseProviderList(value?: string): LyricsProviderKey[] | undefined {
  if (!value) return undefined;
  const known: string[] = Object.values(LyricsProviderKey);
  const providers = value
    .split(',')
    .map((v) => v.trim().toLowerCase())
    .filter((v) => v.length > 0);

  const unknown = providers.filter((v) => !known.includes(v));
  if (unknown.length) {
    throw new ConfigurationError(`Unknown lyrics provider(s): ${unknown.join(', ')}`);
  }
  return providers.filter(isProviderKey);
}

function isProviderKey(value: string): value is LyricsProviderKey {
  const known: string[] = Object.values(LyricsProviderKey);
  return known.includes(value);
}

function normalizeCacheDriver(value: unknown): LyricsCacheDriver {
  const normalized = String(value ?? '').toLowerCase();
  if (normalized === LyricsCacheDriver.LIBSQL) {
    return LyricsCacheDriver.LIBSQL;
  }
  if (normalized === LyricsCacheDriver.NONE) {
    return LyricsCacheDriver.NONE;
  }
  return LyricsCacheDriver.FILE;
}
