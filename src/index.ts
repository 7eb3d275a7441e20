export { loadConfig, ConfigurationError, LyricsCacheDriver, LyricsProviderKey } from './config/appConfig';
export type { AppConfig, LoadConfigOptions, LyricsConfig, OutputConfig, SpotifyConfig } from './config/appConfig';

export { createTrack, parseDuration, trackKey, tracksEqual, formatTrack, assertTrack } from './models/Track';
export type { Track, TrackInput } from './models/Track';
export { Playlist } from './models/Playlist';
export type { IntersectOptions } from './models/Playlist';
export type { MatchPolicy } from './models/trackMatching';
export { PlaylistError, ParseError, AuthError, FetchError, LyricsNotFound } from './models/PlaylistError';
export { ArtifactKind, artifactFileName } from './models/Artifact';
export type { Artifact } from './models/Artifact';

export { parseTrackList, parseTrackListFile } from './parsers/trackListParser';

export type { PlaylistSource } from './adapters/PlaylistSource';
export { SpotifyPlaylistSource, parsePlaylistId } from './adapters/SpotifyPlaylistSource';
export type { LyricsQuery, LyricsResult, LyricsSource } from './adapters/LyricsSource';
export { GeniusLyricsSource } from './adapters/GeniusLyricsSource';
export { LrclibLyricsSource } from './adapters/LrclibLyricsSource';

export {
  artistFrequency,
  sortedArtistCounts,
  frequencyOfFrequencies,
  fiveNumberSummary,
  quantile,
} from './services/statistics';
export type { FiveNumberSummary } from './services/statistics';
export { intersectPlaylists, playlistOverlap } from './services/intersection';
export type { PlaylistOverlap } from './services/intersection';
export { PlaylistAnalyzer } from './services/PlaylistAnalyzer';
export type { ArtistFrequencyMode } from './services/PlaylistAnalyzer';
export { WordCloudService } from './services/WordCloudService';
export type { WordCloudOptions, WordCloudResult } from './services/WordCloudService';
export { LyricsService } from './services/lyrics/LyricsService';
export { loadPlaylist } from './services/playlistLoader';

export type { Chart, ChartRenderer, WordWeight } from './rendering/ChartRenderer';
export { SvgChartRenderer, buildChartSvg } from './rendering/SvgChartRenderer';
export { buildVennLayout } from './rendering/svg/vennDiagram';
export type { VennLayout, VennSizes } from './rendering/svg/vennDiagram';

export type { LyricsCache } from './storage/LyricsCache';
export { FileLyricsCache } from './storage/FileLyricsCache';
export { LibSQLLyricsCache } from './storage/LibSQLLyricsCache';

export { ServiceContainer } from './container/ServiceContainer';
