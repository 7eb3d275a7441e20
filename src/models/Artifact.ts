export enum ArtifactKind {
  ARTIST_FREQUENCY_BAR = 'artist_frequency_bar',
  ARTIST_FREQUENCY_DIST = 'artist_frequency_dist',
  DURATION_BOX = 'duration_box',
  VENN = 'venn',
  WORD_CLOUD = 'wordCloud',
}

export interface Artifact {
  kind: ArtifactKind;
  path: string;
}

export const DEFAULT_TAG = 'playlist';
export const VENN_FILE_NAME = 'playlist_intersection_venn.png';

export function sanitizeTag(tag: string): string {
  const cleaned = tag.trim().replace(/[\\/:*?"<>|\s]+/g, '_');
  return cleaned || DEFAULT_TAG;
}

/** `<tag>_<kind>.png`, e.g. `road-trip_duration_box.png`. */
export function artifactFileName(tag: string, kind: ArtifactKind): string {
  return `${sanitizeTag(tag)}_${kind}.png`;
}
