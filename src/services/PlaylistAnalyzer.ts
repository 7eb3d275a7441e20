import { artifactFileName, ArtifactKind, sanitizeTag, VENN_FILE_NAME, type Artifact } from '../models/Artifact';
import type { Playlist } from '../models/Playlist';
import type { ChartRenderer } from '../rendering/ChartRenderer';
import { validateVennSizes, type VennSizes } from '../rendering/svg/vennDiagram';
import { fiveNumberSummary, frequencyOfFrequencies, sortedArtistCounts } from './statistics';

export type ArtistFrequencyMode = 'bar' | 'dist';

/**
 * Turns playlist statistics into chart artifacts. All methods are read-only
 * with respect to the playlists they receive.
 */
export class PlaylistAnalyzer {
  constructor(private readonly renderer: ChartRenderer) {}

  async renderArtistFrequency(playlist: Playlist, mode: ArtistFrequencyMode = 'dist'): Promise<Artifact> {
    const frequency = playlist.artistFrequency();

    if (mode === 'bar') {
      const kind = ArtifactKind.ARTIST_FREQUENCY_BAR;
      const path = await this.renderer.render(artifactFileName(playlist.tag, kind), {
        type: 'bar',
        title: `${playlist.tag} Songs per artist (ascending)`.trim(),
        xLabel: 'Artist',
        yLabel: 'Number of songs',
        bars: sortedArtistCounts(frequency).map(({ artist, count }) => ({ label: artist, value: count })),
        width: 2000,
        height: 1000,
        rotateLabels: true,
      });
      return { kind, path };
    }

    const kind = ArtifactKind.ARTIST_FREQUENCY_DIST;
    const path = await this.renderer.render(artifactFileName(playlist.tag, kind), {
      type: 'bar',
      title: `${playlist.tag} Distribution of artist frequencies`.trim(),
      xLabel: 'Songs per artist',
      yLabel: 'Number of artists',
      bars: frequencyOfFrequencies(frequency).map(({ songsPerArtist, artists }) => ({
        label: String(songsPerArtist),
        value: artists,
      })),
      width: 500,
      height: 500,
    });
    return { kind, path };
  }

  async renderDurationBox(playlist: Playlist): Promise<Artifact> {
    const kind = ArtifactKind.DURATION_BOX;
    const durations = playlist.durations();
    const path = await this.renderer.render(artifactFileName(playlist.tag, kind), {
      type: 'box',
      title: `${playlist.tag} Song Duration Distribution`.trim(),
      yLabel: 'Duration (seconds)',
      values: durations,
      summary: fiveNumberSummary(durations),
      width: 500,
      height: 500,
    });
    return { kind, path };
  }

  async renderIntersectionVenn(
    sizes: VennSizes,
    labels: [string, string] = ['A', 'B'],
    name?: string,
  ): Promise<Artifact> {
    validateVennSizes(sizes);
    const kind = ArtifactKind.VENN;
    const fileName = name ? `${sanitizeTag(name)}_venn.png` : VENN_FILE_NAME;
    const path = await this.renderer.render(fileName, {
      type: 'venn',
      title: 'Playlist Intersection',
      labels,
      ...sizes,
      width: 640,
      height: 480,
    });
    return { kind, path };
  }

  async renderStatistics(playlist: Playlist): Promise<Artifact[]> {
    return [
      await this.renderArtistFrequency(playlist, 'bar'),
      await this.renderArtistFrequency(playlist, 'dist'),
      await this.renderDurationBox(playlist),
    ];
  }
}
