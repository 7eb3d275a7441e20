import { describe, expect, it } from 'vitest';

import { playlistOf, RecordingRenderer, track } from '../../__tests__/helpers';
import { ArtifactKind } from '../../models/Artifact';
import { PlaylistAnalyzer } from '../PlaylistAnalyzer';

const playlist = playlistOf(
  'road trip',
  track('Song A', 'Artist1', 225),
  track('Song B', 'Artist2', 200),
  track('Song C', 'Artist1', 61),
  track('Song D', 'Artist3', 300),
);

describe('PlaylistAnalyzer', () => {
  it('renders songs per artist as an ascending bar chart', async () => {
    const renderer = new RecordingRenderer();

    const artifact = await new PlaylistAnalyzer(renderer).renderArtistFrequency(playlist, 'bar');

    expect(artifact).toEqual({
      kind: ArtifactKind.ARTIST_FREQUENCY_BAR,
      path: '/out/road_trip_artist_frequency_bar.png',
    });
    const [call] = renderer.calls;
    expect(call.chart).toMatchObject({
      type: 'bar',
      title: 'road trip Songs per artist (ascending)',
      width: 2000,
      height: 1000,
      rotateLabels: true,
      bars: [
        { label: 'Artist2', value: 1 },
        { label: 'Artist3', value: 1 },
        { label: 'Artist1', value: 2 },
      ],
    });
  });

  it('renders the distribution of artist frequencies by default', async () => {
    const renderer = new RecordingRenderer();

    const artifact = await new PlaylistAnalyzer(renderer).renderArtistFrequency(playlist);

    expect(artifact.kind).toBe(ArtifactKind.ARTIST_FREQUENCY_DIST);
    expect(renderer.calls[0].fileName).toBe('road_trip_artist_frequency_dist.png');
    expect(renderer.calls[0].chart).toMatchObject({
      type: 'bar',
      bars: [
        { label: '1', value: 2 },
        { label: '2', value: 1 },
      ],
    });
  });

  it('renders a duration box plot with its summary', async () => {
    const renderer = new RecordingRenderer();

    await new PlaylistAnalyzer(renderer).renderDurationBox(playlist);

    const { chart } = renderer.calls[0];
    if (chart.type !== 'box') {
      throw new Error(`expected a box plot, got ${chart.type}`);
    }
    expect(chart.values).toEqual([225, 200, 61, 300]);
    expect(chart.summary?.median).toBeCloseTo(212.5);
    expect(chart.summary?.min).toBe(61);
    expect(chart.summary?.max).toBe(300);
  });

  it('still renders charts for an empty playlist', async () => {
    const renderer = new RecordingRenderer();

    const artifacts = await new PlaylistAnalyzer(renderer).renderStatistics(playlistOf(''));

    expect(artifacts.map((artifact) => artifact.path)).toEqual([
      '/out/playlist_artist_frequency_bar.png',
      '/out/playlist_artist_frequency_dist.png',
      '/out/playlist_duration_box.png',
    ]);
    const box = renderer.calls[2].chart;
    expect(box.type === 'box' && box.summary).toBeNull();
  });

  it('renders the intersection Venn diagram under a fixed name', async () => {
    const renderer = new RecordingRenderer();

    const artifact = await new PlaylistAnalyzer(renderer).renderIntersectionVenn(
      { sizeA: 4, sizeB: 3, intersection: 2 },
      ['road', 'gym'],
    );

    expect(artifact).toEqual({ kind: ArtifactKind.VENN, path: '/out/playlist_intersection_venn.png' });
    expect(renderer.calls[0].chart).toMatchObject({ type: 'venn', labels: ['road', 'gym'], intersection: 2 });
  });

  it('rejects an intersection larger than either set', async () => {
    const renderer = new RecordingRenderer();

    await expect(
      new PlaylistAnalyzer(renderer).renderIntersectionVenn({ sizeA: 2, sizeB: 5, intersection: 3 }),
    ).rejects.toThrow(RangeError);
    expect(renderer.calls).toHaveLength(0);
  });
});
