import type { WordCloudChart, WordWeight } from '../ChartRenderer';
import { FONT_FAMILY, PALETTE, escapeXml, svgDocument } from './common';

export interface PlacedWord {
  word: string;
  count: number;
  fontSize: number;
  /** Centre of the word's bounding box. */
  x: number;
  y: number;
  width: number;
  height: number;
  color: string;
}

export interface WordCloudLayoutOptions {
  width: number;
  height: number;
  maxFontSize?: number;
  minFontSize?: number;
  /** Glyph width as a fraction of the font size, used to estimate word extents. */
  charWidthRatio?: number;
}

const SPIRAL_STEP = 0.1;
const SPIRAL_GROWTH = 2;

function overlaps(a: PlacedWord, b: Omit<PlacedWord, 'word' | 'count' | 'color' | 'fontSize'>): boolean {
  return Math.abs(a.x - b.x) * 2 < a.width + b.width && Math.abs(a.y - b.y) * 2 < a.height + b.height;
}

/**
 * Places words largest first along an Archimedean spiral from the centre,
 * dropping any word that cannot be placed inside the canvas.
 */
export function layoutWordCloud(words: readonly WordWeight[], options: WordCloudLayoutOptions): PlacedWord[] {
  const { width, height } = options;
  const maxFontSize = options.maxFontSize ?? Math.round(height / 4);
  const minFontSize = options.minFontSize ?? 8;
  const charWidthRatio = options.charWidthRatio ?? 0.6;

  const ordered = [...words].filter((entry) => entry.count > 0).sort((a, b) => b.count - a.count || a.word.localeCompare(b.word));
  if (!ordered.length) {
    return [];
  }

  const topCount = ordered[0].count;
  const maxRadius = Math.hypot(width, height) / 2;
  const placed: PlacedWord[] = [];

  ordered.forEach((entry, index) => {
    const fontSize = Math.max(minFontSize, Math.round(maxFontSize * Math.sqrt(entry.count / topCount)));
    const boxWidth = entry.word.length * fontSize * charWidthRatio;
    const boxHeight = fontSize;
    if (boxWidth > width || boxHeight > height) {
      return;
    }

    for (let t = 0; SPIRAL_GROWTH * t <= maxRadius; t += SPIRAL_STEP) {
      const candidate = {
        x: width / 2 + SPIRAL_GROWTH * t * Math.cos(t),
        y: height / 2 + SPIRAL_GROWTH * t * Math.sin(t),
        width: boxWidth,
        height: boxHeight,
      };
      const inside =
        candidate.x - boxWidth / 2 >= 0 &&
        candidate.x + boxWidth / 2 <= width &&
        candidate.y - boxHeight / 2 >= 0 &&
        candidate.y + boxHeight / 2 <= height;
      if (inside && !placed.some((other) => overlaps(other, candidate))) {
        placed.push({
          word: entry.word,
          count: entry.count,
          fontSize,
          ...candidate,
          color: PALETTE[index % PALETTE.length],
        });
        return;
      }
    }
  });

  return placed;
}

export function buildWordCloudSvg(chart: WordCloudChart): string {
  const placed = layoutWordCloud(chart.words, { width: chart.width, height: chart.height });
  const body = placed.map(
    (word) =>
      `<text class="word" x="${word.x.toFixed(1)}" y="${word.y.toFixed(1)}" font-family="${FONT_FAMILY}" font-size="${word.fontSize}" fill="${word.color}" text-anchor="middle" dominant-baseline="central">${escapeXml(word.word)}</text>`,
  );
  return svgDocument(chart.width, chart.height, body, chart.background);
}
