import { describe, expect, it } from 'vitest';

import { buildWordCloudSvg, layoutWordCloud, type PlacedWord } from '../svg/wordCloud';

function overlapping(a: PlacedWord, b: PlacedWord): boolean {
  return Math.abs(a.x - b.x) * 2 < a.width + b.width && Math.abs(a.y - b.y) * 2 < a.height + b.height;
}

const words = [
  { word: 'days', count: 5 },
  { word: 'sunny', count: 10 },
  { word: 'night', count: 1 },
  { word: 'morning', count: 3 },
  { word: 'unused', count: 0 },
];

describe('layoutWordCloud', () => {
  const placed = layoutWordCloud(words, { width: 800, height: 400 });

  it('places the most frequent word first, at the centre, in the largest font', () => {
    expect(placed.map((word) => word.word)).toEqual(['sunny', 'days', 'morning', 'night']);
    expect(placed[0]).toMatchObject({ x: 400, y: 200, fontSize: 100 });
    expect(placed[1].fontSize).toBe(71);
  });

  it('keeps every word inside the canvas without overlaps', () => {
    for (const word of placed) {
      expect(word.x - word.width / 2).toBeGreaterThanOrEqual(0);
      expect(word.x + word.width / 2).toBeLessThanOrEqual(800);
      expect(word.y - word.height / 2).toBeGreaterThanOrEqual(0);
      expect(word.y + word.height / 2).toBeLessThanOrEqual(400);
    }
    placed.forEach((word, index) => {
      for (const other of placed.slice(index + 1)) {
        expect(overlapping(word, other)).toBe(false);
      }
    });
  });

  it('drops words wider than the canvas', () => {
    expect(layoutWordCloud([{ word: 'extraordinarilylongword', count: 1 }], { width: 100, height: 100 })).toEqual([]);
  });
});

describe('buildWordCloudSvg', () => {
  it('writes one escaped text element per placed word', () => {
    const svg = buildWordCloudSvg({
      type: 'wordCloud',
      words: [
        { word: 'r&b', count: 2 },
        { word: 'soul', count: 1 },
      ],
      width: 400,
      height: 200,
      background: '#000000',
    });

    expect(svg.match(/class="word"/g)).toHaveLength(2);
    expect(svg).toContain('>r&amp;b</text>');
    expect(svg).toContain('fill="#000000"');
  });

  it('renders a blank canvas for no words', () => {
    const svg = buildWordCloudSvg({ type: 'wordCloud', words: [], width: 400, height: 200, background: '#ffffff' });

    expect(svg).not.toContain('class="word"');
  });
});
