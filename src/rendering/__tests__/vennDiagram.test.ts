import { describe, expect, it } from 'vitest';

import type { VennChart } from '../ChartRenderer';
import { buildVennLayout, buildVennSvg, circleOverlapArea, validateVennSizes } from '../svg/vennDiagram';

describe('circleOverlapArea', () => {
  it('covers the disjoint, contained and partial cases', () => {
    expect(circleOverlapArea(1, 1, 2)).toBe(0);
    expect(circleOverlapArea(1, 0.5, 0.2)).toBeCloseTo(Math.PI * 0.25);
    expect(circleOverlapArea(1, 1, 0)).toBeCloseTo(Math.PI);
    expect(circleOverlapArea(1, 1, 1)).toBeCloseTo((2 * Math.PI) / 3 - Math.sqrt(3) / 2);
  });
});

describe('validateVennSizes', () => {
  it('rejects negative, fractional and impossible sizes', () => {
    expect(() => validateVennSizes({ sizeA: -1, sizeB: 2, intersection: 0 })).toThrow(RangeError);
    expect(() => validateVennSizes({ sizeA: 1.5, sizeB: 2, intersection: 0 })).toThrow(RangeError);
    expect(() => validateVennSizes({ sizeA: 3, sizeB: 2, intersection: 3 })).toThrow('exceeds the smaller set (2)');
    expect(() => validateVennSizes({ sizeA: 3, sizeB: 2, intersection: 2 })).not.toThrow();
  });
});

describe('buildVennLayout', () => {
  it('sizes circles by area and the lens by the intersection', () => {
    const layout = buildVennLayout({ sizeA: 4, sizeB: 4, intersection: 2 });

    expect(layout.radiusA).toBe(1);
    expect(layout.radiusB).toBe(1);
    expect(circleOverlapArea(1, 1, layout.distance)).toBeCloseTo(Math.PI / 2, 6);
    expect(layout.counts).toEqual({ onlyA: 2, onlyB: 2, both: 2 });
  });

  it('separates disjoint sets', () => {
    const layout = buildVennLayout({ sizeA: 4, sizeB: 1, intersection: 0 });

    expect(layout.radiusB).toBeCloseTo(0.5);
    expect(layout.distance).toBeCloseTo(1.6);
  });

  it('nests a set contained in the other', () => {
    const layout = buildVennLayout({ sizeA: 1, sizeB: 4, intersection: 1 });

    expect(layout.radiusA).toBeCloseTo(0.5);
    expect(layout.distance).toBeCloseTo(0.5);
    expect(layout.counts).toEqual({ onlyA: 0, onlyB: 3, both: 1 });
  });

  it('collapses when both sets are empty', () => {
    expect(buildVennLayout({ sizeA: 0, sizeB: 0, intersection: 0 })).toEqual({
      radiusA: 0,
      radiusB: 0,
      distance: 0,
      counts: { onlyA: 0, onlyB: 0, both: 0 },
    });
  });
});

describe('buildVennSvg', () => {
  const chart: Omit<VennChart, 'sizeA' | 'sizeB' | 'intersection'> = {
    type: 'venn',
    title: 'Playlist Intersection',
    labels: ['road', 'gym'],
    width: 640,
    height: 480,
  };

  it('draws both circles with region counts', () => {
    const svg = buildVennSvg({ ...chart, sizeA: 4, sizeB: 3, intersection: 2 });

    expect(svg).toContain('class="set-a"');
    expect(svg).toContain('class="set-b"');
    expect([...svg.matchAll(/class="count">(\d+)</g)].map((match) => match[1])).toEqual(['2', '1', '2']);
    expect(svg).toContain('>road</text>');
  });

  it('draws no circles for two empty sets', () => {
    const svg = buildVennSvg({ ...chart, sizeA: 0, sizeB: 0, intersection: 0 });

    expect(svg).not.toContain('<circle');
  });
});
