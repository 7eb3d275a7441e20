import type { VennChart } from '../ChartRenderer';
import { svgDocument, text } from './common';

export interface VennSizes {
  sizeA: number;
  sizeB: number;
  intersection: number;
}

export interface VennLayout {
  radiusA: number;
  radiusB: number;
  /** Distance between the two circle centres. */
  distance: number;
  counts: { onlyA: number; onlyB: number; both: number };
}

const BISECTION_STEPS = 80;
const DISJOINT_GAP = 0.1;

/** Area of the lens where two circles overlap. */
export function circleOverlapArea(r1: number, r2: number, d: number): number {
  if (r1 <= 0 || r2 <= 0 || d >= r1 + r2) {
    return 0;
  }
  if (d <= Math.abs(r1 - r2)) {
    return Math.PI * Math.min(r1, r2) ** 2;
  }
  const a = r1 ** 2 * Math.acos((d ** 2 + r1 ** 2 - r2 ** 2) / (2 * d * r1));
  const b = r2 ** 2 * Math.acos((d ** 2 + r2 ** 2 - r1 ** 2) / (2 * d * r2));
  const c = 0.5 * Math.sqrt((-d + r1 + r2) * (d + r1 - r2) * (d - r1 + r2) * (d + r1 + r2));
  return a + b - c;
}

export function validateVennSizes({ sizeA, sizeB, intersection }: VennSizes): void {
  for (const [name, value] of Object.entries({ sizeA, sizeB, intersection })) {
    if (!Number.isInteger(value) || value < 0) {
      throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
    }
  }
  if (intersection > Math.min(sizeA, sizeB)) {
    throw new RangeError(`intersection ${intersection} exceeds the smaller set (${Math.min(sizeA, sizeB)})`);
  }
}

/**
 * Circle areas are proportional to the set sizes and the lens area to the
 * intersection. The larger circle has radius 1.
 */
export function buildVennLayout(sizes: VennSizes): VennLayout {
  validateVennSizes(sizes);
  const { sizeA, sizeB, intersection } = sizes;
  const counts = { onlyA: sizeA - intersection, onlyB: sizeB - intersection, both: intersection };

  const largest = Math.max(sizeA, sizeB);
  if (largest === 0) {
    return { radiusA: 0, radiusB: 0, distance: 0, counts };
  }

  const radiusA = Math.sqrt(sizeA / largest);
  const radiusB = Math.sqrt(sizeB / largest);

  if (intersection === 0) {
    return { radiusA, radiusB, distance: radiusA + radiusB + DISJOINT_GAP, counts };
  }
  if (intersection === Math.min(sizeA, sizeB)) {
    return { radiusA, radiusB, distance: Math.abs(radiusA - radiusB), counts };
  }

  const target = (Math.PI * intersection) / largest;
  let low = Math.abs(radiusA - radiusB);
  let high = radiusA + radiusB;
  for (let step = 0; step < BISECTION_STEPS; step += 1) {
    const middle = (low + high) / 2;
    if (circleOverlapArea(radiusA, radiusB, middle) > target) {
      low = middle;
    } else {
      high = middle;
    }
  }

  return { radiusA, radiusB, distance: (low + high) / 2, counts };
}

export function buildVennSvg(chart: VennChart): string {
  const layout = buildVennLayout(chart);
  const { width, height } = chart;
  const body: string[] = [text(width / 2, 30, chart.title, 'font-size="18" text-anchor="middle"')];

  const left = -layout.radiusA;
  const right = layout.distance + layout.radiusB;
  const span = Math.max(right - left, 1e-9);
  const tallest = Math.max(layout.radiusA, layout.radiusB) * 2;
  const scale = Math.min((width * 0.8) / span, (height - 120) / Math.max(tallest, 1e-9));
  const offsetX = (width - span * scale) / 2 - left * scale;
  const centerY = height / 2 + 10;

  const ax = offsetX;
  const bx = offsetX + layout.distance * scale;
  const ra = layout.radiusA * scale;
  const rb = layout.radiusB * scale;

  if (ra > 0) {
    body.push(`<circle class="set-a" cx="${ax.toFixed(1)}" cy="${centerY.toFixed(1)}" r="${ra.toFixed(1)}" fill="#d62728" fill-opacity="0.4" stroke="#555555"/>`);
  }
  if (rb > 0) {
    body.push(`<circle class="set-b" cx="${bx.toFixed(1)}" cy="${centerY.toFixed(1)}" r="${rb.toFixed(1)}" fill="#2ca02c" fill-opacity="0.4" stroke="#555555"/>`);
  }

  const aLeft = ax - ra;
  const aRight = ax + ra;
  const bLeft = bx - rb;
  const bRight = bx + rb;
  const labelY = centerY + Math.max(ra, rb) + 28;
  const countAttributes = 'font-size="16" text-anchor="middle" class="count"';

  body.push(
    text((aLeft + Math.min(aRight, bLeft)) / 2, centerY + 5, String(layout.counts.onlyA), countAttributes),
    text((Math.max(aRight, bLeft) + bRight) / 2, centerY + 5, String(layout.counts.onlyB), countAttributes),
    text((Math.max(aLeft, bLeft) + Math.min(aRight, bRight)) / 2, centerY + 5, String(layout.counts.both), countAttributes),
    text(ax, labelY, chart.labels[0], 'font-size="15" text-anchor="middle"'),
    text(bx, labelY, chart.labels[1], 'font-size="15" text-anchor="middle"'),
  );

  return svgDocument(width, height, body);
}
