import type { BoxPlot } from '../ChartRenderer';
import { formatNumber, niceTicks, svgDocument, text } from './common';

const MARGIN = { top: 50, right: 30, bottom: 40, left: 80 };
const JITTER_SPREAD = 0.02;

// mulberry32: small seeded generator so the same playlist always draws the same plot.
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Normally distributed horizontal offsets (Box-Muller), in units of box widths. */
export function jitterOffsets(count: number, seed = 1): number[] {
  const random = seededRandom(seed);
  return Array.from({ length: count }, () => {
    const u = 1 - random();
    const v = random();
    return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v) * JITTER_SPREAD;
  });
}

export function buildBoxPlotSvg(chart: BoxPlot): string {
  const { width, height, summary, values } = chart;
  const plotWidth = width - MARGIN.left - MARGIN.right;
  const plotHeight = height - MARGIN.top - MARGIN.bottom;
  const centerX = MARGIN.left + plotWidth / 2;
  const boxWidth = plotWidth * 0.3;

  const body: string[] = [text(width / 2, 28, chart.title, 'font-size="16" text-anchor="middle"')];
  body.push(
    text(20, MARGIN.top + plotHeight / 2, chart.yLabel, `font-size="13" text-anchor="middle" transform="rotate(-90 20 ${(MARGIN.top + plotHeight / 2).toFixed(1)})"`),
  );

  if (!summary) {
    body.push(`<rect x="${MARGIN.left}" y="${MARGIN.top}" width="${plotWidth}" height="${plotHeight}" fill="none" stroke="#000000"/>`);
    return svgDocument(width, height, body);
  }

  const ticks = niceTicks(summary.min, summary.max);
  const low = Math.min(summary.min, ticks[0]);
  const high = Math.max(summary.max, ticks[ticks.length - 1]);
  const padding = high === low ? 1 : (high - low) * 0.05;
  const yMin = low - padding;
  const yMax = high + padding;
  const scaleY = (value: number): number => MARGIN.top + plotHeight - ((value - yMin) / (yMax - yMin)) * plotHeight;
  const line = (x1: number, y1: number, x2: number, y2: number, stroke = '#000000'): string =>
    `<line x1="${x1.toFixed(1)}" y1="${y1.toFixed(1)}" x2="${x2.toFixed(1)}" y2="${y2.toFixed(1)}" stroke="${stroke}"/>`;

  for (const tick of ticks) {
    const y = scaleY(tick);
    body.push(line(MARGIN.left, y, MARGIN.left + plotWidth, y, '#dddddd'));
    body.push(text(MARGIN.left - 8, y + 4, formatNumber(tick), 'font-size="11" text-anchor="end"'));
  }

  const q1Y = scaleY(summary.q1);
  const q3Y = scaleY(summary.q3);
  const capHalf = boxWidth / 4;
  body.push(
    `<rect class="box" x="${(centerX - boxWidth / 2).toFixed(1)}" y="${q3Y.toFixed(1)}" width="${boxWidth.toFixed(1)}" height="${(q1Y - q3Y).toFixed(1)}" fill="none" stroke="#000000"/>`,
    `<line class="median" x1="${(centerX - boxWidth / 2).toFixed(1)}" y1="${scaleY(summary.median).toFixed(1)}" x2="${(centerX + boxWidth / 2).toFixed(1)}" y2="${scaleY(summary.median).toFixed(1)}" stroke="#ff7f0e" stroke-width="2"/>`,
    line(centerX, q3Y, centerX, scaleY(summary.upperWhisker)),
    line(centerX, q1Y, centerX, scaleY(summary.lowerWhisker)),
    line(centerX - capHalf, scaleY(summary.upperWhisker), centerX + capHalf, scaleY(summary.upperWhisker)),
    line(centerX - capHalf, scaleY(summary.lowerWhisker), centerX + capHalf, scaleY(summary.lowerWhisker)),
  );

  for (const outlier of summary.outliers) {
    body.push(`<circle class="outlier" cx="${centerX.toFixed(1)}" cy="${scaleY(outlier).toFixed(1)}" r="4" fill="none" stroke="#000000"/>`);
  }

  const offsets = jitterOffsets(values.length);
  values.forEach((value, index) => {
    const x = centerX + offsets[index] * (boxWidth / 0.5);
    body.push(`<circle class="point" cx="${x.toFixed(1)}" cy="${scaleY(value).toFixed(1)}" r="2" fill="#0000ff" fill-opacity="0.2"/>`);
  });

  body.push(
    line(MARGIN.left, MARGIN.top, MARGIN.left, MARGIN.top + plotHeight),
    line(MARGIN.left, MARGIN.top + plotHeight, MARGIN.left + plotWidth, MARGIN.top + plotHeight),
  );

  return svgDocument(width, height, body);
}

