import type { BarChart } from '../ChartRenderer';
import { BAR_COLOR, formatNumber, niceTicks, svgDocument, text } from './common';

const MARGIN = { top: 50, right: 30, bottom: 90, left: 70 };

export function buildBarChartSvg(chart: BarChart): string {
  const { width, height, bars } = chart;
  const plotWidth = width - MARGIN.left - MARGIN.right;
  const plotHeight = height - MARGIN.top - MARGIN.bottom;
  const maxValue = Math.max(1, ...bars.map((bar) => bar.value));
  const ticks = niceTicks(0, maxValue);
  const yMax = Math.max(maxValue, ticks[ticks.length - 1]);
  const scaleY = (value: number): number => MARGIN.top + plotHeight - (value / yMax) * plotHeight;

  const body: string[] = [];

  for (const tick of ticks) {
    const y = scaleY(tick);
    body.push(`<line x1="${MARGIN.left}" y1="${y.toFixed(1)}" x2="${MARGIN.left + plotWidth}" y2="${y.toFixed(1)}" stroke="#dddddd"/>`);
    body.push(text(MARGIN.left - 8, y + 4, formatNumber(tick), 'font-size="11" text-anchor="end"'));
  }

  const slot = bars.length ? plotWidth / bars.length : plotWidth;
  const barWidth = slot * 0.8;
  const labelSize = chart.rotateLabels ? 8 : 11;

  bars.forEach((bar, index) => {
    const x = MARGIN.left + index * slot + (slot - barWidth) / 2;
    const y = scaleY(bar.value);
    const barHeight = MARGIN.top + plotHeight - y;
    body.push(
      `<rect class="bar" x="${x.toFixed(1)}" y="${y.toFixed(1)}" width="${barWidth.toFixed(1)}" height="${barHeight.toFixed(1)}" fill="${BAR_COLOR}"/>`,
    );
    const labelX = x + barWidth / 2;
    const labelY = MARGIN.top + plotHeight + 14;
    const anchor = chart.rotateLabels
      ? `font-size="${labelSize}" text-anchor="end" transform="rotate(-45 ${labelX.toFixed(1)} ${labelY.toFixed(1)})"`
      : `font-size="${labelSize}" text-anchor="middle"`;
    body.push(text(labelX, labelY, bar.label, anchor));
  });

  body.push(
    `<line x1="${MARGIN.left}" y1="${MARGIN.top + plotHeight}" x2="${MARGIN.left + plotWidth}" y2="${MARGIN.top + plotHeight}" stroke="#000000"/>`,
    `<line x1="${MARGIN.left}" y1="${MARGIN.top}" x2="${MARGIN.left}" y2="${MARGIN.top + plotHeight}" stroke="#000000"/>`,
    text(width / 2, 28, chart.title, 'font-size="16" text-anchor="middle"'),
    text(width / 2, height - 12, chart.xLabel, 'font-size="13" text-anchor="middle"'),
    text(18, MARGIN.top + plotHeight / 2, chart.yLabel, `font-size="13" text-anchor="middle" transform="rotate(-90 18 ${(MARGIN.top + plotHeight / 2).toFixed(1)})"`),
  );

  return svgDocument(width, height, body);
}
