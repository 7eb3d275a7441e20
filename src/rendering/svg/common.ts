export const FONT_FAMILY = 'DejaVu Sans, Helvetica, Arial, sans-serif';

export const PALETTE = ['#440154', '#3b528b', '#21918c', '#5ec962', '#b8de29', '#31688e', '#35b779', '#6ece58', '#482878', '#1f9e89'];

export const BAR_COLOR = '#1f77b4';

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(1);
}

/** Evenly spaced "round" tick values covering [min, max]. */
export function niceTicks(min: number, max: number, target = 5): number[] {
  if (max <= min) {
    return [min];
  }
  const rough = (max - min) / target;
  const magnitude = 10 ** Math.floor(Math.log10(rough));
  const residual = rough / magnitude;
  const step = (residual > 5 ? 10 : residual > 2 ? 5 : residual > 1 ? 2 : 1) * magnitude;

  const ticks: number[] = [];
  for (let value = Math.ceil(min / step) * step; value <= max + step * 1e-9; value += step) {
    ticks.push(Number(value.toPrecision(12)));
  }
  return ticks;
}

export function text(x: number, y: number, content: string, attributes = ''): string {
  return `<text x="${x.toFixed(1)}" y="${y.toFixed(1)}" font-family="${FONT_FAMILY}" ${attributes}>${escapeXml(content)}</text>`;
}

export function svgDocument(width: number, height: number, body: string[], background = '#ffffff'): string {
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect x="0" y="0" width="${width}" height="${height}" fill="${background}"/>`,
    ...body,
    '</svg>',
  ].join('\n');
}
