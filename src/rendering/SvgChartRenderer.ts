import fs from 'node:fs/promises';
import path from 'node:path';

import sharp from 'sharp';

import type { Chart, ChartRenderer } from './ChartRenderer';
import { buildBarChartSvg } from './svg/barChart';
import { buildBoxPlotSvg } from './svg/boxPlot';
import { buildVennSvg } from './svg/vennDiagram';
import { buildWordCloudSvg } from './svg/wordCloud';
import { logger } from '../utils/logger';

export interface SvgChartRendererOptions {
  outputDirectory: string;
  /** Rasterisation density in DPI; 72 keeps the SVG's own pixel size. */
  density: number;
}

export function buildChartSvg(chart: Chart): string {
  switch (chart.type) {
    case 'bar':
      return buildBarChartSvg(chart);
    case 'box':
      return buildBoxPlotSvg(chart);
    case 'venn':
      return buildVennSvg(chart);
    case 'wordCloud':
      return buildWordCloudSvg(chart);
    default: {
      const unknown: never = chart;
      throw new Error(`Unsupported chart: ${JSON.stringify(unknown)}`);
    }
  }
}

export class SvgChartRenderer implements ChartRenderer {
  private readonly outputDirectory: string;

  constructor(private readonly options: SvgChartRendererOptions) {
    this.outputDirectory = path.resolve(options.outputDirectory);
  }

  async render(fileName: string, chart: Chart): Promise<string> {
    const svg = buildChartSvg(chart);
    const outputPath = path.join(this.outputDirectory, fileName);

    await fs.mkdir(this.outputDirectory, { recursive: true });
    await sharp(Buffer.from(svg), { density: this.options.density }).png().toFile(outputPath);

    logger.info({ outputPath, chart: chart.type }, 'Chart written');
    return outputPath;
  }
}
