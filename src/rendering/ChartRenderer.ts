import type { FiveNumberSummary } from '../services/statistics';

export interface BarDatum {
  label: string;
  value: number;
}

export interface BarChart {
  type: 'bar';
  title: string;
  xLabel: string;
  yLabel: string;
  bars: BarDatum[];
  width: number;
  height: number;
  rotateLabels?: boolean;
}

export interface BoxPlot {
  type: 'box';
  title: string;
  yLabel: string;
  values: number[];
  summary: FiveNumberSummary | null;
  width: number;
  height: number;
}

export interface VennChart {
  type: 'venn';
  title: string;
  labels: [string, string];
  sizeA: number;
  sizeB: number;
  intersection: number;
  width: number;
  height: number;
}

export interface WordWeight {
  word: string;
  count: number;
}

export interface WordCloudChart {
  type: 'wordCloud';
  words: WordWeight[];
  width: number;
  height: number;
  background: string;
}

export type Chart = BarChart | BoxPlot | VennChart | WordCloudChart;

export interface ChartRenderer {
  /** Writes the chart as a PNG named `fileName` and resolves to the written path. */
  render(fileName: string, chart: Chart): Promise<string>;
}
