/**
 * SVG chart drawing.
 * Charts are built as DOM trees with jsdom and serialized, so text content is escaped by the serializer.
 */

import { JSDOM } from 'jsdom';
import type { ChartSeries, CountPoint } from './aggregations';

const SVG_NS = 'http://www.w3.org/2000/svg';

const WIDTH = 960;
const HEIGHT = 520;
const MARGIN = { top: 60, right: 180, bottom: 140, left: 70 };
const PLOT_WIDTH = WIDTH - MARGIN.left - MARGIN.right;
const PLOT_HEIGHT = HEIGHT - MARGIN.top - MARGIN.bottom;
const BAR_GAP = 0.1;
const Y_TICKS = 5;

// Pastel qualitative palette
export const PALETTE = [
  '#66C5CC', '#F6CF71', '#F89C74', '#DCB0F2', '#87C55F', '#9EB9F3',
  '#FE88B1', '#C9DB74', '#8BE0A4', '#B497E7', '#D3B484', '#B3B3B3',
];

export interface BarChartInput {
  title: string;
  xLabel: string;
  yLabel: string;
  points: CountPoint[];
}

export interface LineChartInput {
  title: string;
  xLabel: string;
  yLabel: string;
  series: ChartSeries[];
}

type Attributes = Record<string, string | number>;

function fmt(value: number): string {
  return String(Math.round(value * 100) / 100);
}

class SvgCanvas {
  private readonly document: Document;
  readonly root: SVGSVGElement;

  constructor(title: string) {
    this.document = new JSDOM('<!DOCTYPE html><body></body>').window.document;
    this.root = this.document.createElementNS(SVG_NS, 'svg');
    this.root.setAttribute('xmlns', SVG_NS);
    this.root.setAttribute('width', String(WIDTH));
    this.root.setAttribute('height', String(HEIGHT));
    this.root.setAttribute('viewBox', `0 0 ${WIDTH} ${HEIGHT}`);
    this.root.setAttribute('font-family', 'Helvetica, Arial, sans-serif');

    this.add('rect', { x: 0, y: 0, width: WIDTH, height: HEIGHT, fill: '#ffffff' });
    this.text(title, { x: WIDTH / 2, y: MARGIN.top / 2, 'text-anchor': 'middle', 'font-size': 18 });
  }

  add(tag: string, attributes: Attributes, parent: Element = this.root): Element {
    const element = this.document.createElementNS(SVG_NS, tag);
    for (const [name, value] of Object.entries(attributes)) {
      element.setAttribute(name, typeof value === 'number' ? fmt(value) : value);
    }
    parent.appendChild(element);
    return element;
  }

  text(content: string, attributes: Attributes, parent: Element = this.root): Element {
    const element = this.add('text', attributes, parent);
    element.textContent = content;
    return element;
  }

  tooltip(content: string, parent: Element) {
    const element = this.document.createElementNS(SVG_NS, 'title');
    element.textContent = content;
    parent.appendChild(element);
  }

  serialize(): string {
    return this.root.outerHTML;
  }
}

function niceMax(value: number): number {
  if (value <= Y_TICKS) return Math.max(value, 1);
  const step = Math.ceil(value / Y_TICKS);
  return step * Y_TICKS;
}

function drawAxes(canvas: SvgCanvas, maxValue: number, xLabel: string, yLabel: string) {
  const x0 = MARGIN.left;
  const y0 = MARGIN.top + PLOT_HEIGHT;
  const axis = { stroke: '#444444', 'stroke-width': 1 };

  canvas.add('line', { x1: x0, y1: MARGIN.top, x2: x0, y2: y0, ...axis });
  canvas.add('line', { x1: x0, y1: y0, x2: x0 + PLOT_WIDTH, y2: y0, ...axis });

  const ticks = Math.min(Y_TICKS, maxValue);
  for (let i = 0; i <= ticks; i++) {
    const value = (maxValue / ticks) * i;
    const y = y0 - (value / maxValue) * PLOT_HEIGHT;
    canvas.add('line', { x1: x0, y1: y, x2: x0 + PLOT_WIDTH, y2: y, stroke: '#e5e5e5', 'stroke-width': 1 });
    canvas.text(fmt(value), { x: x0 - 8, y: y + 4, 'text-anchor': 'end', 'font-size': 11 });
  }

  canvas.text(xLabel, { x: x0 + PLOT_WIDTH / 2, y: HEIGHT - 12, 'text-anchor': 'middle', 'font-size': 13 });
  canvas.text(yLabel, {
    x: 18,
    y: MARGIN.top + PLOT_HEIGHT / 2,
    'text-anchor': 'middle',
    'font-size': 13,
    transform: `rotate(-90 18 ${fmt(MARGIN.top + PLOT_HEIGHT / 2)})`,
  });
}

function drawCategoryLabel(canvas: SvgCanvas, label: string, x: number) {
  const y = MARGIN.top + PLOT_HEIGHT + 14;
  canvas.text(label, {
    x,
    y,
    'text-anchor': 'end',
    'font-size': 11,
    transform: `rotate(-45 ${fmt(x)} ${fmt(y)})`,
  });
}

function drawEmpty(canvas: SvgCanvas) {
  canvas.text('No data', {
    x: MARGIN.left + PLOT_WIDTH / 2,
    y: MARGIN.top + PLOT_HEIGHT / 2,
    'text-anchor': 'middle',
    'font-size': 14,
    fill: '#888888',
  });
}

export function renderBarChart(chart: BarChartInput): string {
  const canvas = new SvgCanvas(chart.title);
  if (chart.points.length === 0) {
    drawEmpty(canvas);
    return canvas.serialize();
  }

  const maxValue = niceMax(Math.max(...chart.points.map(point => point.value)));
  drawAxes(canvas, maxValue, chart.xLabel, chart.yLabel);

  const band = PLOT_WIDTH / chart.points.length;
  const barWidth = band * (1 - BAR_GAP);
  const baseline = MARGIN.top + PLOT_HEIGHT;

  chart.points.forEach((point, index) => {
    const height = (point.value / maxValue) * PLOT_HEIGHT;
    const x = MARGIN.left + index * band + (band - barWidth) / 2;
    const bar = canvas.add('rect', {
      x,
      y: baseline - height,
      width: barWidth,
      height,
      fill: PALETTE[index % PALETTE.length],
    });
    canvas.tooltip(`${point.label}: ${point.value}`, bar);
    drawCategoryLabel(canvas, point.label, x + barWidth / 2);
  });

  return canvas.serialize();
}

export function renderLineChart(chart: LineChartInput): string {
  const canvas = new SvgCanvas(chart.title);
  const labels = chart.series[0]?.points.map(point => point.label) ?? [];
  if (labels.length === 0) {
    drawEmpty(canvas);
    return canvas.serialize();
  }

  const allValues = chart.series.flatMap(series => series.points.map(point => point.value));
  const maxValue = niceMax(Math.max(...allValues));
  drawAxes(canvas, maxValue, chart.xLabel, chart.yLabel);

  const step = labels.length > 1 ? PLOT_WIDTH / (labels.length - 1) : 0;
  const xAt = (index: number) => (labels.length > 1 ? MARGIN.left + index * step : MARGIN.left + PLOT_WIDTH / 2);
  const yAt = (value: number) => MARGIN.top + PLOT_HEIGHT - (value / maxValue) * PLOT_HEIGHT;

  labels.forEach((label, index) => drawCategoryLabel(canvas, label, xAt(index)));

  chart.series.forEach((series, seriesIndex) => {
    const colour = PALETTE[seriesIndex % PALETTE.length];
    const coordinates = series.points.map((point, index) => `${fmt(xAt(index))},${fmt(yAt(point.value))}`);
    canvas.add('polyline', {
      points: coordinates.join(' '),
      fill: 'none',
      stroke: colour,
      'stroke-width': 2,
    });
    series.points.forEach((point, index) => {
      canvas.add('circle', { cx: xAt(index), cy: yAt(point.value), r: 3, fill: colour });
    });

    if (chart.series.length > 1) {
      const legendY = MARGIN.top + seriesIndex * 18;
      const legendX = MARGIN.left + PLOT_WIDTH + 16;
      canvas.add('rect', { x: legendX, y: legendY - 9, width: 10, height: 10, fill: colour });
      canvas.text(series.name, { x: legendX + 16, y: legendY, 'font-size': 11 });
    }
  });

  return canvas.serialize();
}
