/**
 * Visualization renderer
 * Turns the stored article sequence into chart artifacts and writes them to disk
 */

import fs from 'fs';
import path from 'path';

import { ArticleStats, type ChartSeries } from './aggregations';
import { renderBarChart, renderLineChart } from './svg';
import { RenderError, describeError } from '../types/errors';
import type { ArticleRecord } from '../types/article';
import type { ChartFormat } from '../config/environment';

export interface ChartArtifact {
  name: string;
  title: string;
  kind: 'bar' | 'line';
  series: ChartSeries[];
  svg: string;
}

export interface RenderOptions {
  topWords?: number;
}

const DEFAULT_TOP_WORDS = 20;

function barChart(name: string, title: string, xLabel: string, yLabel: string, series: ChartSeries): ChartArtifact {
  return {
    name,
    title,
    kind: 'bar',
    series: [series],
    svg: renderBarChart({ title, xLabel, yLabel, points: series.points }),
  };
}

function lineChart(name: string, title: string, xLabel: string, yLabel: string, series: ChartSeries[]): ChartArtifact {
  return {
    name,
    title,
    kind: 'line',
    series,
    svg: renderLineChart({ title, xLabel, yLabel, series }),
  };
}

/**
 * Consume the record sequence once and build every chart.
 * Records without an organisation are counted under "unknown".
 */
export function render(records: Iterable<ArticleRecord>, options: RenderOptions = {}): ChartArtifact[] {
  const stats = new ArticleStats();
  for (const record of records) {
    stats.add(record);
  }

  return [
    barChart(
      'articles-by-organisation',
      'Number of Articles per Organisation',
      'Organisation',
      'Number of Articles',
      { name: 'articles', points: stats.byOrganisation() }
    ),
    lineChart(
      'daily-releases',
      'Total Releases per Day',
      'Date',
      'Number of Releases',
      [{ name: 'releases', points: stats.byDay() }]
    ),
    lineChart(
      'daily-releases-by-organisation',
      'Total Releases per Day by Organisation',
      'Date',
      'Number of Releases',
      stats.byDayAndOrganisation()
    ),
    barChart(
      'hourly-releases',
      'Total Releases by Hour of Day (UTC)',
      'Hour of Day',
      'Number of Releases',
      { name: 'releases', points: stats.byHour() }
    ),
    barChart(
      'top-words',
      'Most Frequent Words in Article Bodies',
      'Word',
      'Occurrences',
      { name: 'occurrences', points: stats.topWords(options.topWords ?? DEFAULT_TOP_WORDS) }
    ),
  ];
}

/**
 * Write one file per artifact and return the paths written.
 * @throws RenderError when the output directory or a file cannot be written
 */
export function writeChartArtifacts(artifacts: ChartArtifact[], outputDir: string, format: ChartFormat): string[] {
  try {
    fs.mkdirSync(outputDir, { recursive: true });
    return artifacts.map(artifact => {
      const filePath = path.join(outputDir, `${artifact.name}.${format}`);
      const contents = format === 'svg'
        ? artifact.svg
        : JSON.stringify({ name: artifact.name, title: artifact.title, kind: artifact.kind, series: artifact.series }, null, 2);
      fs.writeFileSync(filePath, contents, 'utf-8');
      return filePath;
    });
  } catch (error) {
    throw new RenderError(`Cannot write charts to ${outputDir}: ${describeError(error)}`, { cause: error });
  }
}
