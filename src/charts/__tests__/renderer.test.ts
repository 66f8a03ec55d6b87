/**
 * Chart aggregation and rendering tests
 */

import fs from 'fs';
import path from 'path';

import { render, writeChartArtifacts, type ChartArtifact } from '../renderer';
import { ArticleStats, hourLabel, tokenize } from '../aggregations';
import { RenderError } from '../../types/errors';
import { makeRecord, makeTempDir } from '../../__tests__/helpers';

function chart(artifacts: ChartArtifact[], name: string): ChartArtifact {
  const found = artifacts.find(artifact => artifact.name === name);
  if (!found) {
    throw new Error(`Missing chart ${name}`);
  }
  return found;
}

const records = [
  makeRecord({
    id: 'A',
    title: 'Budget update',
    organization: 'HM Treasury',
    body: 'Budget budget timetable',
    published_at: new Date('2024-01-01T09:30:00Z'),
  }),
  makeRecord({
    id: 'B',
    title: 'Health notice',
    organization: null,
    body: 'Winter vaccination guidance',
    published_at: new Date('2024-01-02T14:15:00Z'),
  }),
];

describe('render', () => {
  it('produces every chart', () => {
    expect(render(records).map(artifact => artifact.name)).toEqual([
      'articles-by-organisation',
      'daily-releases',
      'daily-releases-by-organisation',
      'hourly-releases',
      'top-words',
    ]);
  });

  it('counts records without an organisation under "unknown"', () => {
    const byOrganisation = chart(render(records), 'articles-by-organisation');

    expect(byOrganisation.series[0].points).toEqual([
      { label: 'HM Treasury', value: 1 },
      { label: 'unknown', value: 1 },
    ]);
    expect(byOrganisation.svg).toContain('>unknown</text>');
    expect(byOrganisation.svg).toContain('<title>unknown: 1</title>');
  });

  it('sorts organisations by count, then name', () => {
    const byOrganisation = chart(
      render([
        makeRecord({ id: '1', organization: 'Cabinet Office' }),
        makeRecord({ id: '2', organization: 'Home Office' }),
        makeRecord({ id: '3', organization: 'Home Office' }),
        makeRecord({ id: '4', organization: 'Cabinet Office' }),
        makeRecord({ id: '5', organization: 'Home Office' }),
        makeRecord({ id: '6', organization: 'Ministry of Defence' }),
      ]),
      'articles-by-organisation'
    );

    expect(byOrganisation.series[0].points).toEqual([
      { label: 'Home Office', value: 3 },
      { label: 'Cabinet Office', value: 2 },
      { label: 'Ministry of Defence', value: 1 },
    ]);
  });

  it('buckets releases by UTC day', () => {
    expect(chart(render(records), 'daily-releases').series).toEqual([
      {
        name: 'releases',
        points: [
          { label: '2024-01-01', value: 1 },
          { label: '2024-01-02', value: 1 },
        ],
      },
    ]);
  });

  it('zero-fills the per-organisation daily series', () => {
    expect(chart(render(records), 'daily-releases-by-organisation').series).toEqual([
      {
        name: 'HM Treasury',
        points: [
          { label: '2024-01-01', value: 1 },
          { label: '2024-01-02', value: 0 },
        ],
      },
      {
        name: 'unknown',
        points: [
          { label: '2024-01-01', value: 0 },
          { label: '2024-01-02', value: 1 },
        ],
      },
    ]);
  });

  it('covers all 24 hours', () => {
    const points = chart(render(records), 'hourly-releases').series[0].points;

    expect(points).toHaveLength(24);
    expect(points[0]).toEqual({ label: '00:00 - 01:00', value: 0 });
    expect(points[9]).toEqual({ label: '09:00 - 10:00', value: 1 });
    expect(points[14]).toEqual({ label: '14:00 - 15:00', value: 1 });
    expect(points[23]).toEqual({ label: '23:00 - 00:00', value: 0 });
  });

  it('ranks body words and honours the limit', () => {
    const topWords = chart(render(records, { topWords: 2 }), 'top-words');

    expect(topWords.series[0].points).toEqual([
      { label: 'budget', value: 2 },
      { label: 'guidance', value: 1 },
    ]);
  });

  it('consumes a lazy sequence once', () => {
    function* sequence() {
      yield* records;
    }

    const byOrganisation = chart(render(sequence()), 'articles-by-organisation');
    expect(byOrganisation.series[0].points).toHaveLength(2);
  });

  it('renders placeholder charts when there are no records', () => {
    const artifacts = render([]);

    expect(chart(artifacts, 'articles-by-organisation').series[0].points).toEqual([]);
    expect(chart(artifacts, 'daily-releases').svg).toContain('>No data</text>');
  });

  it('escapes organisation names in the SVG', () => {
    const byOrganisation = chart(
      render([makeRecord({ organization: 'Department for Science, Innovation & Technology' })]),
      'articles-by-organisation'
    );

    expect(byOrganisation.svg).toContain('>Department for Science, Innovation &amp; Technology</text>');
  });
});

describe('aggregation helpers', () => {
  it('formats hour ranges', () => {
    expect(hourLabel(7)).toBe('07:00 - 08:00');
    expect(hourLabel(23)).toBe('23:00 - 00:00');
  });

  it('drops stop words, short words and numbers', () => {
    expect(tokenize('The NHS will publish 2024 guidance on it')).toEqual(['nhs', 'publish', 'guidance']);
  });

  it('tracks the record count', () => {
    const stats = new ArticleStats();
    records.forEach(record => stats.add(record));
    expect(stats.count).toBe(2);
  });
});

describe('writeChartArtifacts', () => {
  it('writes one SVG file per chart', () => {
    const dir = path.join(makeTempDir(), 'charts');

    const files = writeChartArtifacts(render(records), dir, 'svg');

    expect(files.map(file => path.basename(file))).toEqual([
      'articles-by-organisation.svg',
      'daily-releases.svg',
      'daily-releases-by-organisation.svg',
      'hourly-releases.svg',
      'top-words.svg',
    ]);
    expect(fs.readFileSync(files[0], 'utf-8').startsWith('<svg xmlns="http://www.w3.org/2000/svg"')).toBe(true);
  });

  it('writes the series data as JSON', () => {
    const dir = makeTempDir();

    const files = writeChartArtifacts(render(records), dir, 'json');
    const written = JSON.parse(fs.readFileSync(path.join(dir, 'articles-by-organisation.json'), 'utf-8'));

    expect(files).toHaveLength(5);
    expect(written).toEqual({
      name: 'articles-by-organisation',
      title: 'Number of Articles per Organisation',
      kind: 'bar',
      series: [
        {
          name: 'articles',
          points: [
            { label: 'HM Treasury', value: 1 },
            { label: 'unknown', value: 1 },
          ],
        },
      ],
    });
  });

  it('raises RenderError when the output location is unusable', () => {
    const dir = makeTempDir();
    const occupied = path.join(dir, 'charts');
    fs.writeFileSync(occupied, 'not a directory');

    expect(() => writeChartArtifacts(render(records), occupied, 'svg')).toThrow(RenderError);
  });
});
