/**
 * One-pass counters behind the charts.
 * All time buckets are UTC.
 */

import stopwords from './stopwords.json';
import type { ArticleRecord } from '../types/article';

export const UNKNOWN_ORGANISATION = 'unknown';

export interface CountPoint {
  label: string;
  value: number;
}

export interface ChartSeries {
  name: string;
  points: CountPoint[];
}

const STOPWORDS = new Set<string>(stopwords);
const MIN_WORD_LENGTH = 3;

export function organisationLabel(organization: string | null): string {
  return organization ?? UNKNOWN_ORGANISATION;
}

export function dayBucket(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function hourLabel(hour: number): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return `${pad(hour)}:00 - ${pad((hour + 1) % 24)}:00`;
}

export function tokenize(text: string): string[] {
  const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
  return words.filter(word => word.length >= MIN_WORD_LENGTH && !STOPWORDS.has(word));
}

function increment(counts: Map<string, number>, key: string, by = 1) {
  counts.set(key, (counts.get(key) ?? 0) + by);
}

function compareLabels(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

// Highest count first, then label order
function byCountDescending(counts: Map<string, number>): CountPoint[] {
  return [...counts.entries()]
    .map(([label, value]) => ({ label, value }))
    .sort((a, b) => b.value - a.value || compareLabels(a.label, b.label));
}

export class ArticleStats {
  private total = 0;
  private readonly organisations = new Map<string, number>();
  private readonly days = new Map<string, number>();
  private readonly dayOrganisations = new Map<string, Map<string, number>>();
  private readonly hours: number[] = new Array<number>(24).fill(0);
  private readonly words = new Map<string, number>();

  add(record: ArticleRecord) {
    const organisation = organisationLabel(record.organization);
    const day = dayBucket(record.published_at);

    this.total += 1;
    increment(this.organisations, organisation);
    increment(this.days, day);

    let perDay = this.dayOrganisations.get(organisation);
    if (!perDay) {
      perDay = new Map();
      this.dayOrganisations.set(organisation, perDay);
    }
    increment(perDay, day);

    this.hours[record.published_at.getUTCHours()] += 1;

    for (const word of tokenize(record.body)) {
      increment(this.words, word);
    }
  }

  get count(): number {
    return this.total;
  }

  byOrganisation(): CountPoint[] {
    return byCountDescending(this.organisations);
  }

  private sortedDays(): string[] {
    return [...this.days.keys()].sort(compareLabels);
  }

  byDay(): CountPoint[] {
    return this.sortedDays().map(day => ({ label: day, value: this.days.get(day) ?? 0 }));
  }

  // One series per organisation, zero-filled over every day seen
  byDayAndOrganisation(): ChartSeries[] {
    const days = this.sortedDays();
    return [...this.dayOrganisations.keys()].sort(compareLabels).map(name => {
      const perDay = this.dayOrganisations.get(name);
      return {
        name,
        points: days.map(day => ({ label: day, value: perDay?.get(day) ?? 0 })),
      };
    });
  }

  byHour(): CountPoint[] {
    return this.hours.map((value, hour) => ({ label: hourLabel(hour), value }));
  }

  topWords(limit: number): CountPoint[] {
    return byCountDescending(this.words).slice(0, limit);
  }
}
