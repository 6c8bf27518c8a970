import type { ChartOptions } from './config';
import { chartDefaults } from './config';
import type { CustomSet } from './set';
import type { Painting } from './utils';
import { findValidYear } from './utils';

export type Slice = {
  label: string,
  count: number,
  percentage: number,
  color: string
};

export type Bar = {
  label: string,
  start: number,
  end: number,
  count: number,
  color: string
};

export type Histogram = {
  interval: number,
  bars: Bar[]
};

export const countBy = <T>(set: CustomSet<T>, key: (element: T) => string) => {
  const counts = new Map<string, number>();
  for (const element of set) {
    const k = key(element);
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  return counts;
}

const byCountThenNameDescending = ([nameA, countA]: [string, number], [nameB, countB]: [string, number]) => {
  if (countA !== countB) {
    return countB - countA;
  }
  if (nameA === nameB) {
    return 0;
  }
  return nameA < nameB ? 1 : -1;
}

/**
 * Share of the catalogue per school. The largest schools get a palette
 * colour each; schools past the palette or at or below
 * `minSlicePercentage` are summed into a single trailing "other" slice.
 */
export const schoolShares = (catalogue: CustomSet<Painting>, options: Partial<ChartOptions> = {}): Slice[] => {
  const { palette, otherColor, otherLabel, minSlicePercentage } = { ...chartDefaults, ...options };
  const total = catalogue.count;
  if (total === 0) {
    return [];
  }
  const schools = [...countBy(catalogue, (painting) => painting.school)].sort(byCountThenNameDescending);
  const distinctSlices = Math.min(palette.length, schools.length);

  const slices: Slice[] = [];
  let otherCount = 0;
  schools.forEach(([school, count], i) => {
    const percentage = 100 * count / total;
    if (i < distinctSlices && percentage > minSlicePercentage) {
      slices.push({ label: school, count, percentage, color: palette[i] });
    } else {
      otherCount += count;
    }
  });
  if (otherCount > 0) {
    slices.push({ label: otherLabel, count: otherCount, percentage: 100 * otherCount / total, color: otherColor });
  }
  return slices;
}

/**
 * Paintings per span of years. The span starts at `initialInterval` and
 * widens until the number of spans between the oldest and newest dated
 * painting fits the palette. With an empty palette every bar takes
 * `otherColor`.
 */
export const datingHistogram = (catalogue: CustomSet<Painting>, options: Partial<ChartOptions> = {}): Histogram => {
  const { palette, otherColor, initialInterval, intervalGrowth, earliestYear, latestYear } = { ...chartDefaults, ...options };
  const logger = catalogue.options.logger ?? console;
  const years: number[] = [];
  for (const painting of catalogue) {
    const year = findValidYear(painting.date, earliestYear, latestYear);
    if (year === 0) {
      logger.warn(`No valid year in "${painting.date}" for ${painting.subject}`);
    } else {
      years.push(year);
    }
  }

  let interval = initialInterval;
  if (years.length === 0) {
    return { interval, bars: [] };
  }
  const minYear = years.reduce((a, b) => Math.min(a, b));
  const maxYear = years.reduce((a, b) => Math.max(a, b));
  const maxGroups = Math.max(1, palette.length);
  const groupsFor = (span: number) => Math.floor((maxYear - minYear) / span) + 1;
  while (groupsFor(interval) > maxGroups) {
    interval = Math.max(interval + 1, Math.trunc(interval * intervalGrowth));
  }

  const counts = new Map<number, number>();
  for (const year of years) {
    const start = minYear + Math.floor((year - minYear) / interval) * interval;
    counts.set(start, (counts.get(start) ?? 0) + 1);
  }
  const bars = [...counts]
    .sort(([a], [b]) => a - b)
    .map(([start, count], i): Bar => {
      const end = start + interval - 1;
      return { label: `${start}-${end}`, start, end, count, color: i < palette.length ? palette[i] : otherColor };
    });
  return { interval, bars };
}
