import { INVALID_YEAR, StatsAccumulator, UNKNOWN_SERIES } from "./accumulator";
import { AgencyReport, SeriesReport, StatsReport, YearHistogram } from "./types";

export interface ReportOptions {
  includeAgencies: boolean;
}

function seriesSortKey(seriesId: string): number {
  return /^\d+$/.test(seriesId) ? Number.parseInt(seriesId, 10) : Number.POSITIVE_INFINITY;
}

function agencySortKey(agencyId: string): number {
  const match = /VA(\d+)/.exec(agencyId);
  return match ? Number.parseInt(match[1], 10) : Number.POSITIVE_INFINITY;
}

function byKey<T>(key: (value: T) => number): (a: T, b: T) => number {
  return (a, b) => {
    const left = key(a);
    const right = key(b);
    if (left === right) {
      return 0;
    }
    return left < right ? -1 : 1;
  };
}

function histogramObject(histogram: YearHistogram): Record<string, number> {
  const result: Record<string, number> = {};
  const keys = [...histogram.keys()].sort((a, b) => {
    if (a === INVALID_YEAR || b === INVALID_YEAR) {
      return a === b ? 0 : a === INVALID_YEAR ? 1 : -1;
    }
    return a < b ? -1 : a > b ? 1 : 0;
  });
  for (const key of keys) {
    result[key] = histogram.get(key) ?? 0;
  }
  return result;
}

function mergeInto(target: YearHistogram, source: YearHistogram): void {
  for (const [year, count] of source) {
    target.set(year, (target.get(year) ?? 0) + count);
  }
}

/**
 * Second pass over a finished accumulator.
 *
 * An agency's figures are its own counts plus the full counts of every series linked to it, so
 * activity in a series shared by several agencies appears under each of them.
 */
export function buildReport(acc: StatsAccumulator, options: ReportOptions): StatsReport {
  const categories: Record<string, number> = {};
  for (const name of [...acc.categories.keys()].sort()) {
    categories[name] = acc.categories.get(name) ?? 0;
  }

  const series: SeriesReport[] = [...acc.series.entries()]
    .filter(([seriesId]) => seriesId !== UNKNOWN_SERIES)
    .sort(byKey(([seriesId]) => seriesSortKey(seriesId)))
    .map(([seriesId, stats]) => ({
      id: seriesId,
      title: stats.title,
      agencies: [...stats.agencies].sort(byKey(agencySortKey)),
      consignments: stats.consignments,
      iiif_manifests: stats.iiif_manifests,
      images: stats.images,
      items: stats.items,
      related_entities: stats.related_entities,
      units: stats.units,
      years: histogramObject(stats.years),
    }));

  const report: StatsReport = {
    overall: {
      categories,
      iiif_manifests: acc.iiifManifests,
      objects: acc.objects,
      units: acc.units,
      years: histogramObject(acc.years),
    },
    series,
  };

  if (options.includeAgencies) {
    report.agencies = [...acc.agencies.entries()]
      .sort(byKey(([agencyId]) => agencySortKey(agencyId)))
      .map(([agencyId, own]): AgencyReport => {
        const totals = {
          consignments: own.consignments,
          iiif_manifests: own.iiif_manifests,
          images: own.images,
          items: own.items,
          units: own.units,
        };
        const years: YearHistogram = new Map(own.years);
        for (const seriesId of own.series) {
          const linked = acc.series.get(seriesId);
          if (!linked) {
            continue;
          }
          totals.consignments += linked.consignments;
          totals.iiif_manifests += linked.iiif_manifests;
          totals.images += linked.images;
          totals.items += linked.items;
          totals.units += linked.units;
          mergeInto(years, linked.years);
        }
        return {
          id: agencyId,
          title: own.title,
          ...totals,
          series: [...own.series].sort(byKey(seriesSortKey)),
          years: histogramObject(years),
        };
      });
  }

  return report;
}

/** Deep copy with every object's keys in sorted order. */
export function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((entry: unknown) => sortKeysDeep(entry));
  }
  if (value !== null && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, entry] of entries) {
      sorted[key] = sortKeysDeep(entry);
    }
    return sorted;
  }
  return value;
}

export function renderReport(report: StatsReport): string {
  return JSON.stringify(sortKeysDeep(report), null, 2);
}
