import { FieldValue, FlatRecord } from "../artifact";
import { AgencyStats, KindCounts, SeriesStats, YearHistogram } from "./types";

export const UNKNOWN_SERIES = "Unknown";
export const INVALID_YEAR = "Invalid";

const CONSIGNMENT_IDENTIFIER = /^VPRS (\d+)\/P/;
const RELATED_ENTITY_ID = /^VPRS(\d+)\//;

function emptyCounts(): KindCounts {
  return { consignments: 0, iiif_manifests: 0, images: 0, items: 0, related_entities: 0, units: 0 };
}

function asText(value: FieldValue | undefined): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

function asTextList(value: FieldValue | undefined): string[] {
  if (Array.isArray(value)) {
    return value.flatMap((entry) => {
      const text = asText(entry);
      return text === undefined ? [] : [text];
    });
  }
  const single = asText(value);
  return single === undefined ? [] : [single];
}

function increment(histogram: YearHistogram, key: string, by = 1): void {
  histogram.set(key, (histogram.get(key) ?? 0) + by);
}

/** UTC year of a seconds-since-epoch timestamp, or `Invalid` when it is not an integer or out of range. */
export function yearOf(value: FieldValue): string {
  let seconds: number;
  if (typeof value === "number" && Number.isFinite(value)) {
    seconds = Math.trunc(value);
  } else if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    seconds = Number.parseInt(value, 10);
  } else {
    return INVALID_YEAR;
  }

  const year = new Date(seconds * 1000).getUTCFullYear();
  if (!Number.isFinite(year) || year < 1 || year > 9999) {
    return INVALID_YEAR;
  }
  return String(year);
}

export function normaliseAgencyId(identifier: string): string {
  return identifier.replace(/\s+/g, "");
}

/**
 * Folds records into per-category, per-series and per-agency counters. Memory grows with the
 * number of distinct series and agencies, never with the number of records.
 */
export class StatsAccumulator {
  readonly categories = new Map<string, number>();
  readonly years: YearHistogram = new Map();
  readonly series = new Map<string, SeriesStats>();
  readonly agencies = new Map<string, AgencyStats>();
  objects = 0;
  units = 0;
  iiifManifests = 0;

  add(record: FlatRecord): void {
    this.objects += 1;
    const category = asText(record.category) ?? "Unknown";
    this.categories.set(category, (this.categories.get(category) ?? 0) + 1);

    if (category === "Agency") {
      this.addAgencyRecord(record);
      return;
    }

    const seriesId = this.seriesIdOf(category, record);
    const series = this.seriesStats(seriesId);

    if ("timestamp" in record) {
      const year = yearOf(record.timestamp);
      increment(this.years, year);
      if (year !== INVALID_YEAR && category !== "Series") {
        increment(series.years, year);
      }
    }

    switch (category) {
      case "Consignment":
        series.consignments += 1;
        break;
      case "Image":
        series.images += 1;
        break;
      case "Item":
        series.items += 1;
        if (this.isUnit(record)) {
          series.units += 1;
          this.units += 1;
        }
        break;
      case "relatedEntity":
        series.related_entities += 1;
        break;
      case "Series":
        series.title = asText(record.title) ?? "";
        break;
      default:
        break;
    }

    if ("iiif-manifest" in record) {
      series.iiif_manifests += 1;
      this.iiifManifests += 1;
    }

    const agencyIds = asTextList(record["agencies.ids"]);
    const agencyTitles = asTextList(record["agencies.titles"]);
    agencyIds.forEach((agencyId, index) => {
      series.agencies.add(agencyId);
      const agency = this.agencyStats(agencyId);
      if (index < agencyTitles.length) {
        agency.title = agencyTitles[index];
      }
      if (seriesId !== UNKNOWN_SERIES) {
        agency.series.add(seriesId);
      }
    });
  }

  seriesStats(seriesId: string): SeriesStats {
    let stats = this.series.get(seriesId);
    if (!stats) {
      stats = { ...emptyCounts(), title: "", agencies: new Set(), years: new Map() };
      this.series.set(seriesId, stats);
    }
    return stats;
  }

  agencyStats(agencyId: string): AgencyStats {
    let stats = this.agencies.get(agencyId);
    if (!stats) {
      stats = { ...emptyCounts(), title: "", series: new Set(), years: new Map() };
      this.agencies.set(agencyId, stats);
    }
    return stats;
  }

  // Agency records only name their agency; they contribute to the global year histogram but to no series.
  private addAgencyRecord(record: FlatRecord): void {
    const agencyId = normaliseAgencyId(asText(record["identifier.PROV_ACM.id"]) ?? "");
    if (agencyId !== "") {
      this.agencyStats(agencyId).title = asText(record.title) ?? "";
    }
    if ("timestamp" in record) {
      increment(this.years, yearOf(record.timestamp));
    }
  }

  private seriesIdOf(category: string, record: FlatRecord): string {
    if (category === "Consignment") {
      const match = CONSIGNMENT_IDENTIFIER.exec(asText(record["identifier.PROV_ACM.id"]) ?? "");
      return match ? match[1] : UNKNOWN_SERIES;
    }
    if (category === "relatedEntity") {
      const match = RELATED_ENTITY_ID.exec(asText(record._id) ?? "");
      return match ? match[1] : UNKNOWN_SERIES;
    }
    return asText(record.series_id) ?? UNKNOWN_SERIES;
  }

  private isUnit(record: FlatRecord): boolean {
    return asText(record.barcode) === asText(record.box_barcode);
  }
}
