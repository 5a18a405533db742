import { SeriesBatchSettings } from "../config";
import { JsonRecord } from "../transport";
import { Logger, MetricsRegistry } from "../observability";

export type SeriesCounts = Map<number, number>;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function parentLinkPattern(seriesTag: string): RegExp {
  return new RegExp(`^${escapeRegExp(seriesTag)}\\s?(\\d+)$`, "i");
}

function lowercaseLinkPattern(seriesTag: string): RegExp {
  return new RegExp(`^${escapeRegExp(seriesTag.toLowerCase())}\\s?(\\d+)$`);
}

interface FacetParseContext {
  logger: Logger;
  metrics: MetricsRegistry;
}

function readFacetPairs(
  field: string,
  values: unknown[] | undefined,
  toSeriesId: (value: string) => number | undefined,
  ctx: FacetParseContext,
): SeriesCounts {
  const counts: SeriesCounts = new Map();
  if (!values) {
    ctx.logger.warn("facet_field_missing", { field });
    return counts;
  }

  for (let index = 0; index < values.length; index += 2) {
    const value = values[index];
    const count = values[index + 1];
    const seriesId = typeof value === "string" ? toSeriesId(value.trim()) : undefined;
    if (seriesId === undefined || typeof count !== "number" || !Number.isInteger(count) || count < 0) {
      ctx.metrics.incrementCounter("facet_entries_skipped", 1);
      ctx.logger.warn("facet_entry_skipped", { field, value, count });
      continue;
    }
    counts.set(seriesId, (counts.get(seriesId) ?? 0) + count);
  }
  return counts;
}

/**
 * Per-series record estimates from the direct series facet and the parent-linkage facet.
 * The harvest query ORs both dimensions, so the two counts overlap and are combined by maximum.
 */
export function parseSeriesFacets(
  facetFields: Record<string, unknown[]>,
  settings: SeriesBatchSettings,
  ctx: FacetParseContext,
): SeriesCounts {
  const parentPattern = parentLinkPattern(settings.seriesTag);
  const direct = readFacetPairs(
    settings.seriesField,
    facetFields[settings.seriesField],
    (value) => (/^\d+$/.test(value) ? Number.parseInt(value, 10) : undefined),
    ctx,
  );
  const parent = readFacetPairs(
    settings.parentField,
    facetFields[settings.parentField],
    (value) => {
      const match = parentPattern.exec(value);
      return match ? Number.parseInt(match[1], 10) : undefined;
    },
    ctx,
  );

  const combined: SeriesCounts = new Map(direct);
  for (const [seriesId, count] of parent) {
    combined.set(seriesId, Math.max(combined.get(seriesId) ?? 0, count));
  }
  return combined;
}

/** Series ids referenced through a lowercase parent-linkage tag in the given consignment records. */
export function collectLowercaseSeries(records: readonly JsonRecord[], settings: SeriesBatchSettings): Set<number> {
  const pattern = lowercaseLinkPattern(settings.seriesTag);
  const found = new Set<number>();
  for (const record of records) {
    const raw = record[settings.parentField];
    const values = Array.isArray(raw) ? raw : [raw];
    for (const value of values) {
      if (typeof value !== "string") {
        continue;
      }
      const match = pattern.exec(value.trim());
      if (match) {
        found.add(Number.parseInt(match[1], 10));
      }
    }
  }
  return found;
}

export function lowercaseScanQuery(settings: SeriesBatchSettings): string {
  return `category:Consignment AND ${settings.parentField}:${settings.seriesTag.toLowerCase()}*`;
}
