import { SeriesBatchSettings } from "../config";
import { Logger, MetricsRegistry } from "../observability";
import { HarvestPass } from "../progress";
import { ApiClient } from "../transport";
import { SeriesBatch, planSeriesBatches } from "./batches";
import { collectLowercaseSeries, lowercaseScanQuery, parseSeriesFacets } from "./facets";
import { batchLabel, buildSeriesBatchQuery, withFilter } from "./queries";

export interface SeriesPassOptions {
  iiifOnly: boolean;
  seriesFrom?: number;
  seriesTo?: number;
  includeRelated: boolean;
}

export interface PlannerDeps {
  client: ApiClient;
  settings: SeriesBatchSettings;
  rows: number;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface SeriesPassPlan {
  passes: HarvestPass[];
  batches: SeriesBatch[];
}

export function hasSeriesRange(options: SeriesPassOptions): boolean {
  return options.seriesFrom !== undefined || options.seriesTo !== undefined;
}

function inRange(seriesId: number, options: SeriesPassOptions): boolean {
  return (
    (options.seriesFrom === undefined || seriesId >= options.seriesFrom) &&
    (options.seriesTo === undefined || seriesId <= options.seriesTo)
  );
}

/**
 * Orders the passes of a series-batch harvest: functions and agencies first, then one pass per
 * series batch, then related entities unless a series range narrowed the harvest (or the caller
 * asked for them anyway).
 */
export async function planSeriesPasses(
  deps: PlannerDeps,
  options: SeriesPassOptions,
  signal?: AbortSignal,
): Promise<SeriesPassPlan> {
  const { client, settings, logger, metrics } = deps;
  const filter = options.iiifOnly ? settings.iiifFilter : undefined;

  logger.info("planner_facet_query_start", { iiifOnly: options.iiifOnly });
  const facets = await client.fetchFacets(
    { query: filter ?? "*:*", facetFields: [settings.seriesField, settings.parentField] },
    signal,
  );
  const allCounts = parseSeriesFacets(facets.fields, settings, { logger, metrics });
  const counts = new Map([...allCounts].filter(([seriesId]) => inRange(seriesId, options)));
  logger.info("planner_facet_query_complete", { seriesFound: allCounts.size, seriesPlanned: counts.size });
  await client.throttle(facets.headers, signal);

  const scanned = await client.fetchAll(
    { query: lowercaseScanQuery(settings), rows: deps.rows, fields: ["id", settings.parentField] },
    signal,
  );
  const lowercaseSeries = collectLowercaseSeries(scanned, settings);
  logger.info("planner_lowercase_scan_complete", {
    consignmentsScanned: scanned.length,
    seriesNeedingVariants: lowercaseSeries.size,
  });
  await client.cooldown(signal);

  const batches = planSeriesBatches(counts, settings);
  const passes: HarvestPass[] = [{ label: "functions and agencies", query: settings.metaQuery, estimate: null }];
  for (const batch of batches) {
    passes.push({
      label: batchLabel(batch),
      query: withFilter(buildSeriesBatchQuery(batch, settings, lowercaseSeries), filter),
      estimate: batch.estimatedRecords,
    });
  }
  if (options.includeRelated || !hasSeriesRange(options)) {
    passes.push({ label: "related entities", query: settings.relatedQuery, estimate: null });
  }

  logger.info("planner_complete", { batches: batches.length, passes: passes.length });
  return { passes, batches };
}
