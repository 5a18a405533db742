import { SeriesBatchSettings } from "../config";
import { SeriesBatch } from "./batches";

/**
 * `<seriesField>:(ids) OR <parentField>:(TAGid ...)`. Series listed in `lowercaseSeries`
 * also match the lowercase tag with and without a space before the number.
 */
export function buildSeriesBatchQuery(
  batch: SeriesBatch,
  settings: SeriesBatchSettings,
  lowercaseSeries: ReadonlySet<number>,
): string {
  const upperTag = settings.seriesTag.toUpperCase();
  const lowerTag = settings.seriesTag.toLowerCase();

  const directTerms = batch.seriesIds.map((id) => String(id));
  const parentTerms: string[] = [];
  for (const id of batch.seriesIds) {
    parentTerms.push(`${upperTag}${id}`);
    if (lowercaseSeries.has(id)) {
      parentTerms.push(`${lowerTag}${id}`, `"${lowerTag} ${id}"`);
    }
  }

  return `${settings.seriesField}:(${directTerms.join(" OR ")}) OR ${settings.parentField}:(${parentTerms.join(" OR ")})`;
}

export function withFilter(query: string, filter: string | undefined): string {
  return filter ? `(${query}) AND ${filter}` : query;
}

export function batchLabel(batch: SeriesBatch): string {
  const first = batch.seriesIds[0];
  const last = batch.seriesIds[batch.seriesIds.length - 1];
  return first === last ? `series ${first}` : `series ${first}-${last}`;
}
