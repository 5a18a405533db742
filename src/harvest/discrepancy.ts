import { SeriesBatchSettings } from "../config";

export type DiscrepancyThreshold = Pick<SeriesBatchSettings, "discrepancyMinRecords" | "discrepancyRatio">;

/** True when `actual` is further from `estimate` than the larger of the absolute and relative allowance. */
export function isDiscrepant(estimate: number, actual: number, threshold: DiscrepancyThreshold): boolean {
  const allowance = Math.max(threshold.discrepancyMinRecords, threshold.discrepancyRatio * estimate);
  return Math.abs(actual - estimate) > allowance;
}
