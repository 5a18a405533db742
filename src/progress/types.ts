import { z } from "zod";

export const harvestPassSchema = z.object({
  label: z.string(),
  query: z.string(),
  estimate: z.number().int().nonnegative().nullable(),
});

export const harvestPlanSchema = z.object({
  rows: z.number().int().positive(),
  sort: z.string(),
  compression: z.enum(["none", "gzip"]),
  passes: z.array(harvestPassSchema).min(1),
});

export const harvestProgressSchema = z.object({
  version: z.literal(1),
  nextOffset: z.number().int().nonnegative(),
  cumulativeBytes: z.number().int().nonnegative(),
  knownTotal: z.number().int().nonnegative().nullable(),
  passIndex: z.number().int().nonnegative(),
  passRecords: z.number().int().nonnegative(),
  recordsWritten: z.number().int().nonnegative(),
  artifactBytes: z.number().int().nonnegative(),
  plan: harvestPlanSchema,
  updatedAt: z.string(),
});

/** One paginated query within a harvest; a plain harvest has exactly one. */
export type HarvestPass = z.infer<typeof harvestPassSchema>;
export type HarvestPlan = z.infer<typeof harvestPlanSchema>;

/**
 * Position of a harvest. `nextOffset` and `knownTotal` refer to the pass at `passIndex`;
 * `recordsWritten` and `artifactBytes` describe the whole in-progress artifact.
 */
export type HarvestProgress = z.infer<typeof harvestProgressSchema>;
