import { z } from "zod";
import { JsonRecord } from "./types";

const pagePayloadSchema = z.object({
  response: z.object({
    numFound: z.number().int().nonnegative(),
    docs: z.array(z.record(z.unknown())),
  }),
});

const facetPayloadSchema = z.object({
  facet_counts: z.object({
    facet_fields: z.record(z.array(z.unknown())),
  }),
});

export type ParseResult<T> = { ok: true; value: T } | { ok: false; reason: string };

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
}

export function parsePagePayload(payload: unknown): ParseResult<{ docs: JsonRecord[]; numFound: number }> {
  const parsed = pagePayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, reason: describeIssues(parsed.error) };
  }
  return { ok: true, value: { docs: parsed.data.response.docs, numFound: parsed.data.response.numFound } };
}

/** Facet values arrive as a flat `[value, count, value, count, ...]` list per field. */
export function parseFacetFields(payload: unknown): ParseResult<Record<string, unknown[]>> {
  const parsed = facetPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, reason: describeIssues(parsed.error) };
  }
  return { ok: true, value: parsed.data.facet_counts.facet_fields };
}
