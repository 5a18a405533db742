import { FacetRequest, PageRequest } from "./types";

// Parameters are rebuilt for every call so no request can observe another's offset.
export function buildPageUrl(baseUrl: string, request: PageRequest): string {
  if (!Number.isInteger(request.rows) || request.rows <= 0) {
    throw new Error(`rows must be a positive integer, got ${request.rows}`);
  }
  if (!Number.isInteger(request.start) || request.start < 0) {
    throw new Error(`start must be a non-negative integer, got ${request.start}`);
  }

  const params = new URLSearchParams();
  params.set("rows", String(request.rows));
  params.set("start", String(request.start));
  if (request.sort) {
    params.set("sort", request.sort);
  }
  params.set("wt", "json");
  params.set("q", request.query);
  if (request.fields && request.fields.length > 0) {
    params.set("fl", request.fields.join(","));
  }
  return `${baseUrl}?${params.toString()}`;
}

export function buildFacetUrl(baseUrl: string, request: FacetRequest): string {
  const params = new URLSearchParams();
  params.set("rows", "0");
  params.set("start", "0");
  params.set("wt", "json");
  params.set("q", request.query);
  params.set("facet", "true");
  for (const field of request.facetFields) {
    params.append("facet.field", field);
  }
  params.set("facet.limit", "-1");
  params.set("facet.mincount", "1");
  return `${baseUrl}?${params.toString()}`;
}
