export * from "./batches";
export * from "./facets";
export * from "./passes";
export * from "./queries";
