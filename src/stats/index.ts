export * from "./accumulator";
export * from "./aggregate";
export * from "./report";
export * from "./types";
