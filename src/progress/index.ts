export * from "./progressStore";
export * from "./types";
