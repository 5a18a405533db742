export * from "./apiClient";
export * from "./httpTransport";
export * from "./payloads";
export * from "./rateGovernor";
export * from "./requests";
export * from "./types";
