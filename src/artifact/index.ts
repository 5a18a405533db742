export * from "./compression";
export * from "./paths";
export * from "./reader";
export * from "./records";
export * from "./writer";
