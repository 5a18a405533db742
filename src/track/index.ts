export * from "./tracker";
