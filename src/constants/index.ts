export * from "./logger";
export * from "./tables";
export * from "./report";
export * from "./config";
