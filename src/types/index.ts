export * from "./logger";
export * from "./tables";
export * from "./store";
export * from "./dedup";
export * from "./config";
