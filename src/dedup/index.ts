export * from "./tableDefinitions";
export * from "./duplicateDetector";
export * from "./reportFormatter";
export * from "./cleanupExecutor";
export * from "./verifier";
export * from "./runState";
