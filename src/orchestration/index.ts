export * from "./dedupOrchestrator";
