export * from "./providers";
export * from "./storeConfig";
