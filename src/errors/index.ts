export * from "./dedupErrors";
