export * from "./args";
export * from "./confirm";
