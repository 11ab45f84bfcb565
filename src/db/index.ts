/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./pgClient";
export * from "./storeFactory";
export * from "./stores";
