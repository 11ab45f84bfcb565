/**
 * Utils barrel exports
 */

export * from "./dbErrors";
export * from "./rowDecoding";
