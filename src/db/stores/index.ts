export * from "./pgRecordStore";
export * from "./sqliteRecordStore";
export * from "./sql";
