/**
 * Database error utilities
 *
 * Helpers for identifying and classifying driver errors.
 */

import type { StoreFailure, StoreFailureReason, TableName } from "@/types";
import { errorMessage } from "@/errors";

/**
 * Node socket error codes that mean the server could not be reached
 */
const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EHOSTUNREACH",
]);

function readErrorCode(err: Error): string | undefined {
  if (!("code" in err)) {
    return undefined;
  }
  const code: unknown = err.code;
  return typeof code === "string" ? code : undefined;
}

/**
 * Check if an error means the store connection is unusable
 *
 * - Node socket errors (ECONNREFUSED, ENOTFOUND, ...)
 * - PostgreSQL SQLSTATE class 08 (connection exception) and 57P0x (shutdown)
 * - pg / better-sqlite3 messages for a closed handle
 *
 * @param err - Error object to check
 * @returns true if the failure is a connection failure
 */
export function isConnectionError(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false;
  }

  const code = readErrorCode(err);
  if (code) {
    if (CONNECTION_ERROR_CODES.has(code)) return true;
    if (code.startsWith("08") || code.startsWith("57P0")) return true;
  }

  const message = err.message.toLowerCase();
  return (
    message.includes("connection terminated") ||
    message.includes("client has encountered a connection error") ||
    message.includes("connection is not open") ||
    message.includes("database not opened")
  );
}

/**
 * Convert a thrown driver error into a store failure
 *
 * @param err - Thrown value
 * @param fallback - Reason used when the error is not a connection error
 * @param table - Table the failing statement targeted
 */
export function toStoreFailure(
  err: unknown,
  fallback: StoreFailureReason,
  table?: TableName,
): StoreFailure {
  return {
    reason: isConnectionError(err) ? "CONNECTION" : fallback,
    message: errorMessage(err),
    ...(table ? { table } : {}),
  };
}
