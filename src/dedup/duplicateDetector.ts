/**
 * Duplicate detector
 *
 * Read-only scan of every pipeline table for natural keys held by more
 * than one physical row. A failure on any table fails the whole detection.
 */

import type {
  DedupResult,
  DetectionReport,
  DuplicateGroup,
  RecordStore,
  TableKeyMap,
  TableName,
} from "@/types";
import { StoreUnavailableError } from "@/errors";
import * as logger from "@/logger";

async function detectTable<T extends TableName>(
  store: RecordStore,
  table: T,
): Promise<DedupResult<DuplicateGroup<TableKeyMap[T]>[]>> {
  const result = await store.findDuplicateGroups(table);
  if (!result.ok) {
    logger.error("Duplicate detection query failed", {
      table,
      reason: result.failure.reason,
      error: result.failure.message,
    });
    return {
      ok: false,
      error: new StoreUnavailableError("detection", {
        ...result.failure,
        table,
      }),
    };
  }

  logger.debug("Scanned table for duplicates", {
    table,
    groups: result.value.length,
  });
  return { ok: true, value: result.value };
}

/**
 * Detect duplicate natural-key groups in the landing, staging and skills tables
 *
 * Groups are ordered by count descending.
 */
export async function detectDuplicates(
  store: RecordStore,
): Promise<DedupResult<DetectionReport>> {
  logger.info("Detecting duplicates", { driver: store.driver });

  const landing = await detectTable(store, "landing");
  if (!landing.ok) return landing;

  const staging = await detectTable(store, "staging");
  if (!staging.ok) return staging;

  const skills = await detectTable(store, "skills");
  if (!skills.ok) return skills;

  const report: DetectionReport = {
    landing: landing.value,
    staging: staging.value,
    skills: skills.value,
  };

  logger.info("Duplicate detection finished", {
    landingGroups: report.landing.length,
    stagingGroups: report.staging.length,
    skillsGroups: report.skills.length,
  });

  return { ok: true, value: report };
}
