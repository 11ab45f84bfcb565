/**
 * Report formatter
 *
 * Pure rendering of detection, cleanup and verification results into
 * operator-facing text. No I/O.
 */

import type {
  CleanupResult,
  DetectionReport,
  DetectionSummary,
  DuplicateGroup,
  RawRow,
  TableName,
  VerificationResult,
} from "@/types";
import { REPORT_RULE_WIDTH, REPORT_SAMPLE_LIMIT, TABLE_ORDER } from "@/constants";
import {
  TABLE_DEFINITIONS,
  formatNaturalKey,
  qualifiedTableName,
} from "./tableDefinitions";

const RULE = "=".repeat(REPORT_RULE_WIDTH);

function tableGroups(
  report: DetectionReport,
  table: TableName,
): readonly DuplicateGroup<RawRow>[] {
  return report[table];
}

function extraRows(groups: readonly DuplicateGroup<RawRow>[]): number {
  let extra = 0;
  for (const group of groups) {
    extra += group.count - 1;
  }
  return extra;
}

/**
 * Per-table and total aggregates of a detection report
 */
export function summarizeReport(report: DetectionReport): DetectionSummary {
  const tables = TABLE_ORDER.map((table) => {
    const groups = tableGroups(report, table);
    return {
      table,
      groupCount: groups.length,
      extraRowCount: extraRows(groups),
    };
  });

  return {
    tables,
    totalGroups: tables.reduce((sum, t) => sum + t.groupCount, 0),
    totalExtraRows: tables.reduce((sum, t) => sum + t.extraRowCount, 0),
  };
}

function formatTableSection(report: DetectionReport, table: TableName): string[] {
  const def = TABLE_DEFINITIONS[table];
  const groups = tableGroups(report, table);
  const lines = [`${def.label} (${qualifiedTableName(table)})`];

  if (groups.length === 0) {
    lines.push("   ✓ No duplicates");
    return lines;
  }

  lines.push(
    `   ⚠ Found ${groups.length} ${def.groupNoun}, ${extraRows(groups)} extra rows`,
  );
  for (const group of groups.slice(0, REPORT_SAMPLE_LIMIT)) {
    lines.push(
      `      ${formatNaturalKey(table, group.key)}: ${group.count} ${def.copyNoun}`,
    );
  }
  if (groups.length > REPORT_SAMPLE_LIMIT) {
    lines.push(`      ... and ${groups.length - REPORT_SAMPLE_LIMIT} more`);
  }
  return lines;
}

/**
 * Render a detection report
 *
 * @returns Report text and whether any table holds duplicates
 */
export function formatDetectionReport(report: DetectionReport): {
  text: string;
  hasDuplicates: boolean;
} {
  const summary = summarizeReport(report);
  const hasDuplicates = summary.totalGroups > 0;

  const lines = [RULE, "DUPLICATE DETECTION REPORT", RULE, ""];
  for (const table of TABLE_ORDER) {
    lines.push(...formatTableSection(report, table), "");
  }

  lines.push(RULE);
  lines.push(
    hasDuplicates
      ? `⚠ DUPLICATES FOUND: ${summary.totalGroups} groups, ${summary.totalExtraRows} extra rows`
      : "✓ ALL TABLES CLEAN - NO DUPLICATES DETECTED",
  );
  lines.push(RULE, "");

  return { text: lines.join("\n"), hasDuplicates };
}

/**
 * Render a verification result (after cleanup or standalone)
 */
export function formatVerification(result: VerificationResult): string {
  const lines = ["Verification:"];
  for (const t of result.tables) {
    lines.push(
      `   ${qualifiedTableName(t.table)}: ${t.totalCount} rows, ${t.distinctKeyCount} unique ${t.isClean ? "✓" : "⚠"}`,
    );
  }
  lines.push("");

  if (result.allClean) {
    lines.push("   ✓ All tables verified clean");
  } else {
    const dirty = result.tables
      .filter((t) => !t.isClean)
      .map((t) => qualifiedTableName(t.table));
    lines.push(
      `   ⚠ Duplicates remain in ${dirty.join(", ")} - manual investigation required`,
    );
  }
  lines.push("");

  return lines.join("\n");
}

/**
 * Render the rows removed by a committed cleanup, followed by verification
 */
export function formatCleanupResult(result: CleanupResult): string {
  const lines = [RULE, "DUPLICATE CLEANUP", RULE, ""];
  for (const table of TABLE_ORDER) {
    const count = result.removed[table];
    if (count > 0) {
      lines.push(
        `   ${qualifiedTableName(table)}: removed ${count} duplicate rows`,
      );
    }
  }
  lines.push(
    `   Cleanup complete: ${result.totalRemoved} duplicate rows removed`,
    "",
  );

  return lines.join("\n") + "\n" + formatVerification(result.verification);
}

/**
 * Header printed once per run
 */
export function formatRunBanner(cleanupRequested: boolean, now: Date): string {
  return [
    "JOBS PIPELINE DUPLICATE DETECTION & CLEANUP",
    `   Timestamp: ${now.toISOString()}`,
    `   Cleanup mode: ${
      cleanupRequested
        ? "ENABLED (will remove duplicates)"
        : "DISABLED (detection only)"
    }`,
    "",
    "",
  ].join("\n");
}
