/**
 * Local mirror seed: sample duplicates are detected and cleaned
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";
import { listRows } from "../../helpers/pipelineRows";
import { seedLocalDuplicates } from "@/db/seedLocal";
import { cleanupDuplicates, detectDuplicates, summarizeReport } from "@/dedup";

describe("seedLocalDuplicates", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should seed one duplicated key per layer", async () => {
    harness = createTestDb();

    expect(seedLocalDuplicates(harness.db)).toEqual({
      landing: 4,
      staging: 3,
      skills: 4,
    });

    const detected = await detectDuplicates(harness.store);
    expect(detected.ok).toBe(true);
    if (!detected.ok) return;
    expect(summarizeReport(detected.value)).toEqual({
      tables: [
        { table: "landing", groupCount: 1, extraRowCount: 2 },
        { table: "staging", groupCount: 1, extraRowCount: 1 },
        { table: "skills", groupCount: 1, extraRowCount: 1 },
      ],
      totalGroups: 3,
      totalExtraRows: 4,
    });
  });

  it("should keep the latest staging title after cleanup", async () => {
    harness = createTestDb();
    seedLocalDuplicates(harness.db);

    const cleaned = await cleanupDuplicates(harness.store);

    expect(cleaned.ok && cleaned.value.totalRemoved).toBe(4);
    expect(listRows(harness.db, "staging").map((r) => r.note)).toEqual([
      "Senior Data Engineer",
      "Analytics Engineer",
    ]);
  });
});
