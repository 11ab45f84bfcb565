/**
 * Unit Test: PostgreSQL record store
 *
 * Runs the store against an in-process query runner that records SQL and
 * returns canned pg-shaped results (counts arrive as strings).
 */

import { describe, it, expect } from "vitest";
import type { RawRow } from "@/types";
import {
  PgRecordStore,
  buildPgClientConfig,
  sslOptionFromMode,
  type PgQueryRunner,
} from "@/db";

type CannedResult = { rows: RawRow[]; rowCount: number | null } | Error;

class FakePgRunner implements PgQueryRunner {
  public readonly queries: string[] = [];
  public endCalls = 0;

  constructor(private readonly results: CannedResult[] = []) {}

  async query(text: string): Promise<{ rows: RawRow[]; rowCount: number | null }> {
    this.queries.push(text.replace(/\s+/g, " ").trim());
    const next = this.results.shift() ?? { rows: [], rowCount: 0 };
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  async end(): Promise<void> {
    this.endCalls++;
  }
}

function connectionRefused(): Error {
  return Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:5432"), {
    code: "ECONNREFUSED",
  });
}

describe("PgRecordStore", () => {
  it("should group skills by the three-column natural key", async () => {
    const runner = new FakePgRunner([
      {
        rows: [{ source_name: "indeed", job_id: "job1", skill: "sql", dup_count: "3" }],
        rowCount: 1,
      },
    ]);
    const store = new PgRecordStore(runner);

    const result = await store.findDuplicateGroups("skills");

    expect(result).toEqual({
      ok: true,
      value: [
        { key: { source_name: "indeed", job_id: "job1", skill: "sql" }, count: 3 },
      ],
    });
    expect(runner.queries[0]).toBe(
      "SELECT source_name, job_id, skill, COUNT(*) AS dup_count FROM staging.job_skills GROUP BY source_name, job_id, skill HAVING COUNT(*) > 1 ORDER BY dup_count DESC, source_name, job_id, skill",
    );
  });

  it("should keep the greatest ctid when deleting", async () => {
    const runner = new FakePgRunner([{ rows: [], rowCount: 2 }]);
    const store = new PgRecordStore(runner);

    const result = await store.deleteRedundantRows("landing");

    expect(result).toEqual({ ok: true, value: 2 });
    expect(runner.queries[0]).toBe(
      "DELETE FROM landing.raw_jobs WHERE ctid NOT IN ( SELECT MAX(ctid) FROM landing.raw_jobs GROUP BY source_name, job_id )",
    );
  });

  it("should parse bigint counts returned as strings", async () => {
    const runner = new FakePgRunner([
      { rows: [{ total_count: "12", distinct_key_count: "10" }], rowCount: 1 },
    ]);
    const store = new PgRecordStore(runner);

    const result = await store.countRows("staging");

    expect(result).toEqual({
      ok: true,
      value: { totalCount: 12, distinctKeyCount: 10 },
    });
    expect(runner.queries[0]).toContain("FROM staging.jobs_v1");
  });

  it("should classify socket errors as connection failures", async () => {
    const store = new PgRecordStore(new FakePgRunner([connectionRefused()]));

    const result = await store.findDuplicateGroups("landing");

    expect(result).toEqual({
      ok: false,
      failure: {
        reason: "CONNECTION",
        message: "connect ECONNREFUSED 127.0.0.1:5432",
        table: "landing",
      },
    });
  });

  it("should classify rejected statements as query failures", async () => {
    const store = new PgRecordStore(
      new FakePgRunner([new Error('relation "staging.jobs_v1" does not exist')]),
    );

    const result = await store.deleteRedundantRows("staging");

    expect(result).toEqual({
      ok: false,
      failure: {
        reason: "QUERY",
        message: 'relation "staging.jobs_v1" does not exist',
        table: "staging",
      },
    });
  });

  it("should only send ROLLBACK inside a transaction", async () => {
    const runner = new FakePgRunner();
    const store = new PgRecordStore(runner);

    await store.rollback();
    expect(runner.queries).toEqual([]);

    await store.begin();
    await store.rollback();
    await store.rollback();
    expect(runner.queries).toEqual(["BEGIN", "ROLLBACK"]);
  });

  it("should not roll back after a commit", async () => {
    const runner = new FakePgRunner();
    const store = new PgRecordStore(runner);

    await store.begin();
    await store.commit();
    await store.rollback();

    expect(runner.queries).toEqual(["BEGIN", "COMMIT"]);
  });

  it("should refuse work after close and end the client once", async () => {
    const runner = new FakePgRunner();
    const store = new PgRecordStore(runner);

    await store.close();
    await store.close();
    const result = await store.countRows("landing");

    expect(runner.endCalls).toBe(1);
    expect(runner.queries).toEqual([]);
    expect(result).toEqual({
      ok: false,
      failure: {
        reason: "CONNECTION",
        message: "Store connection is closed",
        table: "landing",
      },
    });
  });
});

describe("pg client config", () => {
  it("should map sslmode to the pg ssl option", () => {
    expect(sslOptionFromMode("disable")).toBe(false);
    expect(sslOptionFromMode("require")).toEqual({ rejectUnauthorized: false });
    expect(sslOptionFromMode("prefer")).toEqual({ rejectUnauthorized: false });
    expect(sslOptionFromMode("verify-full")).toEqual({ rejectUnauthorized: true });
  });

  it("should build the client config from a store config", () => {
    expect(
      buildPgClientConfig({
        driver: "postgres",
        host: "db.internal",
        port: 6432,
        database: "jobs",
        user: "pipeline",
        password: "test-secret",
        sslMode: "verify-ca",
      }),
    ).toEqual({
      host: "db.internal",
      port: 6432,
      database: "jobs",
      user: "pipeline",
      password: "test-secret",
      ssl: { rejectUnauthorized: true },
      connectionTimeoutMillis: 10_000,
    });
  });
});
