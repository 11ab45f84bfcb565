/**
 * Unit Test: CLI argument parsing and cleanup confirmation
 */

import { describe, it, expect } from "vitest";
import { PassThrough } from "stream";
import { isAffirmative, parseCliArgs, promptConfirmation } from "@/cli";

describe("parseCliArgs", () => {
  it("should default to detection only", () => {
    expect(parseCliArgs([])).toEqual({ ok: true, value: { cleanup: false } });
  });

  it("should enable cleanup with --cleanup", () => {
    expect(parseCliArgs(["--cleanup"])).toEqual({
      ok: true,
      value: { cleanup: true },
    });
  });

  it("should reject any other argument", () => {
    expect(parseCliArgs(["--cleanup", "--force"])).toEqual({
      ok: false,
      message: "Unknown argument: --force",
    });
  });
});

describe("isAffirmative", () => {
  it.each(["yes", "YES", "  Yes \n"])("should accept %j", (answer) => {
    expect(isAffirmative(answer)).toBe(true);
  });

  it.each(["y", "no", "", "yes please"])("should reject %j", (answer) => {
    expect(isAffirmative(answer)).toBe(false);
  });
});

describe("promptConfirmation", () => {
  it("should resolve true for a yes answer", async () => {
    const input = new PassThrough();
    const output = new PassThrough();

    const answer = promptConfirmation("Proceed? ", input, output);
    input.end("Yes\n");

    await expect(answer).resolves.toBe(true);
  });

  it("should resolve false for any other answer", async () => {
    const input = new PassThrough();
    const output = new PassThrough();

    const answer = promptConfirmation("Proceed? ", input, output);
    input.end("nope\n");

    await expect(answer).resolves.toBe(false);
  });

  it("should resolve false when input closes without an answer", async () => {
    const input = new PassThrough();
    const output = new PassThrough();

    const answer = promptConfirmation("Proceed? ", input, output);
    input.end();

    await expect(answer).resolves.toBe(false);
  });
});
