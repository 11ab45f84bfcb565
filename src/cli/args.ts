/**
 * Command-line argument parsing for the dedup CLI
 *
 * The only accepted flag is --cleanup.
 */

import type { DedupCliArgs } from "@/types";

export const USAGE = "Usage: jobs-dedup [--cleanup]";

export type ParsedCliArgs =
  | { ok: true; value: DedupCliArgs }
  | { ok: false; message: string };

export function parseCliArgs(argv: readonly string[]): ParsedCliArgs {
  let cleanup = false;

  for (const arg of argv) {
    if (arg === "--cleanup") {
      cleanup = true;
      continue;
    }
    return { ok: false, message: `Unknown argument: ${arg}` };
  }

  return { ok: true, value: { cleanup } };
}
