import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import type { RandomSource } from "../src/core/random.js";

/**
 * A random source that replays `values` in order and fails loudly when a
 * value is out of range or the script runs out.
 */
export function scriptedRandom(values: number[]): RandomSource {
  const queue = [...values];
  return {
    int(maxExclusive) {
      const value = queue.shift();
      if (value === undefined) {
        throw new Error("scriptedRandom: ran out of values");
      }
      if (value < 0 || value >= maxExclusive) {
        throw new Error(`scriptedRandom: ${value} is not in [0, ${maxExclusive})`);
      }
      return value;
    },
  };
}

/** Everything written to stdout through the spy installed in setup.ts. */
export function stdoutText(): string {
  return vi
    .mocked(process.stdout.write)
    .mock.calls.map(([chunk]) => String(chunk))
    .join("");
}

export function stderrText(): string {
  return vi
    .mocked(process.stderr.write)
    .mock.calls.map(([chunk]) => String(chunk))
    .join("");
}

export async function createTempDir(): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), "wordpass-test-"));
}

export async function cleanup(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
