import { writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { runLengths } from "../../src/commands/lengths.js";
import { InvalidBoundsError, NoEligibleWordsError } from "../../src/core/errors.js";
import { cleanup, createTempDir, stdoutText } from "../helpers.js";

let tmpDir: string;
let configPath: string;
let wordsPath: string;

beforeEach(async () => {
  tmpDir = await createTempDir();
  configPath = path.join(tmpDir, "config.toml");
  wordsPath = path.join(tmpDir, "words.json");
  await writeFile(
    wordsPath,
    JSON.stringify(["cat", "dog", "lion", "horse", "elephant"]),
    "utf8",
  );
});

afterEach(async () => {
  await cleanup(tmpDir);
});

describe("runLengths", () => {
  it("lists eligible lengths with their word counts", async () => {
    const rows = await runLengths({
      configPath,
      dictionary: wordsPath,
      minWordLength: 3,
      maxWordLength: 5,
    });
    expect(rows).toEqual([
      { length: 3, words: 2 },
      { length: 4, words: 1 },
      { length: 5, words: 1 },
    ]);
    expect(stdoutText()).toBe(
      ["Length  Words", "──────  ─────", "3       2", "4       1", "5       1", ""].join("\n"),
    );
  });

  it("uses the configured range by default", async () => {
    // Default range is 4-8.
    const rows = await runLengths({ configPath, dictionary: wordsPath });
    expect(rows.map((r) => r.length)).toEqual([4, 5, 8]);
  });

  it("fails with NoEligibleWords when nothing is in range", async () => {
    await expect(
      runLengths({ configPath, dictionary: wordsPath, minWordLength: 10, maxWordLength: 12 }),
    ).rejects.toThrow(NoEligibleWordsError);
    expect(stdoutText()).toBe("");
  });

  it("rejects min > max as invalid bounds", async () => {
    await expect(
      runLengths({ configPath, dictionary: wordsPath, minWordLength: 5, maxWordLength: 3 }),
    ).rejects.toThrow(InvalidBoundsError);
    expect(stdoutText()).toBe("");
  });

  it("rejects bounds outside the supported range", async () => {
    await expect(
      runLengths({ configPath, dictionary: wordsPath, minWordLength: 0, maxWordLength: 99 }),
    ).rejects.toThrow("Minimum word length must be an integer between 1 and 14, got 0.");
    await expect(
      runLengths({ configPath, dictionary: wordsPath, minWordLength: 3, maxWordLength: 99 }),
    ).rejects.toThrow(InvalidBoundsError);
  });

  it("rejects a bound that is not a number", async () => {
    await expect(
      runLengths({
        configPath,
        dictionary: wordsPath,
        minWordLength: Number.NaN,
        maxWordLength: 4,
      }),
    ).rejects.toThrow(InvalidBoundsError);
  });
});
