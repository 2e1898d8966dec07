import { validateLengthBounds } from "../core/composer.js";
import { NoEligibleWordsError } from "../core/errors.js";
import {
  loadSettingsDictionary,
  resolveSettings,
  type SettingsOverrides,
} from "../core/settings.js";
import { indexFor } from "../core/word-index.js";

export type LengthsOptions = Pick<
  SettingsOverrides,
  "configPath" | "dictionary" | "minWordLength" | "maxWordLength"
>;

export interface LengthRow {
  length: number;
  words: number;
}

/**
 * `wordpass lengths` — show which word lengths the dictionary can supply
 * within the configured range, with the number of words of each length.
 */
export async function runLengths(options: LengthsOptions = {}): Promise<LengthRow[]> {
  const settings = await resolveSettings(options);
  const { minWordLength, maxWordLength } = settings.spec;
  validateLengthBounds(minWordLength, maxWordLength);
  const dictionary = await loadSettingsDictionary(settings);

  const index = indexFor(dictionary);
  const rows = index
    .uniqueLengthsInRange(minWordLength, maxWordLength)
    .map((length) => ({ length, words: index.wordsOfLength(length).length }));
  if (rows.length === 0) {
    throw new NoEligibleWordsError(minWordLength, maxWordLength);
  }

  const lengthW = 8;
  process.stdout.write(`${"Length".padEnd(lengthW)}Words\n`);
  process.stdout.write(`${"─".repeat(lengthW - 2)}  ${"─".repeat(5)}\n`);
  for (const row of rows) {
    process.stdout.write(`${String(row.length).padEnd(lengthW)}${row.words}\n`);
  }

  return rows;
}
