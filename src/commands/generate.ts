import { copyToClipboard } from "../core/clipboard.js";
import { generatePassword } from "../core/composer.js";
import { createSeededRandom, defaultRandom } from "../core/random.js";
import {
  loadSettingsDictionary,
  resolveSettings,
  type SettingsOverrides,
} from "../core/settings.js";

export interface GenerateOptions extends SettingsOverrides {
  count?: number; // passwords to print, default 1
  seed?: number;
  copy?: boolean;
}

/**
 * `wordpass generate` — print one password per line.
 * Returns the generated passwords.
 */
export async function runGenerate(options: GenerateOptions = {}): Promise<string[]> {
  const count = options.count ?? 1;
  if (!Number.isInteger(count) || count < 1) {
    throw new Error(`--count must be a positive integer, got ${count}.`);
  }

  const settings = await resolveSettings(options);
  const dictionary = await loadSettingsDictionary(settings);
  const random = options.seed === undefined ? defaultRandom : createSeededRandom(options.seed);

  const passwords: string[] = [];
  for (let i = 0; i < count; i++) {
    passwords.push(
      generatePassword(dictionary, settings.spec, { random, symbols: settings.symbols }),
    );
  }

  for (const password of passwords) {
    process.stdout.write(`${password}\n`);
  }

  if (options.copy) {
    await copyToClipboard(passwords.join("\n"));
    process.stderr.write(
      `wordpass: copied ${count} password${count !== 1 ? "s" : ""} to the clipboard\n`,
    );
  }

  return passwords;
}
