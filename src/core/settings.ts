import type { PasswordSpec } from "./composer.js";
import { readConfig, resolveConfigPath } from "./config.js";
import { loadBuiltinDictionary, loadDictionary } from "./dictionary.js";
import type { Dictionary } from "./word-index.js";

/** Command-line values that take precedence over the config file. */
export interface SettingsOverrides {
  configPath?: string;
  minWordLength?: number;
  maxWordLength?: number;
  wordCount?: number;
  symbols?: string;
  dictionary?: string;
}

export interface Settings {
  spec: PasswordSpec;
  symbols: string;
  dictionary: string | null;
}

/**
 * Merge the config file with command-line overrides.
 */
export async function resolveSettings(overrides: SettingsOverrides = {}): Promise<Settings> {
  const config = await readConfig(resolveConfigPath(overrides.configPath));
  return {
    spec: {
      minWordLength: overrides.minWordLength ?? config.min_word_length,
      maxWordLength: overrides.maxWordLength ?? config.max_word_length,
      wordCount: overrides.wordCount ?? config.word_count,
    },
    symbols: overrides.symbols ?? config.symbols,
    dictionary: overrides.dictionary ?? config.dictionary,
  };
}

/**
 * Load the configured dictionary, or the built-in list when none is set.
 */
export async function loadSettingsDictionary(settings: Settings): Promise<Dictionary> {
  return settings.dictionary === null
    ? await loadBuiltinDictionary()
    : await loadDictionary(settings.dictionary);
}
