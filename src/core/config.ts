import { mkdir, readFile, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { parse, stringify } from "smol-toml";
import { DEFAULT_SYMBOLS } from "./composer.js";

export interface Config {
  min_word_length: number; // default: 4
  max_word_length: number; // default: 8
  word_count: number; // default: 3
  symbols: string; // default: DEFAULT_SYMBOLS
  dictionary: string | null; // path or URL; null → built-in list
}

/**
 * Return a Config with all defaults.
 */
export function defaultConfig(): Config {
  return {
    min_word_length: 4,
    max_word_length: 8,
    word_count: 3,
    symbols: DEFAULT_SYMBOLS,
    dictionary: null,
  };
}

/**
 * Resolve the config file location: explicit path, then $WORDPASS_CONFIG,
 * then ~/.config/wordpass/config.toml.
 */
export function resolveConfigPath(explicit?: string): string {
  if (explicit) return explicit;
  const fromEnv = process.env["WORDPASS_CONFIG"];
  if (fromEnv) return fromEnv;
  return join(homedir(), ".config", "wordpass", "config.toml");
}

/**
 * Read config from a TOML file. Returns defaults for missing fields.
 * Missing file → returns defaultConfig().
 */
export async function readConfig(configPath: string): Promise<Config> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return defaultConfig();
    }
    throw err;
  }

  const parsed = parse(raw);
  const defaults = defaultConfig();

  const min_word_length =
    typeof parsed.min_word_length === "number" ? parsed.min_word_length : defaults.min_word_length;
  const max_word_length =
    typeof parsed.max_word_length === "number" ? parsed.max_word_length : defaults.max_word_length;
  const word_count =
    typeof parsed.word_count === "number" ? parsed.word_count : defaults.word_count;
  const symbols = typeof parsed.symbols === "string" ? parsed.symbols : defaults.symbols;
  const dictionary =
    typeof parsed.dictionary === "string" && parsed.dictionary !== ""
      ? parsed.dictionary
      : defaults.dictionary;

  return { min_word_length, max_word_length, word_count, symbols, dictionary };
}

/**
 * Write config as TOML, creating the parent directory if needed.
 */
export async function writeConfig(configPath: string, config: Config): Promise<void> {
  const data: Record<string, unknown> = {
    min_word_length: config.min_word_length,
    max_word_length: config.max_word_length,
    word_count: config.word_count,
    symbols: config.symbols,
  };
  if (config.dictionary !== null) {
    data.dictionary = config.dictionary;
  }
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, stringify(data), "utf8");
}
