import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { fileURLToPath } from "node:url";
import { InvalidDictionaryError } from "./errors.js";
import type { Dictionary, DictionaryEntry } from "./word-index.js";

export type DictionaryFormat = "csv" | "json";

export const BUILTIN_DICTIONARY_PATH = fileURLToPath(
  new URL("../../data/words.csv", import.meta.url),
);

/**
 * Split one CSV line into fields. Supports quoted fields with `""` escapes.
 */
export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let inQuotes = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else if (ch === ",") {
      fields.push(current);
      current = "";
    } else if (ch === '"') {
      inQuotes = true;
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

function toEntry(word: string, rawLength: unknown, where: string): DictionaryEntry {
  if (word === "") {
    throw new InvalidDictionaryError(`${where}: word is empty.`);
  }
  const count = [...word].length;
  if (rawLength === undefined || rawLength === "") {
    return { word, length: count };
  }
  const length = typeof rawLength === "string" ? Number(rawLength.trim()) : rawLength;
  if (typeof length !== "number" || !Number.isInteger(length) || length < 1) {
    const shown = JSON.stringify(rawLength);
    throw new InvalidDictionaryError(
      `${where}: length for "${word}" must be a positive integer, got ${shown}.`,
    );
  }
  if (length !== count) {
    throw new InvalidDictionaryError(
      `${where}: length for "${word}" is ${length} but the word has ${count} characters.`,
    );
  }
  return { word, length };
}

function isHeaderRow([word = "", length]: string[]): boolean {
  if (!/^word$/i.test(word.trim())) return false;
  return length === undefined || /^stringlength$/i.test(length.trim());
}

/**
 * Parse `Word,StringLength` rows. The header row is optional; a missing
 * length column means the length is taken from the word itself. A first
 * row such as `word,4` is data, not a header.
 */
export function parseCsvDictionary(text: string, source = "dictionary"): Dictionary {
  const entries: DictionaryEntry[] = [];
  const lines = text.split(/\r?\n/);
  let firstRow = true;
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === "") continue;
    const fields = parseCsvLine(line);
    const header = firstRow && isHeaderRow(fields);
    firstRow = false;
    if (header) continue;
    const [word = "", length] = fields;
    entries.push(toEntry(word.trim(), length, `${source}:${i + 1}`));
  }
  return entries;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON array of `{ Word, StringLength }` objects (`word`/`length`
 * are accepted too) or of plain strings.
 */
export function parseJsonDictionary(text: string, source = "dictionary"): Dictionary {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidDictionaryError(`${source}: invalid JSON (${reason}).`);
  }
  if (!Array.isArray(parsed)) {
    throw new InvalidDictionaryError(`${source}: expected a JSON array of words.`);
  }

  return parsed.map((item: unknown, i) => {
    const where = `${source}[${i}]`;
    if (typeof item === "string") {
      return toEntry(item.trim(), undefined, where);
    }
    if (!isRecord(item)) {
      throw new InvalidDictionaryError(`${where}: expected a string or an object.`);
    }
    const word = item.Word ?? item.word;
    if (typeof word !== "string") {
      throw new InvalidDictionaryError(`${where}: missing "Word" field.`);
    }
    return toEntry(word.trim(), item.StringLength ?? item.length, where);
  });
}

/**
 * Pick a format from the file extension (or URL path), falling back to the
 * content: a leading `[` means JSON.
 */
export function detectFormat(location: string, text: string): DictionaryFormat {
  let path = location;
  if (/^https?:\/\//i.test(location)) {
    path = new URL(location).pathname;
  }
  const ext = extname(path).toLowerCase();
  if (ext === ".csv") return "csv";
  if (ext === ".json") return "json";
  return text.trimStart().startsWith("[") ? "json" : "csv";
}

export function parseDictionary(
  text: string,
  format: DictionaryFormat,
  source = "dictionary",
): Dictionary {
  const dictionary =
    format === "json" ? parseJsonDictionary(text, source) : parseCsvDictionary(text, source);
  if (dictionary.length === 0) {
    throw new InvalidDictionaryError(`${source}: contains no words.`);
  }
  return dictionary;
}

async function fetchText(url: string): Promise<string> {
  let res: Response;
  try {
    res = await fetch(url);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidDictionaryError(`Failed to fetch dictionary from ${url}: ${reason}`);
  }
  if (!res.ok) {
    throw new InvalidDictionaryError(
      `Failed to fetch dictionary from ${url}: HTTP ${res.status}`,
    );
  }
  return await res.text();
}

async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new InvalidDictionaryError(`Dictionary file not found: ${path}`);
    }
    throw err;
  }
}

/**
 * Load a dictionary from a local path or an http(s) URL.
 */
export async function loadDictionary(location: string): Promise<Dictionary> {
  const text = /^https?:\/\//i.test(location)
    ? await fetchText(location)
    : await readText(location);
  return parseDictionary(text, detectFormat(location, text), location);
}

/** The word list shipped with the package. */
export async function loadBuiltinDictionary(): Promise<Dictionary> {
  return await loadDictionary(BUILTIN_DICTIONARY_PATH);
}
