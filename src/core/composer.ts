import {
  InvalidBoundsError,
  InvalidDictionaryError,
  InvalidSymbolsError,
  NoEligibleWordsError,
} from "./errors.js";
import { defaultRandom, pick, type RandomSource } from "./random.js";
import { indexFor, type Dictionary } from "./word-index.js";

export const DEFAULT_SYMBOLS = "!@#$%^&*()-_=+~";

export const WORD_LENGTH_RANGE = { min: 1, max: 14 } as const;
export const WORD_COUNT_RANGE = { min: 1, max: 24 } as const;

export interface PasswordSpec {
  minWordLength: number;
  maxWordLength: number;
  wordCount: number;
}

export interface ComposeOptions {
  random?: RandomSource;
  symbols?: string;
}

/**
 * Everything drawn for one password. `words` already has case alternation
 * applied.
 */
export interface PasswordParts {
  words: string[];
  outside: string;
  inside: string;
  leftNumber: string;
  rightNumber: string;
}

function checkInRange(
  name: string,
  value: number,
  range: { readonly min: number; readonly max: number },
): void {
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new InvalidBoundsError(
      `${name} must be an integer between ${range.min} and ${range.max}, got ${value}.`,
    );
  }
}

/**
 * Throw InvalidBoundsError unless both lengths are in the supported range
 * and min <= max.
 */
export function validateLengthBounds(min: number, max: number): void {
  checkInRange("Minimum word length", min, WORD_LENGTH_RANGE);
  checkInRange("Maximum word length", max, WORD_LENGTH_RANGE);
  if (min > max) {
    throw new InvalidBoundsError(
      `Minimum word length (${min}) is greater than maximum word length (${max}).`,
    );
  }
}

/**
 * Throw InvalidBoundsError unless the length bounds and the word count are
 * all valid.
 */
export function validateSpec(spec: PasswordSpec): void {
  validateLengthBounds(spec.minWordLength, spec.maxWordLength);
  checkInRange("Word count", spec.wordCount, WORD_COUNT_RANGE);
}

function twoDigits(random: RandomSource): string {
  return String(random.int(100)).padStart(2, "0");
}

/**
 * Draw every random part of a password without joining them.
 *
 * Draw order: one length per word, one word per length, the outside symbol,
 * the inside symbol, then the left and right numbers.
 */
export function composePassword(
  dictionary: Dictionary | null | undefined,
  spec: PasswordSpec,
  options: ComposeOptions = {},
): PasswordParts {
  if (!dictionary || dictionary.length === 0) {
    throw new InvalidDictionaryError("Dictionary is empty.");
  }
  validateSpec(spec);

  const symbols = [...(options.symbols ?? DEFAULT_SYMBOLS)];
  if (symbols.length === 0) {
    throw new InvalidSymbolsError("Symbol set must contain at least one character.");
  }
  const random = options.random ?? defaultRandom;
  const index = indexFor(dictionary);

  const eligibleLengths = index.uniqueLengthsInRange(spec.minWordLength, spec.maxWordLength);
  if (eligibleLengths.length === 0) {
    throw new NoEligibleWordsError(spec.minWordLength, spec.maxWordLength);
  }

  const lengths: number[] = [];
  for (let i = 0; i < spec.wordCount; i++) {
    lengths.push(pick(random, eligibleLengths));
  }

  const words = lengths
    .map((length) => pick(random, index.wordsOfLength(length)))
    .map((word, i) => (i % 2 === 1 ? word.toUpperCase() : word));

  const outside = pick(random, symbols);
  const inside = pick(random, symbols);
  const leftNumber = twoDigits(random);
  const rightNumber = twoDigits(random);

  return { words, outside, inside, leftNumber, rightNumber };
}

/**
 * Join drawn parts: `OO` + left number + `I`, each word followed by `I`,
 * then right number + `OO`.
 */
export function formatPassword(parts: PasswordParts): string {
  const edge = parts.outside + parts.outside;
  const left = edge + parts.leftNumber + parts.inside;
  const middle = parts.words.map((word) => word + parts.inside).join("");
  const right = parts.rightNumber + edge;
  return left + middle + right;
}

/**
 * Generate one password from `dictionary`.
 *
 * Throws InvalidDictionaryError, InvalidBoundsError, InvalidSymbolsError or
 * NoEligibleWordsError before drawing anything.
 */
export function generatePassword(
  dictionary: Dictionary | null | undefined,
  spec: PasswordSpec,
  options: ComposeOptions = {},
): string {
  return formatPassword(composePassword(dictionary, spec, options));
}
