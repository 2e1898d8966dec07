export {
  DEFAULT_SYMBOLS,
  WORD_COUNT_RANGE,
  WORD_LENGTH_RANGE,
  composePassword,
  formatPassword,
  generatePassword,
  validateLengthBounds,
  validateSpec,
  type ComposeOptions,
  type PasswordParts,
  type PasswordSpec,
} from "./core/composer.js";
export {
  detectFormat,
  loadBuiltinDictionary,
  loadDictionary,
  parseCsvDictionary,
  parseDictionary,
  parseJsonDictionary,
  type DictionaryFormat,
} from "./core/dictionary.js";
export {
  InvalidBoundsError,
  InvalidDictionaryError,
  InvalidSymbolsError,
  NoEligibleWordsError,
  PasswordError,
  type PasswordErrorCode,
} from "./core/errors.js";
export {
  MAX_SEED,
  createSeededRandom,
  defaultRandom,
  pick,
  type RandomSource,
} from "./core/random.js";
export {
  FieldIndex,
  indexFor,
  uniqueLengthsInRange,
  wordsOfLength,
  type Dictionary,
  type DictionaryEntry,
  type WordIndex,
} from "./core/word-index.js";
