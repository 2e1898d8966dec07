export type PasswordErrorCode =
  | "InvalidDictionary"
  | "InvalidBounds"
  | "NoEligibleWords"
  | "InvalidSymbols";

/**
 * Base class for every failure raised while loading a dictionary or
 * composing a password. `code` is stable; `message` is for people.
 */
export class PasswordError extends Error {
  readonly code: PasswordErrorCode;

  constructor(code: PasswordErrorCode, message: string) {
    super(message);
    this.name = "PasswordError";
    this.code = code;
  }
}

/** Dictionary missing, empty, or malformed beyond recovery. */
export class InvalidDictionaryError extends PasswordError {
  constructor(message: string) {
    super("InvalidDictionary", message);
    this.name = "InvalidDictionaryError";
  }
}

/** Word-length bounds or word count out of range, or min > max. */
export class InvalidBoundsError extends PasswordError {
  constructor(message: string) {
    super("InvalidBounds", message);
    this.name = "InvalidBoundsError";
  }
}

/** No dictionary entry falls within the requested length range. */
export class NoEligibleWordsError extends PasswordError {
  readonly min: number;
  readonly max: number;

  constructor(min: number, max: number) {
    super("NoEligibleWords", `No dictionary words have a length between ${min} and ${max}.`);
    this.name = "NoEligibleWordsError";
    this.min = min;
    this.max = max;
  }
}

export class InvalidSymbolsError extends PasswordError {
  constructor(message: string) {
    super("InvalidSymbols", message);
    this.name = "InvalidSymbolsError";
  }
}
