export type ErrorCode = "NULL_ARGUMENT" | "INVALID_ARGUMENT" | "NEGATIVE_WEIGHT" | "DUPLICATE_WORD";

/**
 * Base class for every contract violation raised by the completion core.
 *
 * All of these are thrown synchronously at construction or call time; none of them
 * describe an operational fault, so nothing inside the core retries or catches them.
 */
export class AutocompleteError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A required argument (string, sequence) was absent. */
export class NullArgumentError extends AutocompleteError {
  constructor(what: string) {
    super("NULL_ARGUMENT", `${what} must not be null`);
  }
}

export class InvalidArgumentError extends AutocompleteError {
  constructor(message: string, code: ErrorCode = "INVALID_ARGUMENT") {
    super(code, message);
  }
}

export class NegativeWeightError extends InvalidArgumentError {
  readonly weight: number;

  constructor(weight: number, word?: string) {
    super(word === undefined ? `negative weight ${weight}` : `negative weight ${weight} for "${word}"`, "NEGATIVE_WEIGHT");
    this.weight = weight;
  }
}

export class DuplicateWordError extends AutocompleteError {
  readonly word: string;

  constructor(word: string) {
    super("DUPLICATE_WORD", `duplicate word "${word}"`);
    this.word = word;
  }
}

export function isAutocompleteError(e: unknown): e is AutocompleteError {
  return e instanceof AutocompleteError;
}
