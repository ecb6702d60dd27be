/**
 * Frequency list validation module
 *
 * Validates the JSON shape of a frequency list before it is ranked:
 * - Top-level value is an array
 * - Every entry is a non-empty string
 *
 * Validation is fail-fast: throws on the first bad entry.
 */

/**
 * Error thrown when a frequency list file is malformed.
 */
export class DictionaryValidationError extends Error {
  constructor(message: string) {
    super(`Dictionary validation failed: ${message}`);
    this.name = "DictionaryValidationError";
  }
}

/**
 * Validates a parsed frequency list.
 *
 * @param raw - Parsed JSON content
 * @param listName - List name for error messages (e.g., "passwords")
 * @returns The same value, typed as a word array
 * @throws {DictionaryValidationError} If the value is not an array of non-empty strings
 */
export function validateFrequencyList(
  raw: unknown,
  listName: string,
): string[] {
  if (!Array.isArray(raw)) {
    throw new DictionaryValidationError(
      `${listName} must be an array, got ${typeof raw}`,
    );
  }

  const words: string[] = [];
  raw.forEach((entry: unknown, index: number) => {
    if (typeof entry !== "string") {
      throw new DictionaryValidationError(
        `${listName}[${index}] must be a string, got ${typeof entry}`,
      );
    }
    if (entry.trim().length === 0) {
      throw new DictionaryValidationError(
        `${listName}[${index}] cannot be empty or whitespace-only`,
      );
    }
    words.push(entry);
  });

  return words;
}
