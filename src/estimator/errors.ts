/**
 * Estimator errors
 */

/**
 * Thrown before any matching when a password exceeds the configured
 * maximum length (in code points).
 */
export class LengthExceededError extends Error {
  public readonly length: number;
  public readonly maxLength: number;

  constructor(length: number, maxLength: number) {
    super(
      `Password length exceeded: ${length} characters, maximum is ${maxLength}`,
    );
    this.name = "LengthExceededError";
    this.length = length;
    this.maxLength = maxLength;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LengthExceededError);
    }
  }
}
