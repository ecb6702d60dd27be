/**
 * Small combinatorics helpers shared by the guess estimators
 */

/**
 * Binomial coefficient C(n, k).
 *
 * Multiplies and divides alternately so intermediate values stay integral.
 *
 * @example
 * nCk(5, 2) // 10
 */
export function nCk(n: number, k: number): number {
  if (k > n || k < 0) {
    return 0;
  }
  if (k === 0) {
    return 1;
  }

  let result = 1;
  let top = n;
  for (let d = 1; d <= k; d++) {
    result *= top;
    result /= d;
    top -= 1;
  }
  return result;
}

/**
 * Σ_{i=1..min(a,b)} C(a+b, i): the number of ways to place up to
 * min(a, b) marked characters among a+b positions.
 */
export function sumOfBinomials(a: number, b: number): number {
  let total = 0;
  for (let i = 1; i <= Math.min(a, b); i++) {
    total += nCk(a + b, i);
  }
  return total;
}

/**
 * Converts a log10 guess count back to a finite number.
 */
export function fromLog10(log10: number): number {
  const value = Math.pow(10, log10);
  return Number.isFinite(value) ? value : Number.MAX_VALUE;
}
