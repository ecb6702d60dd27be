/**
 * Lower-cases text without changing its length.
 *
 * A few characters (e.g. "İ") lower-case to more than one code unit; those
 * are kept as they are so that indices into the result line up with
 * indices into the input.
 *
 * @example
 * lowerPreservingLength("PaSS") // "pass"
 */
export function lowerPreservingLength(text: string): string {
  let result = "";
  for (let k = 0; k < text.length; k++) {
    const char = text[k];
    const lowered = char.toLowerCase();
    result += lowered.length === 1 ? lowered : char;
  }
  return result;
}

/**
 * Reverses text code unit by code unit.
 */
export function reverseText(text: string): string {
  return text.split("").reverse().join("");
}
