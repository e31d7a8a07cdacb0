/**
 * Text normalization helpers
 *
 * @module utils/text
 */

/**
 * Title-case a string word by word.
 *
 * A cased letter is upper-cased when the character before it is not a cased
 * letter, and lower-cased otherwise. Digits and punctuation start a new word,
 * so "o'brien" becomes "O'Brien" and "3rd" becomes "3Rd".
 */
export function toTitleCase(value: string): string {
  let previousCased = false;
  let result = '';
  for (const char of value) {
    const lower = char.toLowerCase();
    const upper = char.toUpperCase();
    const cased = lower !== upper;
    if (cased) {
      result += previousCased ? lower : upper;
    } else {
      result += char;
    }
    previousCased = cased;
  }
  return result;
}

/**
 * Expand a leading "~" to the user's home directory.
 */
export function expandHomePath(value: string, home: string): string {
  if (value === '~') return home;
  if (value.startsWith('~/')) return `${home}${value.slice(1)}`;
  return value;
}
