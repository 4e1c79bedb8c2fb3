/**
 * Count letters and digits in a text, ignoring whitespace, punctuation and
 * control characters.
 */
export function countWordCharacters(text: string): number {
  return text.replace(/[^\p{L}\p{N}]+/gu, '').length;
}

/**
 * Whether a text is too thin to be a trustworthy native extraction.
 */
export function isSparseText(text: string, minChars: number): boolean {
  return countWordCharacters(text) < minChars;
}
