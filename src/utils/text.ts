/**
 * Transcript text helpers
 */

/**
 * Trim and collapse every whitespace run to a single space
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Number of whitespace-separated words
 */
export function countWords(text: string): number {
  const normalized = normalizeWhitespace(text);
  return normalized ? normalized.split(' ').length : 0;
}

/**
 * Cut text to at most `maxChars` characters
 */
export function truncateText(text: string, maxChars: number): string {
  return text.length > maxChars ? text.slice(0, maxChars) : text;
}
