/**
 * Reserved words that can never be used as a custom alias.
 *
 * Two groups:
 * - system routes served by the API or redirect service
 * - values that read as programming literals or debug endpoints
 *
 * Matching is exact and case-insensitive. Substring matching is not used:
 * it rejects harmless aliases like "my-api-notes".
 */

import reservedWords from "./reserved-words.json";

export const RESERVED_WORDS: ReadonlySet<string> = new Set(
  [...reservedWords.systemRoutes, ...reservedWords.problematic].map((word) => word.toLowerCase())
);

export function isReservedWord(value: string): boolean {
  return RESERVED_WORDS.has(value.toLowerCase());
}

export function getReservedWordCount(): number {
  return RESERVED_WORDS.size;
}
