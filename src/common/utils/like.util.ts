export const LIKE_ESCAPE = "ESCAPE '\\'";

/**
 * Builds a lower-cased `%fragment%` pattern for a `LOWER(column) LIKE` clause,
 * escaping `%`, `_` and the escape character itself so they match literally.
 */
export function containsPattern(fragment: string): string {
  const escaped = fragment.toLowerCase().replace(/[\\%_]/g, (char) => `\\${char}`);
  return `%${escaped}%`;
}
