/**
 * Build a lower-cased `LIKE` pattern matching `term` anywhere in a value.
 * Wildcards in the term are escaped with `\`, so queries using the pattern
 * must declare `ESCAPE '\'`.
 */
export function containsPattern(term: string): string {
  const escaped = term.toLowerCase().replace(/[\\%_]/g, (char) => `\\${char}`);
  return `%${escaped}%`;
}

export const LIKE_ESCAPE = "ESCAPE '\\'";
