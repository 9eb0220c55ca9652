// ============================================
// KEYWORD MATCHING HELPERS
// ============================================

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Case-insensitive whole-word (or whole-phrase) match.
 */
export function containsTerm(text: string, term: string): boolean {
  return new RegExp(`\\b${escapeRegExp(term)}\\b`, "i").test(text);
}

export function findTerms(text: string, terms: readonly string[]): string[] {
  return terms.filter((term) => containsTerm(text, term));
}

export function containsAny(text: string, terms: readonly string[]): boolean {
  return terms.some((term) => containsTerm(text, term));
}

/**
 * First label whose term list matches, in declaration order.
 */
export function firstMatchingLabel(
  text: string,
  table: ReadonlyArray<readonly [string, readonly string[]]>,
  fallback: string
): string {
  for (const [label, terms] of table) {
    if (containsAny(text, terms)) return label;
  }
  return fallback;
}
