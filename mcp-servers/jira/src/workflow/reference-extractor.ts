import { TESTIM_REFERENCE_PATTERNS } from '../utils/patterns.js';

/**
 * Find Testim references in a description and its comments.
 * Primary text first, then each secondary text; per text, each pattern in order.
 * Exact duplicates are dropped, keeping the first occurrence.
 */
export function findTestimReferences(
  primaryText: string,
  secondaryTexts: readonly string[] = [],
  patterns: readonly RegExp[] = TESTIM_REFERENCE_PATTERNS
): string[] {
  const seen = new Set<string>();
  const references: string[] = [];

  for (const text of [primaryText, ...secondaryTexts]) {
    if (!text) continue;
    for (const pattern of patterns) {
      for (const match of text.matchAll(pattern)) {
        const reference = match[0];
        if (!seen.has(reference)) {
          seen.add(reference);
          references.push(reference);
        }
      }
    }
  }

  return references;
}
