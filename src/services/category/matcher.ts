const STOP_WORDS = new Set(['and', 'the', 'for']);

export interface NamedCategory {
  name: string;
}

/**
 * Find the category that best fits a free-text hint (from a parsed message or
 * an OCR suggestion). Rules, first hit wins:
 *
 * 1. exact name, ignoring case
 * 2. shortest name containing the hint ("dining" -> "Food - Dining Out")
 * 3. longest name contained in the hint ("Food - Dining Out expenses" -> "Dining Out")
 * 4. first category sharing a significant word
 *
 * Ties keep input order, so callers wanting stable results should sort first.
 */
export function matchCategory<T extends NamedCategory>(suggested: string, categories: readonly T[]): T | null {
  const hint = suggested.trim();
  if (!hint || categories.length === 0) {
    return null;
  }
  const hintLower = hint.toLowerCase();

  const exact = categories.find((category) => category.name.toLowerCase() === hintLower);
  if (exact) {
    return exact;
  }

  let containing: T | null = null;
  for (const category of categories) {
    if (!category.name.toLowerCase().includes(hintLower)) {
      continue;
    }
    if (!containing || charLength(category.name) < charLength(containing.name)) {
      containing = category;
    }
  }
  if (containing) {
    return containing;
  }

  let contained: T | null = null;
  for (const category of categories) {
    const nameLower = category.name.toLowerCase();
    if (!nameLower || !hintLower.includes(nameLower)) {
      continue;
    }
    if (!contained || charLength(category.name) > charLength(contained.name)) {
      contained = category;
    }
  }
  if (contained) {
    return contained;
  }

  const hintWords = new Set(extractSignificantWords(hint));
  if (hintWords.size === 0) {
    return null;
  }
  return categories.find((category) => extractSignificantWords(category.name).some((word) => hintWords.has(word))) ?? null;
}

/**
 * Lowercased words of at least three characters, split on "-", "/", "&" and
 * whitespace, without stop words.
 */
export function extractSignificantWords(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[-/&\s]+/)
    .filter((word) => charLength(word) >= 3 && !STOP_WORDS.has(word));
}

/**
 * Copy of the list ordered by id, for deterministic tie-breaking.
 */
export function sortCategoriesById<T extends { id: number }>(categories: readonly T[]): T[] {
  return [...categories].sort((a, b) => a.id - b.id);
}

function charLength(text: string): number {
  return [...text].length;
}
