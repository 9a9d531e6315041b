/** Content keywords that put a memory into a conflict-prone category. */
export const CATEGORY_KEYWORDS: Readonly<Record<string, readonly string[]>> = {
  location: ["live", "lives", "living", "moved", "from", "city", "country", "address", "home"],
  job: ["work", "works", "job", "career", "company", "employed", "position", "role", "occupation"],
  relationship: ["married", "wife", "husband", "partner", "girlfriend", "boyfriend", "dating", "single", "divorced"],
  name: ["name", "called", "known as", "nickname"],
  preference: ["like", "love", "hate", "prefer", "favorite", "dislike", "enjoy"],
  personal_info: ["age", "birthday", "born", "years old", "height", "weight"],
};

export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/[^\w\s]/g, "");
}

/** Distinct words longer than two characters. */
export function wordSet(text: string): Set<string> {
  return new Set(
    normalizeText(text)
      .split(/\s+/)
      .filter((w) => w.length > 2),
  );
}

/** Jaccard similarity of the two word sets; 0 when either is empty. */
export function keywordSimilarity(a: string, b: string): number {
  const left = wordSet(a);
  const right = wordSet(b);
  if (left.size === 0 || right.size === 0) return 0;

  let overlap = 0;
  for (const word of left) {
    if (right.has(word)) overlap++;
  }
  const union = left.size + right.size - overlap;
  return overlap / union;
}

/**
 * True when the memory's type is itself one of the configured categories,
 * or its content mentions a keyword of one of them.
 */
export function matchesConflictCategory(
  type: string,
  content: string,
  categories: readonly string[],
): boolean {
  const lowerType = type.toLowerCase();
  if (categories.includes(lowerType)) return true;

  const lowerContent = content.toLowerCase();
  return categories.some((category) =>
    (CATEGORY_KEYWORDS[category] ?? []).some((kw) => lowerContent.includes(kw)),
  );
}
