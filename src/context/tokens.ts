/**
 * Approximate token count: one token per four characters, rounded up.
 * Deterministic and monotonic in text length, which the trimming loops
 * rely on to terminate.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export interface TrimResult<T> {
  readonly items: T[];
  readonly content: string;
  readonly trimmed: boolean;
}

/**
 * Drop one item at a time (the index `pick` chooses) and re-render until the
 * content fits `budget` or a single item remains.
 */
export function trimToBudget<T>(
  items: readonly T[],
  render: (items: readonly T[]) => string,
  budget: number,
  pick: (items: readonly T[]) => number,
): TrimResult<T> {
  let kept = [...items];
  let content = render(kept);
  let trimmed = false;

  while (kept.length > 1 && estimateTokens(content) > budget) {
    const index = pick(kept);
    kept = kept.filter((_, i) => i !== index);
    content = render(kept);
    trimmed = true;
  }

  return { items: kept, content, trimmed };
}

export const dropFirst = (): number => 0;

export const dropLast = <T>(items: readonly T[]): number => items.length - 1;
