import type { ConflictCheckConfig } from "../config/types.js";
import { keywordSimilarity, matchesConflictCategory } from "./similarity.js";
import type { CandidateMatch, ExistingMemory, MemoryCandidate } from "./types.js";

/**
 * Existing records worth classifying against `item`, best first. A record
 * qualifies when it shares the item's type (or the item falls into a
 * conflict category) and clears half the similarity threshold.
 */
export function findCandidates(
  item: MemoryCandidate,
  existing: readonly ExistingMemory[],
  config: ConflictCheckConfig,
): CandidateMatch[] {
  const floor = config.similarity.threshold * 0.5;
  const inCategory = matchesConflictCategory(item.type, item.content, config.categories);
  const matches: CandidateMatch[] = [];

  for (const record of existing) {
    if (record.status !== "active") continue;
    if (record.type !== item.type && !inCategory) continue;

    const similarity = keywordSimilarity(item.content, record.content);
    if (similarity >= floor) {
      matches.push({ existing: record, similarity });
    }
  }

  // Array.prototype.sort is stable, so equal scores keep store order.
  matches.sort((a, b) => b.similarity - a.similarity);
  return matches.slice(0, config.similarity.maxCandidates);
}
