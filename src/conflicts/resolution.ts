import type { ConflictCheckConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { findCandidates } from "./candidates.js";
import type { RelationClassifier } from "./classifier.js";
import type {
  CandidateMatch,
  Classification,
  ConflictCheckResult,
  ConflictVerdict,
  ExistingMemory,
  MemoryCandidate,
  Relation,
} from "./types.js";

export type Resolution = "autoResolved" | "pendingClarification" | "continue";

const SEVERITY: Readonly<Record<Relation, number>> = {
  CONFLICT: 3,
  UPDATE: 2,
  DUPLICATE: 1,
  ADDITION: 0,
  NONE: 0,
};

export function resolveRelation(
  relation: Relation,
  behavior: ConflictCheckConfig["behavior"],
): Resolution {
  switch (relation) {
    case "DUPLICATE":
      return behavior.skipDuplicates ? "autoResolved" : "pendingClarification";
    case "UPDATE":
      return behavior.autoResolveUpdates ? "autoResolved" : "pendingClarification";
    case "CONFLICT":
      return "pendingClarification";
    case "ADDITION":
    case "NONE":
      return "continue";
  }
}

interface Qualified {
  readonly match: CandidateMatch;
  readonly classification: Classification;
  readonly resolution: Exclude<Resolution, "continue">;
}

export interface FindConflictsDeps {
  readonly classifier: RelationClassifier;
  readonly logger?: Logger;
}

/**
 * Sort each candidate into clean, auto-resolved or pending clarification.
 * Items are independent; within an item, matches are visited by rank.
 */
export async function findConflicts(
  candidates: readonly MemoryCandidate[],
  existingRecords: readonly ExistingMemory[],
  config: ConflictCheckConfig,
  deps: FindConflictsDeps,
): Promise<ConflictCheckResult> {
  if (!config.enabled || existingRecords.length === 0) {
    return {
      checked: config.enabled ? candidates.length : 0,
      clean: [...candidates],
      autoResolved: [],
      pendingClarifications: [],
      classifierCalls: 0,
    };
  }

  const clean: MemoryCandidate[] = [];
  const autoResolved: ConflictVerdict[] = [];
  const pendingClarifications: ConflictVerdict[] = [];
  let classifierCalls = 0;

  for (const item of candidates) {
    const matches = findCandidates(item, existingRecords, config);
    const chosen: Qualified[] = [];

    for (const match of matches) {
      if (match.similarity < config.similarity.threshold) continue;

      const classification = await deps.classifier.classify(item, match.existing, config);
      classifierCalls++;
      if (config.behavior.logAllChecks) {
        deps.logger?.debug(
          {
            tempId: item.tempId,
            existingId: match.existing.id,
            similarity: match.similarity,
            relation: classification.relation,
          },
          "Conflict check",
        );
      }

      const resolution = resolveRelation(classification.relation, config.behavior);
      if (resolution === "continue") continue;

      chosen.push({ match, classification, resolution });
      if (config.behavior.strategy === "first_match") break;
    }

    const winner = pickMostSevere(chosen);
    if (!winner) {
      clean.push(item);
      continue;
    }

    const verdict: ConflictVerdict = {
      ...winner.classification,
      existing: winner.match.existing,
      candidate: item,
      similarity: winner.match.similarity,
      needsClarification: winner.resolution === "pendingClarification",
      autoResolved: winner.resolution === "autoResolved",
    };
    if (verdict.autoResolved) {
      autoResolved.push(verdict);
    } else {
      pendingClarifications.push(verdict);
    }
  }

  return { checked: candidates.length, clean, autoResolved, pendingClarifications, classifierCalls };
}

/** Highest severity wins; the earlier (better ranked) match wins a tie. */
function pickMostSevere(qualified: readonly Qualified[]): Qualified | undefined {
  let best: Qualified | undefined;
  for (const q of qualified) {
    if (!best || SEVERITY[q.classification.relation] > SEVERITY[best.classification.relation]) {
      best = q;
    }
  }
  return best;
}
