import type { MemoryRecord, SlotMap } from "../store/types.js";

/** A memory produced by the upstream extraction stage for the current turn. */
export interface MemoryCandidate {
  readonly tempId: string;
  readonly content: string;
  readonly type: string;
  readonly confidence: number;
  readonly slots: SlotMap;
}

export type ExistingMemory = Pick<
  MemoryRecord,
  "id" | "content" | "type" | "slots" | "status" | "createdAt" | "updatedAt"
>;

export type Relation = "CONFLICT" | "UPDATE" | "ADDITION" | "DUPLICATE" | "NONE";

export interface Classification {
  readonly relation: Relation;
  readonly confidence: number;
  readonly reason: string;
}

export interface CandidateMatch {
  readonly existing: ExistingMemory;
  readonly similarity: number;
}

export interface ConflictVerdict extends Classification {
  readonly existing: ExistingMemory;
  readonly candidate: MemoryCandidate;
  readonly similarity: number;
  readonly needsClarification: boolean;
  readonly autoResolved: boolean;
}

export interface ConflictCheckResult {
  readonly checked: number;
  readonly clean: readonly MemoryCandidate[];
  readonly autoResolved: readonly ConflictVerdict[];
  readonly pendingClarifications: readonly ConflictVerdict[];
  readonly classifierCalls: number;
}
