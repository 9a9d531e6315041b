import type { ClarificationMode, SlotDefinition } from "../config/types.js";
import type { ConflictVerdict, MemoryCandidate } from "../conflicts/types.js";
import type { SlotScalar } from "../store/types.js";

export type SuggestionPriority = "high" | "medium" | "low";

export interface SlotSuggestion {
  readonly slotId: string;
  readonly issue: string;
  readonly question: string;
  readonly reason: string;
  readonly priority: SuggestionPriority;
  readonly resolvedValue?: string;
}

export interface AmbiguityAnalysis {
  readonly suggestions: readonly SlotSuggestion[];
  /** Reported by the model for diagnostics; only `resolvedValue` is ever applied. */
  readonly resolvedSlots: Readonly<Record<string, string>>;
  readonly analysis: string;
}

export interface SlotCheck {
  readonly missingRequired: readonly string[];
  readonly complete: boolean;
}

export interface ArbitrationPolicy {
  readonly requiredSlotIds: readonly string[];
  /** Questions this item may raise. */
  readonly maxQuestions: number;
  /** Stop asking once asked + queued reaches this. */
  readonly allowPartialAfter: number;
}

export interface QuestionBudget {
  readonly questionsAskedCount: number;
  readonly queuedThisTurn: number;
}

export type DropReason = "optional_slot" | "low_priority" | "item_cap" | "fatigue" | "resolved" | "duplicate";

export interface SlotResolution {
  readonly slotId: string;
  readonly value: string;
}

export interface ArbitrationResult {
  readonly autoApply: readonly SlotResolution[];
  readonly ask: readonly SlotSuggestion[];
  readonly dropped: ReadonlyArray<{ readonly suggestion: SlotSuggestion; readonly reason: DropReason }>;
}

export interface MemoryCard {
  readonly tempId: string;
  readonly type: string;
  readonly status: "pending" | "complete";
  readonly icon: string;
  readonly title: string;
  readonly subtitle: string;
  readonly color: string;
  readonly complete: boolean;
  readonly missingRequired: readonly string[];
  readonly typeConfig: {
    readonly requiredSlots: readonly SlotDefinition[];
    readonly optionalSlots: readonly SlotDefinition[];
  };
  readonly slots: Readonly<Record<string, { readonly value: SlotScalar; readonly filled: boolean }>>;
}

export type ConflictAction = "replace" | "keep_both" | "discard";

export interface ConflictOption {
  readonly id: ConflictAction;
  readonly label: string;
  readonly action: ConflictAction;
}

export interface ConflictCard {
  readonly conflictId: string;
  readonly type: "UPDATE" | "CONFLICT";
  readonly existingMemory: { readonly id: string; readonly content: string; readonly type: string };
  readonly newMemory: { readonly tempId: string; readonly content: string; readonly type: string };
  readonly question: string;
  readonly options: readonly ConflictOption[];
}

export type TurnAction = "proceed" | "ask" | "savePartial" | "reject";

export interface ClarificationInput {
  readonly iin: string;
  readonly items: readonly MemoryCandidate[];
  readonly pendingConflicts: readonly ConflictVerdict[];
  readonly originalMessage: string;
  readonly questionsAskedCount: number;
  /** YYYY-MM-DD; defaults to today (UTC). */
  readonly currentDate?: string;
}

export interface ClarificationDecision {
  readonly mode: ClarificationMode;
  readonly holdForClarification: boolean;
  readonly action: TurnAction;
  readonly questions: readonly string[];
  readonly memoryCards: readonly MemoryCard[];
  readonly conflictCards: readonly ConflictCard[];
  readonly completenessScore: number;
  /** Items after slot auto-resolution. */
  readonly items: readonly MemoryCandidate[];
}
