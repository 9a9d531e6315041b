import type { MemoryCard } from "../clarification/types.js";
import type { AssembledContext, ContextMemory } from "../context/types.js";
import type { ChatMessage } from "../store/types.js";

export type ContextMode = "identity_only" | "neutral_ack" | "memory_confirm_allowed" | "memory_use_allowed";

export type SaveDecisionKind =
  | "save"
  | "skip"
  | "update"
  | "ask_user"
  | "keep_both"
  | "reactivate"
  | "hold";

/** The parts of a completion card the prompt needs to mention it. */
export type PendingCard = Pick<MemoryCard, "tempId" | "type" | "icon" | "title" | "complete" | "missingRequired">;

/** Outcome of the upstream save stage. Consumed here, never computed. */
export interface SaveDecision {
  readonly saved: boolean;
  readonly decision?: SaveDecisionKind;
  readonly savedCount?: number;
  readonly reason?: string;
  readonly pendingCards?: readonly PendingCard[];
}

/** Per-item save outcome in the older list format. */
export interface SaveResult {
  readonly saved: boolean;
  readonly content: string;
  readonly reason?: string;
}

export interface QuickReply {
  readonly id: string;
  readonly label: string;
  readonly message: string;
  readonly icon: string;
}

export interface ContextPromptInput {
  readonly iin: string;
  readonly message: string;
  /** A string or `{ primary }`; anything else counts as absent. */
  readonly intent?: unknown;
  readonly memories?: readonly ContextMemory[];
  readonly saveDecision?: SaveDecision;
  readonly saveResults?: readonly SaveResult[];
  readonly sessionId?: string;
  readonly sessionMessages?: readonly ChatMessage[];
}

export interface ContextPrompt {
  readonly system: string;
  readonly memories: string;
  readonly saveInstruction: string;
  readonly user: string;
  readonly full: string;
}

export interface ContextPromptResult {
  readonly prompt: ContextPrompt;
  readonly contextMode: ContextMode;
  readonly intent: string | null;
  readonly memoriesUsed: number;
  readonly memoriesFiltered: number;
  readonly tokenEstimate: number;
  readonly holdForClarification: boolean;
  readonly memoryCards?: readonly PendingCard[];
  readonly quickReplies?: readonly QuickReply[];
  readonly layerContext?: AssembledContext;
}
