import type { ContextMode } from "./types.js";

export const GREETING_INTENTS: ReadonlySet<string> = new Set(["greeting", "smalltalk"]);

export const MEMORY_USE_INTENTS: ReadonlySet<string> = new Set([
  "question",
  "memory_recall",
  "memory_recall_temporal",
  "recommendation",
  "advice",
]);

export const MEMORY_INSTRUCTION = "memory_instruction";

/**
 * Lower-cased intent label from an upstream signal: either a string or an
 * object with a string `primary`. Returns undefined for anything else; no
 * intent is ever inferred from the message.
 */
export function normalizeIntent(signal: unknown): string | undefined {
  let label: unknown = signal;
  if (typeof signal === "object" && signal !== null && "primary" in signal) {
    label = signal.primary;
  }
  if (typeof label !== "string") return undefined;
  const normalized = label.trim().toLowerCase();
  return normalized === "" ? undefined : normalized;
}

export function deriveContextMode(intent: string | undefined): ContextMode {
  if (intent === undefined) return "neutral_ack";
  if (GREETING_INTENTS.has(intent)) return "identity_only";
  if (intent === MEMORY_INSTRUCTION) return "memory_confirm_allowed";
  if (MEMORY_USE_INTENTS.has(intent)) return "memory_use_allowed";
  return "neutral_ack";
}
