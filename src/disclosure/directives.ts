import type { ContextMode, PendingCard, SaveDecision, SaveResult } from "./types.js";

const MODE_DIRECTIVES: Readonly<Record<ContextMode, string>> = {
  identity_only: [
    "[CONTEXT MODE: IDENTITY ONLY]",
    "You may greet the user by name.",
    "Do NOT bring up personal facts, preferences, plans, work, family or past events.",
    "Do NOT suggest that anything is being remembered or recalled.",
  ].join("\n"),
  neutral_ack: [
    "[CONTEXT MODE: NEUTRAL ACKNOWLEDGEMENT]",
    "Respond to the statement conversationally.",
    "Do NOT say that you will remember, store or recall it later.",
    "Do NOT bring up unrelated personal memories.",
  ].join("\n"),
  memory_confirm_allowed: [
    "[CONTEXT MODE: MEMORY CONFIRMATION ALLOWED]",
    "You may confirm a save only when a save confirmation appears below.",
    "Do not repeat unrelated memories.",
  ].join("\n"),
  memory_use_allowed: [
    "[CONTEXT MODE: MEMORY USE ALLOWED]",
    "The memories listed below describe this user.",
    "Use them to make your answer personal and specific.",
    "When a memory bears on the question, work it into the reply naturally instead of only acknowledging it.",
  ].join("\n"),
};

export const ANTI_INVENTION_GUARD = [
  "Only refer to memories that appear in this prompt.",
  "Never make up earlier conversations, saved memories or confirmations.",
  "Without a save confirmation below, nothing was saved.",
].join("\n");

export const NO_SAVE_DIRECTIVE = [
  "[MEMORY RULE: NOTHING SAVED]",
  "No memory was saved during this message.",
  "You MUST NOT say or suggest that you:",
  "  - remembered this",
  "  - saved or stored this",
  "  - updated your memory",
  "  - will recall this later",
  "Treat what the user said as conversation only.",
  'A neutral acknowledgement such as "Got it" or "Thanks for telling me" is fine.',
  "[END RULE]",
].join("\n");

const SAVE_CONFIRMED_DIRECTIVE = [
  "[MEMORY SAVE CONFIRMED]",
  "The information from this message was saved.",
  'You may tell the user it was saved, e.g. "I\'ll remember that".',
  "[END CONFIRMATION]",
].join("\n");

export function modeDirective(mode: ContextMode): string {
  return MODE_DIRECTIVES[mode];
}

export interface SaveSignals {
  readonly saveDecision?: SaveDecision;
  readonly saveResults?: readonly SaveResult[];
}

/**
 * The only place a save may be confirmed. A supplied decision wins outright;
 * without one, any saved legacy result confirms and lists what was saved.
 * Every other case gets {@link NO_SAVE_DIRECTIVE}.
 */
export function buildSaveDirective({ saveDecision, saveResults }: SaveSignals): string {
  if (saveDecision !== undefined) {
    return saveDecision.saved === true ? SAVE_CONFIRMED_DIRECTIVE : NO_SAVE_DIRECTIVE;
  }

  const saved = (saveResults ?? []).filter((r) => r.saved === true);
  if (saved.length === 0) return NO_SAVE_DIRECTIVE;

  return [
    "[MEMORY SAVE CONFIRMED]",
    "Saved to memory:",
    ...saved.map((r) => `  * "${r.content}"`),
    "You may tell the user this was saved.",
    "[END CONFIRMATION]",
  ].join("\n");
}

/** Keeps the reply short while completion cards are on screen. */
export function buildHoldDirective(cards: readonly PendingCard[]): string {
  const incomplete = cards.filter((c) => !c.complete).length;
  const lines = cards.map(
    (c) => `- ${c.icon} ${c.title}: missing ${c.missingRequired.length > 0 ? c.missingRequired.join(", ") : "none"}`,
  );
  return [
    "[CONTEXT: MEMORY CARDS PENDING]",
    "The user shared something that is being captured.",
    `${incomplete} item(s) need more details before they can be saved.`,
    "",
    "Detected items:",
    ...lines,
    "",
    "Cards in the app ask for the missing details. Reply briefly: say what you understood and do not list the missing fields.",
  ].join("\n");
}
