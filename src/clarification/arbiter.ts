import type {
  ArbitrationPolicy,
  ArbitrationResult,
  DropReason,
  QuestionBudget,
  SlotResolution,
  SlotSuggestion,
} from "./types.js";

/**
 * Decide which model suggestions take effect. Resolved values are applied
 * without touching any budget; a question is queued only for a required
 * slot at high or medium priority while the item cap and the user's
 * fatigue allowance both hold. Everything else is dropped.
 */
export function arbitrate(
  suggestions: readonly SlotSuggestion[],
  policy: ArbitrationPolicy,
  budget: QuestionBudget,
): ArbitrationResult {
  const autoApply: SlotResolution[] = [];
  const resolvedSlots = new Set<string>();
  for (const s of suggestions) {
    if (s.resolvedValue !== undefined && !resolvedSlots.has(s.slotId)) {
      autoApply.push({ slotId: s.slotId, value: s.resolvedValue });
      resolvedSlots.add(s.slotId);
    }
  }

  const ask: SlotSuggestion[] = [];
  const dropped: Array<{ suggestion: SlotSuggestion; reason: DropReason }> = [];
  const asking = new Set<string>();
  let queued = budget.queuedThisTurn;

  for (const s of suggestions) {
    if (s.resolvedValue !== undefined) continue;

    let reason: DropReason | null = null;
    if (resolvedSlots.has(s.slotId)) reason = "resolved";
    else if (asking.has(s.slotId)) reason = "duplicate";
    else if (!policy.requiredSlotIds.includes(s.slotId)) reason = "optional_slot";
    else if (s.priority === "low") reason = "low_priority";
    else if (ask.length >= policy.maxQuestions) reason = "item_cap";
    else if (budget.questionsAskedCount + queued >= policy.allowPartialAfter) reason = "fatigue";

    if (reason) {
      dropped.push({ suggestion: s, reason });
      continue;
    }
    ask.push(s);
    asking.add(s.slotId);
    queued++;
  }

  return { autoApply, ask, dropped };
}
