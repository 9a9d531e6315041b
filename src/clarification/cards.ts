import { findSlot } from "../config/memory-types.js";
import type { MemoryTypeDefinition } from "../config/types.js";
import type { ConflictVerdict, MemoryCandidate } from "../conflicts/types.js";
import type { SlotMap, SlotScalar } from "../store/types.js";
import type { ConflictCard, ConflictOption, MemoryCard } from "./types.js";

const DEFAULT_ICON = "📝";
const DEFAULT_COLOR = "#607D8B";

export const CONFLICT_OPTIONS: readonly ConflictOption[] = Object.freeze([
  { id: "replace", label: "Update to new", action: "replace" },
  { id: "keep_both", label: "Keep both", action: "keep_both" },
  { id: "discard", label: "Keep old, discard new", action: "discard" },
]);

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function slotText(slots: SlotMap, id: string): string {
  const value = slots[id]?.value;
  return value === null || value === undefined ? "" : String(value);
}

export function cardTitle(item: MemoryCandidate): string {
  const { slots } = item;
  switch (item.type) {
    case "event":
      return capitalize(slotText(slots, "what")) || "Event";
    case "relationship":
      return capitalize(slotText(slots, "person_name")) || "Person";
    case "preference":
      return capitalize(slotText(slots, "what")) || "Preference";
    case "todo":
      return capitalize(slotText(slots, "task").slice(0, 30)) || "Task";
    case "goal":
      return capitalize(slotText(slots, "goal").slice(0, 30)) || "Goal";
    case "fact":
      return capitalize(slotText(slots, "subject")) || "Fact";
    default:
      return capitalize(item.type);
  }
}

export function cardSubtitle(item: MemoryCandidate): string {
  const { slots } = item;
  switch (item.type) {
    case "event": {
      const date = slotText(slots, "when_date");
      const time = slotText(slots, "when_time");
      if (date && time) return `${date} at ${time}`;
      return date || "No date set";
    }
    case "relationship":
      return capitalize(slotText(slots, "relationship_type"));
    case "preference":
      return slotText(slots, "sentiment");
    case "todo":
      return slotText(slots, "due_date");
    case "goal":
      return slotText(slots, "target_date");
    case "fact":
      return slotText(slots, "value").slice(0, 40);
    default:
      return "";
  }
}

export function buildMemoryCard(
  item: MemoryCandidate,
  typeDef: MemoryTypeDefinition | undefined,
  missingRequired: readonly string[],
): MemoryCard {
  const slots: Record<string, { value: SlotScalar; filled: boolean }> = {};
  for (const [id, slot] of Object.entries(item.slots)) {
    slots[id] = { value: slot.value, filled: slot.filled };
  }
  const complete = missingRequired.length === 0;

  return {
    tempId: item.tempId,
    type: item.type,
    status: complete ? "complete" : "pending",
    icon: typeDef?.icon ?? DEFAULT_ICON,
    title: cardTitle(item),
    subtitle: cardSubtitle(item),
    color: typeDef?.color ?? DEFAULT_COLOR,
    complete,
    missingRequired: [...missingRequired],
    typeConfig: {
      requiredSlots: typeDef?.requiredSlots ?? [],
      optionalSlots: typeDef?.optionalSlots ?? [],
    },
    slots,
  };
}

export function buildConflictCard(verdict: ConflictVerdict): ConflictCard {
  const { existing, candidate } = verdict;
  const isUpdate = verdict.relation === "UPDATE";
  return {
    conflictId: `conflict_${candidate.tempId}_${existing.id}`,
    type: isUpdate ? "UPDATE" : "CONFLICT",
    existingMemory: { id: existing.id, content: existing.content, type: existing.type },
    newMemory: { tempId: candidate.tempId, content: candidate.content, type: candidate.type },
    question: isUpdate
      ? `I remember "${existing.content}". Did this change to "${candidate.content}"?`
      : `I have conflicting information: "${existing.content}" vs "${candidate.content}". Which is correct?`,
    options: CONFLICT_OPTIONS,
  };
}

/** "when_date" → "when date" */
export function humanizeSlotId(slotId: string): string {
  return slotId.replace(/[_-]+/g, " ").trim().toLowerCase();
}

/**
 * One question per missing slot: the slot's template with `{slot}`
 * placeholders filled from the item's filled slots. A slot without a
 * template, or a template naming an unfilled slot, gets the generic one.
 */
export function generateQuestions(
  item: MemoryCandidate,
  typeDef: MemoryTypeDefinition | undefined,
  missingSlotIds: readonly string[],
): string[] {
  return missingSlotIds.map((slotId) => {
    const template = findSlot(typeDef, slotId)?.questionTemplate;
    const filledValue = (key: string): string | undefined => {
      const slot = item.slots[key];
      return slot?.filled && slot.value !== null && slot.value !== "" ? String(slot.value) : undefined;
    };
    const keys = template ? [...template.matchAll(/\{(\w+)\}/g)].map((m) => m[1] ?? "") : [];
    if (!template || keys.some((key) => filledValue(key) === undefined)) {
      return `What is the ${humanizeSlotId(slotId)}?`;
    }
    return template.replace(/\{(\w+)\}/g, (match, key: string) => filledValue(key) ?? match);
  });
}
