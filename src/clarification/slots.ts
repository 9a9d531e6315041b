import { requiredSlotIds } from "../config/memory-types.js";
import type { MemoryTypeDefinition } from "../config/types.js";
import type { MemoryCandidate } from "../conflicts/types.js";
import type { SlotValue } from "../store/types.js";
import type { SlotCheck, SlotResolution } from "./types.js";

/** Required slots of the item's type that are absent or unfilled. */
export function checkSlots(item: MemoryCandidate, typeDef: MemoryTypeDefinition | undefined): SlotCheck {
  const missingRequired = requiredSlotIds(typeDef).filter((id) => item.slots[id]?.filled !== true);
  return { missingRequired, complete: missingRequired.length === 0 };
}

/**
 * Apply model-resolved values as a new item. A resolution lands only on a
 * slot the type defines or the item already carries.
 */
export function applyResolutions(
  item: MemoryCandidate,
  resolutions: readonly SlotResolution[],
  typeDef: MemoryTypeDefinition | undefined,
): MemoryCandidate {
  if (resolutions.length === 0) return item;

  const known = new Set([
    ...Object.keys(item.slots),
    ...(typeDef?.requiredSlots ?? []).map((s) => s.id),
    ...(typeDef?.optionalSlots ?? []).map((s) => s.id),
  ]);

  const slots: Record<string, SlotValue> = { ...item.slots };
  let changed = false;
  for (const { slotId, value } of resolutions) {
    if (!known.has(slotId)) continue;
    slots[slotId] = { value, filled: true, source: "model_resolved" };
    changed = true;
  }
  return changed ? { ...item, slots } : item;
}

/**
 * Mean of filled-required / total-required across items. Items whose type
 * requires nothing count as complete; an empty set scores 1.
 */
export function completenessScore(
  items: readonly MemoryCandidate[],
  types: Readonly<Record<string, MemoryTypeDefinition>>,
): number {
  if (items.length === 0) return 1;

  let total = 0;
  for (const item of items) {
    const typeDef = types[item.type];
    const required = requiredSlotIds(typeDef).length;
    if (required === 0) {
      total += 1;
    } else {
      const missing = checkSlots(item, typeDef).missingRequired.length;
      total += (required - missing) / required;
    }
  }
  return total / items.length;
}
