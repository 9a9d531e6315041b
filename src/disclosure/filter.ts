import type { ContextConfig, MemorySortOrder } from "../config/types.js";
import type { ContextMemory } from "../context/types.js";
import { fillTemplate } from "../llm/completion.js";
import { GREETING_INTENTS, MEMORY_INSTRUCTION, MEMORY_USE_INTENTS } from "./intent.js";

/** Types never shown for a greeting, even when tagged as identity. */
export const PERSONAL_MEMORY_TYPES: ReadonlySet<string> = new Set([
  "event",
  "appointment",
  "preference",
  "work",
  "todo",
  "goal",
  "relationship",
]);

const HIGH_RELEVANCE_FACT = 0.8;

function isIdentity(memory: ContextMemory): boolean {
  return memory.type.toLowerCase() === "name" || memory.context?.toLowerCase() === "identity";
}

function sortMemories(memories: readonly ContextMemory[], sortBy: MemorySortOrder): ContextMemory[] {
  switch (sortBy) {
    case "relevance":
      return [...memories].sort((a, b) => b.relevance - a.relevance);
    case "recency":
      return [...memories].sort((a, b) => (b.createdAt ?? 0) - (a.createdAt ?? 0));
    case "type":
      return [...memories].sort((a, b) => a.type.localeCompare(b.type));
    case "none":
      return [...memories];
  }
}

/** Type, tier and relevance filters, then the configured order and cap. */
export function selectMemories(memories: readonly ContextMemory[], config: ContextConfig): ContextMemory[] {
  const { filter, injection } = config;
  const eligible = memories.filter(
    (m) =>
      filter.types.includes(m.type) && filter.tiers.includes(m.tier) && m.relevance >= injection.minRelevance,
  );
  return sortMemories(eligible, injection.sortBy).slice(0, injection.maxMemories);
}

/**
 * Narrows the selection to what the intent may see. Never adds memories.
 */
export function filterMemoriesByIntent(
  memories: readonly ContextMemory[],
  intent: string | undefined,
): ContextMemory[] {
  if (intent === undefined) return memories.filter(isIdentity);

  if (GREETING_INTENTS.has(intent)) {
    return memories.filter((m) => isIdentity(m) && !PERSONAL_MEMORY_TYPES.has(m.type.toLowerCase()));
  }

  if (intent === MEMORY_INSTRUCTION || MEMORY_USE_INTENTS.has(intent)) return [...memories];

  return memories.filter(
    (m) => isIdentity(m) || (m.type.toLowerCase() === "fact" && m.relevance >= HIGH_RELEVANCE_FACT),
  );
}

export function formatMemories(memories: readonly ContextMemory[], itemFormat: string): string {
  return memories
    .map((m) => fillTemplate(itemFormat, { content: m.content, type: m.type, context: m.context ?? "" }))
    .join("\n");
}
