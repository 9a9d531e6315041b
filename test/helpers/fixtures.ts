import { resolveClarificationConfig, resolveConflictCheckConfig, resolveContextConfig } from "../../src/config/stages.js";
import type { ClarificationConfig, ConflictCheckConfig, ContextConfig } from "../../src/config/types.js";
import type { ExistingMemory, MemoryCandidate } from "../../src/conflicts/types.js";
import type { ContextMemory } from "../../src/context/types.js";
import type { CompletionParams, TextCompletion } from "../../src/llm/completion.js";
import { createNullLogger } from "../../src/logging/logger.js";
import type { SlotMap, SlotScalar } from "../../src/store/types.js";

type Reply = string | Error | ((prompt: string) => string);

/** Scripted completion: replies are used in order, the last one repeats. */
export class FakeCompletion implements TextCompletion {
  readonly calls: Array<{ prompt: string; params: CompletionParams | undefined }> = [];

  constructor(private readonly replies: Reply[] = []) {}

  async complete(prompt: string, params?: CompletionParams): Promise<string> {
    this.calls.push({ prompt, params });
    const reply = this.replies[Math.min(this.calls.length - 1, this.replies.length - 1)];
    if (reply === undefined) return "";
    if (reply instanceof Error) throw reply;
    return typeof reply === "function" ? reply(prompt) : reply;
  }
}

/** Filled slots from plain values; `null` marks a slot as present but unfilled. */
export function slots(values: Record<string, SlotScalar>): SlotMap {
  const out: Record<string, { value: SlotScalar; filled: boolean; source: string }> = {};
  for (const [id, value] of Object.entries(values)) {
    out[id] = { value, filled: value !== null && value !== "", source: "extracted" };
  }
  return out;
}

export function makeCandidate(overrides: Partial<MemoryCandidate> = {}): MemoryCandidate {
  return {
    tempId: "item-0",
    content: "Dentist appointment Tuesday",
    type: "event",
    confidence: 0.9,
    slots: {},
    ...overrides,
  };
}

export function makeExisting(overrides: Partial<ExistingMemory> = {}): ExistingMemory {
  return {
    id: "mem-1",
    content: "Dentist appointment Tuesday",
    type: "event",
    slots: {},
    status: "active",
    createdAt: 1_700_000_000_000,
    updatedAt: 1_700_000_000_000,
    ...overrides,
  };
}

export function makeMemory(overrides: Partial<ContextMemory> = {}): ContextMemory {
  return {
    id: "mem-1",
    content: "Name is Dana",
    type: "name",
    context: "identity",
    relevance: 0.9,
    tier: "longterm",
    createdAt: 1_700_000_000_000,
    ...overrides,
  };
}

const silent = createNullLogger();

export function conflictConfig(raw: Record<string, unknown> = {}): ConflictCheckConfig {
  return resolveConflictCheckConfig(raw, silent);
}

export function clarificationConfig(raw: Record<string, unknown> = {}): ClarificationConfig {
  return resolveClarificationConfig(raw, silent);
}

export function contextConfig(raw: Record<string, unknown> = {}): ContextConfig {
  return resolveContextConfig(raw, silent);
}
