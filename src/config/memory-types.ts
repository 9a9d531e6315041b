import { readFileSync } from "node:fs";
import { z } from "zod";
import type { MemoryTypeDefinition, SlotDefinition } from "./types.js";

export const slotDefinitionSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  icon: z.string().default("📝"),
  inputType: z
    .enum(["text", "dropdown", "datePicker", "timePicker", "chips", "toggle", "textarea"])
    .default("text"),
  placeholder: z.string().optional(),
  questionTemplate: z.string().optional(),
  options: z.array(z.string()).optional(),
});

export const memoryTypeSchema = z.object({
  name: z.string().min(1),
  icon: z.string().default("📝"),
  color: z.string().default("#607D8B"),
  requiredSlots: z.array(slotDefinitionSchema).default([]),
  optionalSlots: z.array(slotDefinitionSchema).default([]),
});

export const memoryTypeRegistrySchema = z.record(memoryTypeSchema);

const REGISTRY_URL = new URL("../../data/memory-types.json", import.meta.url);

let builtIn: Readonly<Record<string, MemoryTypeDefinition>> | null = null;

/**
 * Built-in memory type definitions shipped in `data/memory-types.json`.
 * Parsed once; a broken bundled file is a packaging error and throws.
 */
export function builtInMemoryTypes(): Readonly<Record<string, MemoryTypeDefinition>> {
  if (!builtIn) {
    const raw: unknown = JSON.parse(readFileSync(REGISTRY_URL, "utf-8"));
    builtIn = Object.freeze(memoryTypeRegistrySchema.parse(raw));
  }
  return builtIn;
}

export function requiredSlotIds(typeDef: MemoryTypeDefinition | undefined): string[] {
  return typeDef ? typeDef.requiredSlots.map((s) => s.id) : [];
}

export function findSlot(
  typeDef: MemoryTypeDefinition | undefined,
  slotId: string,
): SlotDefinition | undefined {
  if (!typeDef) return undefined;
  return (
    typeDef.requiredSlots.find((s) => s.id === slotId) ??
    typeDef.optionalSlots.find((s) => s.id === slotId)
  );
}
