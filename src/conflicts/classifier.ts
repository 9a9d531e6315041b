import { z } from "zod";
import type { ConflictCheckConfig } from "../config/types.js";
import { fillTemplate, type TextCompletion } from "../llm/completion.js";
import { parseModelJson } from "../llm/json-extract.js";
import type { Logger } from "../logging/logger.js";
import type { Classification, ExistingMemory, MemoryCandidate, Relation } from "./types.js";

const CLASSIFIED_RELATIONS: readonly Relation[] = ["CONFLICT", "UPDATE", "ADDITION", "DUPLICATE"];

const responseSchema = z.object({
  type: z.string(),
  confidence: z.number().optional(),
  reason: z.string().optional(),
});

export interface RelationClassifier {
  classify(
    item: MemoryCandidate,
    existing: ExistingMemory,
    config: ConflictCheckConfig,
  ): Promise<Classification>;
}

function toRelation(value: string): Relation {
  const upper = value.trim().toUpperCase();
  return CLASSIFIED_RELATIONS.find((r) => r === upper) ?? "NONE";
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Asks the completion model how a new memory relates to a stored one.
 * Fails open: any call or parse failure is reported as NONE.
 */
export class ConflictClassifier implements RelationClassifier {
  constructor(
    private readonly completion: TextCompletion,
    private readonly logger: Logger,
  ) {}

  async classify(
    item: MemoryCandidate,
    existing: ExistingMemory,
    config: ConflictCheckConfig,
  ): Promise<Classification> {
    const prompt = fillTemplate(config.promptTemplate, {
      existing: existing.content,
      new: item.content,
    });

    let text: string;
    try {
      text = await this.completion.complete(prompt, config.llm);
    } catch (err) {
      this.logger.warn({ err, existingId: existing.id }, "Conflict classifier call failed");
      return { relation: "NONE", confidence: 0, reason: "Classifier unavailable" };
    }

    const parsed = parseModelJson(text, responseSchema);
    if (!parsed) {
      this.logger.warn({ existingId: existing.id }, "Conflict classifier returned no usable JSON");
      return { relation: "NONE", confidence: 0, reason: "Unparsable classifier response" };
    }

    return {
      relation: toRelation(parsed.type),
      confidence: clamp01(parsed.confidence ?? 0.8),
      reason: parsed.reason ?? "Model determined",
    };
  }
}
