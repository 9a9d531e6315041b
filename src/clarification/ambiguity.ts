import { z } from "zod";
import { requiredSlotIds } from "../config/memory-types.js";
import type { MemoryTypeDefinition, StageLlmConfig } from "../config/types.js";
import type { MemoryCandidate } from "../conflicts/types.js";
import type { TextCompletion } from "../llm/completion.js";
import { parseModelJson } from "../llm/json-extract.js";
import type { Logger } from "../logging/logger.js";
import type { AmbiguityAnalysis, SlotSuggestion, SuggestionPriority } from "./types.js";

export interface AmbiguityRequest {
  readonly item: MemoryCandidate;
  readonly typeDef: MemoryTypeDefinition | undefined;
  readonly originalMessage: string;
  /** YYYY-MM-DD */
  readonly currentDate: string;
  readonly llm: StageLlmConfig;
}

/** Proposes clarifications for one item. Never decides; see `arbitrate`. */
export interface SlotSuggester {
  suggest(request: AmbiguityRequest): Promise<AmbiguityAnalysis>;
}

export const EMPTY_ANALYSIS: AmbiguityAnalysis = Object.freeze({
  suggestions: [],
  resolvedSlots: {},
  analysis: "",
});

const scalar = z.union([z.string(), z.number(), z.boolean()]);

const suggestionSchema = z.object({
  slotId: z.string().min(1),
  question: z.string().min(1),
  issue: z.string().optional(),
  reason: z.string().optional(),
  priority: z.string().optional(),
  resolvedValue: scalar.nullish(),
});

const responseSchema = z.object({
  suggestions: z.array(z.unknown()).catch([]).default([]),
  resolvedSlots: z.record(scalar).catch({}).default({}),
  analysis: z.string().catch("").default(""),
});

function toPriority(value: string | undefined): SuggestionPriority {
  const lower = value?.toLowerCase();
  return lower === "high" || lower === "low" ? lower : "medium";
}

/** Keep well-formed entries only; defaults fill the optional fields. */
export function sanitizeSuggestions(raw: readonly unknown[]): SlotSuggestion[] {
  const out: SlotSuggestion[] = [];
  for (const entry of raw) {
    const parsed = suggestionSchema.safeParse(entry);
    if (!parsed.success) continue;
    const s = parsed.data;
    const resolved = s.resolvedValue === null || s.resolvedValue === undefined ? "" : String(s.resolvedValue);
    out.push({
      slotId: s.slotId,
      issue: s.issue ?? "ambiguous",
      question: s.question,
      reason: s.reason ?? "",
      priority: toPriority(s.priority),
      ...(resolved.length > 0 ? { resolvedValue: resolved } : {}),
    });
  }
  return out;
}

export function buildAmbiguityPrompt(request: AmbiguityRequest): string {
  const { item, typeDef, originalMessage, currentDate } = request;
  const slotLines = Object.entries(item.slots)
    .map(([id, slot]) => `  - ${id}: ${slot.value === null ? "null" : String(slot.value)} (filled: ${slot.filled})`)
    .join("\n");
  const required = requiredSlotIds(typeDef);

  return `You review a memory extracted from a user's message and point out vague or missing details.

TODAY'S DATE: ${currentDate}

ORIGINAL USER MESSAGE:
"${originalMessage}"

EXTRACTED MEMORY:
- Type: ${item.type}
- Content: ${item.content}
- Slots:
${slotLines || "  (none)"}

REQUIRED SLOTS for ${item.type}: ${required.length > 0 ? required.join(", ") : "none defined"}

Check filled slots for vague values. Turn relative dates ("next tuesday") into calendar dates using today's date. Note a missing time when the memory needs one.

Reply with JSON only, in this shape:
{
  "suggestions": [
    {
      "slotId": "when_date",
      "issue": "ambiguous",
      "question": "Which Tuesday do you mean?",
      "reason": "'tuesday' could be this week or next",
      "priority": "high",
      "resolvedValue": "2025-01-07"
    }
  ],
  "resolvedSlots": { "when_date": "2025-01-07" },
  "analysis": "one sentence"
}

Rules:
- Report real problems only. An empty suggestions array is a valid answer.
- priority is "high" for required slots, "medium" for useful optional ones, "low" otherwise.
- Include resolvedValue only when you can resolve the value with confidence.
- Keep questions short; the user reads them as-is.`;
}

export class AmbiguityAnalyzer implements SlotSuggester {
  constructor(
    private readonly completion: TextCompletion,
    private readonly logger: Logger,
  ) {}

  async suggest(request: AmbiguityRequest): Promise<AmbiguityAnalysis> {
    let text: string;
    try {
      text = await this.completion.complete(buildAmbiguityPrompt(request), request.llm);
    } catch (err) {
      this.logger.warn({ err, tempId: request.item.tempId }, "Ambiguity analysis call failed");
      return EMPTY_ANALYSIS;
    }

    const parsed = parseModelJson(text, responseSchema);
    if (!parsed) {
      this.logger.warn({ tempId: request.item.tempId }, "Ambiguity analysis returned no usable JSON");
      return EMPTY_ANALYSIS;
    }

    const resolvedSlots: Record<string, string> = {};
    for (const [slotId, value] of Object.entries(parsed.resolvedSlots)) {
      resolvedSlots[slotId] = String(value);
    }
    return {
      suggestions: sanitizeSuggestions(parsed.suggestions),
      resolvedSlots,
      analysis: parsed.analysis,
    };
  }
}
