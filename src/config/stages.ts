import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import { builtInMemoryTypes, memoryTypeRegistrySchema } from "./memory-types.js";
import type {
  ClarificationConfig,
  ConflictCheckConfig,
  ContextConfig,
  LayerName,
  StageName,
} from "./types.js";

export const STAGE_NAMES = ["conflict_check", "clarification", "context_injection"] as const;

export const LAYER_NAMES = ["immediate", "sessionSummary", "profile", "calendar", "longRange"] as const;

export function isStageName(value: string): value is StageName {
  return STAGE_NAMES.some((name) => name === value);
}

const DEFAULT_CONFLICT_PROMPT = `You compare two statements about the same user and classify how they relate.

EXISTING MEMORY: {{existing}}
NEW INFORMATION: {{new}}

Pick exactly one relation:
- CONFLICT: the statements contradict each other
- UPDATE: the new statement replaces the old one over time
- ADDITION: both statements can be true at once
- DUPLICATE: both statements say the same thing

Answer with a single JSON object:
{
  "type": "CONFLICT|UPDATE|ADDITION|DUPLICATE",
  "confidence": 0.0-1.0,
  "reason": "short explanation"
}`;

const DEFAULT_PERSONA =
  "You are a personal memory assistant. You know the user and draw on what you remember about them to give personal, helpful answers. Stay friendly and aware of the conversation so far.";

const DEFAULT_SUMMARY_PROMPT = `Summarize the following conversation in 2-3 sentences. Focus on the topics discussed and any decisions or facts worth keeping.

Conversation:
{{messages}}

Summary:`;

const DEFAULT_TYPE_SETTINGS: Readonly<Record<string, { maxQuestions: number }>> = {
  event: { maxQuestions: 3 },
  todo: { maxQuestions: 2 },
  goal: { maxQuestions: 2 },
  relationship: { maxQuestions: 1 },
  preference: { maxQuestions: 0 },
  fact: { maxQuestions: 1 },
};

const DEFAULT_HEADERS: Readonly<Record<LayerName, string>> = {
  profile: "USER PROFILE:",
  calendar: "UPCOMING EVENTS:",
  longRange: "PAST CONVERSATIONS:",
  sessionSummary: "SESSION CONTEXT:",
  immediate: "RECENT CONVERSATION:",
};

function stageLlmSchema(temperature: number, maxTokens: number) {
  return z
    .object({
      model: z.string().min(1).optional(),
      temperature: z.number().min(0).max(2).default(temperature),
      maxTokens: z.number().int().positive().default(maxTokens),
    })
    .default({});
}

const ratio = z.number().min(0).max(1);
const count = z.number().int().min(0);
const budget = z.number().int().positive();

// ── conflict_check ──

export const conflictCheckSchema = z.object({
  enabled: z.boolean().default(true),
  similarity: z
    .object({
      threshold: ratio.default(0.75),
      maxCandidates: count.default(10),
      maxExisting: z.number().int().positive().default(100),
    })
    .default({}),
  categories: z
    .array(z.string().min(1))
    .default(["location", "job", "relationship", "name", "preference", "personal_info"]),
  behavior: z
    .object({
      autoResolveUpdates: z.boolean().default(false),
      skipDuplicates: z.boolean().default(true),
      logAllChecks: z.boolean().default(true),
      strategy: z.enum(["first_match", "severity"]).default("first_match"),
    })
    .default({}),
  llm: stageLlmSchema(0.2, 200),
  promptTemplate: z.string().min(1).default(DEFAULT_CONFLICT_PROMPT),
});

// ── clarification ──

export const clarificationSchema = z.object({
  enabled: z.boolean().default(true),
  mode: z.enum(["local", "hybrid", "llm"]).default("local"),
  behavior: z
    .object({
      whenIncomplete: z.enum(["ask", "savePartial", "reject"]).default("ask"),
      allowPartialAfter: count.default(3),
    })
    .default({}),
  limits: z
    .object({
      maxQuestionsPerTurn: count.default(1),
      maxQuestionsPerMemory: count.default(3),
    })
    .default({}),
  typeSettings: z.record(z.object({ maxQuestions: count })).default({}),
  types: memoryTypeRegistrySchema.default({}),
  llm: stageLlmSchema(0.2, 500),
});

// ── context_injection ──

const layersSchema = z
  .object({
    immediate: z
      .object({
        enabled: z.boolean().default(true),
        maxMessages: z.number().int().positive().default(10),
        tokenBudget: budget.default(400),
        format: z.enum(["conversation", "compact", "json"]).default("conversation"),
      })
      .default({}),
    sessionSummary: z
      .object({
        enabled: z.boolean().default(true),
        threshold: count.default(20),
        summarizeCount: z.number().int().positive().default(15),
        tokenBudget: budget.default(200),
        cacheEnabled: z.boolean().default(true),
        cacheTtlMinutes: z.number().positive().default(30),
      })
      .default({}),
    profile: z
      .object({
        enabled: z.boolean().default(true),
        maxMemories: z.number().int().positive().default(10),
        tokenBudget: budget.default(300),
        minRelevance: ratio.default(0.3),
        includeTypes: z.array(z.string()).default(["fact", "preference", "relationship", "goal"]),
        excludeTypes: z.array(z.string()).default(["note", "event"]),
      })
      .default({}),
    calendar: z
      .object({
        enabled: z.boolean().default(true),
        lookaheadHours: z.number().positive().default(48),
        tokenBudget: budget.default(100),
        maxEvents: z.number().int().positive().default(10),
        format: z.enum(["list", "prose", "json"]).default("list"),
        timeZone: z
          .string()
          .default("UTC")
          .refine(isValidTimeZone, { message: "Unknown IANA time zone" }),
      })
      .default({}),
    longRange: z
      .object({
        enabled: z.boolean().default(true),
        maxDays: z.number().int().positive().default(7),
        tokenBudget: budget.default(200),
      })
      .default({}),
  })
  .default({});

export const contextSchema = z.object({
  injection: z
    .object({
      enabled: z.boolean().default(true),
      maxMemories: z.number().int().positive().default(10),
      minRelevance: ratio.default(0.3),
      sortBy: z.enum(["relevance", "recency", "type", "none"]).default("relevance"),
    })
    .default({}),
  filter: z
    .object({
      types: z
        .array(z.string())
        .default(["name", "fact", "preference", "relationship", "event", "goal", "todo"]),
      tiers: z.array(z.string()).default(["working", "longterm"]),
    })
    .default({}),
  prompts: z
    .object({
      persona: z.string().min(1).default(DEFAULT_PERSONA),
      memoryHeader: z.string().default("Here is what you know about the user:"),
      memoryItemFormat: z.string().default("- {{content}}"),
      noMemoriesText: z.string().default("You don't have any memories about this user yet."),
      userMessageFormat: z.string().default("User: {{message}}"),
    })
    .default({}),
  layers: layersSchema,
  sections: z
    .object({
      order: z
        .array(z.enum(LAYER_NAMES))
        .default(["profile", "calendar", "longRange", "sessionSummary", "immediate"])
        .refine((order) => new Set(order).size === order.length, {
          message: "Section order must not repeat a layer",
        }),
      headers: z
        .object({
          immediate: z.string().default(DEFAULT_HEADERS.immediate),
          sessionSummary: z.string().default(DEFAULT_HEADERS.sessionSummary),
          profile: z.string().default(DEFAULT_HEADERS.profile),
          calendar: z.string().default(DEFAULT_HEADERS.calendar),
          longRange: z.string().default(DEFAULT_HEADERS.longRange),
        })
        .default({}),
    })
    .default({}),
  summary: z
    .object({
      model: z.string().min(1).optional(),
      temperature: z.number().min(0).max(2).default(0.3),
      maxTokens: z.number().int().positive().default(200),
      prompt: z.string().min(1).default(DEFAULT_SUMMARY_PROMPT),
    })
    .default({}),
});

function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Parse a stored stage document. Absent documents silently take defaults;
 * invalid ones are logged and replaced wholesale by defaults.
 */
function parseStage<S extends z.ZodTypeAny>(
  stage: StageName,
  schema: S,
  raw: unknown,
  logger: Logger,
): z.output<S> {
  if (raw === undefined || raw === null) {
    logger.debug({ stage }, "No stage config stored, using defaults");
    return schema.parse({});
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    logger.warn(
      { stage, issues: parsed.error.flatten() },
      "Invalid stage config, falling back to defaults",
    );
    return schema.parse({});
  }
  return parsed.data;
}

export function resolveConflictCheckConfig(raw: unknown, logger: Logger): ConflictCheckConfig {
  const config: ConflictCheckConfig = parseStage("conflict_check", conflictCheckSchema, raw, logger);
  return deepFreeze(config);
}

export function resolveClarificationConfig(raw: unknown, logger: Logger): ClarificationConfig {
  const parsed = parseStage("clarification", clarificationSchema, raw, logger);
  const config: ClarificationConfig = {
    ...parsed,
    typeSettings: { ...DEFAULT_TYPE_SETTINGS, ...parsed.typeSettings },
    types: { ...builtInMemoryTypes(), ...parsed.types },
  };
  return deepFreeze(config);
}

export function resolveContextConfig(raw: unknown, logger: Logger): ContextConfig {
  const config: ContextConfig = parseStage("context_injection", contextSchema, raw, logger);
  return deepFreeze(config);
}

/** Validate a stage document without falling back; used for caller-requested writes. */
export function validateStageConfig(
  stage: StageName,
  raw: unknown,
): { ok: true } | { ok: false; issues: string[] } {
  const schema =
    stage === "conflict_check"
      ? conflictCheckSchema
      : stage === "clarification"
        ? clarificationSchema
        : contextSchema;
  const parsed = schema.safeParse(raw);
  if (parsed.success) return { ok: true };
  return {
    ok: false,
    issues: parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
  };
}

export interface StageConfigSource {
  readStageConfig(name: StageName): unknown;
}

/**
 * Reads stage documents from the store on every call so that edits take
 * effect on the next turn. Store failures degrade to defaults.
 */
export class StageConfigResolver {
  constructor(
    private readonly source: StageConfigSource | null,
    private readonly logger: Logger,
  ) {}

  conflictCheck(): ConflictCheckConfig {
    return resolveConflictCheckConfig(this.read("conflict_check"), this.logger);
  }

  clarification(): ClarificationConfig {
    return resolveClarificationConfig(this.read("clarification"), this.logger);
  }

  context(): ContextConfig {
    return resolveContextConfig(this.read("context_injection"), this.logger);
  }

  private read(stage: StageName): unknown {
    if (!this.source) return undefined;
    try {
      return this.source.readStageConfig(stage);
    } catch (err) {
      this.logger.warn({ err, stage }, "Stage config unreadable, using defaults");
      return undefined;
    }
  }
}
