import { z } from "zod";
import { MalformedInputError } from "../errors.js";
import { slotMapSchema, topicsSchema } from "../store/schemas.js";

const iinSchema = z.string().trim().min(1);

const candidateSchema = z.object({
  tempId: z.string().min(1).optional(),
  content: z.string().min(1),
  type: z.string().min(1),
  confidence: z.number().min(0).max(1).default(1),
  slots: slotMapSchema.default({}),
});

/** Extracted items; those without a tempId get `item-<index>`. */
const candidatesSchema = z
  .array(candidateSchema)
  .transform((items) => items.map((item, index) => ({ ...item, tempId: item.tempId ?? `item-${index}` })));

const existingMemorySchema = z.object({
  id: z.string().min(1),
  content: z.string(),
  type: z.string().min(1),
  slots: slotMapSchema.default({}),
  status: z.enum(["active", "inactive"]).default("active"),
  createdAt: z.number().default(0),
  updatedAt: z.number().default(0),
});

const verdictSchema = z.object({
  existing: existingMemorySchema,
  candidate: candidateSchema.extend({ tempId: z.string().min(1) }),
  relation: z.enum(["CONFLICT", "UPDATE", "ADDITION", "DUPLICATE", "NONE"]),
  confidence: z.number().min(0).max(1).default(0.8),
  reason: z.string().default(""),
  similarity: z.number().min(0).max(1).default(0),
  needsClarification: z.boolean().default(true),
  autoResolved: z.boolean().default(false),
});

const contextMemorySchema = z.object({
  id: z.string().min(1),
  content: z.string(),
  type: z.string().min(1),
  context: z.string().nullable().optional(),
  relevance: z.number().min(0).max(1).default(0.5),
  tier: z.string().default("longterm"),
  createdAt: z.number().optional(),
});

const chatMessageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.number().optional(),
});

const pendingCardSchema = z.object({
  tempId: z.string().default(""),
  type: z.string().default("fact"),
  icon: z.string().default("📝"),
  title: z.string(),
  complete: z.boolean(),
  missingRequired: z.array(z.string()).default([]),
});

const saveDecisionSchema = z.object({
  saved: z.boolean(),
  decision: z.enum(["save", "skip", "update", "ask_user", "keep_both", "reactivate", "hold"]).optional(),
  savedCount: z.number().int().nonnegative().optional(),
  reason: z.string().optional(),
  pendingCards: z.array(pendingCardSchema).optional(),
});

const saveResultSchema = z.object({
  saved: z.boolean(),
  content: z.string(),
  reason: z.string().optional(),
});

const dateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

export const conflictCheckRequestSchema = z.object({
  iin: iinSchema,
  candidates: candidatesSchema,
});

export const clarifyRequestSchema = z.object({
  iin: iinSchema,
  items: candidatesSchema.default([]),
  pendingConflicts: z.array(verdictSchema).default([]),
  originalMessage: z.string().default(""),
  questionsAskedCount: z.number().int().nonnegative().default(0),
  currentDate: dateSchema.optional(),
});

const promptFields = {
  iin: iinSchema,
  message: z.string().min(1),
  intent: z.unknown().optional(),
  memories: z.array(contextMemorySchema).optional(),
  saveDecision: saveDecisionSchema.optional(),
  saveResults: z.array(saveResultSchema).optional(),
  sessionId: z.string().min(1).optional(),
  sessionMessages: z.array(chatMessageSchema).optional(),
};

export const contextRequestSchema = z.object(promptFields);

export const turnRequestSchema = z.object({
  ...promptFields,
  candidates: candidatesSchema.default([]),
  questionsAskedCount: z.number().int().nonnegative().default(0),
  currentDate: dateSchema.optional(),
});

export const daySummaryRequestSchema = z.object({
  iin: iinSchema,
  date: dateSchema,
  content: z.string().min(1),
  topics: topicsSchema.default([]),
});

export type ConflictCheckRequest = z.infer<typeof conflictCheckRequestSchema>;
export type ClarifyRequest = z.infer<typeof clarifyRequestSchema>;
export type ContextRequest = z.infer<typeof contextRequestSchema>;
export type TurnRequest = z.infer<typeof turnRequestSchema>;
export type DaySummaryRequest = z.infer<typeof daySummaryRequestSchema>;

function parseWith<S extends z.ZodTypeAny>(what: string, schema: S, raw: unknown): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) throw new MalformedInputError(what, parsed.error);
  return parsed.data;
}

export const parseConflictCheckRequest = (raw: unknown): ConflictCheckRequest =>
  parseWith("conflict check request", conflictCheckRequestSchema, raw);

export const parseClarifyRequest = (raw: unknown): ClarifyRequest =>
  parseWith("clarification request", clarifyRequestSchema, raw);

export const parseContextRequest = (raw: unknown): ContextRequest =>
  parseWith("context request", contextRequestSchema, raw);

export const parseTurnRequest = (raw: unknown): TurnRequest => parseWith("turn request", turnRequestSchema, raw);

export const parseDaySummaryRequest = (raw: unknown): DaySummaryRequest =>
  parseWith("day summary", daySummaryRequestSchema, raw);
