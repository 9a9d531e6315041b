import { z } from "zod";

export const slotScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const slotValueSchema = z.object({
  value: slotScalarSchema.default(null),
  filled: z.boolean(),
  source: z.string().default("extracted"),
});

export const slotMapSchema = z.record(slotValueSchema);

export const topicsSchema = z.array(z.string());

/** Decode a JSON column, falling back when the stored text is not what we wrote. */
export function decodeJson<S extends z.ZodTypeAny>(
  text: string | null,
  schema: S,
  fallback: z.output<S>,
): z.output<S> {
  if (text === null) return fallback;
  try {
    const parsed = schema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : fallback;
  } catch {
    return fallback;
  }
}
