import type { z } from "zod";

export function stripCodeFences(text: string): string {
  return text.replace(/```(?:json)?\s*([\s\S]*?)```/gi, (_m, inner: string) => inner.trim());
}

/**
 * First `{` to last `}` of the response, after removing code fences.
 * Models often wrap the object in prose; anything outside the span is ignored.
 */
export function extractJsonObject(text: string): string | null {
  const cleaned = stripCodeFences(text);
  const start = cleaned.indexOf("{");
  const end = cleaned.lastIndexOf("}");
  if (start === -1 || end <= start) return null;
  return cleaned.slice(start, end + 1);
}

/** Parse and validate a model response; null on any failure. */
export function parseModelJson<S extends z.ZodTypeAny>(text: string, schema: S): z.output<S> | null {
  const span = extractJsonObject(text);
  if (span === null) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(span);
  } catch {
    return null;
  }

  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
