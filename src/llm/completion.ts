export interface CompletionParams {
  readonly model?: string;
  readonly temperature?: number;
  readonly maxTokens?: number;
}

/**
 * Single-shot text completion. Implementations may throw; callers in the
 * turn pipeline treat any failure as an absent result.
 */
export interface TextCompletion {
  complete(prompt: string, params?: CompletionParams): Promise<string>;
}

/** Fill `{{key}}` placeholders. Unknown keys are left as written. */
export function fillTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => values[key] ?? match);
}
