import OpenAI from "openai";
import type { LlmConfig } from "../config/types.js";
import { ModelCallError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { CredentialProvider } from "../secrets/credentials.js";
import type { CompletionParams, TextCompletion } from "./completion.js";

/**
 * Chat-completions backed `TextCompletion`. The API key is fetched from the
 * credential provider on first use, so a missing key only disables the
 * calls that need it.
 */
export class OpenAICompletion implements TextCompletion {
  private client: OpenAI | null = null;
  private clientKey: string | null = null;

  constructor(
    private readonly config: LlmConfig,
    private readonly credentials: CredentialProvider,
    private readonly logger: Logger,
  ) {}

  async complete(prompt: string, params: CompletionParams = {}): Promise<string> {
    const client = this.getClient();
    const model = params.model ?? this.config.model;
    const started = Date.now();

    try {
      const response = await client.chat.completions.create({
        model,
        messages: [{ role: "user", content: prompt }],
        ...(params.temperature !== undefined ? { temperature: params.temperature } : {}),
        ...(params.maxTokens !== undefined ? { max_tokens: params.maxTokens } : {}),
      });
      const text = response.choices[0]?.message.content ?? "";
      this.logger.debug({ model, durationMs: Date.now() - started }, "Completion finished");
      return text;
    } catch (err) {
      if (err instanceof OpenAI.APIError && err.status === 401) {
        this.credentials.invalidate(this.config.apiKeySecret);
      }
      throw new ModelCallError(`Completion failed for model ${model}`, { cause: err });
    }
  }

  private getClient(): OpenAI {
    const apiKey = this.credentials.get(this.config.apiKeySecret);
    if (!this.client || this.clientKey !== apiKey) {
      this.client = new OpenAI({
        apiKey,
        timeout: this.config.timeoutMs,
        maxRetries: 0,
        ...(this.config.baseUrl ? { baseURL: this.config.baseUrl } : {}),
      });
      this.clientKey = apiKey;
    }
    return this.client;
  }
}
