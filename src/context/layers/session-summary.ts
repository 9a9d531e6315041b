import { fillTemplate, type TextCompletion } from "../../llm/completion.js";
import type { Logger } from "../../logging/logger.js";
import type { CachedSessionSummary, ChatMessage } from "../../store/types.js";
import { estimateTokens } from "../tokens.js";
import {
  emptyLayer,
  type ContextLayer,
  type ContextLayerBuilder,
  type LayerBuildRequest,
} from "../types.js";
import { formatMessages } from "./immediate.js";

export interface SummaryCacheStore {
  get(iin: string, sessionId: string): CachedSessionSummary | null;
  put(iin: string, sessionId: string, entry: CachedSessionSummary): void;
}

/** Reads a stored session from its first message. */
export interface SessionOpeningReader {
  countSessionMessages(iin: string, sessionId: string): number;
  /** The first `limit` messages of a session in chronological order. */
  listFirstMessages(iin: string, sessionId: string, limit: number): readonly ChatMessage[];
}

/** Cut to the budget at a word boundary. */
export function clampToBudget(text: string, budget: number): { text: string; trimmed: boolean } {
  if (estimateTokens(text) <= budget) return { text, trimmed: false };
  const limit = Math.max(0, budget * 4 - 1);
  const cut = text.slice(0, limit);
  const lastSpace = cut.lastIndexOf(" ");
  const body = lastSpace > 0 ? cut.slice(0, lastSpace) : cut;
  return { text: `${body}…`, trimmed: true };
}

/**
 * A model-written summary of the opening of a long session. Cached per
 * (IIN, session) until the TTL lapses.
 */
export class SessionSummaryLayer implements ContextLayerBuilder {
  readonly name = "sessionSummary" as const;

  constructor(
    private readonly completion: TextCompletion | null,
    private readonly cache: SummaryCacheStore | null,
    private readonly messages: SessionOpeningReader | null,
    private readonly logger: Logger,
  ) {}

  async build({ user, config, now }: LayerBuildRequest): Promise<ContextLayer> {
    const layer = config.layers.sessionSummary;
    if (!layer.enabled) return emptyLayer(this.name);

    const given: readonly ChatMessage[] = user.sessionMessages ?? [];
    const sessionId = user.sessionId;
    const reader = given.length === 0 && sessionId ? this.messages : null;
    const total = reader && sessionId ? reader.countSessionMessages(user.iin, sessionId) : given.length;
    if (total <= layer.threshold) return emptyLayer(this.name);

    const cache = layer.cacheEnabled ? this.cache : null;
    if (cache && sessionId) {
      const cached = this.readCache(cache, user.iin, sessionId);
      if (cached && now - cached.generatedAt < layer.cacheTtlMinutes * 60_000) {
        return this.toLayer(cached.summary, cached.messageCount, layer.tokenBudget);
      }
    }

    if (!this.completion) return emptyLayer(this.name);

    const block =
      reader && sessionId
        ? reader.listFirstMessages(user.iin, sessionId, layer.summarizeCount)
        : given.slice(0, layer.summarizeCount);
    const prompt = fillTemplate(config.summary.prompt, {
      messages: formatMessages(block, "conversation"),
    });

    let summary: string;
    try {
      summary = (await this.completion.complete(prompt, config.summary)).trim();
    } catch (err) {
      this.logger.warn({ err, iin: user.iin }, "Session summary generation failed");
      return emptyLayer(this.name);
    }
    if (summary.length === 0) return emptyLayer(this.name);

    if (cache && sessionId) {
      try {
        cache.put(user.iin, sessionId, {
          summary,
          messageCount: block.length,
          generatedAt: now,
        });
      } catch (err) {
        this.logger.warn({ err, iin: user.iin }, "Session summary cache write failed");
      }
    }

    return this.toLayer(summary, block.length, layer.tokenBudget);
  }

  private readCache(cache: SummaryCacheStore, iin: string, sessionId: string): CachedSessionSummary | null {
    try {
      return cache.get(iin, sessionId);
    } catch (err) {
      this.logger.warn({ err, iin }, "Session summary cache read failed");
      return null;
    }
  }

  private toLayer(summary: string, messageCount: number, budget: number): ContextLayer {
    const { text, trimmed } = clampToBudget(summary, budget);
    return {
      name: this.name,
      content: text,
      tokenCount: estimateTokens(text),
      itemCount: messageCount,
      trimmed,
    };
  }
}
