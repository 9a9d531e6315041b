import type { ContextLayersConfig } from "../../config/types.js";
import type { Logger } from "../../logging/logger.js";
import type { ChatMessage } from "../../store/types.js";
import { dropFirst, estimateTokens, trimToBudget } from "../tokens.js";
import {
  emptyLayer,
  type ContextLayer,
  type ContextLayerBuilder,
  type LayerBuildRequest,
} from "../types.js";

export interface RecentMessageReader {
  listRecentMessages(iin: string, sessionId: string, limit: number): readonly ChatMessage[];
}

type ImmediateFormat = ContextLayersConfig["immediate"]["format"];

export function formatMessages(messages: readonly ChatMessage[], format: ImmediateFormat): string {
  switch (format) {
    case "conversation":
      return messages.map((m) => `${m.role === "user" ? "User" : "Assistant"}: ${m.content}`).join("\n");
    case "compact":
      return messages.map((m) => m.content).join(" | ");
    case "json":
      return JSON.stringify(
        messages.map((m) => ({ role: m.role, content: m.content })),
        null,
        2,
      );
  }
}

/** The last turns of the live conversation, oldest dropped first. */
export class ImmediateLayer implements ContextLayerBuilder {
  readonly name = "immediate" as const;

  constructor(
    private readonly messages: RecentMessageReader | null,
    private readonly logger: Logger,
  ) {}

  async build({ user, config }: LayerBuildRequest): Promise<ContextLayer> {
    const layer = config.layers.immediate;
    if (!layer.enabled) return emptyLayer(this.name);

    let source: readonly ChatMessage[] = user.sessionMessages ?? [];
    if (source.length === 0 && user.sessionId && this.messages) {
      source = this.messages.listRecentMessages(user.iin, user.sessionId, layer.maxMessages);
    }

    const recent = source.slice(-layer.maxMessages);
    if (recent.length === 0) return emptyLayer(this.name);

    const result = trimToBudget(
      recent,
      (kept) => formatMessages(kept, layer.format),
      layer.tokenBudget,
      dropFirst,
    );
    const tokenCount = estimateTokens(result.content);
    this.logger.debug(
      { layer: this.name, messages: result.items.length, tokens: tokenCount, trimmed: result.trimmed },
      "Layer built",
    );
    return {
      name: this.name,
      content: result.content,
      tokenCount,
      itemCount: result.items.length,
      trimmed: result.trimmed,
    };
  }
}
