import type { Logger } from "../../logging/logger.js";
import { estimateTokens, trimToBudget } from "../tokens.js";
import {
  emptyLayer,
  type ContextLayer,
  type ContextLayerBuilder,
  type ContextMemory,
  type LayerBuildRequest,
} from "../types.js";

export interface ProfileMemoryReader {
  listActiveMemories(iin: string, limit: number): readonly ContextMemory[];
}

const STORE_SCAN_LIMIT = 100;

function renderProfile(memories: readonly ContextMemory[]): string {
  return memories.map((m) => `- ${m.content}`).join("\n");
}

/** Index of the least relevant memory; the later one on a tie. */
function leastRelevant(memories: readonly ContextMemory[]): number {
  let index = 0;
  memories.forEach((m, i) => {
    const current = memories[index];
    if (current && m.relevance <= current.relevance) index = i;
  });
  return index;
}

/** Long-lived facts about the user, most relevant first. */
export class ProfileLayer implements ContextLayerBuilder {
  readonly name = "profile" as const;

  constructor(
    private readonly memories: ProfileMemoryReader | null,
    private readonly logger: Logger,
  ) {}

  async build({ user, config }: LayerBuildRequest): Promise<ContextLayer> {
    const layer = config.layers.profile;
    if (!layer.enabled) return emptyLayer(this.name);

    // Memories handed in have already been narrowed for this turn; the store is only read when none were.
    const source = user.memories ?? this.memories?.listActiveMemories(user.iin, STORE_SCAN_LIMIT) ?? [];

    const selected = source
      .filter((m) => {
        const type = m.type.toLowerCase();
        return layer.includeTypes.includes(type) && !layer.excludeTypes.includes(type);
      })
      .filter((m) => m.relevance >= layer.minRelevance)
      .sort((a, b) => b.relevance - a.relevance)
      .slice(0, layer.maxMemories);
    if (selected.length === 0) return emptyLayer(this.name);

    const result = trimToBudget(selected, renderProfile, layer.tokenBudget, leastRelevant);
    const tokenCount = estimateTokens(result.content);
    this.logger.debug(
      { layer: this.name, memories: result.items.length, tokens: tokenCount, trimmed: result.trimmed },
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
