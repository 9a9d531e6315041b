import type { StageConfigResolver } from "../config/stages.js";
import type { ContextAssembler } from "../context/assembler.js";
import { estimateTokens } from "../context/tokens.js";
import type { AssembledContext, ContextMemory } from "../context/types.js";
import { fillTemplate } from "../llm/completion.js";
import type { Logger } from "../logging/logger.js";
import {
  ANTI_INVENTION_GUARD,
  buildHoldDirective,
  buildSaveDirective,
  modeDirective,
} from "./directives.js";
import { filterMemoriesByIntent, formatMemories, selectMemories } from "./filter.js";
import { deriveContextMode, normalizeIntent } from "./intent.js";
import { buildQuickReplies } from "./quick-replies.js";
import type { ContextPromptInput, ContextPromptResult } from "./types.js";

export interface MemoryLookup {
  listActiveMemories(iin: string, limit: number): readonly ContextMemory[];
}

const LOOKUP_LIMIT = 100;

function joinSections(...sections: string[]): string {
  return sections.filter((s) => s.length > 0).join("\n\n");
}

/**
 * Final instruction block for the reply model. Mode and save directives are
 * appended after the persona as separate sections.
 */
export class ContextPromptBuilder {
  constructor(
    private readonly stages: StageConfigResolver,
    private readonly assembler: ContextAssembler | null,
    private readonly memories: MemoryLookup | null,
    private readonly logger: Logger,
  ) {}

  async build(input: ContextPromptInput, now = Date.now()): Promise<ContextPromptResult> {
    const config = this.stages.context();
    const intent = normalizeIntent(input.intent);
    const contextMode = deriveContextMode(intent);
    const user = fillTemplate(config.prompts.userMessageFormat, { message: input.message });

    const saveInstruction = buildSaveDirective({
      saveDecision: input.saveDecision,
      saveResults: input.saveResults,
    });

    if (!config.injection.enabled) {
      const { persona, noMemoriesText } = config.prompts;
      const full = joinSections(persona, noMemoriesText, saveInstruction, user);
      return {
        prompt: { system: persona, memories: noMemoriesText, saveInstruction, user, full },
        contextMode,
        intent: intent ?? null,
        memoriesUsed: 0,
        memoriesFiltered: 0,
        tokenEstimate: estimateTokens(full),
        holdForClarification: false,
      };
    }

    const candidates = input.memories ?? this.lookupMemories(input.iin);
    const selected = filterMemoriesByIntent(selectMemories(candidates, config), intent);

    const holding = input.saveDecision?.decision === "hold";
    const pendingCards = input.saveDecision?.pendingCards ?? [];

    const systemSections = [config.prompts.persona, modeDirective(contextMode), ANTI_INVENTION_GUARD];
    if (holding && pendingCards.length > 0) {
      systemSections.push(buildHoldDirective(pendingCards));
    }
    const system = joinSections(...systemSections);

    const memories =
      selected.length > 0
        ? `${config.prompts.memoryHeader}\n\n${formatMemories(selected, config.prompts.memoryItemFormat)}`
        : config.prompts.noMemoriesText;
    let layerContext: AssembledContext | undefined;
    if (this.assembler) {
      layerContext = await this.assembler.assemble(
        {
          iin: input.iin,
          message: input.message,
          memories: selected,
          sessionId: input.sessionId,
          sessionMessages: input.sessionMessages,
        },
        config,
        now,
      );
    }

    const body = layerContext && layerContext.assembledText ? layerContext.assembledText : memories;
    const full = joinSections(system, body, saveInstruction, user);
    const quickReplies = buildQuickReplies(intent, input.saveDecision, holding);

    this.logger.info(
      {
        iin: input.iin,
        intent: intent ?? "none",
        contextMode,
        memoriesUsed: selected.length,
        layers: layerContext?.debug.layersIncluded ?? [],
        holding,
      },
      "Context prompt built",
    );

    return {
      prompt: { system, memories, saveInstruction, user, full },
      contextMode,
      intent: intent ?? null,
      memoriesUsed: selected.length,
      memoriesFiltered: candidates.length - selected.length,
      tokenEstimate: estimateTokens(full),
      holdForClarification: holding,
      ...(pendingCards.length > 0 ? { memoryCards: pendingCards } : {}),
      ...(quickReplies ? { quickReplies } : {}),
      ...(layerContext ? { layerContext } : {}),
    };
  }

  private lookupMemories(iin: string): readonly ContextMemory[] {
    if (!this.memories) return [];
    try {
      return this.memories.listActiveMemories(iin, LOOKUP_LIMIT);
    } catch (err) {
      this.logger.warn({ err, iin }, "Memory lookup failed, continuing without memories");
      return [];
    }
  }
}
