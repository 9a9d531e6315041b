import type { StageConfigResolver } from "../config/stages.js";
import { requiredSlotIds } from "../config/memory-types.js";
import type { ClarificationConfig } from "../config/types.js";
import type { MemoryCandidate } from "../conflicts/types.js";
import type { Logger } from "../logging/logger.js";
import { EMPTY_ANALYSIS, type SlotSuggester } from "./ambiguity.js";
import { arbitrate } from "./arbiter.js";
import { buildConflictCard, buildMemoryCard, generateQuestions } from "./cards.js";
import { applyResolutions, checkSlots, completenessScore } from "./slots.js";
import type {
  AmbiguityAnalysis,
  ClarificationDecision,
  ClarificationInput,
  MemoryCard,
} from "./types.js";

function today(): string {
  return new Date().toISOString().slice(0, 10);
}

function itemQuestionCap(config: ClarificationConfig, type: string): number {
  const perType = config.typeSettings[type]?.maxQuestions;
  const perMemory = config.limits.maxQuestionsPerMemory;
  return perType === undefined ? perMemory : Math.min(perType, perMemory);
}

/**
 * Decides whether the turn should pause for the user. Local slot checks
 * always run; in hybrid mode a model suggests clarifications and
 * `arbitrate` decides which of them count.
 */
export class ClarificationEngine {
  constructor(
    private readonly stages: StageConfigResolver,
    private readonly suggester: SlotSuggester | null,
    private readonly logger: Logger,
  ) {}

  async process(input: ClarificationInput): Promise<ClarificationDecision> {
    const config = this.stages.clarification();

    if (!config.enabled) {
      return {
        mode: config.mode,
        holdForClarification: false,
        action: "proceed",
        questions: [],
        memoryCards: [],
        conflictCards: [],
        completenessScore: 1,
        items: input.items,
      };
    }

    if (input.items.length === 0 && input.pendingConflicts.length === 0) {
      return {
        mode: config.mode,
        holdForClarification: false,
        action: "proceed",
        questions: [],
        memoryCards: [],
        conflictCards: [],
        completenessScore: 1,
        items: [],
      };
    }

    const conflictCards = input.pendingConflicts.map(buildConflictCard);
    const questions: string[] = conflictCards.map((c) => c.question);
    let hold = conflictCards.length > 0;

    const hybrid = config.mode === "hybrid" && this.suggester !== null;
    const analyses = hybrid
      ? await this.analyzeAll(input, config)
      : input.items.map(() => EMPTY_ANALYSIS);

    const memoryCards: MemoryCard[] = [];
    const items: MemoryCandidate[] = [];
    let queuedThisTurn = 0;

    input.items.forEach((item, index) => {
      const typeDef = config.types[item.type];
      const required = requiredSlotIds(typeDef);
      const analysis = analyses[index] ?? EMPTY_ANALYSIS;

      const verdict = arbitrate(
        analysis.suggestions,
        {
          requiredSlotIds: required,
          maxQuestions: itemQuestionCap(config, item.type),
          allowPartialAfter: config.behavior.allowPartialAfter,
        },
        { questionsAskedCount: input.questionsAskedCount, queuedThisTurn },
      );
      queuedThisTurn += verdict.ask.length;

      const resolved = applyResolutions(item, verdict.autoApply, typeDef);
      const local = checkSlots(resolved, typeDef);
      const askedSlots = new Set(verdict.ask.map((s) => s.slotId));
      const missingRequired = required.filter(
        (id) => local.missingRequired.includes(id) || askedSlots.has(id),
      );

      const card = buildMemoryCard(resolved, typeDef, missingRequired);
      memoryCards.push(card);
      items.push(resolved);

      if (!card.complete) hold = true;

      for (const s of verdict.ask) questions.push(s.question);
      // Local requirements stand even when the model says nothing about them.
      const uncovered = local.missingRequired.filter((id) => !askedSlots.has(id));
      for (const q of generateQuestions(resolved, typeDef, uncovered)) {
        if (!questions.includes(q)) questions.push(q);
      }

      this.logger.debug(
        {
          tempId: item.tempId,
          type: item.type,
          missingRequired,
          autoApplied: verdict.autoApply.map((r) => r.slotId),
          asked: verdict.ask.length,
          dropped: verdict.dropped.length,
        },
        "Clarification item checked",
      );
    });

    const decision: ClarificationDecision = {
      mode: config.mode,
      holdForClarification: hold,
      action: hold ? config.behavior.whenIncomplete : "proceed",
      questions: questions.slice(0, config.limits.maxQuestionsPerTurn),
      memoryCards,
      conflictCards,
      completenessScore: completenessScore(items, config.types),
      items,
    };

    this.logger.info(
      {
        iin: input.iin,
        mode: config.mode,
        cards: memoryCards.length,
        conflicts: conflictCards.length,
        hold,
        action: decision.action,
      },
      "Clarification complete",
    );
    return decision;
  }

  /** Suggestions for every item, fetched concurrently; arbitration stays sequential. */
  private async analyzeAll(
    input: ClarificationInput,
    config: ClarificationConfig,
  ): Promise<AmbiguityAnalysis[]> {
    const suggester = this.suggester;
    if (!suggester) return input.items.map(() => EMPTY_ANALYSIS);

    const currentDate = input.currentDate ?? today();
    return Promise.all(
      input.items.map((item) =>
        suggester
          .suggest({
            item,
            typeDef: config.types[item.type],
            originalMessage: input.originalMessage,
            currentDate,
            llm: config.llm,
          })
          .catch((err: unknown) => {
            this.logger.warn({ err, tempId: item.tempId }, "Suggester failed, using local check only");
            return EMPTY_ANALYSIS;
          }),
      ),
    );
  }
}
