import type { ClarificationEngine } from "../clarification/engine.js";
import type { ClarificationDecision } from "../clarification/types.js";
import type { ConflictChecker, ConflictCheckReport } from "../conflicts/checker.js";
import type { ContextPromptBuilder } from "../disclosure/prompt-builder.js";
import type { ContextPromptResult, SaveDecision } from "../disclosure/types.js";
import type { Logger } from "../logging/logger.js";
import type { TurnRequest } from "./validate.js";

export interface TurnResult {
  readonly conflicts: ConflictCheckReport;
  readonly clarification: ClarificationDecision;
  readonly context: ContextPromptResult;
  readonly processingTimeMs: number;
}

/**
 * When the caller reports no save outcome, a held turn is described as a
 * hold with its cards; otherwise nothing is claimed.
 */
function effectiveSaveDecision(
  supplied: SaveDecision | undefined,
  clarification: ClarificationDecision,
): SaveDecision | undefined {
  if (supplied !== undefined) return supplied;
  if (!clarification.holdForClarification) return undefined;
  return { saved: false, decision: "hold", pendingCards: clarification.memoryCards };
}

/** One user turn: conflict check, then clarification, then the reply prompt. */
export class TurnPipeline {
  constructor(
    private readonly conflicts: ConflictChecker,
    private readonly clarification: ClarificationEngine,
    private readonly prompts: ContextPromptBuilder,
    private readonly logger: Logger,
  ) {}

  async run(request: TurnRequest, now = Date.now()): Promise<TurnResult> {
    const started = Date.now();

    const conflicts = await this.conflicts.check({ iin: request.iin, candidates: request.candidates });

    const clarification = await this.clarification.process({
      iin: request.iin,
      items: conflicts.clean,
      pendingConflicts: conflicts.pendingClarifications,
      originalMessage: request.message,
      questionsAskedCount: request.questionsAskedCount,
      currentDate: request.currentDate,
    });

    const context = await this.prompts.build(
      {
        iin: request.iin,
        message: request.message,
        intent: request.intent,
        memories: request.memories,
        saveDecision: effectiveSaveDecision(request.saveDecision, clarification),
        saveResults: request.saveResults,
        sessionId: request.sessionId,
        sessionMessages: request.sessionMessages,
      },
      now,
    );

    const processingTimeMs = Date.now() - started;
    this.logger.info(
      {
        iin: request.iin,
        candidates: request.candidates.length,
        hold: clarification.holdForClarification,
        action: clarification.action,
        contextMode: context.contextMode,
        processingTimeMs,
      },
      "Turn processed",
    );
    return { conflicts, clarification, context, processingTimeMs };
  }
}
