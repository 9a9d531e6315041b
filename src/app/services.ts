import { AmbiguityAnalyzer } from "../clarification/ambiguity.js";
import { ClarificationEngine } from "../clarification/engine.js";
import { StageConfigResolver } from "../config/stages.js";
import { ConflictChecker } from "../conflicts/checker.js";
import { ConflictClassifier } from "../conflicts/classifier.js";
import { ContextAssembler } from "../context/assembler.js";
import { CalendarLayer } from "../context/layers/calendar.js";
import { ImmediateLayer } from "../context/layers/immediate.js";
import { LongRangeLayer } from "../context/layers/long-range.js";
import { ProfileLayer } from "../context/layers/profile.js";
import { SessionSummaryLayer } from "../context/layers/session-summary.js";
import { ContextPromptBuilder } from "../disclosure/prompt-builder.js";
import type { TextCompletion } from "../llm/completion.js";
import { stageLogger, type Logger } from "../logging/logger.js";
import { TurnPipeline } from "../pipeline/orchestrator.js";
import type { PipelineDB } from "../store/db.js";
import { MemoryStore } from "../store/memory-store.js";
import { StageConfigStore } from "../store/stage-config-store.js";
import { SessionSummaryCache } from "../store/summary-cache.js";

export interface PipelineServices {
  readonly memoryStore: MemoryStore;
  readonly stageConfigs: StageConfigStore;
  readonly stages: StageConfigResolver;
  readonly conflicts: ConflictChecker;
  readonly clarification: ClarificationEngine;
  readonly assembler: ContextAssembler;
  readonly prompts: ContextPromptBuilder;
  readonly pipeline: TurnPipeline;
}

/** Wires stores, stages and the turn pipeline over one database. */
export function createServices(db: PipelineDB, completion: TextCompletion, logger: Logger): PipelineServices {
  const memoryStore = new MemoryStore(db);
  const stageConfigs = new StageConfigStore(db);
  const summaryCache = new SessionSummaryCache(db);
  const stages = new StageConfigResolver(stageConfigs, stageLogger(logger, "config"));

  const conflictLog = stageLogger(logger, "conflict_check");
  const conflicts = new ConflictChecker(
    stages,
    memoryStore,
    new ConflictClassifier(completion, conflictLog),
    conflictLog,
  );

  const clarifyLog = stageLogger(logger, "clarification");
  const clarification = new ClarificationEngine(
    stages,
    new AmbiguityAnalyzer(completion, clarifyLog),
    clarifyLog,
  );

  const contextLog = stageLogger(logger, "context_injection");
  const assembler = new ContextAssembler(
    [
      new ImmediateLayer(memoryStore, contextLog),
      new SessionSummaryLayer(completion, summaryCache, memoryStore, contextLog),
      new ProfileLayer(memoryStore, contextLog),
      new CalendarLayer(memoryStore, contextLog),
      new LongRangeLayer(memoryStore, contextLog),
    ],
    contextLog,
  );
  const prompts = new ContextPromptBuilder(stages, assembler, memoryStore, contextLog);

  const pipeline = new TurnPipeline(conflicts, clarification, prompts, stageLogger(logger, "turn"));

  return { memoryStore, stageConfigs, stages, conflicts, clarification, assembler, prompts, pipeline };
}
