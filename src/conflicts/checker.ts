import type { StageConfigResolver } from "../config/stages.js";
import type { Logger } from "../logging/logger.js";
import type { RelationClassifier } from "./classifier.js";
import { findConflicts } from "./resolution.js";
import type { ConflictCheckResult, ExistingMemory, MemoryCandidate } from "./types.js";

export interface ExistingMemoryReader {
  listActiveMemories(iin: string, limit: number): readonly ExistingMemory[];
}

export interface ConflictCheckInput {
  readonly iin: string;
  readonly candidates: readonly MemoryCandidate[];
}

export interface ConflictCheckReport extends ConflictCheckResult {
  readonly processingTimeMs: number;
}

export class ConflictChecker {
  constructor(
    private readonly stages: StageConfigResolver,
    private readonly memories: ExistingMemoryReader,
    private readonly classifier: RelationClassifier,
    private readonly logger: Logger,
  ) {}

  async check(input: ConflictCheckInput): Promise<ConflictCheckReport> {
    const started = Date.now();
    const config = this.stages.conflictCheck();

    let existing: readonly ExistingMemory[] = [];
    if (config.enabled && input.candidates.length > 0) {
      try {
        existing = this.memories.listActiveMemories(input.iin, config.similarity.maxExisting);
      } catch (err) {
        this.logger.warn({ err, iin: input.iin }, "Existing memories unavailable, treating as none");
      }
    }

    const result = await findConflicts(input.candidates, existing, config, {
      classifier: this.classifier,
      logger: this.logger,
    });

    const processingTimeMs = Date.now() - started;
    this.logger.info(
      {
        iin: input.iin,
        checked: result.checked,
        clean: result.clean.length,
        autoResolved: result.autoResolved.length,
        pending: result.pendingClarifications.length,
        processingTimeMs,
      },
      "Conflict check complete",
    );
    return { ...result, processingTimeMs };
  }
}
