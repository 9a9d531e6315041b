export type * from "./config/types.js";
export { loadConfig } from "./config/loader.js";
export { parseConfig } from "./config/schema.js";
export {
  StageConfigResolver,
  resolveClarificationConfig,
  resolveConflictCheckConfig,
  resolveContextConfig,
  validateStageConfig,
} from "./config/stages.js";
export { builtInMemoryTypes, requiredSlotIds } from "./config/memory-types.js";

export { MalformedInputError, CredentialUnavailableError, ModelCallError } from "./errors.js";
export { createLogger, createNullLogger, type Logger } from "./logging/logger.js";
export { CredentialProvider, EnvSecretSource, FileSecretSource } from "./secrets/credentials.js";
export type { TextCompletion, CompletionParams } from "./llm/completion.js";
export { OpenAICompletion } from "./llm/openai.js";

export type * from "./conflicts/types.js";
export { keywordSimilarity } from "./conflicts/similarity.js";
export { findCandidates } from "./conflicts/candidates.js";
export { ConflictClassifier } from "./conflicts/classifier.js";
export { findConflicts, resolveRelation } from "./conflicts/resolution.js";
export { ConflictChecker } from "./conflicts/checker.js";

export type * from "./clarification/types.js";
export { arbitrate } from "./clarification/arbiter.js";
export { checkSlots } from "./clarification/slots.js";
export { AmbiguityAnalyzer } from "./clarification/ambiguity.js";
export { ClarificationEngine } from "./clarification/engine.js";

export type * from "./context/types.js";
export { estimateTokens } from "./context/tokens.js";
export { ContextAssembler } from "./context/assembler.js";

export type * from "./disclosure/types.js";
export { normalizeIntent, deriveContextMode } from "./disclosure/intent.js";
export { buildSaveDirective, NO_SAVE_DIRECTIVE } from "./disclosure/directives.js";
export { filterMemoriesByIntent, selectMemories } from "./disclosure/filter.js";
export { ContextPromptBuilder } from "./disclosure/prompt-builder.js";

export { TurnPipeline, type TurnResult } from "./pipeline/orchestrator.js";
export { PipelineDB } from "./store/db.js";
export { MemoryStore } from "./store/memory-store.js";
export { createServices } from "./app/services.js";
export { startService } from "./app/lifecycle.js";
