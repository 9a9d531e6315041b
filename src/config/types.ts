export interface AppConfig {
  readonly server: ServerConfig;
  readonly logging: LoggingConfig;
  readonly llm: LlmConfig;
  readonly secrets: SecretsConfig;
  readonly storage: StorageConfig;
}

export interface ServerConfig {
  readonly port: number;
  readonly hostname: string;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}

export interface LlmConfig {
  readonly provider: "openai";
  readonly model: string;
  readonly baseUrl?: string;
  readonly apiKeySecret: string;
  readonly timeoutMs: number;
}

export interface SecretsConfig {
  readonly source: "env" | "file";
  readonly file?: string;
}

export interface StorageConfig {
  readonly stateDir?: string;
}

// ── Stage documents ──

export type StageName = "conflict_check" | "clarification" | "context_injection";

export interface StageLlmConfig {
  readonly model?: string;
  readonly temperature: number;
  readonly maxTokens: number;
}

export type ResolutionStrategy = "first_match" | "severity";

export interface ConflictCheckConfig {
  readonly enabled: boolean;
  readonly similarity: {
    readonly threshold: number;
    readonly maxCandidates: number;
    readonly maxExisting: number;
  };
  readonly categories: readonly string[];
  readonly behavior: {
    readonly autoResolveUpdates: boolean;
    readonly skipDuplicates: boolean;
    readonly logAllChecks: boolean;
    readonly strategy: ResolutionStrategy;
  };
  readonly llm: StageLlmConfig;
  readonly promptTemplate: string;
}

export type ClarificationMode = "local" | "hybrid" | "llm";
export type IncompleteAction = "ask" | "savePartial" | "reject";

export interface SlotDefinition {
  readonly id: string;
  readonly label: string;
  readonly icon: string;
  readonly inputType: "text" | "dropdown" | "datePicker" | "timePicker" | "chips" | "toggle" | "textarea";
  readonly placeholder?: string;
  readonly questionTemplate?: string;
  readonly options?: readonly string[];
}

export interface MemoryTypeDefinition {
  readonly name: string;
  readonly icon: string;
  readonly color: string;
  readonly requiredSlots: readonly SlotDefinition[];
  readonly optionalSlots: readonly SlotDefinition[];
}

export interface ClarificationConfig {
  readonly enabled: boolean;
  readonly mode: ClarificationMode;
  readonly behavior: {
    readonly whenIncomplete: IncompleteAction;
    readonly allowPartialAfter: number;
  };
  readonly limits: {
    readonly maxQuestionsPerTurn: number;
    readonly maxQuestionsPerMemory: number;
  };
  readonly typeSettings: Readonly<Record<string, { readonly maxQuestions: number }>>;
  readonly types: Readonly<Record<string, MemoryTypeDefinition>>;
  readonly llm: StageLlmConfig;
}

export type LayerName = "immediate" | "sessionSummary" | "profile" | "calendar" | "longRange";

export interface ContextLayersConfig {
  readonly immediate: {
    readonly enabled: boolean;
    readonly maxMessages: number;
    readonly tokenBudget: number;
    readonly format: "conversation" | "compact" | "json";
  };
  readonly sessionSummary: {
    readonly enabled: boolean;
    readonly threshold: number;
    readonly summarizeCount: number;
    readonly tokenBudget: number;
    readonly cacheEnabled: boolean;
    readonly cacheTtlMinutes: number;
  };
  readonly profile: {
    readonly enabled: boolean;
    readonly maxMemories: number;
    readonly tokenBudget: number;
    readonly minRelevance: number;
    readonly includeTypes: readonly string[];
    readonly excludeTypes: readonly string[];
  };
  readonly calendar: {
    readonly enabled: boolean;
    readonly lookaheadHours: number;
    readonly tokenBudget: number;
    readonly maxEvents: number;
    readonly format: "list" | "prose" | "json";
    readonly timeZone: string;
  };
  readonly longRange: {
    readonly enabled: boolean;
    readonly maxDays: number;
    readonly tokenBudget: number;
  };
}

export type MemorySortOrder = "relevance" | "recency" | "type" | "none";

export interface ContextConfig {
  readonly injection: {
    readonly enabled: boolean;
    readonly maxMemories: number;
    readonly minRelevance: number;
    readonly sortBy: MemorySortOrder;
  };
  readonly filter: {
    readonly types: readonly string[];
    readonly tiers: readonly string[];
  };
  readonly prompts: {
    readonly persona: string;
    readonly memoryHeader: string;
    readonly memoryItemFormat: string;
    readonly noMemoriesText: string;
    readonly userMessageFormat: string;
  };
  readonly layers: ContextLayersConfig;
  readonly sections: {
    readonly order: readonly LayerName[];
    readonly headers: Readonly<Record<LayerName, string>>;
  };
  readonly summary: StageLlmConfig & { readonly prompt: string };
}
