import { describe, it, expect, vi } from "vitest";
import {
  isStageName,
  resolveClarificationConfig,
  resolveConflictCheckConfig,
  resolveContextConfig,
  StageConfigResolver,
  validateStageConfig,
} from "../../src/config/stages.js";
import { createNullLogger } from "../../src/logging/logger.js";

const logger = createNullLogger();

describe("stage config resolution", () => {
  it("fills defaults for an absent document", () => {
    const config = resolveConflictCheckConfig(undefined, logger);
    expect(config.enabled).toBe(true);
    expect(config.similarity.threshold).toBe(0.75);
    expect(config.behavior.strategy).toBe("first_match");
    expect(config.behavior.skipDuplicates).toBe(true);
  });

  it("keeps valid overrides and defaults the rest", () => {
    const config = resolveContextConfig({ layers: { calendar: { lookaheadHours: 24 } } }, logger);
    expect(config.layers.calendar.lookaheadHours).toBe(24);
    expect(config.layers.calendar.tokenBudget).toBe(100);
    expect(config.layers.immediate.tokenBudget).toBe(400);
  });

  it("replaces an invalid document wholesale with defaults", () => {
    const config = resolveClarificationConfig({ mode: "telepathy", limits: { maxQuestionsPerTurn: 5 } }, logger);
    expect(config.mode).toBe("local");
    expect(config.limits.maxQuestionsPerTurn).toBe(1);
  });

  it("merges type settings and memory types over the built-ins", () => {
    const config = resolveClarificationConfig({ typeSettings: { event: { maxQuestions: 1 } } }, logger);
    expect(config.typeSettings["event"]?.maxQuestions).toBe(1);
    expect(config.typeSettings["todo"]?.maxQuestions).toBe(2);
    expect(config.types["event"]).toBeDefined();
  });

  it("returns frozen values", () => {
    const config = resolveContextConfig(undefined, logger);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.layers.profile.includeTypes)).toBe(true);
  });

  it("rejects a section order that repeats a layer", () => {
    const config = resolveContextConfig({ sections: { order: ["profile", "profile"] } }, logger);
    expect(config.sections.order).toEqual(["profile", "calendar", "longRange", "sessionSummary", "immediate"]);
  });

  it("rejects an unknown calendar time zone", () => {
    const config = resolveContextConfig({ layers: { calendar: { timeZone: "Mars/Olympus" } } }, logger);
    expect(config.layers.calendar.timeZone).toBe("UTC");
  });
});

describe("validateStageConfig", () => {
  it("accepts a valid document", () => {
    expect(validateStageConfig("clarification", { mode: "hybrid" })).toEqual({ ok: true });
  });

  it("lists issues with their paths", () => {
    const result = validateStageConfig("conflict_check", { similarity: { threshold: 2 } });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues).toHaveLength(1);
      expect(result.issues[0]?.startsWith("similarity.threshold:")).toBe(true);
    }
  });
});

describe("isStageName", () => {
  it("recognizes the three stages", () => {
    expect(isStageName("context_injection")).toBe(true);
    expect(isStageName("delivery")).toBe(false);
  });
});

describe("StageConfigResolver", () => {
  it("reads the store on every call", () => {
    const readStageConfig = vi
      .fn()
      .mockReturnValueOnce({ mode: "hybrid" })
      .mockReturnValueOnce({ mode: "llm" });
    const resolver = new StageConfigResolver({ readStageConfig }, logger);
    expect(resolver.clarification().mode).toBe("hybrid");
    expect(resolver.clarification().mode).toBe("llm");
    expect(readStageConfig).toHaveBeenCalledWith("clarification");
  });

  it("falls back to defaults when the store throws", () => {
    const resolver = new StageConfigResolver(
      {
        readStageConfig: () => {
          throw new Error("database is locked");
        },
      },
      logger,
    );
    expect(resolver.conflictCheck().similarity.maxCandidates).toBe(10);
  });

  it("uses defaults without a store", () => {
    expect(new StageConfigResolver(null, logger).context().injection.maxMemories).toBe(10);
  });
});
