import { describe, it, expect } from "vitest";
import { createLogger, createNullLogger, stageLogger } from "../../src/logging/logger.js";

describe("createLogger", () => {
  it("creates a logger with default level", () => {
    const logger = createLogger();
    expect(logger.level).toBe("info");
  });

  it("creates a logger with custom level", () => {
    const logger = createLogger({ level: "debug" });
    expect(logger.level).toBe("debug");
  });

  it("creates a JSON logger", () => {
    const logger = createLogger({ level: "warn", json: true });
    expect(logger.level).toBe("warn");
  });

  it("binds the stage on child loggers", () => {
    const logger = createLogger({ level: "info", json: true });
    const child = stageLogger(logger, "conflict_check");
    expect(child.bindings()).toEqual({ stage: "conflict_check" });
    expect(child.level).toBe("info");
  });

  it("creates a silent logger", () => {
    expect(createNullLogger().level).toBe("silent");
  });
});
