import { describe, it, expect } from "vitest";
import type { LayerName } from "../../src/config/types.js";
import { ContextAssembler } from "../../src/context/assembler.js";
import { CalendarLayer } from "../../src/context/layers/calendar.js";
import { ImmediateLayer } from "../../src/context/layers/immediate.js";
import { LongRangeLayer } from "../../src/context/layers/long-range.js";
import { ProfileLayer } from "../../src/context/layers/profile.js";
import { SessionSummaryLayer } from "../../src/context/layers/session-summary.js";
import { estimateTokens } from "../../src/context/tokens.js";
import type { ContextLayer, ContextLayerBuilder } from "../../src/context/types.js";
import { createNullLogger } from "../../src/logging/logger.js";
import { contextConfig, FakeCompletion, makeMemory } from "../helpers/fixtures.js";

const logger = createNullLogger();
const NOW = Date.UTC(2025, 0, 6, 12, 0, 0);

function fixed(name: LayerName, content: string, trimmed = false): ContextLayerBuilder {
  return {
    name,
    build: async (): Promise<ContextLayer> => ({
      name,
      content,
      tokenCount: estimateTokens(content),
      itemCount: content ? 1 : 0,
      trimmed,
    }),
  };
}

function failing(name: LayerName): ContextLayerBuilder {
  return {
    name,
    build: async (): Promise<ContextLayer> => {
      throw new Error(`${name} unavailable`);
    },
  };
}

describe("ContextAssembler", () => {
  it("joins every populated layer under its header in section order", async () => {
    const sessionMessages = Array.from({ length: 25 }, (_, i) => ({
      role: i % 2 === 0 ? ("user" as const) : ("assistant" as const),
      content: `turn ${i + 1}`,
    }));
    const assembler = new ContextAssembler(
      [
        new ImmediateLayer(null, logger),
        new SessionSummaryLayer(new FakeCompletion(["Planned a weekend trip."]), null, null, logger),
        new ProfileLayer(null, logger),
        new CalendarLayer(
          {
            listEventsBetween: () => [
              {
                id: "e1",
                iin: "u1",
                title: "Dentist",
                startsAt: Date.UTC(2025, 0, 7, 15, 0),
                time: "15:00",
                description: null,
              },
            ],
          },
          logger,
        ),
        new LongRangeLayer(
          { listDailySummaries: () => [{ date: "2025-01-05", content: "Talked about work.", topics: [] }] },
          logger,
        ),
      ],
      logger,
    );

    const result = await assembler.assemble(
      {
        iin: "u1",
        message: "what's next?",
        sessionMessages,
        memories: [makeMemory({ content: "Works as a nurse", type: "fact" })],
      },
      contextConfig(),
      NOW,
    );

    expect(result.debug.layersIncluded).toEqual(["profile", "calendar", "longRange", "sessionSummary", "immediate"]);
    expect(result.debug.trimmed).toEqual([]);
    const text = result.assembledText;
    const positions = [
      "USER PROFILE:",
      "UPCOMING EVENTS:",
      "PAST CONVERSATIONS:",
      "SESSION CONTEXT:",
      "RECENT CONVERSATION:",
    ].map((header) => text.indexOf(header));
    expect(positions.every((p) => p >= 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
    expect(text.startsWith("USER PROFILE:\n- Works as a nurse\n\nUPCOMING EVENTS:\n- Tue, Jan 7 15:00: Dentist")).toBe(
      true,
    );
    expect(result.totalTokens).toBe(estimateTokens(text));
  });

  it("leaves out empty layers", async () => {
    const assembler = new ContextAssembler([fixed("profile", "- Likes tea"), fixed("calendar", "")], logger);
    const result = await assembler.assemble({ iin: "u1", message: "hi" }, contextConfig(), NOW);
    expect(result.assembledText).toBe("USER PROFILE:\n- Likes tea");
    expect(result.debug.layersIncluded).toEqual(["profile"]);
    expect(result.debug.tokensPerLayer).toEqual({ profile: 3 });
  });

  it("skips a layer whose builder throws", async () => {
    const assembler = new ContextAssembler([failing("calendar"), fixed("immediate", "User: hi")], logger);
    const result = await assembler.assemble({ iin: "u1", message: "hi" }, contextConfig(), NOW);
    expect(result.assembledText).toBe("RECENT CONVERSATION:\nUser: hi");
    expect(result.layers).toHaveLength(1);
  });

  it("follows a custom section order and headers", async () => {
    const config = contextConfig({
      sections: { order: ["immediate", "profile"], headers: { immediate: "NOW:" } },
    });
    const assembler = new ContextAssembler(
      [fixed("profile", "- Likes tea"), fixed("immediate", "User: hi"), fixed("calendar", "- Gym")],
      logger,
    );
    const result = await assembler.assemble({ iin: "u1", message: "hi" }, config, NOW);
    expect(result.assembledText).toBe("NOW:\nUser: hi\n\nUSER PROFILE:\n- Likes tea");
  });

  it("reports trimmed layers", async () => {
    const assembler = new ContextAssembler([fixed("longRange", "Jan 5: Work.", true)], logger);
    const result = await assembler.assemble({ iin: "u1", message: "hi" }, contextConfig(), NOW);
    expect(result.debug.trimmed).toEqual(["longRange"]);
  });
});
