import { describe, it, expect, vi } from "vitest";
import { StageConfigResolver } from "../../src/config/stages.js";
import type { StageName } from "../../src/config/types.js";
import { ContextAssembler } from "../../src/context/assembler.js";
import { ProfileLayer } from "../../src/context/layers/profile.js";
import { NO_SAVE_DIRECTIVE } from "../../src/disclosure/directives.js";
import { ContextPromptBuilder } from "../../src/disclosure/prompt-builder.js";
import { createNullLogger } from "../../src/logging/logger.js";
import { makeMemory } from "../helpers/fixtures.js";

const logger = createNullLogger();
const NOW = Date.UTC(2025, 0, 6, 12, 0, 0);

function resolverWith(context: Record<string, unknown> | undefined): StageConfigResolver {
  return new StageConfigResolver(
    { readStageConfig: (name: StageName) => (name === "context_injection" ? context : undefined) },
    logger,
  );
}

const identity = makeMemory({ id: "m1", content: "Name is Dana", type: "name", context: "identity" });
const personal = [
  makeMemory({ id: "m2", content: "Dentist Tuesday", type: "event", context: null }),
  makeMemory({ id: "m3", content: "Likes jazz", type: "preference", context: null }),
  makeMemory({ id: "m4", content: "Run a marathon", type: "goal", context: null }),
];

describe("ContextPromptBuilder", () => {
  it("discloses only identity for a greeting", async () => {
    const builder = new ContextPromptBuilder(resolverWith(undefined), null, null, logger);
    const result = await builder.build(
      { iin: "u1", message: "hello", intent: "greeting", memories: [identity, ...personal] },
      NOW,
    );

    expect(result.contextMode).toBe("identity_only");
    expect(result.intent).toBe("greeting");
    expect(result.memoriesUsed).toBe(1);
    expect(result.memoriesFiltered).toBe(3);
    expect(result.prompt.memories).toBe("Here is what you know about the user:\n\n- Name is Dana");
    expect(result.prompt.saveInstruction).toBe(NO_SAVE_DIRECTIVE);
    expect(result.prompt.user).toBe("User: hello");
    expect(result.quickReplies?.map((r) => r.id)).toEqual(["qr_howareyou", "qr_whatcanido", "qr_tellme"]);
    expect(result.holdForClarification).toBe(false);
  });

  it("assembles the full prompt from its sections", async () => {
    const builder = new ContextPromptBuilder(resolverWith(undefined), null, null, logger);
    const result = await builder.build({ iin: "u1", message: "hello", intent: "greeting", memories: [identity] }, NOW);
    const { system, memories, saveInstruction, user, full } = result.prompt;
    expect(full).toBe([system, memories, saveInstruction, user].join("\n\n"));
    expect(system).toContain("[CONTEXT MODE: IDENTITY ONLY]");
    expect(result.tokenEstimate).toBe(Math.ceil(full.length / 4));
  });

  it("confirms a save only when the decision says so", async () => {
    const builder = new ContextPromptBuilder(resolverWith(undefined), null, null, logger);
    const saved = await builder.build(
      { iin: "u1", message: "remember I like tea", intent: "memory_instruction", saveDecision: { saved: true } },
      NOW,
    );
    expect(saved.contextMode).toBe("memory_confirm_allowed");
    expect(saved.prompt.saveInstruction.split("\n")[0]).toBe("[MEMORY SAVE CONFIRMED]");

    const skipped = await builder.build(
      {
        iin: "u1",
        message: "remember I like tea",
        intent: "memory_instruction",
        saveDecision: { saved: false, decision: "skip" },
        saveResults: [{ saved: true, content: "Likes tea" }],
      },
      NOW,
    );
    expect(skipped.prompt.saveInstruction).toBe(NO_SAVE_DIRECTIVE);
  });

  it("holds the reply while memory cards are pending", async () => {
    const builder = new ContextPromptBuilder(resolverWith(undefined), null, null, logger);
    const card = {
      tempId: "item-0",
      type: "event",
      icon: "📅",
      title: "Dentist",
      complete: false,
      missingRequired: ["when_date"],
    };
    const result = await builder.build(
      {
        iin: "u1",
        message: "dentist next week",
        intent: "greeting",
        saveDecision: { saved: false, decision: "hold", pendingCards: [card] },
      },
      NOW,
    );
    expect(result.holdForClarification).toBe(true);
    expect(result.memoryCards).toEqual([card]);
    expect(result.quickReplies).toBeUndefined();
    expect(result.prompt.system).toContain("[CONTEXT: MEMORY CARDS PENDING]");
    expect(result.prompt.saveInstruction).toBe(NO_SAVE_DIRECTIVE);
  });

  it("falls back to a minimal prompt when injection is disabled", async () => {
    const builder = new ContextPromptBuilder(
      resolverWith({ injection: { enabled: false }, prompts: { persona: "You are helpful." } }),
      null,
      null,
      logger,
    );
    const result = await builder.build(
      { iin: "u1", message: "hi", intent: "question", memories: [identity] },
      NOW,
    );
    expect(result.prompt.full).toBe(
      ["You are helpful.", "You don't have any memories about this user yet.", NO_SAVE_DIRECTIVE, "User: hi"].join(
        "\n\n",
      ),
    );
    expect(result.memoriesUsed).toBe(0);
    expect(result.holdForClarification).toBe(false);
  });

  it("confirms a save when injection is disabled", async () => {
    const builder = new ContextPromptBuilder(
      resolverWith({ injection: { enabled: false }, prompts: { persona: "You are helpful." } }),
      null,
      null,
      logger,
    );
    const result = await builder.build(
      {
        iin: "u1",
        message: "hi",
        intent: "question",
        memories: [identity],
        saveDecision: { saved: true, decision: "save" },
      },
      NOW,
    );
    expect(result.prompt.saveInstruction.split("\n")[0]).toBe("[MEMORY SAVE CONFIRMED]");
    expect(result.prompt.saveInstruction).not.toBe(NO_SAVE_DIRECTIVE);
    expect(result.prompt.memories).toBe("You don't have any memories about this user yet.");
  });

  it("looks memories up when none are supplied", async () => {
    const listActiveMemories = vi.fn(() => [identity]);
    const builder = new ContextPromptBuilder(resolverWith(undefined), null, { listActiveMemories }, logger);
    const result = await builder.build({ iin: "u1", message: "who am I?", intent: { primary: "Question" } }, NOW);
    expect(listActiveMemories).toHaveBeenCalledWith("u1", 100);
    expect(result.intent).toBe("question");
    expect(result.memoriesUsed).toBe(1);
  });

  it("continues without memories when the lookup fails", async () => {
    const builder = new ContextPromptBuilder(
      resolverWith(undefined),
      null,
      {
        listActiveMemories: () => {
          throw new Error("disk I/O error");
        },
      },
      logger,
    );
    const result = await builder.build({ iin: "u1", message: "who am I?", intent: "question" }, NOW);
    expect(result.prompt.memories).toBe("You don't have any memories about this user yet.");
    expect(result.memoriesUsed).toBe(0);
  });

  it("uses the layered context in place of the memory list", async () => {
    const assembler = new ContextAssembler([new ProfileLayer(null, logger)], logger);
    const builder = new ContextPromptBuilder(resolverWith(undefined), assembler, null, logger);
    const fact = makeMemory({ id: "f1", content: "Works as a nurse", type: "fact", context: null });
    const result = await builder.build({ iin: "u1", message: "any advice?", intent: "advice", memories: [fact] }, NOW);

    expect(result.layerContext?.assembledText).toBe("USER PROFILE:\n- Works as a nurse");
    expect(result.prompt.full).toContain("\n\nUSER PROFILE:\n- Works as a nurse\n\n");
    expect(result.prompt.full).not.toContain("Here is what you know about the user:");
  });

  it("never shows the layers a memory the intent filter removed", async () => {
    const assembler = new ContextAssembler([new ProfileLayer(null, logger)], logger);
    const builder = new ContextPromptBuilder(resolverWith(undefined), assembler, null, logger);
    const result = await builder.build(
      { iin: "u1", message: "hi", intent: "greeting", memories: [identity, ...personal] },
      NOW,
    );
    expect(result.layerContext?.assembledText).toBe("");
    expect(result.prompt.full).toContain("Here is what you know about the user:\n\n- Name is Dana");
  });
});
