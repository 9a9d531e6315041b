import { describe, it, expect } from "vitest";
import { ConflictClassifier } from "../../src/conflicts/classifier.js";
import { createNullLogger } from "../../src/logging/logger.js";
import { conflictConfig, FakeCompletion, makeCandidate, makeExisting } from "../helpers/fixtures.js";

describe("ConflictClassifier", () => {
  const config = conflictConfig();
  const item = makeCandidate({ content: "Moved to Porto" });
  const existing = makeExisting({ content: "Lives in Lisbon" });

  it("fills both texts into the prompt and passes the stage llm settings", async () => {
    const completion = new FakeCompletion(['{"type":"UPDATE","confidence":0.9,"reason":"moved"}']);
    await new ConflictClassifier(completion, createNullLogger()).classify(item, existing, config);

    expect(completion.calls).toHaveLength(1);
    expect(completion.calls[0]?.prompt).toContain("EXISTING MEMORY: Lives in Lisbon");
    expect(completion.calls[0]?.prompt).toContain("NEW INFORMATION: Moved to Porto");
    expect(completion.calls[0]?.params).toEqual({ temperature: 0.2, maxTokens: 200 });
  });

  it("parses the first JSON object out of surrounding prose", async () => {
    const completion = new FakeCompletion([
      'Sure! Here you go: {"type": "conflict", "confidence": 0.7, "reason": "different cities"} Hope that helps.',
    ]);
    const result = await new ConflictClassifier(completion, createNullLogger()).classify(item, existing, config);
    expect(result).toEqual({ relation: "CONFLICT", confidence: 0.7, reason: "different cities" });
  });

  it("defaults confidence and reason, and clamps confidence", async () => {
    const classifier = new ConflictClassifier(
      new FakeCompletion(['{"type":"DUPLICATE"}', '{"type":"ADDITION","confidence":4}']),
      createNullLogger(),
    );
    expect(await classifier.classify(item, existing, config)).toEqual({
      relation: "DUPLICATE",
      confidence: 0.8,
      reason: "Model determined",
    });
    expect((await classifier.classify(item, existing, config)).confidence).toBe(1);
  });

  it("maps unknown relation labels to NONE", async () => {
    const completion = new FakeCompletion(['{"type":"MAYBE"}']);
    const result = await new ConflictClassifier(completion, createNullLogger()).classify(item, existing, config);
    expect(result.relation).toBe("NONE");
  });

  it("fails open when the call throws", async () => {
    const completion = new FakeCompletion([new Error("timeout")]);
    const result = await new ConflictClassifier(completion, createNullLogger()).classify(item, existing, config);
    expect(result).toEqual({ relation: "NONE", confidence: 0, reason: "Classifier unavailable" });
  });

  it("fails open on an unparsable response", async () => {
    const completion = new FakeCompletion(["I think they conflict."]);
    const result = await new ConflictClassifier(completion, createNullLogger()).classify(item, existing, config);
    expect(result).toEqual({ relation: "NONE", confidence: 0, reason: "Unparsable classifier response" });
  });
});
