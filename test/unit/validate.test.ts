import { describe, it, expect } from "vitest";
import { MalformedInputError } from "../../src/errors.js";
import {
  parseClarifyRequest,
  parseConflictCheckRequest,
  parseContextRequest,
  parseDaySummaryRequest,
  parseTurnRequest,
} from "../../src/pipeline/validate.js";

describe("request validation", () => {
  it("numbers candidates without a tempId and fills defaults", () => {
    const request = parseConflictCheckRequest({
      iin: "u1",
      candidates: [
        { content: "Likes tea", type: "preference" },
        { tempId: "mine", content: "Has a cat", type: "fact", confidence: 0.4 },
      ],
    });
    expect(request.candidates).toEqual([
      { tempId: "item-0", content: "Likes tea", type: "preference", confidence: 1, slots: {} },
      { tempId: "mine", content: "Has a cat", type: "fact", confidence: 0.4, slots: {} },
    ]);
  });

  it("fills slot defaults", () => {
    const request = parseConflictCheckRequest({
      iin: "u1",
      candidates: [{ content: "Dentist", type: "event", slots: { what: { filled: false } } }],
    });
    expect(request.candidates[0]?.slots).toEqual({ what: { value: null, filled: false, source: "extracted" } });
  });

  it("throws MalformedInputError listing each issue", () => {
    let caught: unknown;
    try {
      parseConflictCheckRequest({ iin: "  ", candidates: [{ content: "", type: "fact" }] });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MalformedInputError);
    if (caught instanceof MalformedInputError) {
      expect(caught.message).toBe("Malformed conflict check request");
      expect(caught.issues).toEqual([
        "iin: String must contain at least 1 character(s)",
        "candidates.0.content: String must contain at least 1 character(s)",
      ]);
    }
  });

  it("defaults optional clarification fields", () => {
    const request = parseClarifyRequest({ iin: "u1" });
    expect(request).toEqual({
      iin: "u1",
      items: [],
      pendingConflicts: [],
      originalMessage: "",
      questionsAskedCount: 0,
    });
  });

  it("keeps the intent signal as given", () => {
    expect(parseContextRequest({ iin: "u1", message: "hi", intent: { primary: "greeting" } }).intent).toEqual({
      primary: "greeting",
    });
  });

  it("validates the save decision", () => {
    expect(() =>
      parseContextRequest({ iin: "u1", message: "hi", saveDecision: { saved: true, decision: "maybe" } }),
    ).toThrow(MalformedInputError);
    const request = parseContextRequest({
      iin: "u1",
      message: "hi",
      saveDecision: { saved: false, decision: "hold", pendingCards: [{ title: "Dentist", complete: false }] },
    });
    expect(request.saveDecision?.pendingCards).toEqual([
      { tempId: "", type: "fact", icon: "📝", title: "Dentist", complete: false, missingRequired: [] },
    ]);
  });

  it("defaults turn candidates and counters", () => {
    const request = parseTurnRequest({ iin: "u1", message: "hi" });
    expect(request.candidates).toEqual([]);
    expect(request.questionsAskedCount).toBe(0);
  });

  it("requires an ISO calendar date", () => {
    expect(() => parseTurnRequest({ iin: "u1", message: "hi", currentDate: "Jan 5" })).toThrow(MalformedInputError);
    expect(() => parseDaySummaryRequest({ iin: "u1", date: "5/1/2025", content: "x" })).toThrow(
      "Malformed day summary",
    );
    expect(parseDaySummaryRequest({ iin: "u1", date: "2025-01-05", content: "x" }).topics).toEqual([]);
  });
});
