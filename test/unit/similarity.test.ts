import { describe, it, expect } from "vitest";
import {
  keywordSimilarity,
  matchesConflictCategory,
  normalizeText,
  wordSet,
} from "../../src/conflicts/similarity.js";

describe("normalizeText", () => {
  it("lowercases and strips punctuation", () => {
    expect(normalizeText("Hello, World!")).toBe("hello world");
  });
});

describe("wordSet", () => {
  it("drops words of two characters or fewer", () => {
    expect([...wordSet("I am at the gym")]).toEqual(["the", "gym"]);
  });
});

describe("keywordSimilarity", () => {
  it("is 1 for identical normalized content", () => {
    expect(keywordSimilarity("Dentist appt Tuesday 3pm", "dentist APPT tuesday, 3pm!")).toBe(1);
  });

  it("is 0 when either side has no usable words", () => {
    expect(keywordSimilarity("a b", "dentist appointment")).toBe(0);
    expect(keywordSimilarity("", "")).toBe(0);
  });

  it("computes Jaccard over word sets", () => {
    // {lives, berlin} vs {lives, paris}: 1 shared of 3
    expect(keywordSimilarity("Lives in Berlin", "Lives in Paris")).toBeCloseTo(1 / 3);
  });

  it("is symmetric", () => {
    const a = "Works at the bakery downtown";
    const b = "Works downtown now";
    expect(keywordSimilarity(a, b)).toBe(keywordSimilarity(b, a));
  });
});

describe("matchesConflictCategory", () => {
  const categories = ["location", "job"];

  it("matches when the type is a category", () => {
    expect(matchesConflictCategory("Location", "anything", categories)).toBe(true);
  });

  it("matches on a category keyword in the content", () => {
    expect(matchesConflictCategory("fact", "User moved to Lisbon", categories)).toBe(true);
  });

  it("ignores keywords of categories that are not configured", () => {
    expect(matchesConflictCategory("fact", "User is married", categories)).toBe(false);
  });
});
