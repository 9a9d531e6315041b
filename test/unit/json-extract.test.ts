import { describe, it, expect } from "vitest";
import { z } from "zod";
import { extractJsonObject, parseModelJson, stripCodeFences } from "../../src/llm/json-extract.js";

const schema = z.object({ type: z.string(), confidence: z.number() });

describe("stripCodeFences", () => {
  it("unwraps fenced blocks", () => {
    expect(stripCodeFences('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
  });
});

describe("extractJsonObject", () => {
  it("takes the span from the first brace to the last", () => {
    expect(extractJsonObject('Sure! {"type": "UPDATE", "confidence": 0.8} Hope this helps.')).toBe(
      '{"type": "UPDATE", "confidence": 0.8}',
    );
  });

  it("returns null without an object", () => {
    expect(extractJsonObject("no json here")).toBeNull();
    expect(extractJsonObject("} backwards {")).toBeNull();
  });
});

describe("parseModelJson", () => {
  it("parses and validates", () => {
    expect(parseModelJson('```json\n{"type": "CONFLICT", "confidence": 0.9}\n```', schema)).toEqual({
      type: "CONFLICT",
      confidence: 0.9,
    });
  });

  it("returns null for invalid JSON or a schema mismatch", () => {
    expect(parseModelJson("{type: CONFLICT}", schema)).toBeNull();
    expect(parseModelJson('{"type": "CONFLICT"}', schema)).toBeNull();
  });
});
