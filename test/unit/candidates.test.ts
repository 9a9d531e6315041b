import { describe, it, expect } from "vitest";
import { findCandidates } from "../../src/conflicts/candidates.js";
import { conflictConfig, makeCandidate, makeExisting } from "../helpers/fixtures.js";

describe("findCandidates", () => {
  const config = conflictConfig();

  it("keeps same-type records above half the threshold, best first", () => {
    const item = makeCandidate({ content: "Dentist appointment Tuesday afternoon" });
    const matches = findCandidates(
      item,
      [
        makeExisting({ id: "weak", content: "Dentist appointment" }),
        makeExisting({ id: "strong", content: "Dentist appointment Tuesday afternoon" }),
        makeExisting({ id: "unrelated", content: "Birthday party Saturday" }),
      ],
      config,
    );
    expect(matches.map((m) => m.existing.id)).toEqual(["strong", "weak"]);
    expect(matches[0]?.similarity).toBe(1);
    expect(matches[1]?.similarity).toBe(0.5);
  });

  it("skips inactive records", () => {
    const matches = findCandidates(
      makeCandidate(),
      [makeExisting({ status: "inactive" })],
      config,
    );
    expect(matches).toEqual([]);
  });

  it("skips records of another type unless the item falls in a category", () => {
    const existing = [makeExisting({ type: "fact", content: "Dentist appointment Tuesday" })];
    expect(findCandidates(makeCandidate(), existing, config)).toEqual([]);

    const located = makeCandidate({ type: "event", content: "Lives near the dentist" });
    const cross = findCandidates(
      located,
      [makeExisting({ type: "fact", content: "Lives near the dentist" })],
      config,
    );
    expect(cross).toHaveLength(1);
  });

  it("caps results at maxCandidates", () => {
    const capped = conflictConfig({ similarity: { maxCandidates: 2 } });
    const existing = [1, 2, 3].map((n) => makeExisting({ id: `m${n}` }));
    expect(findCandidates(makeCandidate(), existing, capped)).toHaveLength(2);
  });
});
