import { describe, expect, it } from "vitest";
import { expandQuestionTerms, MAX_EXPANSION_TERMS } from "../../src/modules/analysis/query-expansion.js";

describe("modules/analysis/query-expansion", () => {
  it("adds synonyms for terms found in the question without repeating question words", () => {
    const expansions = expandQuestionTerms({
      normalized: "Who is eligible for employment insurance",
      keywords: ["eligible", "employment", "insurance"]
    });

    expect(expansions).toEqual([
      "ei",
      "unemployment insurance",
      "assurance-emploi",
      "qualify",
      "entitled",
      "admissible",
      "work",
      "job",
      "occupation"
    ]);
  });

  it("limits synonyms per term and in total", () => {
    const synonyms = {
      alpha: ["a1", "a2", "a3", "a4"],
      beta: ["b1", "b2", "b3"],
      gamma: ["g1", "g2", "g3"],
      delta: ["d1", "d2", "d3"]
    };

    const expansions = expandQuestionTerms({ normalized: "alpha beta gamma delta", keywords: [] }, synonyms);

    expect(expansions).toHaveLength(MAX_EXPANSION_TERMS);
    expect(expansions).not.toContain("a4");
    expect(expansions.slice(0, 4)).toEqual(["a1", "a2", "a3", "b1"]);
  });

  it("matches dictionary terms on word boundaries only", () => {
    expect(expandQuestionTerms({ normalized: "employer obligations", keywords: [] }, { employ: ["hire"] })).toEqual([]);
  });
});
