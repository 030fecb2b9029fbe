import { describe, expect, it } from "vitest";
import { loadSearchStopWords } from "../../src/modules/analysis/terminology.js";
import {
  buildSnippet,
  dateColumnSchema,
  keywordCoverage,
  relationshipsSchema
} from "../../src/modules/retrieval/adapters/hit-mapping.js";
import { buildSeedTsQuery, buildTsQuery, textSearchConfig } from "../../src/modules/retrieval/adapters/tsquery.js";

describe("modules/retrieval/adapters/tsquery", () => {
  const stopWords = loadSearchStopWords();

  it("joins terms with & and turns slash alternatives into OR groups", () => {
    expect(buildTsQuery("EI/CPP benefits for the spouse", stopWords)).toBe("(EI | CPP) & benefits & spouse");
  });

  it("strips punctuation and drops stop words", () => {
    expect(buildTsQuery("What are the benefits? --self-employed_", stopWords)).toBe("benefits & self-employed");
    expect(buildTsQuery("what is the", stopWords)).toBeNull();
  });

  it("ORs seed phrases and keeps multi-word phrases grouped", () => {
    expect(buildSeedTsQuery(["Employment Insurance", "eligible", "eligible", "the"], stopWords)).toBe(
      "(Employment & Insurance) | eligible"
    );
    expect(buildSeedTsQuery([], stopWords)).toBeNull();
  });

  it("selects the text search configuration by language", () => {
    expect(textSearchConfig("fr")).toBe("french");
    expect(textSearchConfig("en")).toBe("english");
  });
});

describe("modules/retrieval/adapters/hit-mapping", () => {
  it("measures keyword coverage case-insensitively", () => {
    expect(keywordCoverage("Benefits are payable weekly", ["benefits", "claim"])).toBe(0.5);
    expect(keywordCoverage("Benefits", [])).toBe(0);
  });

  it("highlights terms in short passages", () => {
    expect(buildSnippet("A person is  eligible for\nbenefits.", ["eligible", "benefits"])).toBe(
      "A person is **eligible** for **benefits**."
    );
  });

  it("centres long passages on the first match", () => {
    const content = `${"a".repeat(100)} eligible ${"b".repeat(300)}`;

    expect(buildSnippet(content, ["eligible"])).toBe(`…${"a".repeat(59)} **eligible** ${"b".repeat(171)}…`);
  });

  it("keeps known relationship kinds only", () => {
    expect(
      relationshipsSchema.parse([
        { kind: "SUPERSEDES", target_id: 12 },
        { kind: "cites", target_id: "doc-9" }
      ])
    ).toEqual([{ kind: "supersedes", targetId: "12" }]);
    expect(relationshipsSchema.parse(null)).toEqual([]);
  });

  it("normalizes date columns to ISO days", () => {
    expect(dateColumnSchema.parse(new Date("2021-03-05T00:00:00Z"))).toBe("2021-03-05");
    expect(dateColumnSchema.parse("2020-01-01T10:00:00")).toBe("2020-01-01");
    expect(dateColumnSchema.parse("  ")).toBeNull();
  });
});
