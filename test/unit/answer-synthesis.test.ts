import { describe, expect, it, vi } from "vitest";
import { RequestCancelledError, SynthesisParseError } from "../../src/modules/errors.js";
import { parseStructuredAnswer, stripCodeFence } from "../../src/modules/synthesis/answer-schema.js";
import { AnswerSynthesizer, type SynthesisPolicy } from "../../src/modules/synthesis/answer-synthesizer.js";
import type { GenerationPort } from "../../src/modules/synthesis/types.js";
import { ANSWER_RETRY_INSTRUCTION, ANSWER_SYSTEM_PROMPT, buildAnswerUserPrompt } from "../../src/prompts/index.js";
import { answerJson, makeAnswer, makeContext, makeFakeGenerator, makeHit, makeQuestion } from "../helpers/factories.js";

const input = {
  question: makeQuestion(),
  context: makeContext([makeHit()]),
  conflicts: []
};

const makeSynthesizer = (generator: GenerationPort, policy: Partial<SynthesisPolicy> = {}) => {
  const deps = {
    now: () => 0,
    logDebug: vi.fn(),
    logWarn: vi.fn(),
    recordErrorRate: vi.fn(),
    recordGenerationLatency: vi.fn(),
    recordOpenAIUsage: vi.fn()
  };
  return { deps, synthesizer: new AnswerSynthesizer({ generator, policy, ...deps }) };
};

describe("prompts/buildAnswerUserPrompt", () => {
  it("lists the question, tagged passages and conflicts", () => {
    expect(buildAnswerUserPrompt({ question: "Who is eligible for employment insurance", entries: input.context.entries, conflicts: [] })).toBe(
      [
        "Question:",
        "Who is eligible for employment insurance",
        "",
        "Context passages:",
        "[ref_1] Employment Insurance Act, Section 7, in force from 2020-01-01",
        "A person who has lost employment is eligible for benefits.",
        "",
        "Conflicts between passages:",
        "(none)"
      ].join("\n")
    );
  });

  it("formats conflict findings with their reference ids", () => {
    const prompt = buildAnswerUserPrompt({
      question: "q",
      entries: [],
      conflicts: [
        {
          id: "conflict_1",
          hitIds: ["a", "b"],
          referenceIds: ["ref_1", "ref_2"],
          kind: "supersession",
          description: "A supersedes B."
        }
      ],
      retry: true
    });

    expect(prompt).toContain("conflict_1 (supersession, between ref_1 and ref_2): A supersedes B.");
    expect(prompt.endsWith(ANSWER_RETRY_INSTRUCTION)).toBe(true);
  });
});

describe("modules/synthesis/answer-schema", () => {
  it("parses generator JSON into a structured answer", () => {
    expect(parseStructuredAnswer(answerJson())).toEqual(makeAnswer());
  });

  it("accepts fenced output and normalizes enum casing", () => {
    const raw = `\`\`\`json\n${answerJson({ confidence: { level: "MEDIUM" } })}\n\`\`\``;

    const answer = parseStructuredAnswer(raw);

    expect(answer.selfReportedConfidence).toEqual({ level: "medium", justification: "" });
    expect(stripCodeFence("```\n{}\n```")).toBe("{}");
  });

  it("defaults missing citations and statuses", () => {
    const answer = parseStructuredAnswer(
      JSON.stringify({
        direct_answer: { sentence: "Not covered." },
        confidence: { level: "low" },
        requirements: [{ text: "Hold a social insurance number." }]
      })
    );

    expect(answer.directAnswer).toEqual({ sentence: "Not covered.", citations: [], status: "supported" });
    expect(answer.claims).toEqual([]);
    expect(answer.requirements).toEqual([{ text: "Hold a social insurance number.", citations: [] }]);
  });

  it("rejects empty, non-JSON and off-schema output", () => {
    expect(() => parseStructuredAnswer("  ")).toThrowError("Generator returned empty content.");
    expect(() => parseStructuredAnswer("The answer is yes.")).toThrowError(/^Generator returned invalid JSON/);
    expect(() => parseStructuredAnswer(JSON.stringify({ direct_answer: { sentence: "x" } }))).toThrowError(
      "Generator JSON failed schema validation: confidence: Required"
    );
  });
});

describe("modules/synthesis/answer-synthesizer", () => {
  it("sends the strict prompt once and returns the parsed answer", async () => {
    const generator = makeFakeGenerator(answerJson());
    const { synthesizer, deps } = makeSynthesizer(generator);

    const outcome = await synthesizer.synthesize(input, { requestId: "req-1" });

    expect(outcome).toEqual({ status: "ok", answer: makeAnswer(), attempts: 1 });
    expect(generator.complete).toHaveBeenCalledTimes(1);
    expect(generator.complete.mock.calls[0]?.[0].system).toBe(ANSWER_SYSTEM_PROMPT);
    expect(generator.complete.mock.calls[0]?.[0].user).toContain("[ref_1] Employment Insurance Act, Section 7");
    expect(deps.recordGenerationLatency).toHaveBeenCalledWith(0);
  });

  it("records token usage when the generator reports it", async () => {
    const generator: GenerationPort = {
      complete: vi.fn().mockResolvedValue({
        content: answerJson(),
        usage: { promptTokens: 120, completionTokens: 30, totalTokens: 150 }
      })
    };
    const { synthesizer, deps } = makeSynthesizer(generator);

    await synthesizer.synthesize(input);

    expect(deps.recordOpenAIUsage).toHaveBeenCalledWith({ promptTokens: 120, completionTokens: 30, totalTokens: 150 });
  });

  it("fails closed on unparseable output without retrying by default", async () => {
    const generator = makeFakeGenerator("not json");
    const { synthesizer, deps } = makeSynthesizer(generator);

    const outcome = await synthesizer.synthesize(input);

    expect(outcome.status).toBe("parse_error");
    expect(outcome.status === "parse_error" ? outcome.error : null).toBeInstanceOf(SynthesisParseError);
    expect(generator.complete).toHaveBeenCalledTimes(1);
    expect(deps.recordErrorRate).toHaveBeenCalledWith("synthesis_parse_error");
  });

  it("retries once with a stricter instruction when allowed", async () => {
    const generator = makeFakeGenerator("not json", answerJson());
    const { synthesizer } = makeSynthesizer(generator, { parseRetries: 1 });

    const outcome = await synthesizer.synthesize(input);

    expect(outcome).toMatchObject({ status: "ok", attempts: 2 });
    expect(generator.complete.mock.calls[0]?.[0].user).not.toContain(ANSWER_RETRY_INSTRUCTION);
    expect(generator.complete.mock.calls[1]?.[0].user.endsWith(ANSWER_RETRY_INSTRUCTION)).toBe(true);
  });

  it("reports the generator as unavailable on transport failure", async () => {
    const generator: GenerationPort = { complete: vi.fn().mockRejectedValue(new Error("503 upstream")) };
    const { synthesizer } = makeSynthesizer(generator, { parseRetries: 1 });

    await expect(synthesizer.synthesize(input)).resolves.toEqual({
      status: "generator_unavailable",
      error: "503 upstream",
      attempts: 1
    });
    expect(generator.complete).toHaveBeenCalledTimes(1);
  });

  it("abandons a generator that outlives its timeout", async () => {
    const generator: GenerationPort = { complete: () => new Promise(() => undefined) };
    const { synthesizer } = makeSynthesizer(generator, { timeoutMs: 20 });

    await expect(synthesizer.synthesize(input)).resolves.toEqual({
      status: "generator_unavailable",
      error: "answer generation timed out after 20ms",
      attempts: 1
    });
  });

  it("rejects with RequestCancelledError when the request is aborted", async () => {
    const generator: GenerationPort = { complete: () => new Promise(() => undefined) };
    const { synthesizer } = makeSynthesizer(generator, { timeoutMs: 1000 });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 5);

    await expect(synthesizer.synthesize(input, { signal: controller.signal })).rejects.toThrowError(
      RequestCancelledError
    );
  });
});
