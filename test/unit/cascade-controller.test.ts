import { describe, expect, it, vi } from "vitest";
import { RequestCancelledError } from "../../src/modules/errors.js";
import {
  advanceCascade,
  CascadeController,
  initialCascadeState,
  resolveTierLimit,
  resultQuality,
  uniquePassageCount,
  type CascadeAdapters,
  type CascadePolicy
} from "../../src/modules/retrieval/cascade-controller.js";
import { calibrateScore } from "../../src/modules/retrieval/score-calibration.js";
import type { RawHit } from "../../src/modules/retrieval/types.js";
import { makeFakeAdapter, makeHit, makeQuestion, makeRawHit, type FakeAdapter } from "../helpers/factories.js";

const makeController = (
  adapters: { hybrid?: FakeAdapter; graph?: FakeAdapter; fulltext?: FakeAdapter },
  policy: Partial<CascadePolicy> = {}
) => {
  const resolved: CascadeAdapters & { hybrid: FakeAdapter; graph: FakeAdapter; fulltext: FakeAdapter } = {
    hybrid: adapters.hybrid ?? makeFakeAdapter("hybrid"),
    graph: adapters.graph ?? makeFakeAdapter("graph"),
    fulltext: adapters.fulltext ?? makeFakeAdapter("fulltext")
  };
  const deps = {
    now: () => 0,
    logDebug: vi.fn(),
    logInfo: vi.fn(),
    logWarn: vi.fn(),
    recordErrorRate: vi.fn(),
    recordRetrievalLatency: vi.fn(),
    recordTierLatency: vi.fn()
  };
  return {
    adapters: resolved,
    deps,
    controller: new CascadeController({ adapters: resolved, policy, ...deps })
  };
};

const strongGraphHits = (): RawHit[] =>
  [1, 2, 3].map((index) =>
    makeRawHit({ id: `graph-${index}`, documentId: `doc-g${index}`, sectionId: String(index), rawScore: 0.4 })
  );

const never = (): Promise<RawHit[]> => new Promise<RawHit[]>(() => undefined);

describe("modules/retrieval/score-calibration", () => {
  it("clamps blended scores and saturates rank scores", () => {
    expect(calibrateScore(1.4, { kind: "clamp" })).toBe(1);
    expect(calibrateScore(0.3, { kind: "saturating", halfPoint: 0.1 })).toBeCloseTo(0.75, 10);
    expect(calibrateScore(-1, { kind: "saturating", halfPoint: 0.1 })).toBe(0);
    expect(calibrateScore(Number.NaN, { kind: "clamp" })).toBe(0);
  });

  it("is monotonic", () => {
    const rule = { kind: "saturating", halfPoint: 0.1 } as const;
    const scores = [0.01, 0.05, 0.1, 0.5, 2].map((raw) => calibrateScore(raw, rule));
    expect([...scores].sort((left, right) => left - right)).toEqual(scores);
  });
});

describe("modules/retrieval/cascade-controller", () => {
  it("computes result quality from the best score and the hit count", () => {
    expect(resultQuality([])).toBe(0);
    expect(resultQuality([makeHit({ normalizedScore: 0.8 })])).toBeCloseTo(0.56, 10);
    expect(
      resultQuality(
        Array.from({ length: 5 }, (_, index) => makeHit({ id: `h${index}`, sectionId: String(index), normalizedScore: 0.6 }))
      )
    ).toBeCloseTo(0.6, 10);
  });

  it("counts a passage found by several tiers once", () => {
    const passages = [1, 2, 3].map((index) => makeHit({ id: `t1-${index}`, sectionId: String(index), normalizedScore: 0.5 }));
    const repeated = passages.map((hit) => ({ ...hit, id: `t2-${hit.sectionId}`, tier: 2 as const }));

    expect(uniquePassageCount([...passages, ...repeated])).toBe(3);
    expect(resultQuality([...passages, ...repeated])).toBeCloseTo(0.45, 10);
  });

  it("widens tier limits for low-confidence intents", () => {
    expect(resolveTierLimit(10, 0.3)).toBe(15);
    expect(resolveTierLimit(10, 0.5)).toBe(10);
  });

  it("stops on a sufficient hit count even when quality is low", () => {
    const hits = Array.from({ length: 8 }, (_, index) =>
      makeHit({ id: `weak-${index}`, sectionId: String(index), normalizedScore: 0.05 })
    );
    const state = advanceCascade(
      initialCascadeState(),
      { hits, invocations: [{ tier: 1, backend: "hybrid", status: "ok", hitCount: 8, durationMs: 3 }] },
      { acceptanceThreshold: 0.5, minimumSufficientCount: 8 }
    );

    expect(state.nextTier).toBeNull();
    expect(state.stopReason).toBe("sufficient_count");
  });

  it("escalates to the next tier when the threshold is not met", () => {
    const state = advanceCascade(
      initialCascadeState(),
      { hits: [], invocations: [{ tier: 1, backend: "hybrid", status: "ok", hitCount: 0, durationMs: 1 }] },
      { acceptanceThreshold: 0.5, minimumSufficientCount: 8 }
    );

    expect(state).toEqual({
      nextTier: 2,
      accumulated: [],
      invocations: [{ tier: 1, backend: "hybrid", status: "ok", hitCount: 0, durationMs: 1 }],
      stopReason: null
    });
  });

  it("never invokes Tiers 3 or 4 when Tier 1 meets the threshold", async () => {
    const { controller, adapters } = makeController({
      hybrid: makeFakeAdapter("hybrid", { 1: [makeRawHit({ rawScore: 0.8 })] })
    });

    const result = await controller.run(makeQuestion());

    expect(result.tiersUsed).toEqual([1]);
    expect(result.stopReason).toBe("accepted");
    expect(result.lowEvidence).toBe(false);
    expect(result.hits).toHaveLength(1);
    expect(result.hits[0]).toMatchObject({ tier: 1, normalizedScore: 0.8 });
    expect(adapters.graph.retrieve).not.toHaveBeenCalled();
    expect(adapters.fulltext.retrieve).not.toHaveBeenCalled();
  });

  it("stops after Tier 3 when graph results lift quality over the threshold", async () => {
    const { controller, adapters } = makeController({
      hybrid: makeFakeAdapter("hybrid", {
        1: [],
        2: [makeRawHit({ id: "weak", documentId: "doc-w", title: "Old Age Security Act", rawScore: 0.2 })]
      }),
      graph: makeFakeAdapter("graph", { 3: strongGraphHits() })
    });

    const result = await controller.run(makeQuestion());

    expect(result.tiersUsed).toEqual([1, 2, 3]);
    expect(result.stopReason).toBe("accepted");
    expect(result.quality).toBeCloseTo(0.8, 10);
    expect(result.hits.map((hit) => [hit.id, hit.tier])).toEqual([
      ["weak", 2],
      ["graph-1", 3],
      ["graph-2", 3],
      ["graph-3", 3]
    ]);
    expect(adapters.fulltext.retrieve).not.toHaveBeenCalled();
    expect(adapters.graph.retrieve.mock.calls[0]?.[0].seedTitles).toEqual(["Old Age Security Act"]);
  });

  it("keeps escalating when the relaxed tier only repeats earlier passages", async () => {
    const weakPassages = [1, 2, 3, 4].map((index) =>
      makeRawHit({ id: `weak-${index}`, documentId: `doc-${index}`, sectionId: String(index), rawScore: 0.1 })
    );
    const { controller, adapters } = makeController({
      hybrid: makeFakeAdapter("hybrid", { 1: weakPassages, 2: weakPassages })
    });

    const result = await controller.run(makeQuestion());

    expect(result.tiersUsed).toEqual([1, 2, 3, 4]);
    expect(result.stopReason).toBe("exhausted");
    expect(result.lowEvidence).toBe(true);
    expect(result.hits).toHaveLength(8);
    expect(uniquePassageCount(result.hits)).toBe(4);
    expect(adapters.graph.retrieve).toHaveBeenCalledTimes(1);
    expect(adapters.fulltext.retrieve).toHaveBeenCalledTimes(1);
  });

  it("reports low evidence after exhausting every tier", async () => {
    const { controller } = makeController({});

    const result = await controller.run(makeQuestion());

    expect(result.tiersUsed).toEqual([1, 2, 3, 4]);
    expect(result.stopReason).toBe("exhausted");
    expect(result.lowEvidence).toBe(true);
    expect(result.hits).toEqual([]);
    expect(result.invocations.map((invocation) => invocation.backend)).toEqual(["hybrid", "hybrid", "graph", "fulltext"]);
  });

  it("records a timed-out tier and continues", async () => {
    const hybrid = makeFakeAdapter("hybrid");
    hybrid.retrieve.mockImplementation(async (query) => (query.tier === 1 ? never() : [makeRawHit({ rawScore: 0.9 })]));
    const { controller, deps } = makeController({ hybrid }, { tierTimeoutMs: 20 });

    const result = await controller.run(makeQuestion());

    expect(result.invocations).toEqual([
      {
        tier: 1,
        backend: "hybrid",
        status: "timeout",
        hitCount: 0,
        durationMs: 0,
        error: "hybrid backend timed out on tier 1 after 20ms"
      },
      { tier: 2, backend: "hybrid", status: "ok", hitCount: 1, durationMs: 0 }
    ]);
    expect(result.stopReason).toBe("accepted");
    expect(deps.recordErrorRate).toHaveBeenCalledWith("retrieval_tier_1_timeout");
  });

  it("records a failing backend and falls through to the next tier", async () => {
    const graph = makeFakeAdapter("graph");
    graph.retrieve.mockRejectedValue(new Error("connection refused"));
    const { controller, deps } = makeController({
      graph,
      fulltext: makeFakeAdapter("fulltext", { 4: [makeRawHit({ id: "ft-1", rawScore: 0.3 })] })
    });

    const result = await controller.run(makeQuestion());

    expect(result.invocations[2]).toEqual({
      tier: 3,
      backend: "graph",
      status: "error",
      hitCount: 0,
      durationMs: 0,
      error: "graph backend failed on tier 3: connection refused"
    });
    expect(result.tiersUsed).toEqual([1, 2, 3, 4]);
    expect(result.hits.map((hit) => hit.id)).toEqual(["ft-1"]);
    expect(result.stopReason).toBe("accepted");
    expect(deps.logWarn).toHaveBeenCalledWith(
      "retrieval.tier.failed",
      { requestId: null },
      expect.objectContaining({ tier: 3, status: "error" })
    );
  });

  it("issues Tiers 3 and 4 together when parallel fallback is enabled", async () => {
    const { controller, adapters } = makeController(
      {
        graph: makeFakeAdapter("graph", { 3: strongGraphHits() }),
        fulltext: makeFakeAdapter("fulltext", { 4: [makeRawHit({ id: "ft-1", documentId: "doc-f", rawScore: 0.1 })] })
      },
      { parallelFallback: true }
    );

    const result = await controller.run(makeQuestion());

    expect(result.tiersUsed).toEqual([1, 2, 3, 4]);
    expect(adapters.fulltext.retrieve).toHaveBeenCalledTimes(1);
    expect(result.hits).toHaveLength(4);
  });

  it("passes widened limits to adapters for low-confidence questions", async () => {
    const { controller, adapters } = makeController({});

    await controller.run(makeQuestion({ intent: "unknown", intentConfidence: 0.3 }));

    expect(adapters.hybrid.retrieve.mock.calls[0]?.[0].limit).toBe(15);
  });

  it("rejects with RequestCancelledError when the request is aborted mid-tier", async () => {
    const hybrid = makeFakeAdapter("hybrid");
    hybrid.retrieve.mockImplementation(never);
    const { controller, adapters } = makeController({ hybrid }, { tierTimeoutMs: 1000 });
    const abortController = new AbortController();
    setTimeout(() => abortController.abort(), 5);

    await expect(controller.run(makeQuestion(), { signal: abortController.signal })).rejects.toThrowError(
      RequestCancelledError
    );
    expect(adapters.graph.retrieve).not.toHaveBeenCalled();
  });

  it("rejects before invoking any tier when already aborted", async () => {
    const { controller, adapters } = makeController({});
    const abortController = new AbortController();
    abortController.abort();

    await expect(controller.run(makeQuestion(), { signal: abortController.signal })).rejects.toThrowError(
      "Request was cancelled during retrieval."
    );
    expect(adapters.hybrid.retrieve).not.toHaveBeenCalled();
  });

  it("uses the same tiers and hit order across identical runs", async () => {
    const { controller } = makeController({
      hybrid: makeFakeAdapter("hybrid", { 2: [makeRawHit({ id: "weak", rawScore: 0.2 })] }),
      graph: makeFakeAdapter("graph", { 3: strongGraphHits() })
    });

    const first = await controller.run(makeQuestion());
    const second = await controller.run(makeQuestion());

    expect(second.tiersUsed).toEqual(first.tiersUsed);
    expect(second.hits.map((hit) => hit.id)).toEqual(first.hits.map((hit) => hit.id));
  });
});
