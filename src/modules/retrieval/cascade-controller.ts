import type { Question } from "../analysis/types.js";
import { BackendUnavailableError, describeError, RequestCancelledError } from "../errors.js";
import { passageKey } from "../fusion/context-assembler.js";
import { OperationTimeoutError, withTimeout } from "../shared/abort.js";
import { logDebug, logInfo, logWarn, type CorrelationContext } from "../../observability/logger.js";
import { recordErrorRate, recordRetrievalLatency, recordTierLatency } from "../../observability/metrics.js";
import { calibrateHits, DEFAULT_CALIBRATION, type CalibrationPolicy } from "./score-calibration.js";
import type { BackendName, RetrievalAdapter, RetrievalHit, TierInvocation, TierNumber } from "./types.js";

export interface CascadePolicy {
  acceptanceThreshold: number;
  minimumSufficientCount: number;
  tierTimeoutMs: number;
  parallelFallback: boolean;
  tierResultLimit: number;
  calibration: CalibrationPolicy;
}

export const DEFAULT_CASCADE_POLICY: CascadePolicy = {
  acceptanceThreshold: 0.5,
  minimumSufficientCount: 8,
  tierTimeoutMs: 4000,
  parallelFallback: false,
  tierResultLimit: 10,
  calibration: DEFAULT_CALIBRATION
};

export type StopReason = "accepted" | "sufficient_count" | "exhausted";

export interface CascadeState {
  nextTier: TierNumber | null;
  accumulated: RetrievalHit[];
  invocations: TierInvocation[];
  stopReason: StopReason | null;
}

export interface TierOutcome {
  hits: RetrievalHit[];
  invocations: TierInvocation[];
}

export interface CascadeResult {
  hits: RetrievalHit[];
  invocations: TierInvocation[];
  tiersUsed: TierNumber[];
  quality: number;
  stopReason: StopReason;
  lowEvidence: boolean;
  durationMs: number;
}

export interface CascadeAdapters {
  hybrid: RetrievalAdapter;
  graph: RetrievalAdapter;
  fulltext: RetrievalAdapter;
}

export interface CascadeControllerDependencies {
  adapters: CascadeAdapters;
  policy?: Partial<CascadePolicy>;
  now?: () => number;
  logDebug?: typeof logDebug;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
  recordErrorRate?: typeof recordErrorRate;
  recordRetrievalLatency?: typeof recordRetrievalLatency;
  recordTierLatency?: typeof recordTierLatency;
}

export interface CascadeRunOptions {
  signal?: AbortSignal;
  requestId?: string;
}

const LOW_CONFIDENCE_INTENT = 0.5;
const BREADTH_FACTOR = 1.5;

export const TIER_BACKENDS: Record<TierNumber, BackendName> = {
  1: "hybrid",
  2: "hybrid",
  3: "graph",
  4: "fulltext"
};

export const initialCascadeState = (): CascadeState => ({
  nextTier: 1,
  accumulated: [],
  invocations: [],
  stopReason: null
});

/** Distinct (documentId, sectionId) passages; a passage found by several tiers counts once. */
export const uniquePassageCount = (hits: readonly RetrievalHit[]): number => new Set(hits.map(passageKey)).size;

export const resultQuality = (hits: readonly RetrievalHit[]): number => {
  if (hits.length === 0) {
    return 0;
  }
  const maxScore = Math.max(...hits.map((hit) => hit.normalizedScore));
  return maxScore * Math.min(1, 0.6 + 0.1 * uniquePassageCount(hits));
};

/** Per-tier result limit, widened when the analyzer is unsure what was asked. */
export const resolveTierLimit = (baseLimit: number, intentConfidence: number): number =>
  intentConfidence < LOW_CONFIDENCE_INTENT ? Math.ceil(baseLimit * BREADTH_FACTOR) : baseLimit;

const toTierNumber = (value: number): TierNumber | null =>
  value === 1 || value === 2 || value === 3 || value === 4 ? value : null;

/**
 * Folds the outcome of one cascade step into the state and decides whether to
 * stop. A step may cover several tiers when fallback tiers run in parallel.
 */
export const advanceCascade = (
  state: CascadeState,
  outcome: TierOutcome,
  policy: Pick<CascadePolicy, "acceptanceThreshold" | "minimumSufficientCount">
): CascadeState => {
  const accumulated = [...state.accumulated, ...outcome.hits];
  const invocations = [...state.invocations, ...outcome.invocations];
  const lastTier = Math.max(state.nextTier ?? 4, ...outcome.invocations.map((invocation) => invocation.tier));

  if (resultQuality(accumulated) >= policy.acceptanceThreshold) {
    return { nextTier: null, accumulated, invocations, stopReason: "accepted" };
  }
  if (uniquePassageCount(accumulated) >= policy.minimumSufficientCount) {
    return { nextTier: null, accumulated, invocations, stopReason: "sufficient_count" };
  }

  const nextTier = toTierNumber(lastTier + 1);
  return nextTier
    ? { nextTier, accumulated, invocations, stopReason: null }
    : { nextTier: null, accumulated, invocations, stopReason: "exhausted" };
};

const uniqueTitles = (hits: readonly RetrievalHit[]): string[] => [...new Set(hits.map((hit) => hit.title))];

export class CascadeController {
  private readonly adapters: CascadeAdapters;
  private readonly policy: CascadePolicy;
  private readonly deps: Required<Omit<CascadeControllerDependencies, "adapters" | "policy">>;

  constructor(dependencies: CascadeControllerDependencies) {
    this.adapters = dependencies.adapters;
    this.policy = { ...DEFAULT_CASCADE_POLICY, ...dependencies.policy };
    this.deps = {
      now: dependencies.now ?? Date.now,
      logDebug: dependencies.logDebug ?? logDebug,
      logInfo: dependencies.logInfo ?? logInfo,
      logWarn: dependencies.logWarn ?? logWarn,
      recordErrorRate: dependencies.recordErrorRate ?? recordErrorRate,
      recordRetrievalLatency: dependencies.recordRetrievalLatency ?? recordRetrievalLatency,
      recordTierLatency: dependencies.recordTierLatency ?? recordTierLatency
    };
  }

  async run(question: Question, options: CascadeRunOptions = {}): Promise<CascadeResult> {
    const { signal } = options;
    const context: CorrelationContext = { requestId: options.requestId ?? null };
    const startedAt = this.deps.now();
    const limit = resolveTierLimit(this.policy.tierResultLimit, question.intentConfidence);
    let state = initialCascadeState();

    while (state.nextTier !== null) {
      this.throwIfCancelled(signal);
      const tiers: TierNumber[] = state.nextTier === 3 && this.policy.parallelFallback ? [3, 4] : [state.nextTier];
      const seedTitles = uniqueTitles(state.accumulated);

      const outcomes = await Promise.all(
        tiers.map((tier) => this.invokeTier(tier, question, limit, seedTitles, context, signal))
      );
      this.throwIfCancelled(signal);

      state = advanceCascade(
        state,
        {
          hits: outcomes.flatMap((outcome) => outcome.hits),
          invocations: outcomes.flatMap((outcome) => outcome.invocations)
        },
        this.policy
      );
    }

    const stopReason: StopReason = state.stopReason ?? "exhausted";
    const durationMs = this.deps.now() - startedAt;
    const result: CascadeResult = {
      hits: state.accumulated,
      invocations: state.invocations,
      tiersUsed: state.invocations.map((invocation) => invocation.tier),
      quality: resultQuality(state.accumulated),
      stopReason,
      lowEvidence: stopReason === "exhausted",
      durationMs
    };

    this.deps.recordRetrievalLatency(durationMs);
    this.deps.logInfo("retrieval.cascade.complete", context, {
      tiers_used: result.tiersUsed,
      hit_count: result.hits.length,
      unique_passage_count: uniquePassageCount(result.hits),
      quality: Number(result.quality.toFixed(3)),
      stop_reason: stopReason,
      low_evidence: result.lowEvidence,
      latency_ms: durationMs
    });

    return result;
  }

  private throwIfCancelled(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new RequestCancelledError("retrieval");
    }
  }

  private async invokeTier(
    tier: TierNumber,
    question: Question,
    limit: number,
    seedTitles: string[],
    context: CorrelationContext,
    signal: AbortSignal | undefined
  ): Promise<TierOutcome> {
    const backend = TIER_BACKENDS[tier];
    const adapter = this.adapters[backend];
    const startedAt = this.deps.now();

    try {
      const rawHits = await withTimeout(
        `tier ${tier} (${backend})`,
        (tierSignal) => adapter.retrieve({ question, tier, limit, seedTitles }, tierSignal),
        this.policy.tierTimeoutMs,
        signal
      );
      const hits = calibrateHits(rawHits.slice(0, limit), tier, this.policy.calibration[tier]);
      const durationMs = this.deps.now() - startedAt;

      this.deps.recordTierLatency(tier, backend, durationMs);
      this.deps.logDebug("retrieval.tier.complete", context, {
        tier,
        backend,
        hit_count: hits.length,
        latency_ms: durationMs
      });

      return {
        hits,
        invocations: [{ tier, backend, status: "ok", hitCount: hits.length, durationMs }]
      };
    } catch (error) {
      if (signal?.aborted) {
        throw new RequestCancelledError("retrieval");
      }

      const kind = error instanceof OperationTimeoutError ? "timeout" : "error";
      const failure = new BackendUnavailableError({
        tier,
        backend,
        kind,
        message:
          kind === "timeout"
            ? `${backend} backend timed out on tier ${tier} after ${this.policy.tierTimeoutMs}ms`
            : `${backend} backend failed on tier ${tier}: ${describeError(error)}`,
        cause: error
      });
      const durationMs = this.deps.now() - startedAt;

      this.deps.recordErrorRate(`retrieval_tier_${tier}_${kind}`);
      this.deps.logWarn("retrieval.tier.failed", context, {
        tier,
        backend,
        status: kind,
        latency_ms: durationMs,
        error_code: failure.code,
        error_message: failure.message
      });

      return {
        hits: [],
        invocations: [{ tier, backend, status: kind, hitCount: 0, durationMs, error: failure.message }]
      };
    }
  }
}
