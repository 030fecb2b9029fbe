import { randomUUID } from "node:crypto";
import type { LowEvidencePolicy } from "../../config/policies.js";
import { logDebug, logInfo, logWarn, type CorrelationContext } from "../../observability/logger.js";
import { recordAnswerLatency, recordAnswerOutcome } from "../../observability/metrics.js";
import type { QueryAnalyzer } from "../analysis/query-analyzer.js";
import type { Question } from "../analysis/types.js";
import { detectConflicts, type ConflictFinding } from "../conflicts/conflict-detector.js";
import { EmptyEvidenceError, RequestCancelledError } from "../errors.js";
import {
  assembleContext,
  DEFAULT_FUSION_POLICY,
  type FusedContext,
  type FusionPolicy
} from "../fusion/context-assembler.js";
import type { CascadeController, CascadeResult } from "../retrieval/cascade-controller.js";
import type { AnswerSynthesizer } from "../synthesis/answer-synthesizer.js";
import type { ConflictNote } from "../synthesis/types.js";
import { validateAnswer } from "../validation/citation-validator.js";
import {
  DEFAULT_CONFIDENCE_POLICY,
  FAIL_CLOSED_CONFIDENCE,
  scoreConfidence,
  type ConfidencePolicy
} from "../validation/confidence-scorer.js";
import { describeFailClosedReason, failClosedSentence } from "./fail-closed.js";
import type { FailClosedReason, FinalResponse, ResponseConflict, SourceReference, StageTimings } from "./types.js";

export interface AnswerPipelinePolicies {
  fusion: FusionPolicy;
  confidence: ConfidencePolicy;
  lowEvidence: LowEvidencePolicy;
}

export interface AnswerPipelineDependencies {
  analyzer: Pick<QueryAnalyzer, "analyze">;
  cascade: Pick<CascadeController, "run">;
  synthesizer: Pick<AnswerSynthesizer, "synthesize">;
  policies?: Partial<AnswerPipelinePolicies>;
  now?: () => number;
  createRequestId?: () => string;
  logDebug?: typeof logDebug;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
  recordAnswerLatency?: typeof recordAnswerLatency;
  recordAnswerOutcome?: typeof recordAnswerOutcome;
}

export interface AnswerOptions {
  signal?: AbortSignal;
  requestId?: string;
}

const DEFAULT_PIPELINE_POLICIES: AnswerPipelinePolicies = {
  fusion: DEFAULT_FUSION_POLICY,
  confidence: DEFAULT_CONFIDENCE_POLICY,
  lowEvidence: "fail_closed"
};

export const toSourceReferences = (context: FusedContext, referenceIds: readonly string[]): SourceReference[] =>
  context.entries
    .filter((entry) => referenceIds.includes(entry.referenceId))
    .map(({ referenceId, hit }) => ({
      referenceId,
      documentId: hit.documentId,
      sectionId: hit.sectionId,
      title: hit.title,
      citation: `${hit.citation.documentTitle}, Section ${hit.citation.sectionId}`,
      tier: hit.tier,
      score: hit.normalizedScore,
      effectiveDate: hit.effectiveDate,
      snippet: hit.snippet
    }));

export const mergeConflictNotes = (
  findings: readonly ConflictFinding[],
  notes: readonly ConflictNote[]
): ResponseConflict[] =>
  findings.map((finding) => ({
    id: finding.id,
    kind: finding.kind,
    referenceIds: finding.referenceIds,
    description: finding.description,
    note: notes.find((note) => note.findingId === finding.id)?.note ?? null
  }));

interface ResponseFrame {
  question: Question;
  requestId: string;
  retrieval: CascadeResult | null;
  timings: StageTimings;
}

export class AnswerPipeline {
  private readonly analyzer: Pick<QueryAnalyzer, "analyze">;
  private readonly cascade: Pick<CascadeController, "run">;
  private readonly synthesizer: Pick<AnswerSynthesizer, "synthesize">;
  private readonly policies: AnswerPipelinePolicies;
  private readonly deps: Required<
    Omit<AnswerPipelineDependencies, "analyzer" | "cascade" | "synthesizer" | "policies">
  >;

  constructor(dependencies: AnswerPipelineDependencies) {
    this.analyzer = dependencies.analyzer;
    this.cascade = dependencies.cascade;
    this.synthesizer = dependencies.synthesizer;
    this.policies = { ...DEFAULT_PIPELINE_POLICIES, ...dependencies.policies };
    this.deps = {
      now: dependencies.now ?? Date.now,
      createRequestId: dependencies.createRequestId ?? randomUUID,
      logDebug: dependencies.logDebug ?? logDebug,
      logInfo: dependencies.logInfo ?? logInfo,
      logWarn: dependencies.logWarn ?? logWarn,
      recordAnswerLatency: dependencies.recordAnswerLatency ?? recordAnswerLatency,
      recordAnswerOutcome: dependencies.recordAnswerOutcome ?? recordAnswerOutcome
    };
  }

  /**
   * Runs one question through analysis, tiered retrieval, fusion, conflict
   * detection, synthesis and citation validation. Evidence failures resolve to
   * a fail-closed response; only invalid input and cancellation reject.
   */
  async answer(rawQuestion: string, options: AnswerOptions = {}): Promise<FinalResponse> {
    const requestId = options.requestId ?? this.deps.createRequestId();
    const context: CorrelationContext = { requestId };
    const startedAt = this.deps.now();

    const question = this.analyzer.analyze(rawQuestion);
    const analyzedAt = this.deps.now();
    this.deps.logDebug("answer.question.analyzed", context, {
      intent: question.intent,
      intent_confidence: question.intentConfidence,
      keyword_count: question.keywords.length,
      entity_count: question.entities.length,
      language: question.language
    });

    const frame: ResponseFrame = {
      question,
      requestId,
      retrieval: null,
      timings: { analysisMs: analyzedAt - startedAt, retrievalMs: 0, synthesisMs: 0, totalMs: 0 }
    };

    const retrieval = await this.cascade.run(question, { signal: options.signal, requestId });
    frame.retrieval = retrieval;
    frame.timings.retrievalMs = this.deps.now() - analyzedAt;

    if (retrieval.lowEvidence && this.policies.lowEvidence === "fail_closed") {
      return this.failClosed(frame, retrieval.hits.length === 0 ? "empty_evidence" : "low_evidence", startedAt);
    }

    let fused: FusedContext;
    try {
      fused = assembleContext(retrieval.hits, this.policies.fusion);
    } catch (error) {
      if (error instanceof EmptyEvidenceError) {
        this.deps.logWarn("answer.context.empty", context, {
          candidate_count: error.candidateCount,
          error_message: error.message
        });
        return this.failClosed(frame, "empty_evidence", startedAt);
      }
      throw error;
    }

    const findings = detectConflicts(fused);
    this.deps.logDebug("answer.context.assembled", context, {
      entry_count: fused.entries.length,
      total_chars: fused.totalChars,
      dropped_count: fused.droppedHitIds.length,
      conflict_count: findings.length
    });

    if (options.signal?.aborted) {
      throw new RequestCancelledError("fusion");
    }

    const synthesisStartedAt = this.deps.now();
    const outcome = await this.synthesizer.synthesize(
      { question, context: fused, conflicts: findings },
      { signal: options.signal, requestId }
    );
    frame.timings.synthesisMs = this.deps.now() - synthesisStartedAt;

    if (outcome.status === "parse_error") {
      return this.failClosed(frame, "synthesis_parse_error", startedAt, [], findings);
    }
    if (outcome.status === "generator_unavailable") {
      return this.failClosed(frame, "generator_unavailable", startedAt, [], findings);
    }

    const validation = validateAnswer(outcome.answer, fused);
    const conflicts = mergeConflictNotes(findings, outcome.answer.conflicts);
    if (validation.removals.length > 0) {
      this.deps.logWarn("answer.citations.removed", context, {
        removed_count: validation.removals.length,
        pass_ratio: validation.passRatio
      });
    }
    if (validation.collapsed) {
      return this.failClosed(frame, validation.collapsed, startedAt, validation.limitations, findings, conflicts);
    }

    const maxContextScore = Math.max(...fused.entries.map((entry) => entry.hit.normalizedScore));
    const confidence = scoreConfidence(
      {
        passRatio: validation.passRatio,
        maxContextScore,
        selfReported: outcome.answer.selfReportedConfidence.level,
        removalCount: validation.removals.length,
        hasConflicts: findings.length > 0,
        capAtLow: retrieval.lowEvidence
      },
      this.policies.confidence
    );

    const limitations = retrieval.lowEvidence
      ? [describeFailClosedReason("low_evidence"), ...validation.limitations]
      : validation.limitations;

    return this.finish(frame, startedAt, {
      answer: validation.answer,
      explanation: outcome.answer.explanation,
      claims: validation.claims,
      requirements: validation.requirements,
      conflicts,
      confidence: { ...confidence, justification: outcome.answer.selfReportedConfidence.justification },
      limitations,
      failClosed: null,
      sources: toSourceReferences(fused, validation.citedReferenceIds)
    });
  }

  private failClosed(
    frame: ResponseFrame,
    reason: FailClosedReason,
    startedAt: number,
    extraLimitations: string[] = [],
    findings: readonly ConflictFinding[] = [],
    conflicts: ResponseConflict[] = mergeConflictNotes(findings, [])
  ): FinalResponse {
    this.deps.logWarn("answer.fail_closed", { requestId: frame.requestId }, { reason });
    return this.finish(frame, startedAt, {
      answer: failClosedSentence(frame.question),
      explanation: null,
      claims: [],
      requirements: [],
      conflicts,
      confidence: { ...FAIL_CLOSED_CONFIDENCE, justification: null },
      limitations: [describeFailClosedReason(reason), ...extraLimitations],
      failClosed: { reason },
      sources: []
    });
  }

  private finish(
    frame: ResponseFrame,
    startedAt: number,
    body: Pick<
      FinalResponse,
      "answer" | "explanation" | "claims" | "requirements" | "conflicts" | "confidence" | "limitations" | "failClosed" | "sources"
    >
  ): FinalResponse {
    const totalMs = this.deps.now() - startedAt;
    const outcome = body.failClosed ? `fail_closed_${body.failClosed.reason}` : `answered_${body.confidence.level.toLowerCase()}`;
    this.deps.recordAnswerLatency(totalMs);
    this.deps.recordAnswerOutcome(outcome);
    this.deps.logInfo("answer.complete", { requestId: frame.requestId }, {
      outcome,
      confidence_score: body.confidence.score,
      tiers_used: frame.retrieval?.tiersUsed ?? [],
      source_count: body.sources.length,
      duration_ms: totalMs
    });

    return {
      question: frame.question,
      ...body,
      tiersUsed: frame.retrieval?.tiersUsed ?? [],
      lowEvidence: frame.retrieval?.lowEvidence ?? false,
      observability: {
        requestId: frame.requestId,
        tiers: frame.retrieval?.invocations ?? [],
        timings: { ...frame.timings, totalMs }
      }
    };
  }
}
