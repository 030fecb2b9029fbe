import type { CascadePolicy } from "../modules/retrieval/cascade-controller.js";
import { DEFAULT_CALIBRATION } from "../modules/retrieval/score-calibration.js";
import type { FusionPolicy } from "../modules/fusion/context-assembler.js";
import type { SynthesisPolicy } from "../modules/synthesis/answer-synthesizer.js";
import { DEFAULT_CONFIDENCE_POLICY, type ConfidencePolicy } from "../modules/validation/confidence-scorer.js";
import type { Config } from "./index.js";

export type LowEvidencePolicy = "fail_closed" | "synthesize_capped";

export interface AnswerPolicies {
  cascade: CascadePolicy;
  fusion: FusionPolicy;
  synthesis: SynthesisPolicy;
  confidence: ConfidencePolicy;
  lowEvidence: LowEvidencePolicy;
}

export type PolicyConfig = Pick<
  Config,
  | "CASCADE_ACCEPTANCE_THRESHOLD"
  | "CASCADE_MIN_SUFFICIENT_HITS"
  | "CASCADE_TIER_TIMEOUT_MS"
  | "CASCADE_PARALLEL_FALLBACK"
  | "TIER_RESULT_LIMIT"
  | "CONTEXT_MAX_CHARS"
  | "CONTEXT_MAX_HITS"
  | "GENERATOR_TIMEOUT_MS"
  | "SYNTHESIS_PARSE_RETRIES"
  | "LOW_EVIDENCE_POLICY"
  | "CONFIDENCE_HIGH_RETRIEVAL_BAR"
>;

export const buildPolicies = (source: PolicyConfig): AnswerPolicies => ({
  cascade: {
    acceptanceThreshold: source.CASCADE_ACCEPTANCE_THRESHOLD,
    minimumSufficientCount: source.CASCADE_MIN_SUFFICIENT_HITS,
    tierTimeoutMs: source.CASCADE_TIER_TIMEOUT_MS,
    parallelFallback: source.CASCADE_PARALLEL_FALLBACK,
    tierResultLimit: source.TIER_RESULT_LIMIT,
    calibration: DEFAULT_CALIBRATION
  },
  fusion: {
    budgetChars: source.CONTEXT_MAX_CHARS,
    maxHits: source.CONTEXT_MAX_HITS
  },
  synthesis: {
    timeoutMs: source.GENERATOR_TIMEOUT_MS,
    parseRetries: source.SYNTHESIS_PARSE_RETRIES
  },
  confidence: {
    ...DEFAULT_CONFIDENCE_POLICY,
    highRetrievalBar: source.CONFIDENCE_HIGH_RETRIEVAL_BAR
  },
  lowEvidence: source.LOW_EVIDENCE_POLICY
});
