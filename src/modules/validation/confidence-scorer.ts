import type { SelfReportedLevel } from "../synthesis/types.js";

export type ConfidenceLevel = "High" | "Medium" | "Low";

export interface ConfidencePolicy {
  highRetrievalBar: number;
  highScore: number;
  mediumScore: number;
}

export const DEFAULT_CONFIDENCE_POLICY: ConfidencePolicy = {
  highRetrievalBar: 0.7,
  highScore: 0.75,
  mediumScore: 0.45
};

const SELF_REPORTED_WEIGHTS: Record<SelfReportedLevel, number> = {
  high: 1,
  medium: 0.6,
  low: 0.2
};

export interface ConfidenceInput {
  passRatio: number;
  maxContextScore: number;
  selfReported: SelfReportedLevel;
  removalCount: number;
  hasConflicts: boolean;
  capAtLow?: boolean;
}

export interface ConfidenceAssessment {
  level: ConfidenceLevel;
  score: number;
  selfReported: SelfReportedLevel | null;
}

const round3 = (value: number): number => Math.round(value * 1000) / 1000;

export const FAIL_CLOSED_CONFIDENCE: ConfidenceAssessment = Object.freeze({
  level: "Low",
  score: 0,
  selfReported: null
});

export const scoreConfidence = (
  input: ConfidenceInput,
  policy: ConfidencePolicy = DEFAULT_CONFIDENCE_POLICY
): ConfidenceAssessment => {
  const score = round3(
    0.4 * input.passRatio + 0.4 * input.maxContextScore + 0.2 * SELF_REPORTED_WEIGHTS[input.selfReported]
  );

  let level: ConfidenceLevel = "Low";
  if (
    score >= policy.highScore &&
    input.maxContextScore >= policy.highRetrievalBar &&
    input.removalCount === 0 &&
    input.selfReported !== "low"
  ) {
    level = "High";
  } else if (score >= policy.mediumScore) {
    level = "Medium";
  }

  if (input.hasConflicts && level === "High") {
    level = "Medium";
  }
  if (input.capAtLow) {
    level = "Low";
  }

  return { level, score, selfReported: input.selfReported };
};
