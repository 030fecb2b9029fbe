import type { Question } from "../analysis/types.js";
import type { ConflictKind } from "../conflicts/conflict-detector.js";
import type { TierInvocation, TierNumber } from "../retrieval/types.js";
import type { CitedSentence, Requirement } from "../synthesis/types.js";
import type { ConfidenceAssessment } from "../validation/confidence-scorer.js";

export type FailClosedReason =
  | "empty_evidence"
  | "low_evidence"
  | "synthesis_parse_error"
  | "generator_unavailable"
  | "all_claims_removed"
  | "not_found_in_context";

export interface SourceReference {
  referenceId: string;
  documentId: string;
  sectionId: string;
  title: string;
  /** "Title, Section X" */
  citation: string;
  tier: TierNumber;
  score: number;
  effectiveDate: string | null;
  snippet: string;
}

export interface ResponseConflict {
  id: string;
  kind: ConflictKind;
  referenceIds: [string, string];
  description: string;
  note: string | null;
}

/** Computed confidence plus the generator's own justification, null when no answer was synthesized. */
export interface ResponseConfidence extends ConfidenceAssessment {
  justification: string | null;
}

export interface StageTimings {
  analysisMs: number;
  retrievalMs: number;
  synthesisMs: number;
  totalMs: number;
}

export interface FinalResponse {
  question: Question;
  answer: string;
  explanation: string | null;
  claims: CitedSentence[];
  requirements: Requirement[];
  conflicts: ResponseConflict[];
  confidence: ResponseConfidence;
  limitations: string[];
  tiersUsed: TierNumber[];
  lowEvidence: boolean;
  failClosed: { reason: FailClosedReason } | null;
  sources: SourceReference[];
  observability: {
    requestId: string;
    tiers: TierInvocation[];
    timings: StageTimings;
  };
}
