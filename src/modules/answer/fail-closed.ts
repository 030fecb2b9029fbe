import type { Question } from "../analysis/types.js";
import type { FailClosedReason } from "./types.js";

const TOPIC_KEYWORDS = 6;

export const failClosedTopic = (question: Pick<Question, "keywords" | "normalized">): string =>
  question.keywords.length > 0 ? question.keywords.slice(0, TOPIC_KEYWORDS).join(" ") : question.normalized;

export const failClosedSentence = (question: Pick<Question, "keywords" | "normalized">): string =>
  `The provided documents do not contain information about ${failClosedTopic(question)}.`;

const REASON_LIMITATIONS: Record<FailClosedReason, string> = {
  empty_evidence: "No passages were retrieved for this question.",
  low_evidence: "Retrieved passages did not reach the relevance threshold.",
  synthesis_parse_error: "The generated answer could not be read.",
  generator_unavailable: "The answer generator was unavailable.",
  all_claims_removed: "Every generated statement cited sources outside the retrieved passages.",
  not_found_in_context: "The retrieved passages do not address the question."
};

export const describeFailClosedReason = (reason: FailClosedReason): string => REASON_LIMITATIONS[reason];
