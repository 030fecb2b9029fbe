import type { TierNumber } from "./retrieval/types.js";

export type AppErrorCode =
  | "invalid_input"
  | "backend_unavailable"
  | "empty_evidence"
  | "synthesis_parse_error"
  | "citation_mismatch"
  | "request_cancelled";

export abstract class AppError extends Error {
  abstract readonly code: AppErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends AppError {
  readonly code = "invalid_input";
  readonly field: string;

  constructor(message: string, field = "question") {
    super(message);
    this.field = field;
  }
}

export type BackendFailureKind = "timeout" | "error";

export class BackendUnavailableError extends AppError {
  readonly code = "backend_unavailable";
  readonly tier: TierNumber;
  readonly backend: string;
  readonly kind: BackendFailureKind;

  constructor(input: { tier: TierNumber; backend: string; kind: BackendFailureKind; message: string; cause?: unknown }) {
    super(input.message, { cause: input.cause });
    this.tier = input.tier;
    this.backend = input.backend;
    this.kind = input.kind;
  }
}

export class EmptyEvidenceError extends AppError {
  readonly code = "empty_evidence";
  readonly candidateCount: number;

  constructor(candidateCount: number) {
    super(
      candidateCount === 0
        ? "No retrieval hits were available for fusion."
        : `None of the ${candidateCount} retrieval hits fit the context budget.`
    );
    this.candidateCount = candidateCount;
  }
}

export class SynthesisParseError extends AppError {
  readonly code = "synthesis_parse_error";
  readonly rawOutput: string;

  constructor(message: string, rawOutput: string, cause?: unknown) {
    super(message, { cause });
    this.rawOutput = rawOutput;
  }
}

export class CitationMismatchError extends AppError {
  readonly code = "citation_mismatch";
  readonly claim: string;
  readonly unresolvedCitations: string[];

  constructor(claim: string, unresolvedCitations: string[]) {
    super(
      unresolvedCitations.length === 0
        ? "Claim has no citation."
        : `Claim cites sources that are not in the retrieved context: ${unresolvedCitations.join(", ")}`
    );
    this.claim = claim;
    this.unresolvedCitations = unresolvedCitations;
  }
}

export class RequestCancelledError extends AppError {
  readonly code = "request_cancelled";

  constructor(stage: string) {
    super(`Request was cancelled during ${stage}.`);
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  return String(error ?? "unknown error");
};
