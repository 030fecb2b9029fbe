export type ClaimStatus = "supported" | "not_found";

export type SelfReportedLevel = "high" | "medium" | "low";

export interface CitedSentence {
  sentence: string;
  citations: string[];
  status: ClaimStatus;
}

export interface Requirement {
  text: string;
  citations: string[];
}

export interface ConflictNote {
  findingId: string | null;
  note: string;
}

export interface SelfReportedConfidence {
  level: SelfReportedLevel;
  justification: string;
}

/** The generator's answer after parsing, before citation validation. */
export interface StructuredAnswer {
  directAnswer: CitedSentence;
  explanation: string;
  claims: CitedSentence[];
  requirements: Requirement[];
  conflicts: ConflictNote[];
  selfReportedConfidence: SelfReportedConfidence;
  limitations: string[];
}

export interface GenerationMessages {
  system: string;
  user: string;
}

export interface GenerationUsage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}

export interface GenerationResult {
  content: string;
  usage?: GenerationUsage;
}

export interface GenerationPort {
  complete(messages: GenerationMessages, signal: AbortSignal): Promise<GenerationResult>;
}
