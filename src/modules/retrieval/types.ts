import type { Question } from "../analysis/types.js";

export type TierNumber = 1 | 2 | 3 | 4;

export type BackendName = "hybrid" | "graph" | "fulltext";

export type RelationKind = "supersedes" | "amends" | "references" | "has_section" | "implements";

export interface HitRelationship {
  kind: RelationKind;
  targetId: string;
}

export interface ScoreBreakdown {
  keyword: number;
  vector: number;
}

export interface HitCitation {
  documentTitle: string;
  sectionId: string;
}

/** A passage as returned by one backend, before score calibration. */
export interface RawHit {
  id: string;
  documentId: string;
  sectionId: string;
  title: string;
  content: string;
  snippet: string;
  rawScore: number;
  documentType: string | null;
  jurisdiction: string | null;
  language: string | null;
  effectiveDate: string | null;
  effectiveUntil: string | null;
  relationships: HitRelationship[];
  scoreBreakdown?: ScoreBreakdown;
}

export interface RetrievalHit extends RawHit {
  tier: TierNumber;
  normalizedScore: number;
  citation: HitCitation;
  corroboratingTiers: TierNumber[];
}

export interface AdapterQuery {
  question: Question;
  tier: TierNumber;
  limit: number;
  /** Titles of passages found by earlier tiers, used to seed graph traversal. */
  seedTitles: string[];
}

export interface RetrievalAdapter {
  readonly backend: BackendName;
  retrieve(query: AdapterQuery, signal: AbortSignal): Promise<RawHit[]>;
}

export type InvocationStatus = "ok" | "timeout" | "error";

export interface TierInvocation {
  tier: TierNumber;
  backend: BackendName;
  status: InvocationStatus;
  hitCount: number;
  durationMs: number;
  error?: string;
}
