export type QuestionIntent = "definitional" | "eligibility" | "procedural" | "comparative" | "unknown";

export type DictionaryEntityType = "person_type" | "program" | "jurisdiction" | "requirement";

export type EntityType = DictionaryEntityType | "date" | "money" | "legislation";

export type QuestionLanguage = "en" | "fr";

export type DocumentType = "act" | "regulation";

export interface TextSpan {
  start: number;
  end: number;
}

export interface ExtractedEntity {
  text: string;
  type: EntityType;
  normalized: string;
  confidence: number;
  span: TextSpan;
}

export interface DateRange {
  from?: string;
  to?: string;
}

export interface QuestionFilters {
  jurisdiction?: string;
  dateRange?: DateRange;
  documentType?: DocumentType;
}

/** Analyzed form of one user question. Produced once per request and frozen. */
export interface Question {
  readonly raw: string;
  readonly normalized: string;
  readonly intent: QuestionIntent;
  readonly intentConfidence: number;
  readonly alternativeIntents: readonly QuestionIntent[];
  readonly keywords: readonly string[];
  readonly entities: readonly Readonly<ExtractedEntity>[];
  readonly filters: Readonly<QuestionFilters>;
  readonly sectionReferences: readonly string[];
  readonly language: QuestionLanguage;
}
