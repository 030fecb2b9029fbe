import { InvalidInputError } from "../errors.js";
import { escapeRegExp, loadStopWords, loadTerminology, type StopWords, type Terminology } from "./terminology.js";
import type {
  DateRange,
  DictionaryEntityType,
  DocumentType,
  ExtractedEntity,
  Question,
  QuestionFilters,
  QuestionIntent,
  QuestionLanguage
} from "./types.js";

export const MAX_QUESTION_CHARS = 2000;

type ScoredIntent = Exclude<QuestionIntent, "unknown">;

// Declaration order breaks ties between equally scored intents.
const INTENT_PATTERNS: ReadonlyArray<[ScoredIntent, RegExp[]]> = [
  [
    "comparative",
    [
      /\b(compare|comparison|difference between|differences between)\b/i,
      /\b(versus|vs)\b/i,
      /\bwhat'?s the difference\b/i
    ]
  ],
  [
    "eligibility",
    [
      /\b(eligible|eligibility|qualify|qualifies)\b/i,
      /\b(can|may)\b.*\bapply\b/i,
      /\b(who is eligible|who can|am i eligible)\b/i,
      /\b(do i qualify|entitled to)\b/i
    ]
  ],
  [
    "procedural",
    [
      /\b(how do i|how to|how can i|what are the steps)\b/i,
      /\b(process for|procedure for|steps to)\b/i,
      /\b(apply for|submit|register)\b/i
    ]
  ],
  [
    "definitional",
    [/\b(what is|what are|define|definition of)\b/i, /\b(who is considered|what counts as|meaning of)\b/i]
  ]
];

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december"
];

const DATE_PATTERN = new RegExp(
  `\\b(\\d{4}-\\d{2}-\\d{2}|\\d{1,2}/\\d{1,2}/\\d{4}|(?:${MONTHS.join("|")})\\s+\\d{1,2},?\\s+\\d{4})\\b`,
  "gi"
);
const MONEY_PATTERN = /\$\s?\d{1,3}(?:,\d{3})*(?:\.\d{2})?|\b\d{1,3}(?:,\d{3})*(?:\.\d{2})?\s?(?:dollars|CAD)\b/gi;
const LEGISLATION_PATTERN = /\b(?:[A-Z][a-z]+\s+)+(?:Act|Regulations?|Code)\b/g;
const SECTION_REFERENCE_PATTERN =
  /\b(?:sections?|sec\.|s\.|article|art\.)\s*(\d+(?:\.\d+)?(?:\(\d+(?:\.\d+)?\))*(?:\([a-z]\))?)/gi;
const WORD_PATTERN = /[\p{L}\p{N}]+/gu;

const DICTIONARY_TYPES: DictionaryEntityType[] = ["person_type", "program", "jurisdiction", "requirement"];

const CANONICAL_CONFIDENCE = 0.95;
const SYNONYM_CONFIDENCE = 0.85;
const ABBREVIATION_CONFIDENCE = 0.7;
const DATE_CONFIDENCE = 0.9;
const MONEY_CONFIDENCE = 0.95;
const LEGISLATION_CONFIDENCE = 0.85;

const FRENCH_MARKER_THRESHOLD = 2;

export interface QueryAnalyzerOptions {
  terminology?: Terminology;
  stopWords?: StopWords;
}

interface DictionaryMatcher {
  type: DictionaryEntityType;
  pattern: RegExp;
  canonicalBySurface: Map<string, string>;
}

const buildDictionaryMatcher = (type: DictionaryEntityType, dictionary: Record<string, string[]>): DictionaryMatcher => {
  const canonicalBySurface = new Map<string, string>();
  for (const [canonical, surfaces] of Object.entries(dictionary)) {
    canonicalBySurface.set(canonical.replace(/_/g, " "), canonical);
    for (const surface of surfaces) {
      const key = surface.toLowerCase();
      if (!canonicalBySurface.has(key)) {
        canonicalBySurface.set(key, canonical);
      }
    }
  }

  const alternatives = [...canonicalBySurface.keys()]
    .sort((left, right) => right.length - left.length)
    .map(escapeRegExp);

  return {
    type,
    pattern: new RegExp(`\\b(?:${alternatives.join("|")})s?\\b`, "gi"),
    canonicalBySurface
  };
};

const toIsoDate = (text: string): string | null => {
  const iso = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text);
  if (iso) {
    const [, year, month, day] = iso;
    return Number(month) >= 1 && Number(month) <= 12 && Number(day) >= 1 && Number(day) <= 31
      ? `${year}-${month}-${day}`
      : null;
  }

  const named = /^([a-z]+)\s+(\d{1,2}),?\s+(\d{4})$/i.exec(text);
  if (named) {
    const [, monthName, day, year] = named;
    const monthIndex = MONTHS.indexOf(monthName.toLowerCase());
    if (monthIndex < 0 || Number(day) < 1 || Number(day) > 31) {
      return null;
    }
    return `${year}-${String(monthIndex + 1).padStart(2, "0")}-${day.padStart(2, "0")}`;
  }

  // d/m/y and m/d/y are indistinguishable, so slash dates are kept verbatim.
  return null;
};

const overlaps = (left: ExtractedEntity, right: ExtractedEntity): boolean =>
  left.span.start < right.span.end && right.span.start < left.span.end;

const resolveOverlaps = (candidates: ExtractedEntity[]): ExtractedEntity[] => {
  const ranked = [...candidates].sort((left, right) => {
    const lengthDelta = right.span.end - right.span.start - (left.span.end - left.span.start);
    if (lengthDelta !== 0) {
      return lengthDelta;
    }
    if (right.confidence !== left.confidence) {
      return right.confidence - left.confidence;
    }
    return left.span.start - right.span.start;
  });

  const accepted: ExtractedEntity[] = [];
  for (const candidate of ranked) {
    if (!accepted.some((entity) => overlaps(entity, candidate))) {
      accepted.push(candidate);
    }
  }
  return accepted.sort((left, right) => left.span.start - right.span.start);
};

const dedupe = (values: string[]): string[] => [...new Set(values)];

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
};

/**
 * Turns a raw question into the structured {@link Question} that drives retrieval.
 * Pure: the same input always yields an equal, frozen result.
 */
export class QueryAnalyzer {
  private readonly matchers: DictionaryMatcher[];
  private readonly stopWords: StopWords;

  constructor(options: QueryAnalyzerOptions = {}) {
    const terminology = options.terminology ?? loadTerminology();
    this.stopWords = options.stopWords ?? loadStopWords();
    this.matchers = DICTIONARY_TYPES.map((type) => buildDictionaryMatcher(type, terminology[type]));
  }

  analyze(raw: string): Question {
    if (typeof raw !== "string" || raw.trim().length === 0) {
      throw new InvalidInputError("Question must not be empty.");
    }
    if (raw.length > MAX_QUESTION_CHARS) {
      throw new InvalidInputError(`Question must be at most ${MAX_QUESTION_CHARS} characters.`);
    }

    const normalized = normalizeQuestion(raw);
    const { intent, confidence, alternatives } = classifyIntent(normalized);
    const entities = this.extractEntities(normalized);
    const words = normalized.toLowerCase().match(WORD_PATTERN) ?? [];

    const question: Question = {
      raw,
      normalized,
      intent,
      intentConfidence: confidence,
      alternativeIntents: alternatives,
      keywords: this.extractKeywords(words, entities),
      entities,
      filters: extractFilters(entities),
      sectionReferences: extractSectionReferences(normalized),
      language: this.detectLanguage(words)
    };

    return deepFreeze(question);
  }

  extractEntities(text: string): ExtractedEntity[] {
    const candidates: ExtractedEntity[] = [];

    for (const matcher of this.matchers) {
      for (const match of text.matchAll(matcher.pattern)) {
        const matched = match[0];
        const start = match.index ?? 0;
        const lower = matched.toLowerCase();
        const surface = matcher.canonicalBySurface.has(lower) ? lower : lower.replace(/s$/, "");
        const canonical = matcher.canonicalBySurface.get(surface);
        if (!canonical) {
          continue;
        }

        let confidence = SYNONYM_CONFIDENCE;
        if (surface === canonical.replace(/_/g, " ")) {
          confidence = CANONICAL_CONFIDENCE;
        } else if (surface.length <= 3) {
          confidence = ABBREVIATION_CONFIDENCE;
        }

        candidates.push({
          text: matched,
          type: matcher.type,
          normalized: canonical,
          confidence,
          span: { start, end: start + matched.length }
        });
      }
    }

    for (const match of text.matchAll(DATE_PATTERN)) {
      const start = match.index ?? 0;
      candidates.push({
        text: match[0],
        type: "date",
        normalized: toIsoDate(match[0]) ?? match[0],
        confidence: DATE_CONFIDENCE,
        span: { start, end: start + match[0].length }
      });
    }

    for (const match of text.matchAll(MONEY_PATTERN)) {
      const start = match.index ?? 0;
      candidates.push({
        text: match[0],
        type: "money",
        normalized: match[0].replace(/[^\d.]/g, ""),
        confidence: MONEY_CONFIDENCE,
        span: { start, end: start + match[0].length }
      });
    }

    for (const match of text.matchAll(LEGISLATION_PATTERN)) {
      const start = match.index ?? 0;
      candidates.push({
        text: match[0],
        type: "legislation",
        normalized: match[0].toLowerCase(),
        confidence: LEGISLATION_CONFIDENCE,
        span: { start, end: start + match[0].length }
      });
    }

    return resolveOverlaps(candidates);
  }

  private extractKeywords(words: string[], entities: ExtractedEntity[]): string[] {
    const entityTexts = new Set(entities.map((entity) => entity.text.toLowerCase()));
    return dedupe(
      words.filter(
        (word) =>
          word.length >= 3 &&
          !this.stopWords.english.has(word) &&
          !this.stopWords.french.has(word) &&
          !entityTexts.has(word)
      )
    );
  }

  private detectLanguage(words: string[]): QuestionLanguage {
    const markers = words.filter((word) => this.stopWords.french.has(word) && !this.stopWords.english.has(word));
    return markers.length >= FRENCH_MARKER_THRESHOLD ? "fr" : "en";
  }
}

export const normalizeQuestion = (raw: string): string =>
  raw
    .split(/\s+/)
    .filter(Boolean)
    .join(" ")
    .replace(/\?+$/, "")
    .trim();

export const classifyIntent = (
  normalized: string
): { intent: QuestionIntent; confidence: number; alternatives: QuestionIntent[] } => {
  const scored: Array<{ intent: ScoredIntent; score: number; order: number }> = [];

  INTENT_PATTERNS.forEach(([intent, patterns], order) => {
    const matches = patterns.filter((pattern) => pattern.test(normalized)).length;
    if (matches > 0) {
      scored.push({ intent, score: matches / patterns.length, order });
    }
  });

  if (scored.length === 0) {
    const inferred = inferIntentFromStructure(normalized);
    return { ...inferred, alternatives: [] };
  }

  scored.sort((left, right) => right.score - left.score || left.order - right.order);
  const [best, ...rest] = scored;
  const confidence = best.score > 0.5 ? Math.min(best.score * 1.2, 0.95) : best.score;

  return {
    intent: best.intent,
    confidence,
    alternatives: rest.map((entry) => entry.intent)
  };
};

const inferIntentFromStructure = (normalized: string): { intent: QuestionIntent; confidence: number } => {
  const lower = normalized.toLowerCase();
  if (/\bcan\b/.test(lower) && /\bapply\b/.test(lower)) {
    return { intent: "eligibility", confidence: 0.7 };
  }
  if (lower.startsWith("what is") || lower.startsWith("what are")) {
    return { intent: "definitional", confidence: 0.7 };
  }
  if (lower.startsWith("how")) {
    return { intent: "procedural", confidence: 0.7 };
  }
  return { intent: "unknown", confidence: 0.3 };
};

export const extractFilters = (entities: readonly ExtractedEntity[]): QuestionFilters => {
  const filters: QuestionFilters = {};

  const jurisdiction = entities.find((entity) => entity.type === "jurisdiction");
  if (jurisdiction) {
    filters.jurisdiction = jurisdiction.normalized;
  }

  const isoDates = entities
    .filter((entity) => entity.type === "date" && /^\d{4}-\d{2}-\d{2}$/.test(entity.normalized))
    .map((entity) => entity.normalized)
    .sort();
  if (isoDates.length > 0) {
    const dateRange: DateRange = { from: isoDates[0], to: isoDates[isoDates.length - 1] };
    filters.dateRange = dateRange;
  }

  const legislation = entities.find((entity) => entity.type === "legislation");
  if (legislation) {
    filters.documentType = toDocumentType(legislation.text);
  }

  return filters;
};

const toDocumentType = (legislationName: string): DocumentType =>
  /Regulations?$/.test(legislationName) ? "regulation" : "act";

export const extractSectionReferences = (text: string): string[] =>
  dedupe([...text.matchAll(SECTION_REFERENCE_PATTERN)].map((match) => match[1]));
