import { z } from "zod";
import { expandQuestionTerms } from "../../analysis/query-expansion.js";
import type { SynonymDictionary } from "../../analysis/terminology.js";
import { throwIfAborted } from "../../shared/abort.js";
import {
  createOpenAIEmbeddingPort,
  createQdrantSearchPort,
  type EmbeddingPort,
  type FieldCondition,
  type VectorFilter,
  type VectorPoint,
  type VectorSearchPort,
  type VectorSearchRequest
} from "../ports.js";
import type { AdapterQuery, RawHit, RetrievalAdapter } from "../types.js";
import {
  buildSnippet,
  dateColumnSchema,
  identifierSchema,
  keywordCoverage,
  optionalTextSchema,
  relationshipsSchema
} from "./hit-mapping.js";

export const KEYWORD_WEIGHT = 0.6;
export const VECTOR_WEIGHT = 0.4;

const payloadSchema = z.object({
  document_id: identifierSchema,
  section_id: identifierSchema,
  title: z.string(),
  content: z.string().min(1),
  document_type: optionalTextSchema,
  jurisdiction: optionalTextSchema,
  language: optionalTextSchema,
  effective_date: dateColumnSchema,
  effective_until: dateColumnSchema,
  relationships: relationshipsSchema
});

export interface HybridSearchAdapterOptions {
  collection: string;
  embeddings?: EmbeddingPort;
  vectorSearch?: VectorSearchPort;
  synonyms?: SynonymDictionary;
}

export interface HybridSearchPlan {
  queryText: string;
  terms: string[];
  filter: VectorFilter;
}

const textConditions = (terms: readonly string[]): FieldCondition[] =>
  terms.map((term) => ({ key: "content", match: { text: term } }));

/**
 * Tier 1 narrows by language, jurisdiction and document type and asks for the
 * question's own keywords. Tier 2 keeps only the language filter and widens the
 * keyword set with synonyms.
 */
export const planHybridSearch = (query: AdapterQuery, synonyms?: SynonymDictionary): HybridSearchPlan => {
  const { question } = query;
  const must: FieldCondition[] = [{ key: "language", match: { value: question.language } }];

  if (query.tier === 1) {
    if (question.filters.jurisdiction) {
      must.push({ key: "jurisdiction", match: { value: question.filters.jurisdiction } });
    }
    if (question.filters.documentType) {
      must.push({ key: "document_type", match: { value: question.filters.documentType } });
    }

    const terms = [...question.keywords];
    const sectionConditions: FieldCondition[] = question.sectionReferences.map((section) => ({
      key: "section_id",
      match: { value: section }
    }));
    const should = [...textConditions(terms), ...sectionConditions];
    const sectionText = question.sectionReferences.map((section) => `section ${section}`).join(" ");

    return {
      queryText: sectionText ? `${question.normalized} ${sectionText}` : question.normalized,
      terms,
      filter: should.length > 0 ? { must, should } : { must }
    };
  }

  const expansions = expandQuestionTerms(question, synonyms);
  const terms = [...question.keywords, ...expansions];
  const should = textConditions(terms);

  return {
    queryText: expansions.length > 0 ? `${question.normalized} ${expansions.join(" ")}` : question.normalized,
    terms,
    filter: should.length > 0 ? { must, should } : { must }
  };
};

export const toHybridHit = (point: VectorPoint, keywords: readonly string[], terms: readonly string[]): RawHit | null => {
  const parsed = payloadSchema.safeParse(point.payload ?? {});
  if (!parsed.success) {
    return null;
  }

  const payload = parsed.data;
  const keyword = keywordCoverage(payload.content, keywords);
  const vector = Math.max(0, point.score);

  return {
    id: String(point.id),
    documentId: payload.document_id,
    sectionId: payload.section_id,
    title: payload.title,
    content: payload.content,
    snippet: buildSnippet(payload.content, terms),
    rawScore: KEYWORD_WEIGHT * keyword + VECTOR_WEIGHT * vector,
    documentType: payload.document_type,
    jurisdiction: payload.jurisdiction,
    language: payload.language,
    effectiveDate: payload.effective_date,
    effectiveUntil: payload.effective_until,
    relationships: payload.relationships,
    scoreBreakdown: { keyword, vector }
  };
};

export class HybridSearchAdapter implements RetrievalAdapter {
  readonly backend = "hybrid";

  private readonly collection: string;
  private readonly embeddings: EmbeddingPort;
  private readonly vectorSearch: VectorSearchPort;
  private readonly synonyms?: SynonymDictionary;

  constructor(options: HybridSearchAdapterOptions) {
    this.collection = options.collection;
    this.embeddings = options.embeddings ?? createOpenAIEmbeddingPort();
    this.vectorSearch = options.vectorSearch ?? createQdrantSearchPort();
    this.synonyms = options.synonyms;
  }

  async retrieve(query: AdapterQuery, signal: AbortSignal): Promise<RawHit[]> {
    throwIfAborted(signal, "hybrid retrieval");
    const plan = planHybridSearch(query, this.synonyms);
    const vector = await this.embeddings.embed(plan.queryText, signal);
    const request: VectorSearchRequest = {
      vector,
      limit: query.limit,
      with_payload: true,
      with_vector: false,
      filter: plan.filter
    };

    const points = await this.vectorSearch.search(this.collection, request, signal);
    return points.flatMap((point) => {
      const hit = toHybridHit(point, query.question.keywords, plan.terms);
      return hit ? [hit] : [];
    });
  }
}
