import { z } from "zod";
import { loadSearchStopWords } from "../../analysis/terminology.js";
import { throwIfAborted } from "../../shared/abort.js";
import { createPostgresQueryPort, type SqlQueryPort } from "../ports.js";
import type { AdapterQuery, RawHit, RetrievalAdapter } from "../types.js";
import { buildSnippet, dateColumnSchema, identifierSchema, optionalTextSchema, relationshipsSchema } from "./hit-mapping.js";
import { buildTsQuery, textSearchConfig } from "./tsquery.js";

const sectionRowSchema = z.object({
  id: identifierSchema,
  document_id: identifierSchema,
  section_id: identifierSchema,
  title: z.string(),
  content: z.string().min(1),
  document_type: optionalTextSchema,
  jurisdiction: optionalTextSchema,
  language: optionalTextSchema,
  effective_date: dateColumnSchema,
  effective_until: dateColumnSchema,
  score: z.coerce.number(),
  relationships: relationshipsSchema
});

export interface FullTextAdapterOptions {
  sql?: SqlQueryPort;
  stopWords?: ReadonlySet<string>;
}

export interface FullTextQueryPlan {
  text: string;
  values: unknown[];
  terms: string[];
}

/** Chooses the tsvector column that matches the question language. */
export const searchVectorColumn = (language: string): "search_vector" | "search_vector_fr" =>
  language === "fr" ? "search_vector_fr" : "search_vector";

export const buildFullTextQuery = (query: AdapterQuery, stopWords: ReadonlySet<string>): FullTextQueryPlan | null => {
  const tsQuery = buildTsQuery(query.question.normalized, stopWords);
  if (!tsQuery) {
    return null;
  }

  const column = searchVectorColumn(query.question.language);
  const text = `
    SELECT
      s.id,
      r.id AS document_id,
      s.section_number AS section_id,
      r.title,
      s.content,
      COALESCE(r.extra_metadata->>'document_type', 'regulation') AS document_type,
      r.jurisdiction,
      r.language,
      r.effective_date,
      r.extra_metadata->>'effective_until' AS effective_until,
      ts_rank_cd(s.${column}, query, 32) AS score,
      COALESCE(
        (
          SELECT json_agg(json_build_object('kind', dr.relationship_type, 'target_id', dr.target_document_id))
          FROM document_relationships dr
          WHERE dr.source_document_id = r.id
        ),
        '[]'::json
      ) AS relationships
    FROM sections s
    JOIN regulations r ON r.id = s.regulation_id
    CROSS JOIN to_tsquery($1::regconfig, $2) AS query
    WHERE s.${column} @@ query
      AND s.content IS NOT NULL
    ORDER BY score DESC, r.effective_date DESC NULLS LAST, s.id ASC
    LIMIT $3
  `;

  return {
    text,
    values: [textSearchConfig(query.question.language), tsQuery, query.limit],
    terms: [...query.question.keywords]
  };
};

export class FullTextAdapter implements RetrievalAdapter {
  readonly backend = "fulltext";

  private readonly sql: SqlQueryPort;
  private readonly stopWords: ReadonlySet<string>;

  constructor(options: FullTextAdapterOptions = {}) {
    this.sql = options.sql ?? createPostgresQueryPort();
    this.stopWords = options.stopWords ?? loadSearchStopWords();
  }

  async retrieve(query: AdapterQuery, signal: AbortSignal): Promise<RawHit[]> {
    const plan = buildFullTextQuery(query, this.stopWords);
    if (!plan) {
      return [];
    }

    throwIfAborted(signal, "full-text retrieval");
    const { rows } = await this.sql.query(plan.text, plan.values, signal);
    return rows.flatMap((row): RawHit[] => {
      const parsed = sectionRowSchema.safeParse(row);
      if (!parsed.success) {
        return [];
      }
      const section = parsed.data;
      return [
        {
          id: section.id,
          documentId: section.document_id,
          sectionId: section.section_id,
          title: section.title,
          content: section.content,
          snippet: buildSnippet(section.content, plan.terms),
          rawScore: section.score,
          documentType: section.document_type,
          jurisdiction: section.jurisdiction,
          language: section.language,
          effectiveDate: section.effective_date,
          effectiveUntil: section.effective_until,
          relationships: section.relationships
        }
      ];
    });
  }
}
