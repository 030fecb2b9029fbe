import { z } from "zod";
import { loadSearchStopWords } from "../../analysis/terminology.js";
import { throwIfAborted } from "../../shared/abort.js";
import { createPostgresQueryPort, type SqlQueryPort } from "../ports.js";
import type { AdapterQuery, RawHit, RetrievalAdapter } from "../types.js";
import { buildSnippet, dateColumnSchema, identifierSchema, optionalTextSchema, relationshipsSchema } from "./hit-mapping.js";
import { buildSeedTsQuery, textSearchConfig } from "./tsquery.js";

export const TRAVERSED_RELATIONS = ["HAS_SECTION", "REFERENCES"] as const;
const SEED_LIMIT_FACTOR = 2;

const graphRowSchema = z.object({
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
  depth: z.coerce.number().int().min(0),
  relationships: relationshipsSchema
});

export interface GraphAdapterOptions {
  schema: string;
  maxDepth: number;
  sql?: SqlQueryPort;
  stopWords?: ReadonlySet<string>;
}

export interface GraphQueryPlan {
  text: string;
  values: unknown[];
  seedTerms: string[];
}

export const collectSeedTerms = (query: AdapterQuery): string[] => {
  const { question } = query;
  const terms = [
    ...question.entities.map((entity) => entity.text),
    ...question.keywords,
    ...query.seedTitles
  ];
  return [...new Set(terms.map((term) => term.trim()).filter((term) => term.length > 0))];
};

/**
 * Full-text seed search over graph nodes followed by a bounded walk along
 * HAS_SECTION and REFERENCES edges. A node reached at depth d scores
 * seed_rank / (d + 1); a node reached by several paths keeps its best score.
 */
export const buildGraphQuery = (
  query: AdapterQuery,
  options: { schema: string; maxDepth: number },
  stopWords: ReadonlySet<string>
): GraphQueryPlan | null => {
  const seedTerms = collectSeedTerms(query);
  const tsQuery = buildSeedTsQuery(seedTerms, stopWords);
  if (!tsQuery) {
    return null;
  }

  const nodes = `${options.schema}.graph_nodes`;
  const edges = `${options.schema}.graph_edges`;
  const text = `
    WITH RECURSIVE seeds AS (
      SELECT n.id, ts_rank_cd(n.search_vector, to_tsquery($1::regconfig, $2), 32) AS seed_score
      FROM ${nodes} n
      WHERE n.search_vector @@ to_tsquery($1::regconfig, $2)
      ORDER BY seed_score DESC, n.id ASC
      LIMIT $3
    ),
    walk (node_id, seed_score, depth, path) AS (
      SELECT s.id, s.seed_score, 0, ARRAY[s.id]
      FROM seeds s
      UNION ALL
      SELECT e.target_id, w.seed_score, w.depth + 1, w.path || e.target_id
      FROM walk w
      JOIN ${edges} e ON e.source_id = w.node_id
      WHERE w.depth < $4
        AND e.relation_type = ANY($5::text[])
        AND NOT e.target_id = ANY(w.path)
    ),
    ranked AS (
      SELECT node_id, MAX(seed_score / (depth + 1)) AS score, MIN(depth) AS depth
      FROM walk
      GROUP BY node_id
    )
    SELECT
      n.id,
      n.document_id,
      n.section_id,
      n.title,
      n.content,
      n.document_type,
      n.jurisdiction,
      n.language,
      n.effective_date,
      n.effective_until,
      r.score,
      r.depth,
      COALESCE(
        (
          SELECT json_agg(json_build_object('kind', lower(e.relation_type), 'target_id', t.document_id))
          FROM ${edges} e
          JOIN ${nodes} t ON t.id = e.target_id
          WHERE e.source_id = n.id
        ),
        '[]'::json
      ) AS relationships
    FROM ranked r
    JOIN ${nodes} n ON n.id = r.node_id
    WHERE n.content IS NOT NULL AND n.content <> ''
    ORDER BY r.score DESC, n.id ASC
    LIMIT $6
  `;

  return {
    text,
    values: [
      textSearchConfig(query.question.language),
      tsQuery,
      query.limit * SEED_LIMIT_FACTOR,
      options.maxDepth,
      [...TRAVERSED_RELATIONS],
      query.limit
    ],
    seedTerms
  };
};

export class GraphAdapter implements RetrievalAdapter {
  readonly backend = "graph";

  private readonly schema: string;
  private readonly maxDepth: number;
  private readonly sql: SqlQueryPort;
  private readonly stopWords: ReadonlySet<string>;

  constructor(options: GraphAdapterOptions) {
    this.schema = options.schema;
    this.maxDepth = options.maxDepth;
    this.sql = options.sql ?? createPostgresQueryPort();
    this.stopWords = options.stopWords ?? loadSearchStopWords();
  }

  async retrieve(query: AdapterQuery, signal: AbortSignal): Promise<RawHit[]> {
    const plan = buildGraphQuery(query, { schema: this.schema, maxDepth: this.maxDepth }, this.stopWords);
    if (!plan) {
      return [];
    }

    throwIfAborted(signal, "graph retrieval");
    const { rows } = await this.sql.query(plan.text, plan.values, signal);
    return rows.flatMap((row): RawHit[] => {
      const parsed = graphRowSchema.safeParse(row);
      if (!parsed.success) {
        return [];
      }
      const node = parsed.data;
      return [
        {
          id: node.id,
          documentId: node.document_id,
          sectionId: node.section_id,
          title: node.title,
          content: node.content,
          snippet: buildSnippet(node.content, plan.seedTerms),
          rawScore: node.score,
          documentType: node.document_type,
          jurisdiction: node.jurisdiction,
          language: node.language,
          effectiveDate: node.effective_date,
          effectiveUntil: node.effective_until,
          relationships: node.relationships
        }
      ];
    });
  }
}
