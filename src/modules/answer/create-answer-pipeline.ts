import { buildPolicies, config, type Config } from "../../config/index.js";
import { QueryAnalyzer } from "../analysis/query-analyzer.js";
import { CascadeController } from "../retrieval/cascade-controller.js";
import { FullTextAdapter } from "../retrieval/adapters/fulltext-adapter.js";
import { GraphAdapter } from "../retrieval/adapters/graph-adapter.js";
import { HybridSearchAdapter } from "../retrieval/adapters/hybrid-search-adapter.js";
import { createPostgresQueryPort } from "../retrieval/ports.js";
import { AnswerSynthesizer } from "../synthesis/answer-synthesizer.js";
import { createOpenAIGenerator } from "../synthesis/openai-generator.js";
import { AnswerPipeline } from "./answer-pipeline.js";

/** Production wiring: Qdrant and OpenAI for Tiers 1-2, Postgres for Tiers 3-4, OpenAI for generation. */
export const createAnswerPipeline = (source: Config = config): AnswerPipeline => {
  const policies = buildPolicies(source);
  const sql = createPostgresQueryPort({ statementTimeoutMs: source.CASCADE_TIER_TIMEOUT_MS });

  return new AnswerPipeline({
    analyzer: new QueryAnalyzer(),
    cascade: new CascadeController({
      adapters: {
        hybrid: new HybridSearchAdapter({ collection: source.QDRANT_COLLECTION }),
        graph: new GraphAdapter({ schema: source.GRAPH_SCHEMA, maxDepth: source.GRAPH_MAX_DEPTH, sql }),
        fulltext: new FullTextAdapter({ sql })
      },
      policy: policies.cascade
    }),
    synthesizer: new AnswerSynthesizer({
      generator: createOpenAIGenerator({ model: source.OPENAI_MODEL, timeoutMs: source.GENERATOR_TIMEOUT_MS }),
      policy: policies.synthesis
    }),
    policies: {
      fusion: policies.fusion,
      confidence: policies.confidence,
      lowEvidence: policies.lowEvidence
    }
  });
};
