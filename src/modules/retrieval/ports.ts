import { getOpenAIClient } from "../../clients/openai.js";
import { getPostgresClient } from "../../clients/postgres.js";
import { getQdrantClient } from "../../clients/qdrant.js";
import { config } from "../../config/index.js";
import { throwIfAborted } from "../shared/abort.js";

export interface EmbeddingPort {
  embed(text: string, signal: AbortSignal): Promise<number[]>;
}

export type MatchCondition = { value: string } | { text: string };

export interface FieldCondition {
  key: string;
  match: MatchCondition;
}

export interface VectorFilter {
  must?: FieldCondition[];
  should?: FieldCondition[];
}

export interface VectorSearchRequest {
  vector: number[];
  limit: number;
  with_payload: true;
  with_vector: false;
  filter?: VectorFilter;
}

export interface VectorPoint {
  id: string | number;
  score: number;
  payload?: Record<string, unknown> | null;
}

export interface VectorSearchPort {
  search(collection: string, request: VectorSearchRequest, signal: AbortSignal): Promise<VectorPoint[]>;
}

export interface SqlQueryPort {
  query(text: string, values: unknown[], signal: AbortSignal): Promise<{ rows: unknown[] }>;
}

export const createOpenAIEmbeddingPort = (
  model: string = config.OPENAI_EMBEDDING_MODEL,
  getClient: typeof getOpenAIClient = getOpenAIClient
): EmbeddingPort => ({
  async embed(text, signal) {
    const { client } = await getClient();
    const response = await client.embeddings.create({ model, input: text }, { signal });
    const embedding = response.data[0]?.embedding;
    if (!embedding || embedding.length === 0) {
      throw new Error("Embedding response missing vector payload.");
    }
    return embedding;
  }
});

export const createQdrantSearchPort = (getClient: typeof getQdrantClient = getQdrantClient): VectorSearchPort => ({
  async search(collection, request, signal) {
    throwIfAborted(signal, "qdrant search");
    const { client } = await getClient();
    throwIfAborted(signal, "qdrant search");
    const points = await client.search(collection, request);
    return points.map((point) => ({ id: point.id, score: point.score, payload: point.payload }));
  }
});

export interface PostgresQueryPortOptions {
  /** Server-side limit for each statement, applied with SET LOCAL semantics. */
  statementTimeoutMs?: number;
  getClient?: typeof getPostgresClient;
}

/**
 * Runs each query on its own pooled connection inside a transaction carrying a
 * local statement_timeout. Aborting the signal destroys the connection and
 * with it the in-flight statement.
 */
export const createPostgresQueryPort = (options: PostgresQueryPortOptions = {}): SqlQueryPort => {
  const getClient = options.getClient ?? getPostgresClient;
  const statementTimeoutMs = options.statementTimeoutMs ?? config.CASCADE_TIER_TIMEOUT_MS;

  return {
    async query(text, values, signal) {
      throwIfAborted(signal, "postgres query");
      const { pool } = await getClient();
      throwIfAborted(signal, "postgres query");
      const connection = await pool.connect();

      let released = false;
      const release = (destroy: boolean): void => {
        if (!released) {
          released = true;
          connection.release(destroy);
        }
      };
      const onAbort = (): void => release(true);
      signal.addEventListener("abort", onAbort, { once: true });

      try {
        throwIfAborted(signal, "postgres query");
        await connection.query("BEGIN");
        await connection.query("SELECT set_config('statement_timeout', $1, true)", [String(statementTimeoutMs)]);
        const result = await connection.query(text, values);
        await connection.query("COMMIT");
        return { rows: result.rows };
      } catch (error) {
        release(true);
        throw error;
      } finally {
        signal.removeEventListener("abort", onAbort);
        release(false);
      }
    }
  };
};
