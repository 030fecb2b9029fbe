import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

interface LatencySummary {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
}

interface OpenAIUsageSummary {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

interface MetricsState {
  requestLatency: LatencySummary;
  answerLatency: LatencySummary;
  retrievalLatency: LatencySummary;
  tierLatency: Record<string, LatencySummary>;
  generationLatency: LatencySummary;
  openAIUsage: OpenAIUsageSummary;
  answerOutcomes: Record<string, number>;
  errorRates: Record<string, number>;
}

export interface SerializedLatency {
  count: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
}

export interface MetricsSnapshot {
  request_latency: SerializedLatency;
  answer_latency: SerializedLatency;
  retrieval_latency: SerializedLatency;
  tier_latency: Record<string, SerializedLatency>;
  generation_latency: SerializedLatency;
  openai_usage: OpenAIUsageSummary;
  answer_outcomes: Record<string, number>;
  error_rates: Record<string, number>;
}

const createLatencySummary = (): LatencySummary => ({
  count: 0,
  totalMs: 0,
  minMs: Number.POSITIVE_INFINITY,
  maxMs: 0
});

const createState = (): MetricsState => ({
  requestLatency: createLatencySummary(),
  answerLatency: createLatencySummary(),
  retrievalLatency: createLatencySummary(),
  tierLatency: {},
  generationLatency: createLatencySummary(),
  openAIUsage: {
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0
  },
  answerOutcomes: {},
  errorRates: {}
});

let state: MetricsState = createState();

const requestStartTimes = new WeakMap<FastifyRequest, number>();

const recordLatency = (summary: LatencySummary, durationMs: number): void => {
  const safeDuration = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
  summary.count += 1;
  summary.totalMs += safeDuration;
  summary.minMs = Math.min(summary.minMs, safeDuration);
  summary.maxMs = Math.max(summary.maxMs, safeDuration);
};

const roundTo2Decimals = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

const serializeLatency = (summary: LatencySummary): SerializedLatency => {
  if (summary.count === 0) {
    return { count: 0, avgMs: 0, minMs: 0, maxMs: 0 };
  }
  return {
    count: summary.count,
    avgMs: roundTo2Decimals(summary.totalMs / summary.count),
    minMs: roundTo2Decimals(summary.minMs),
    maxMs: roundTo2Decimals(summary.maxMs)
  };
};

const increment = (counters: Record<string, number>, key: string): void => {
  counters[key] = (counters[key] ?? 0) + 1;
};

export const recordRequestLatency = (durationMs: number): void => {
  recordLatency(state.requestLatency, durationMs);
};

export const recordAnswerLatency = (durationMs: number): void => {
  recordLatency(state.answerLatency, durationMs);
};

export const recordRetrievalLatency = (durationMs: number): void => {
  recordLatency(state.retrievalLatency, durationMs);
};

export const recordTierLatency = (tier: number, backend: string, durationMs: number): void => {
  const key = `tier_${tier}_${backend}`;
  const summary = state.tierLatency[key] ?? createLatencySummary();
  state.tierLatency[key] = summary;
  recordLatency(summary, durationMs);
};

export const recordGenerationLatency = (durationMs: number): void => {
  recordLatency(state.generationLatency, durationMs);
};

export const recordOpenAIUsage = (usage: {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}): void => {
  state.openAIUsage.promptTokens += usage.promptTokens ?? 0;
  state.openAIUsage.completionTokens += usage.completionTokens ?? 0;
  state.openAIUsage.totalTokens += usage.totalTokens ?? 0;
};

export const recordAnswerOutcome = (outcome: string): void => {
  increment(state.answerOutcomes, outcome);
};

export const recordErrorRate = (key: string): void => {
  increment(state.errorRates, key);
};

export const getMetricsSnapshot = (): MetricsSnapshot => ({
  request_latency: serializeLatency(state.requestLatency),
  answer_latency: serializeLatency(state.answerLatency),
  retrieval_latency: serializeLatency(state.retrievalLatency),
  tier_latency: Object.fromEntries(
    Object.entries(state.tierLatency).map(([key, summary]) => [key, serializeLatency(summary)])
  ),
  generation_latency: serializeLatency(state.generationLatency),
  openai_usage: { ...state.openAIUsage },
  answer_outcomes: { ...state.answerOutcomes },
  error_rates: { ...state.errorRates }
});

export const resetMetrics = (): void => {
  state = createState();
};

export const registerMetricsRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/metrics", async () => getMetricsSnapshot());
};

export const registerRequestMetricsHooks = (app: FastifyInstance): void => {
  app.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    requestStartTimes.set(request, Date.now());
    reply.header("x-request-id", request.id);
  });

  app.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    const startedAt = requestStartTimes.get(request) ?? Date.now();
    recordRequestLatency(Date.now() - startedAt);
    if (reply.statusCode >= 400) {
      recordErrorRate(`http_${reply.statusCode}`);
    }
  });

  app.addHook("onError", async (_request, reply) => {
    recordErrorRate(`http_${reply.statusCode || 500}`);
  });
};
