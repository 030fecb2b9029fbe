import { describe, expect, it, vi } from "vitest";
import { buildAllowedOrigins, buildApp } from "../../src/app.js";
import { failClosedSentence } from "../../src/modules/answer/fail-closed.js";
import type { FinalResponse } from "../../src/modules/answer/types.js";
import { makeQuestion } from "../helpers/factories.js";

const failClosedResponse = (): FinalResponse => {
  const question = makeQuestion();
  return {
    question,
    answer: failClosedSentence(question),
    claims: [],
    requirements: [],
    conflicts: [],
    explanation: null,
    confidence: { level: "Low", score: 0, selfReported: null, justification: null },
    limitations: ["No passages were retrieved for this question."],
    tiersUsed: [1, 2, 3, 4],
    lowEvidence: true,
    failClosed: { reason: "empty_evidence" },
    sources: [],
    observability: {
      requestId: "req-app",
      tiers: [],
      timings: { analysisMs: 0, retrievalMs: 0, synthesisMs: 0, totalMs: 0 }
    }
  };
};

describe("app.ts", () => {
  it("buildAllowedOrigins allows nothing by default and adds localhost aliases", () => {
    expect(buildAllowedOrigins(undefined)).toEqual([]);
    expect(buildAllowedOrigins(" , ")).toEqual([]);
    expect(buildAllowedOrigins("http://localhost:3000, invalid-url, http://localhost:3000")).toEqual([
      "http://localhost:3000",
      "invalid-url",
      "http://127.0.0.1:3000"
    ]);
  });

  it("buildApp wires health, metrics and the answer route", async () => {
    const answer = vi.fn(async () => failClosedResponse());
    const app = await buildApp({
      logger: false,
      registerInfrastructureHealth: false,
      lifecycle: { enableBootstrap: false },
      apiDependencies: { answer: { createPipeline: () => ({ answer }) } }
    });
    try {
      const health = await app.inject({ method: "GET", url: "/health" });
      expect(health.statusCode).toBe(200);
      expect(health.json()).toEqual({ status: "ok" });
      expect(health.headers["x-request-id"]).toEqual(expect.any(String));

      const answered = await app.inject({
        method: "POST",
        url: "/api/answer",
        payload: { question: "Who is eligible for employment insurance?" }
      });
      expect(answered.statusCode).toBe(200);
      expect(answered.json().answer).toBe("The provided documents do not contain information about eligible.");

      const metrics = await app.inject({ method: "GET", url: "/metrics" });
      expect(metrics.statusCode).toBe(200);

      const infra = await app.inject({ method: "GET", url: "/infra/health" });
      expect(infra.statusCode).toBe(404);
    } finally {
      await app.close();
    }
  });

  it("answers CORS preflight requests from the configured origin", async () => {
    vi.stubEnv("CORS_ORIGINS", "http://localhost:9999");
    const app = await buildApp({
      logger: false,
      registerInfrastructureHealth: false,
      lifecycle: { enableBootstrap: false }
    });
    try {
      const response = await app.inject({
        method: "OPTIONS",
        url: "/api/answer",
        headers: {
          origin: "http://127.0.0.1:9999",
          "access-control-request-method": "POST"
        }
      });

      expect(response.statusCode).toBe(204);
      expect(response.headers["access-control-allow-origin"]).toBe("http://127.0.0.1:9999");
    } finally {
      await app.close();
    }
  });
});
