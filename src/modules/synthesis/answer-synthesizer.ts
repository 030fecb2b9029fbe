import type { Question } from "../analysis/types.js";
import type { ConflictFinding } from "../conflicts/conflict-detector.js";
import { describeError, RequestCancelledError, SynthesisParseError } from "../errors.js";
import type { FusedContext } from "../fusion/context-assembler.js";
import { withTimeout } from "../shared/abort.js";
import { ANSWER_SYSTEM_PROMPT, buildAnswerUserPrompt } from "../../prompts/index.js";
import { logDebug, logWarn, type CorrelationContext } from "../../observability/logger.js";
import { recordErrorRate, recordGenerationLatency, recordOpenAIUsage } from "../../observability/metrics.js";
import { parseStructuredAnswer } from "./answer-schema.js";
import type { GenerationMessages, GenerationPort, StructuredAnswer } from "./types.js";

export interface SynthesisPolicy {
  timeoutMs: number;
  /** Extra generations allowed after a parse failure; 0 or 1. */
  parseRetries: number;
}

export const DEFAULT_SYNTHESIS_POLICY: SynthesisPolicy = {
  timeoutMs: 30000,
  parseRetries: 0
};

export type SynthesisOutcome =
  | { status: "ok"; answer: StructuredAnswer; attempts: number }
  | { status: "parse_error"; error: SynthesisParseError; attempts: number }
  | { status: "generator_unavailable"; error: string; attempts: number };

export interface SynthesisInput {
  question: Question;
  context: FusedContext;
  conflicts: ConflictFinding[];
}

export interface AnswerSynthesizerDependencies {
  generator: GenerationPort;
  policy?: Partial<SynthesisPolicy>;
  now?: () => number;
  logDebug?: typeof logDebug;
  logWarn?: typeof logWarn;
  recordErrorRate?: typeof recordErrorRate;
  recordGenerationLatency?: typeof recordGenerationLatency;
  recordOpenAIUsage?: typeof recordOpenAIUsage;
}

export const buildGenerationMessages = (input: SynthesisInput, retry = false): GenerationMessages => ({
  system: ANSWER_SYSTEM_PROMPT,
  user: buildAnswerUserPrompt({
    question: input.question.normalized,
    entries: input.context.entries,
    conflicts: input.conflicts,
    retry
  })
});

export class AnswerSynthesizer {
  private readonly generator: GenerationPort;
  private readonly policy: SynthesisPolicy;
  private readonly deps: Required<Omit<AnswerSynthesizerDependencies, "generator" | "policy">>;

  constructor(dependencies: AnswerSynthesizerDependencies) {
    this.generator = dependencies.generator;
    this.policy = { ...DEFAULT_SYNTHESIS_POLICY, ...dependencies.policy };
    this.deps = {
      now: dependencies.now ?? Date.now,
      logDebug: dependencies.logDebug ?? logDebug,
      logWarn: dependencies.logWarn ?? logWarn,
      recordErrorRate: dependencies.recordErrorRate ?? recordErrorRate,
      recordGenerationLatency: dependencies.recordGenerationLatency ?? recordGenerationLatency,
      recordOpenAIUsage: dependencies.recordOpenAIUsage ?? recordOpenAIUsage
    };
  }

  async synthesize(
    input: SynthesisInput,
    options: { signal?: AbortSignal; requestId?: string } = {}
  ): Promise<SynthesisOutcome> {
    const context: CorrelationContext = { requestId: options.requestId ?? null };
    const maxAttempts = 1 + Math.min(1, Math.max(0, this.policy.parseRetries));
    let lastParseError: SynthesisParseError | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const messages = buildGenerationMessages(input, attempt > 1);
      const startedAt = this.deps.now();

      let content: string;
      try {
        const result = await withTimeout(
          "answer generation",
          (signal) => this.generator.complete(messages, signal),
          this.policy.timeoutMs,
          options.signal
        );
        content = result.content;
        if (result.usage) {
          this.deps.recordOpenAIUsage(result.usage);
        }
      } catch (error) {
        if (options.signal?.aborted) {
          throw new RequestCancelledError("synthesis");
        }
        const message = describeError(error);
        this.deps.recordErrorRate("generation_unavailable");
        this.deps.logWarn("synthesis.generator.failed", context, { attempt, error_message: message });
        return { status: "generator_unavailable", error: message, attempts: attempt };
      } finally {
        this.deps.recordGenerationLatency(this.deps.now() - startedAt);
      }

      try {
        const answer = parseStructuredAnswer(content);
        this.deps.logDebug("synthesis.answer.parsed", context, {
          attempt,
          claim_count: answer.claims.length,
          requirement_count: answer.requirements.length
        });
        return { status: "ok", answer, attempts: attempt };
      } catch (error) {
        if (!(error instanceof SynthesisParseError)) {
          throw error;
        }
        lastParseError = error;
        this.deps.recordErrorRate("synthesis_parse_error");
        this.deps.logWarn("synthesis.answer.parse_failed", context, {
          attempt,
          error_message: error.message,
          raw_length: error.rawOutput.length
        });
      }
    }

    return {
      status: "parse_error",
      error: lastParseError ?? new SynthesisParseError("Generator output could not be parsed.", ""),
      attempts: maxAttempts
    };
  }
}
