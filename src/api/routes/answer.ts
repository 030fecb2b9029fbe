import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { InvalidInputError, RequestCancelledError } from "../../modules/errors.js";
import type { AnswerPipeline } from "../../modules/answer/answer-pipeline.js";
import { logError, logInfo } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";

const answerBodySchema = z.object({
  question: z.string().min(1, "question is required")
});

const toValidationError = (error: z.ZodError) => ({
  detail: error.issues.map((issue) => ({
    type: issue.code,
    loc: ["body", ...issue.path],
    msg: issue.message
  }))
});

const resolveRequestId = (request: FastifyRequest): string => {
  const headerRequestId = request.headers["x-request-id"];
  if (typeof headerRequestId === "string" && headerRequestId.trim().length > 0) {
    return headerRequestId.trim();
  }
  return request.id;
};

export interface AnswerRoutesDependencies {
  createPipeline?: () => Pick<AnswerPipeline, "answer">;
}

const loadDefaultPipeline = async (): Promise<Pick<AnswerPipeline, "answer">> => {
  const { createAnswerPipeline } = await import("../../modules/answer/create-answer-pipeline.js");
  return createAnswerPipeline();
};

const buildAnswerHandler = (dependencies?: AnswerRoutesDependencies) => {
  let pipeline: Pick<AnswerPipeline, "answer"> | null = null;
  const resolvePipeline = async (): Promise<Pick<AnswerPipeline, "answer">> => {
    if (!pipeline) {
      pipeline = dependencies?.createPipeline ? dependencies.createPipeline() : await loadDefaultPipeline();
    }
    return pipeline;
  };

  return async (request: FastifyRequest, reply: FastifyReply) => {
    const requestId = resolveRequestId(request);
    const parsed = answerBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      return reply.code(422).send(toValidationError(parsed.error));
    }

    const controller = new AbortController();
    const onClose = (): void => {
      if (!reply.raw.writableEnded) {
        controller.abort();
      }
    };
    reply.raw.on("close", onClose);

    try {
      const answerPipeline = await resolvePipeline();
      const response = await answerPipeline.answer(parsed.data.question, { signal: controller.signal, requestId });
      logInfo("api.answer.completed", { requestId }, { fail_closed: response.failClosed?.reason ?? null });
      return reply.send(response);
    } catch (error) {
      if (error instanceof InvalidInputError) {
        recordErrorRate("validation_422");
        return reply.code(422).send({
          detail: [{ type: error.code, loc: ["body", error.field], msg: error.message }]
        });
      }
      if (error instanceof RequestCancelledError) {
        recordErrorRate("request_cancelled");
        logInfo("api.answer.cancelled", { requestId }, { error_message: error.message });
        return reply.code(499).send({ detail: error.message });
      }
      recordErrorRate("answer_500");
      logError("api.answer.failed", { requestId }, {
        error_message: error instanceof Error ? error.message : String(error)
      });
      return reply.code(500).send({ detail: "Internal server error" });
    } finally {
      reply.raw.off("close", onClose);
    }
  };
};

export async function registerAnswerRoutes(app: FastifyInstance, dependencies?: AnswerRoutesDependencies): Promise<void> {
  app.post("/api/answer", buildAnswerHandler(dependencies));
}
