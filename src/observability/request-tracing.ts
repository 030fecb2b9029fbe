import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { getConfiguredLogLevel, logDebug, logInfo, logTrace, type LogFields } from "./logger.js";

export type RequestTraceMode = "off" | "debug" | "trace";

const requestStartTimes = new WeakMap<FastifyRequest, number>();

export const resolveRequestTraceMode = (value: string | undefined = process.env.REQUEST_TRACE_MODE): RequestTraceMode => {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "trace") {
    return normalized;
  }
  return "off";
};

const pickRequestHeaders = (request: FastifyRequest): LogFields => {
  const headers = request.headers;
  return {
    origin: headers.origin ?? null,
    host: headers.host ?? null,
    "user-agent": headers["user-agent"] ?? null,
    "content-type": headers["content-type"] ?? null,
    "content-length": headers["content-length"] ?? null
  };
};

// Only the shape of the body is logged; questions may carry personal details.
export const summarizeBody = (body: unknown): LogFields | null => {
  if (body === undefined) {
    return null;
  }
  if (body === null) {
    return { type: "null" };
  }
  if (typeof body === "string") {
    return { type: "string", length: body.length };
  }
  if (Array.isArray(body)) {
    return { type: "array", length: body.length };
  }
  if (typeof body === "object") {
    const keys = Object.keys(body);
    return { type: "object", key_count: keys.length, keys: keys.slice(0, 20) };
  }
  return { type: typeof body };
};

const traceRequest = (
  mode: RequestTraceMode,
  request: FastifyRequest,
  reply: FastifyReply,
  event: string,
  fields: LogFields = {}
): void => {
  const routeUrl: string | undefined = request.routeOptions.url;
  const baseFields: LogFields = {
    method: request.method,
    url: request.url,
    route: routeUrl ?? null,
    status_code: reply.statusCode || null,
    ...fields
  };

  if (mode === "trace") {
    logTrace(event, { requestId: request.id }, baseFields);
    return;
  }
  logDebug(event, { requestId: request.id }, baseFields);
};

export const registerRequestTraceHooks = (app: FastifyInstance, mode: RequestTraceMode = resolveRequestTraceMode()): void => {
  if (mode === "off") {
    return;
  }

  logInfo("http.trace.enabled", {}, { mode, log_level: getConfiguredLogLevel() });

  app.addHook("onRequest", async (request, reply) => {
    requestStartTimes.set(request, Date.now());
    traceRequest(mode, request, reply, "http.request.start", {
      headers: pickRequestHeaders(request)
    });
  });

  if (mode === "trace") {
    app.addHook("preHandler", async (request, reply) => {
      traceRequest(mode, request, reply, "http.request.pre_handler", {
        body: summarizeBody(request.body)
      });
    });
  }

  app.addHook("onError", async (request, reply, error) => {
    traceRequest(mode, request, reply, "http.request.error", {
      error_name: error.name,
      error_message: error.message
    });
  });

  app.addHook("onResponse", async (request, reply) => {
    const startedAt = requestStartTimes.get(request) ?? Date.now();
    traceRequest(mode, request, reply, "http.request.complete", {
      duration_ms: Date.now() - startedAt
    });
  });
};
