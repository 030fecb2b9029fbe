import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { registerClientLifecycle, type ClientLifecycleOptions } from "./clients/lifecycle.js";
import { registerHealthRoute } from "./api/routes/health.js";
import {
  registerInfrastructureHealthRoute,
  type InfrastructureHealthDependencies
} from "./api/routes/infrastructure-health.js";
import { registerApiRoutes, type ApiRoutesDependencies } from "./api/routes/index.js";
import { registerMetricsRoutes, registerRequestMetricsHooks } from "./observability/metrics.js";
import { registerRequestTraceHooks } from "./observability/request-tracing.js";

export interface BuildAppOptions {
  apiDependencies?: ApiRoutesDependencies;
  infrastructureHealth?: InfrastructureHealthDependencies;
  registerInfrastructureHealth?: boolean;
  lifecycle?: Partial<ClientLifecycleOptions>;
  logger?: boolean;
}

/** Comma-separated CORS origins, each localhost origin paired with its 127.0.0.1 alias. None when unset. */
export function buildAllowedOrigins(rawOrigins: string | undefined): string[] {
  const origins = new Set<string>(
    (rawOrigins ?? "")
      .split(",")
      .map((origin) => origin.trim())
      .filter(Boolean)
  );

  for (const origin of [...origins]) {
    let url: URL;
    try {
      url = new URL(origin);
    } catch {
      continue;
    }
    if (url.hostname === "localhost") {
      url.hostname = "127.0.0.1";
      origins.add(url.toString().replace(/\/$/, ""));
    } else if (url.hostname === "127.0.0.1") {
      url.hostname = "localhost";
      origins.add(url.toString().replace(/\/$/, ""));
    }
  }

  return [...origins];
}

export async function buildApp(options?: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: options?.logger ?? true });

  await app.register(cors, {
    origin: buildAllowedOrigins(process.env.CORS_ORIGINS),
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Request-Id"]
  });

  registerRequestMetricsHooks(app);
  registerRequestTraceHooks(app);
  registerClientLifecycle(app, {
    enableBootstrap: process.env.ENABLE_INFRA_BOOTSTRAP === "true",
    ...options?.lifecycle
  });
  await registerHealthRoute(app);
  await registerMetricsRoutes(app);
  if (options?.registerInfrastructureHealth !== false) {
    await registerInfrastructureHealthRoute(app, options?.infrastructureHealth);
  }
  await registerApiRoutes(app, options?.apiDependencies);

  return app;
}
