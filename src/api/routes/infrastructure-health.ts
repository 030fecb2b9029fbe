import type { FastifyInstance } from "fastify";
import type { ClientLifecycleModules } from "../../clients/lifecycle.js";
import { describeError } from "../../modules/errors.js";
import { logWarn } from "../../observability/logger.js";

type HealthModules = Pick<ClientLifecycleModules, "getOpenAIClient" | "getPostgresClient" | "getQdrantClient">;

export interface InfrastructureHealthDependencies {
  loadClientModules?: () => Promise<HealthModules>;
}

const loadDefaultClientModules = async (): Promise<HealthModules> => {
  const [openaiModule, postgresModule, qdrantModule] = await Promise.all([
    import("../../clients/openai.js"),
    import("../../clients/postgres.js"),
    import("../../clients/qdrant.js")
  ]);
  return {
    getOpenAIClient: openaiModule.getOpenAIClient,
    getPostgresClient: postgresModule.getPostgresClient,
    getQdrantClient: qdrantModule.getQdrantClient
  };
};

export async function registerInfrastructureHealthRoute(
  app: FastifyInstance,
  dependencies?: InfrastructureHealthDependencies
): Promise<void> {
  const loadClientModules = dependencies?.loadClientModules ?? loadDefaultClientModules;

  app.get("/infra/health", async (request, reply) => {
    try {
      const modules = await loadClientModules();
      const [postgres, openai, qdrant] = await Promise.all([
        modules.getPostgresClient(),
        modules.getOpenAIClient(),
        modules.getQdrantClient()
      ]);

      const [postgresHealth, openaiHealth, qdrantHealth] = await Promise.all([
        postgres.healthCheck(),
        openai.healthCheck(),
        qdrant.healthCheck()
      ]);

      return {
        status: "ok",
        clients: {
          postgres: postgresHealth,
          openai: openaiHealth,
          qdrant: qdrantHealth
        }
      };
    } catch (error) {
      const detail = describeError(error);
      logWarn("infra.health.failed", { requestId: request.id }, { error_message: detail });
      reply.code(503);
      return {
        status: "error",
        detail
      };
    }
  });
}
