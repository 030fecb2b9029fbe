import type { FastifyInstance } from "fastify";
import type { HealthReport } from "./retry.js";

let processHooksRegistered = false;

type HealthCheckedClient = { healthCheck: () => Promise<HealthReport> };

export interface ClientLifecycleModules {
  getOpenAIClient: () => Promise<HealthCheckedClient>;
  shutdownOpenAIClient: () => Promise<void>;
  getPostgresClient: () => Promise<HealthCheckedClient>;
  shutdownPostgresClient: () => Promise<void>;
  getQdrantClient: () => Promise<HealthCheckedClient>;
  shutdownQdrantClient: () => Promise<void>;
}

async function loadDefaultClientModules(): Promise<ClientLifecycleModules> {
  const [openaiModule, postgresModule, qdrantModule] = await Promise.all([
    import("./openai.js"),
    import("./postgres.js"),
    import("./qdrant.js")
  ]);

  return {
    getOpenAIClient: openaiModule.getOpenAIClient,
    shutdownOpenAIClient: openaiModule.shutdownOpenAIClient,
    getPostgresClient: postgresModule.getPostgresClient,
    shutdownPostgresClient: postgresModule.shutdownPostgresClient,
    getQdrantClient: qdrantModule.getQdrantClient,
    shutdownQdrantClient: qdrantModule.shutdownQdrantClient
  };
}

async function shutdownAllClients(logPrefix: string, loadClientModules: () => Promise<ClientLifecycleModules>): Promise<void> {
  const clients = await loadClientModules();
  console.info(`${logPrefix} shutting down infrastructure clients`);
  await Promise.allSettled([
    clients.shutdownQdrantClient(),
    clients.shutdownOpenAIClient(),
    clients.shutdownPostgresClient()
  ]);
}

export interface ClientLifecycleOptions {
  enableBootstrap: boolean;
  loadClientModules?: () => Promise<ClientLifecycleModules>;
  registerProcessSignals?: boolean;
  exit?: (code: number) => void;
}

/**
 * Initializes and health-checks the infrastructure singletons when the server
 * becomes ready, and closes them on shutdown or on SIGINT/SIGTERM.
 */
export function registerClientLifecycle(app: FastifyInstance, options: ClientLifecycleOptions): void {
  if (!options.enableBootstrap) {
    app.log.info("Infrastructure bootstrap disabled (set ENABLE_INFRA_BOOTSTRAP=true to enable).");
    return;
  }
  const loadClientModules = options.loadClientModules ?? loadDefaultClientModules;
  const shouldRegisterProcessSignals = options.registerProcessSignals ?? true;
  const exit = options.exit ?? ((code: number) => process.exit(code));

  app.addHook("onReady", async () => {
    const clients = await loadClientModules();
    const reports = await Promise.all([
      clients.getPostgresClient().then((client) => client.healthCheck()),
      clients.getOpenAIClient().then((client) => client.healthCheck()),
      clients.getQdrantClient().then((client) => client.healthCheck())
    ]);
    const failing = reports.filter((report) => report.status === "error");
    if (failing.length > 0) {
      app.log.warn({ failing }, "Infrastructure singletons initialized with failing health checks");
      return;
    }
    app.log.info("Infrastructure singletons initialized and health checked");
  });

  app.addHook("onClose", async () => {
    await shutdownAllClients("[lifecycle/onClose]", loadClientModules);
  });

  if (shouldRegisterProcessSignals && !processHooksRegistered) {
    processHooksRegistered = true;
    const handleSignal = (signal: NodeJS.Signals): void => {
      console.info(`[lifecycle/process] received ${signal}`);
      void shutdownAllClients("[lifecycle/process]", loadClientModules)
        .catch((error: unknown) => {
          console.error("[lifecycle/process] shutdown failed", error);
        })
        .finally(() => exit(0));
    };

    process.once("SIGINT", handleSignal);
    process.once("SIGTERM", handleSignal);
  }
}
