import { QdrantClient } from "@qdrant/js-client-rest";
import { config } from "../config/index.js";
import { describeError } from "../modules/errors.js";
import { withRetries, type HealthReport } from "./retry.js";

export interface QdrantSingleton {
  client: QdrantClient;
  healthCheck: () => Promise<HealthReport>;
}

const REQUEST_TIMEOUT_MS = 5000;
const STARTUP_RETRIES = 3;
const STARTUP_RETRY_DELAY_MS = 250;

let singleton: QdrantSingleton | null = null;
let initPromise: Promise<QdrantSingleton> | null = null;

async function initialize(): Promise<QdrantSingleton> {
  const client = new QdrantClient({
    url: config.QDRANT_URL,
    apiKey: config.QDRANT_API_KEY,
    timeout: REQUEST_TIMEOUT_MS
  });

  await withRetries(
    async () => {
      await client.getCollections();
    },
    { attempts: STARTUP_RETRIES, delayMs: STARTUP_RETRY_DELAY_MS }
  );

  console.info("[clients/qdrant] initialized singleton");

  return {
    client,
    async healthCheck() {
      try {
        const { exists } = await client.collectionExists(config.QDRANT_COLLECTION);
        return exists
          ? { status: "ok" }
          : { status: "error", details: `collection ${config.QDRANT_COLLECTION} does not exist` };
      } catch (error) {
        return { status: "error", details: describeError(error) };
      }
    }
  };
}

export async function getQdrantClient(): Promise<QdrantSingleton> {
  if (singleton) {
    return singleton;
  }

  if (!initPromise) {
    initPromise = initialize().catch((error: unknown) => {
      initPromise = null;
      throw error;
    });
  }

  singleton = await initPromise;
  return singleton;
}

export async function shutdownQdrantClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  initPromise = null;
  console.info("[clients/qdrant] shutdown complete");
}
