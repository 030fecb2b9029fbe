import OpenAI from "openai";
import { config } from "../config/index.js";
import { describeError } from "../modules/errors.js";
import { withTimeout } from "../modules/shared/abort.js";
import { withRetries, type HealthReport } from "./retry.js";

export interface OpenAISingleton {
  client: OpenAI;
  healthCheck: () => Promise<HealthReport>;
}

const HEALTH_TIMEOUT_MS = 7000;
const TRANSPORT_RETRIES = 2;
const HEALTH_RETRY_DELAY_MS = 300;

let singleton: OpenAISingleton | null = null;

function initialize(): OpenAISingleton {
  const client = new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    maxRetries: TRANSPORT_RETRIES,
    timeout: config.GENERATOR_TIMEOUT_MS
  });

  console.info("[clients/openai] initialized singleton");

  return {
    client,
    async healthCheck() {
      try {
        await withRetries(
          () =>
            withTimeout(
              "openai health check",
              async (signal) => {
                await client.models.retrieve(config.OPENAI_MODEL, { signal });
              },
              HEALTH_TIMEOUT_MS
            ),
          { attempts: TRANSPORT_RETRIES, delayMs: HEALTH_RETRY_DELAY_MS }
        );
        return { status: "ok" };
      } catch (error) {
        return { status: "error", details: describeError(error) };
      }
    }
  };
}

export async function getOpenAIClient(): Promise<OpenAISingleton> {
  if (!singleton) {
    singleton = initialize();
  }

  return singleton;
}

export async function shutdownOpenAIClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  console.info("[clients/openai] shutdown complete");
}
