export interface RetryOptions {
  attempts: number;
  delayMs: number;
}

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/** Retries with a linear backoff; rethrows the last failure. */
export async function withRetries<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.attempts; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt < options.attempts) {
        await delay(options.delayMs * attempt);
      }
    }
  }

  throw lastError;
}

export type HealthStatus = "ok" | "error";

export interface HealthReport {
  status: HealthStatus;
  details?: string;
}
