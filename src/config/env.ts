import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

export function parseDotEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const separatorIndex = trimmed.indexOf("=");
  if (separatorIndex <= 0) {
    return null;
  }

  const key = trimmed.slice(0, separatorIndex).trim();
  let value = trimmed.slice(separatorIndex + 1).trim();

  if (
    (value.startsWith('"') && value.endsWith('"')) ||
    (value.startsWith("'") && value.endsWith("'"))
  ) {
    value = value.slice(1, -1);
  }

  return [key, value];
}

export interface LoadModeEnvFileOptions {
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
  existsSync?: typeof fs.existsSync;
  readFileSync?: typeof fs.readFileSync;
}

export function loadModeEnvFile(options: LoadModeEnvFileOptions = {}): string | null {
  const cwd = options.cwd ?? process.cwd();
  const processEnv = options.processEnv ?? process.env;
  const existsSync = options.existsSync ?? fs.existsSync;
  const readFileSync = options.readFileSync ?? fs.readFileSync;
  const protectedKeys = new Set(
    Object.keys(processEnv).filter((key) => processEnv[key] !== undefined)
  );
  const rawMode = processEnv.APP_MODE?.trim().toLowerCase();
  const explicitMode = rawMode === "local" || rawMode === "prod" ? rawMode : undefined;

  const modeCandidates = explicitMode ? [explicitMode] : ["local", "prod"];
  const envFilePath = modeCandidates
    .map((mode) => path.join(cwd, `.env.${mode}`))
    .find((candidate) => existsSync(candidate));
  if (!envFilePath) {
    return null;
  }

  const content = readFileSync(envFilePath, "utf8");
  for (const line of content.split(/\r?\n/)) {
    const entry = parseDotEnvLine(line);
    if (!entry) {
      continue;
    }
    const [key, value] = entry;
    if (protectedKeys.has(key)) {
      continue;
    }
    processEnv[key] = value;
  }
  return envFilePath;
}

loadModeEnvFile();

const booleanFlagSchema = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (typeof value === "boolean") {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
  });

const unitIntervalSchema = z.coerce.number().min(0).max(1);

export const envSchema = z.object({
  APP_MODE: z.enum(["prod", "local"]).default("prod"),
  PORT: z.coerce.number().int().positive().default(3000),
  CORS_ORIGINS: z.string().optional(),
  ENABLE_INFRA_BOOTSTRAP: booleanFlagSchema.default(false),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error"]).default("info"),
  REQUEST_TRACE_MODE: z.enum(["off", "debug", "trace"]).default("off"),
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  OPENAI_MODEL: z.string().min(1).default("gpt-4.1-mini"),
  OPENAI_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  POSTGRES_URL: z.string().min(1, "POSTGRES_URL is required"),
  GRAPH_SCHEMA: z
    .string()
    .regex(/^[a-z_][a-z0-9_]*$/, "GRAPH_SCHEMA must be a plain lowercase identifier")
    .default("graph"),
  QDRANT_URL: z.string().min(1, "QDRANT_URL is required"),
  QDRANT_API_KEY: z.string().optional(),
  QDRANT_COLLECTION: z.string().min(1, "QDRANT_COLLECTION is required"),
  CASCADE_ACCEPTANCE_THRESHOLD: unitIntervalSchema.default(0.5),
  CASCADE_MIN_SUFFICIENT_HITS: z.coerce.number().int().positive().default(8),
  CASCADE_TIER_TIMEOUT_MS: z.coerce.number().int().positive().default(4000),
  CASCADE_PARALLEL_FALLBACK: booleanFlagSchema.default(false),
  TIER_RESULT_LIMIT: z.coerce.number().int().positive().default(10),
  GRAPH_MAX_DEPTH: z.coerce.number().int().min(1).max(3).default(1),
  CONTEXT_MAX_CHARS: z.coerce.number().int().positive().default(12000),
  CONTEXT_MAX_HITS: z.coerce.number().int().positive().default(12),
  GENERATOR_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  SYNTHESIS_PARSE_RETRIES: z.coerce.number().int().min(0).max(1).default(0),
  LOW_EVIDENCE_POLICY: z.enum(["fail_closed", "synthesize_capped"]).default("fail_closed"),
  CONFIDENCE_HIGH_RETRIEVAL_BAR: unitIntervalSchema.default(0.7)
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(rawEnv: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(rawEnv);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return {
    ...parsed.data,
    QDRANT_API_KEY:
      parsed.data.QDRANT_API_KEY && parsed.data.QDRANT_API_KEY.trim().length > 0
        ? parsed.data.QDRANT_API_KEY
        : undefined
  };
}

export const env: Env = parseEnv(process.env);
