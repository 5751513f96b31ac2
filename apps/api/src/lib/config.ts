import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().default("0.0.0.0"),
  WEB_ORIGIN: z.string().default("*"),
  NODE_ENV: z.string().default("development"),
  OPENAI_API_KEY: z.string().optional(),
  LLM_MODEL: z.string().default("gpt-4o-mini"),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  LLM_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(2000),
  LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  LLM_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(0),
  PIPELINE_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  DATA_DIR: z.string().default("data"),
  SHORT_RESPONSE_THRESHOLD: z.coerce.number().int().min(0).default(10),
  STORE_SERIALIZE_APPENDS: booleanFlag.default(false),
  VALKEY_URL: z.url().optional(),
  SENTRY_DSN: z.string().optional(),
});

export interface ApiConfig {
  port: number;
  host: string;
  webOrigin: string;
  environment: string;
  production: boolean;
  llm: {
    model: string;
    apiKey?: string;
    temperature: number;
    maxOutputTokens: number;
    maxAttempts: number;
    retryDelayMs: number;
  };
  pipelineConcurrency: number;
  dataDir: string;
  shortResponseThreshold: number;
  serializeAppends: boolean;
  valkeyUrl?: string;
  sentryDsn?: string;
}

/**
 * Read the service configuration from environment variables. Empty values
 * count as unset. Throws with every offending variable listed.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ApiConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""),
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    host: vars.HOST,
    webOrigin: vars.WEB_ORIGIN,
    environment: vars.NODE_ENV,
    production: vars.NODE_ENV === "production",
    llm: {
      model: vars.LLM_MODEL,
      apiKey: vars.OPENAI_API_KEY,
      temperature: vars.LLM_TEMPERATURE,
      maxOutputTokens: vars.LLM_MAX_OUTPUT_TOKENS,
      maxAttempts: vars.LLM_MAX_ATTEMPTS,
      retryDelayMs: vars.LLM_RETRY_DELAY_MS,
    },
    pipelineConcurrency: vars.PIPELINE_CONCURRENCY,
    dataDir: vars.DATA_DIR,
    shortResponseThreshold: vars.SHORT_RESPONSE_THRESHOLD,
    serializeAppends: vars.STORE_SERIALIZE_APPENDS,
    valkeyUrl: vars.VALKEY_URL,
    sentryDsn: vars.SENTRY_DSN,
  };
}
