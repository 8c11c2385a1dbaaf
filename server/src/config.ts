import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const numberWithDefault = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value) => {
      const numeric = Number(value);
      return value !== undefined && value.trim() !== "" && Number.isFinite(numeric)
        ? numeric
        : fallback;
    });

export const DEFAULT_WEBHOOK_TIMEOUT_SECONDS = 5;

const EnvSchema = z.object({
  PORT: numberWithDefault(3001),
  LLM_BASE_URL: optionalString,
  LLM_API_KEY: optionalString,
  GROQ_API_KEY: optionalString,
  LLM_MODEL: optionalString,
  WEBHOOK_TIMEOUT: numberWithDefault(DEFAULT_WEBHOOK_TIMEOUT_SECONDS),
  SUPABASE_URL: optionalString,
  SUPABASE_PROJECT_ID: optionalString,
  SUPABASE_SERVICE_KEY: optionalString,
  SUPABASE_SECRET_KEY: optionalString,
  CORS_ALLOW_ORIGINS: optionalString,
  RULE_CACHE_TTL_MS: numberWithDefault(30_000),
  BACKGROUND_CONCURRENCY: numberWithDefault(4),
  BACKGROUND_MAX_PENDING: numberWithDefault(1000),
  META_GRAPH_VERSION: optionalString,
});

export type LlmConfig = {
  baseUrl: string;
  apiKey?: string;
  model: string;
  completionTimeoutMs: number;
  modelListTimeoutMs: number;
  extractionTimeoutMs: number;
};

export type AppConfig = {
  port: number;
  llm: LlmConfig;
  webhookTimeoutMs: number;
  supabase?: { url: string; serviceKey: string };
  corsOrigins: string[] | "*";
  ruleCacheTtlMs: number;
  background: { concurrency: number; maxPending: number };
  meta: { graphVersion: string };
};

export const DEFAULT_LLM_BASE_URL = "https://api.groq.com/openai/v1";
export const DEFAULT_LLM_MODEL = "llama-3.1-70b-versatile";

const resolveSupabase = (env: z.infer<typeof EnvSchema>) => {
  const url =
    env.SUPABASE_URL ||
    (env.SUPABASE_PROJECT_ID ? `https://${env.SUPABASE_PROJECT_ID}.supabase.co` : "");
  const serviceKey = env.SUPABASE_SERVICE_KEY || env.SUPABASE_SECRET_KEY;
  if (!url || !serviceKey) return undefined;
  return { url, serviceKey };
};

const parseCorsOrigins = (value?: string): string[] | "*" => {
  if (!value || value === "*") return "*";
  const origins = value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
  return origins.length > 0 ? origins : "*";
};

const deepFreeze = <T extends object>(value: T): Readonly<T> => {
  for (const nested of Object.values(value)) {
    if (nested && typeof nested === "object" && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
};

/**
 * Builds the immutable configuration handed to every component at
 * construction time. Only the entry point reads `process.env`.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> => {
  const parsed = EnvSchema.parse(env);

  const config: AppConfig = {
    port: parsed.PORT,
    llm: {
      baseUrl: (parsed.LLM_BASE_URL ?? DEFAULT_LLM_BASE_URL).replace(/\/+$/, ""),
      apiKey: parsed.LLM_API_KEY || parsed.GROQ_API_KEY,
      model: parsed.LLM_MODEL ?? DEFAULT_LLM_MODEL,
      completionTimeoutMs: 30_000,
      modelListTimeoutMs: 10_000,
      extractionTimeoutMs: 10_000,
    },
    // axios reads a 0 timeout as "no timeout".
    webhookTimeoutMs:
      (parsed.WEBHOOK_TIMEOUT > 0 ? parsed.WEBHOOK_TIMEOUT : DEFAULT_WEBHOOK_TIMEOUT_SECONDS) * 1000,
    supabase: resolveSupabase(parsed),
    corsOrigins: parseCorsOrigins(parsed.CORS_ALLOW_ORIGINS),
    ruleCacheTtlMs: Math.max(0, parsed.RULE_CACHE_TTL_MS),
    background: {
      concurrency: Math.max(1, Math.round(parsed.BACKGROUND_CONCURRENCY)),
      maxPending: Math.max(1, Math.round(parsed.BACKGROUND_MAX_PENDING)),
    },
    meta: { graphVersion: parsed.META_GRAPH_VERSION ?? "v21.0" },
  };

  return deepFreeze(config);
};
