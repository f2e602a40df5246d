import { resolve } from "node:path";
import { z } from "zod";

const intFromEnv = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const envSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_MODEL: z.string().min(1).default("gpt-4.1-mini"),
  LLM_TIMEOUT_MS: intFromEnv(15000, 100, 120000),
  LLM_MAX_RETRIES: intFromEnv(1, 0, 1),
  LLM_RETRY_DELAY_MS: intFromEnv(500, 0, 10000),
  DB_PATH: z.string().min(1).default("./var/retail.db"),
  MEMORY_DIR: z.string().min(1).default("./var/memory"),
  TRACE_DIR: z.string().min(1).default("./var/traces"),
  MAX_MESSAGE_HISTORY: intFromEnv(10, 1, 500),
  MAX_TRACE_HISTORY: intFromEnv(5, 1, 500)
});

export type AppConfig = {
  llm: {
    apiKey?: string;
    baseUrl?: string;
    model: string;
    timeoutMs: number;
    maxRetries: number;
    retryDelayMs: number;
  };
  dbPath: string;
  memoryDir: string;
  traceDir: string;
  history: {
    maxMessages: number;
    maxTraces: number;
  };
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

const blankToUndefined = (env: NodeJS.ProcessEnv): Record<string, string | undefined> =>
  Object.fromEntries(Object.entries(env).map(([key, value]) => [key, value === "" ? undefined : value]));

export const loadConfig = (env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): AppConfig => {
  const parsed = envSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`));
  }

  const value = parsed.data;
  return {
    llm: {
      apiKey: value.OPENAI_API_KEY,
      baseUrl: value.OPENAI_BASE_URL,
      model: value.OPENAI_MODEL,
      timeoutMs: value.LLM_TIMEOUT_MS,
      maxRetries: value.LLM_MAX_RETRIES,
      retryDelayMs: value.LLM_RETRY_DELAY_MS
    },
    dbPath: value.DB_PATH === ":memory:" ? value.DB_PATH : resolve(cwd, value.DB_PATH),
    memoryDir: resolve(cwd, value.MEMORY_DIR),
    traceDir: resolve(cwd, value.TRACE_DIR),
    history: {
      maxMessages: value.MAX_MESSAGE_HISTORY,
      maxTraces: value.MAX_TRACE_HISTORY
    }
  };
};
