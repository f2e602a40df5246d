import type { AppConfig } from "../config/settings.js";
import type { Logger } from "../runtime/logger.js";
import { CompletionClient } from "./client.js";
import { LlmConfigError } from "./errors.js";
import type { LlmProvider } from "./provider.js";
import { OpenAIResponsesProvider } from "./providers/openai_responses.js";

export const getProviderFromConfig = (config: AppConfig): LlmProvider => {
  if (!config.llm.apiKey) {
    throw new LlmConfigError("Missing LLM credentials. Set OPENAI_API_KEY (optionally OPENAI_BASE_URL / OPENAI_MODEL).");
  }
  return new OpenAIResponsesProvider({
    apiKey: config.llm.apiKey,
    baseUrl: config.llm.baseUrl,
    model: config.llm.model
  });
};

export const createCompletionClient = (provider: LlmProvider, config: AppConfig, logger?: Logger): CompletionClient =>
  new CompletionClient(provider, {
    timeoutMs: config.llm.timeoutMs,
    maxRetries: config.llm.maxRetries,
    retryDelayMs: config.llm.retryDelayMs,
    model: config.llm.model,
    logger
  });
