import type { Logger } from "../runtime/logger.js";
import { consoleLogger } from "../runtime/logger.js";
import { errorMessage, isTransientLlmError, LlmProviderError, LlmTimeoutError } from "./errors.js";
import type { LlmMessage, LlmProvider } from "./provider.js";

/** Text completion as the engine sees the planner, repair and responder services. */
export interface CompletionService {
  complete(prompt: string, systemPrompt?: string): Promise<string>;
}

export type CompletionClientOptions = {
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class CompletionClient implements CompletionService {
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly provider: LlmProvider,
    private readonly opts: CompletionClientOptions = {}
  ) {
    this.timeoutMs = opts.timeoutMs ?? 15000;
    this.maxRetries = Math.min(Math.max(opts.maxRetries ?? 1, 0), 1);
    this.retryDelayMs = opts.retryDelayMs ?? 500;
    this.logger = opts.logger ?? consoleLogger;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  async complete(prompt: string, systemPrompt?: string): Promise<string> {
    const messages: LlmMessage[] = [];
    if (systemPrompt) messages.push({ role: "system", content: systemPrompt });
    messages.push({ role: "user", content: prompt });

    for (let attempt = 0; ; attempt += 1) {
      try {
        return await this.attempt(messages);
      } catch (error) {
        if (attempt >= this.maxRetries || !isTransientLlmError(error)) throw error;
        this.logger.warn(`[llm] ${this.provider.name} attempt ${attempt + 1} failed, retrying: ${errorMessage(error)}`);
        await this.sleep(this.retryDelayMs);
      }
    }
  }

  private async attempt(messages: LlmMessage[]): Promise<string> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Settle before aborting so the race reports the timeout, not the provider's abort error.
        reject(new LlmTimeoutError(this.timeoutMs));
        controller.abort();
      }, this.timeoutMs);
    });

    try {
      const text = await Promise.race([
        this.provider.completeText(messages, {
          model: this.opts.model,
          temperature: this.opts.temperature ?? 0.3,
          maxOutputTokens: this.opts.maxOutputTokens ?? 2048,
          signal: controller.signal
        }),
        timeout
      ]);
      if (text.trim().length === 0) {
        throw new LlmProviderError(`Empty response from ${this.provider.name}`);
      }
      return text;
    } finally {
      clearTimeout(timer);
    }
  }
}
