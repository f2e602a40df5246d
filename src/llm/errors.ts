export class LlmConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LlmConfigError";
  }
}

export class LlmTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`LLM request timed out after ${timeoutMs}ms`);
    this.name = "LlmTimeoutError";
  }
}

export class LlmProviderError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = "LlmProviderError";
  }

  get transient(): boolean {
    if (this.status === undefined) return true;
    return this.status === 408 || this.status === 429 || this.status >= 500;
  }
}

// Config and 4xx failures are final; timeouts, network errors and 429/5xx get one more try.
export const isTransientLlmError = (error: unknown): boolean => {
  if (error instanceof LlmConfigError) return false;
  if (error instanceof LlmTimeoutError) return true;
  if (error instanceof LlmProviderError) return error.transient;
  if (error instanceof TypeError) return true;
  return false;
};

export const errorMessage = (error: unknown, fallback = "unknown error"): string =>
  error instanceof Error ? error.message : typeof error === "string" ? error : fallback;
