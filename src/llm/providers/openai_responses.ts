import { LlmConfigError, LlmProviderError } from "../errors.js";
import { BaseLlmProvider, type LlmCallOptions, type LlmMessage, type LlmResponse } from "../provider.js";
import { parseResponsesOutput } from "../responses/parse.js";

export type OpenAIResponsesConfig = {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
};

type ResponseInputItem = {
  type: "message";
  role: LlmMessage["role"];
  content: Array<{ type: "input_text"; text: string }>;
};

const toInputItems = (messages: LlmMessage[]): ResponseInputItem[] =>
  messages.map((message) => ({
    type: "message",
    role: message.role,
    content: [{ type: "input_text", text: message.content }]
  }));

export class OpenAIResponsesProvider extends BaseLlmProvider {
  name = "openai_responses";
  private readonly baseUrl: string;
  private readonly model: string;

  constructor(private readonly config: OpenAIResponsesConfig) {
    super();
    this.baseUrl = (config.baseUrl || "https://api.openai.com/v1").replace(/\/$/, "");
    this.model = config.model || "gpt-4.1-mini";
  }

  private toRequestBody(messages: LlmMessage[], opts?: LlmCallOptions): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: opts?.model || this.model,
      input: toInputItems(messages)
    };
    if (typeof opts?.temperature === "number") body.temperature = opts.temperature;
    if (typeof opts?.maxOutputTokens === "number") body.max_output_tokens = opts.maxOutputTokens;
    return body;
  }

  async complete(messages: LlmMessage[], opts?: LlmCallOptions): Promise<LlmResponse> {
    if (!this.config.apiKey) {
      throw new LlmConfigError("OPENAI_API_KEY is required for the OpenAI Responses provider");
    }

    const response = await fetch(`${this.baseUrl}/responses`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.config.apiKey}`,
        "Content-Type": "application/json"
      },
      body: JSON.stringify(this.toRequestBody(messages, opts)),
      signal: opts?.signal
    });

    if (!response.ok) {
      const text = await response.text();
      throw new LlmProviderError(`OpenAI Responses API error ${response.status}: ${text.slice(0, 500)}`, response.status);
    }

    const raw: unknown = await response.json();
    const parsed = parseResponsesOutput(raw);
    if (parsed.refusals.length > 0 && parsed.text.length === 0) {
      throw new LlmProviderError(`Model refused: ${parsed.refusals.join(" | ")}`, 422);
    }

    return { text: parsed.text };
  }
}
