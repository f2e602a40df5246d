export type LlmMessage = { role: "system" | "user"; content: string };

export type LlmCallOptions = {
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  signal?: AbortSignal;
};

export type LlmResponse = {
  text: string;
};

export interface LlmProvider {
  name: string;
  complete(messages: LlmMessage[], opts?: LlmCallOptions): Promise<LlmResponse>;
  completeText(messages: LlmMessage[], opts?: LlmCallOptions): Promise<string>;
}

export abstract class BaseLlmProvider implements LlmProvider {
  abstract name: string;
  abstract complete(messages: LlmMessage[], opts?: LlmCallOptions): Promise<LlmResponse>;

  async completeText(messages: LlmMessage[], opts?: LlmCallOptions): Promise<string> {
    const response = await this.complete(messages, opts);
    return response.text;
  }
}
