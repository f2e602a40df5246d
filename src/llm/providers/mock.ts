import { BaseLlmProvider, type LlmCallOptions, type LlmMessage, type LlmResponse } from "../provider.js";

export type MockOutput = string | Error | ((messages: LlmMessage[]) => string);

/** Replays scripted outputs in order; an Error entry is thrown instead of returned. */
export class MockProvider extends BaseLlmProvider {
  name = "mock";
  readonly calls: LlmMessage[][] = [];
  private readonly outputs: MockOutput[];

  constructor(outputs: MockOutput[]) {
    super();
    this.outputs = [...outputs];
  }

  async complete(messages: LlmMessage[], _opts?: LlmCallOptions): Promise<LlmResponse> {
    this.calls.push(messages);
    const next = this.outputs.shift();
    if (next === undefined) {
      throw new Error("MockProvider outputs exhausted");
    }
    if (next instanceof Error) throw next;
    const text = typeof next === "function" ? next(messages) : next;
    return { text };
  }
}
