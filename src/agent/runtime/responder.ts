import type { CompletionService } from "../../llm/client.js";
import { consoleLogger, type Logger } from "../../runtime/logger.js";
import { truncate } from "../../utils/text.js";
import { classifyMessage, mentionsCatalogIds } from "../plan/intent.js";
import type { AgentPlan, ExecutionStepResult, MessageClass, SessionContext } from "../plan/schema.js";
import { isRecord } from "../plan/schema.js";
import { RESPONSE_SYSTEM_PROMPT, SMALL_TALK_SYSTEM_PROMPT } from "../planning/prompts.js";

export const SMALL_TALK_FALLBACK = "I'm doing well, thanks for asking! How can I help you with your shopping today?";

export const CAPABILITIES_REPLY =
  "I might not be able to do exactly that yet, but I can help you check whether items are in stock, suggest products, look up your loyalty benefits, estimate order totals and explore delivery or pickup options.";

export const NO_RESULTS_APOLOGY =
  "I tried to process your request but ran into an unexpected issue. Please try again or rephrase your question.";

const CHAT_INTENTS = new Set(["", "small_talk", "general_chat"]);

export type ResponseInput = {
  userMessage: string;
  plan: AgentPlan;
  steps: readonly ExecutionStepResult[];
  context: SessionContext;
  messageClass?: MessageClass;
};

export interface ResponseGenerator {
  generate(input: ResponseInput): Promise<string>;
}

type CompactTurn = { user: string; response: string; intent: string };

export const compactHistory = (history: unknown, maxItems = 10, maxChars = 400): CompactTurn[] => {
  if (!Array.isArray(history)) return [];
  return history.slice(-maxItems).flatMap((turn: unknown) =>
    isRecord(turn)
      ? [
          {
            user: String(turn.user ?? "").slice(0, maxChars),
            response: String(turn.response ?? "").slice(0, maxChars),
            intent: String(turn.intent ?? "")
          }
        ]
      : []
  );
};

/** Second completion call: phrases tool results for the user. Business facts stay in the tools. */
export class LlmResponder implements ResponseGenerator {
  constructor(
    private readonly completion: CompletionService,
    private readonly logger: Logger = consoleLogger
  ) {}

  async generate(input: ResponseInput): Promise<string> {
    const messageClass = input.messageClass ?? classifyMessage(input.userMessage);
    if (messageClass === "small_talk") return this.smallTalk(input);

    const intent = input.plan.intent.toLowerCase();
    if (intent === "unsupported_request") return CAPABILITIES_REPLY;

    const results = input.steps.map((step) => ({
      action: step.step,
      success: step.success,
      params: step.params,
      result: step.result,
      error: step.error
    }));
    const successful = results.filter((result) => result.success);
    if (successful.length === 0 && !CHAT_INTENTS.has(intent)) return NO_RESULTS_APOLOGY;

    const prompt = [
      "User message:",
      input.userMessage,
      "",
      "Intent:",
      input.plan.intent,
      "",
      `Response style: ${input.plan.response_style}`,
      "",
      "Tool results (JSON, for your reference only):",
      truncate(JSON.stringify(successful.length > 0 ? successful : results, null, 2), 12000),
      "",
      "Context summary:",
      JSON.stringify({ last_intent: input.context.last_intent ?? null, last_message: input.context.last_message ?? null }, null, 2),
      "",
      `User explicitly mentioned product/sku IDs: ${mentionsCatalogIds(input.userMessage)}`,
      "",
      "Recent conversation (most recent last):",
      JSON.stringify(compactHistory(input.context.message_history), null, 2),
      "",
      "Now respond to the user. Do not reveal raw JSON or internal structures."
    ].join("\n");

    return (await this.completion.complete(prompt, RESPONSE_SYSTEM_PROMPT)).trim();
  }

  private async smallTalk(input: ResponseInput): Promise<string> {
    const lastMessage = typeof input.context.last_message === "string" ? input.context.last_message : "";
    const prompt = `User: ${input.userMessage}\n\nPrevious message from this user (if any): ${lastMessage}\n\nReply naturally, as a human assistant would.`;
    try {
      return (await this.completion.complete(prompt, SMALL_TALK_SYSTEM_PROMPT)).trim();
    } catch (error) {
      this.logger.warn(`[responder] small talk completion failed: ${error instanceof Error ? error.message : String(error)}`);
      return SMALL_TALK_FALLBACK;
    }
  }
}
