import type { CompletionService } from "../../llm/client.js";
import { decodeLlmJson } from "../../llm/normalize.js";
import { isRecord, type SessionContext } from "../plan/schema.js";
import { buildPlannerSystemPrompt } from "./prompts.js";

export const PARSE_ERROR_INTENT = "parse error";

export type PlannerInput = {
  message: string;
  userId: string;
  sessionId: string;
  context: SessionContext;
};

export type PlannerOutput = {
  rawPlan: unknown;
  rawText: string;
};

const HISTORY_TURNS = 10;
const HISTORY_CHARS = 500;

/** The slice of session state the planner sees. */
export const plannerContext = (context: SessionContext): Record<string, unknown> => {
  const essential: Record<string, unknown> = {};
  (["last_message", "last_intent", "user_profile"] as const).forEach((key) => {
    if (context[key] !== undefined) essential[key] = context[key];
  });

  const personalization = isRecord(context.personalization) ? context.personalization : {};
  essential.personalization = personalization;
  if (personalization.gender !== undefined) essential.user_gender = personalization.gender;
  if (personalization.preferred_size !== undefined) essential.user_preferred_size = personalization.preferred_size;

  const history = Array.isArray(context.message_history) ? context.message_history : [];
  if (history.length > 0) {
    essential.conversation_history = history.slice(-HISTORY_TURNS).flatMap((turn: unknown) =>
      isRecord(turn)
        ? [
            {
              user: String(turn.user ?? "").slice(0, HISTORY_CHARS),
              response: String(turn.response ?? "").slice(0, HISTORY_CHARS),
              intent: String(turn.intent ?? "")
            }
          ]
        : []
    );
  }
  return essential;
};

export const buildPlannerPrompt = (input: PlannerInput): string =>
  [
    `User Message: ${JSON.stringify(input.message)}`,
    `User ID: ${input.userId}`,
    `Session ID: ${input.sessionId}`,
    "",
    "Context:",
    JSON.stringify(plannerContext(input.context), null, 2),
    "",
    "Extract category, gender, product type, size and price range from the message, fill gaps from personalization and history, then call tools.",
    "Generate a JSON action plan."
  ].join("\n");

export class Planner {
  constructor(private readonly completion: CompletionService) {}

  /** Undecodable output becomes a placeholder plan so validation routes it to repair with the raw text. */
  async generatePlan(input: PlannerInput): Promise<PlannerOutput> {
    const rawText = await this.completion.complete(buildPlannerPrompt(input), buildPlannerSystemPrompt());
    const decoded = decodeLlmJson(rawText);
    if (decoded.ok) return { rawPlan: decoded.value, rawText };
    return {
      rawPlan: {
        intent: PARSE_ERROR_INTENT,
        steps: [],
        response_style: "professional",
        _parse_error: decoded.error
      },
      rawText
    };
  }
}
