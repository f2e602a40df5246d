// Runs validated plans step by step; one failing step never aborts the run.
import { consoleLogger, type Logger } from "../../runtime/logger.js";
import { boundContext } from "../../session/bound.js";
import { DEFAULT_HISTORY_LIMITS, type HistoryLimits, type SessionStore } from "../../session/types.js";
import type { ProductLookup } from "../../store/repositories.js";
import { truncate } from "../../utils/text.js";
import type { AgentPlan, ExecutionStepResult, HistoryTurn, MessageClass, SessionContext, TraceTurn } from "../plan/schema.js";
import { isRecord } from "../plan/schema.js";
import { isToolName } from "../tools/catalog.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { ToolRunContext } from "../tools/types.js";
import type { AgentEventHandler } from "./events.js";
import { resolveStepParams } from "./resolver.js";
import type { ResponseGenerator } from "./responder.js";

export type ExecutorDeps = {
  tools: ToolRegistry;
  toolContext: ToolRunContext;
  sessions: SessionStore;
  responder: ResponseGenerator;
  productLookup?: ProductLookup;
  limits?: HistoryLimits;
  logger?: Logger;
  onEvent?: AgentEventHandler;
};

export type ExecutePlanInput = {
  plan: AgentPlan;
  sessionId: string;
  userId: string;
  userMessage: string;
  /** Skips the session-store read when supplied. */
  sessionContext?: SessionContext;
  messageClass?: MessageClass;
};

export type ExecutionResult = {
  response: string;
  execution_steps: ExecutionStepResult[];
  context: SessionContext;
  responseFallback: boolean;
  persisted: boolean;
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/** Used when the response generator fails; never includes error detail. */
export const fallbackResponse = (plan: AgentPlan, steps: readonly ExecutionStepResult[]): string => {
  const successful = steps.filter((step) => step.success);
  if (successful.length === 0) {
    return "I worked on your request but couldn't put together a detailed answer. Please try again.";
  }
  const inventory = successful.find((step) => step.step === "check_inventory" && isRecord(step.result));
  if (inventory && isRecord(inventory.result)) {
    if (inventory.result.available === true) {
      return `The product is available, with quantity ${String(inventory.result.quantity)} at location ${String(inventory.result.location)}.`;
    }
    return "I'm sorry, but this product is currently out of stock.";
  }
  return `I've processed your request about '${plan.intent}'.`;
};

/** Looked up fresh each turn; never written back to the session. */
export const TURN_ONLY_CONTEXT_KEYS = ["personalization", "user_profile"] as const;

const withoutTurnOnlyKeys = (context: SessionContext): SessionContext => {
  const kept: SessionContext = { ...context };
  TURN_ONLY_CONTEXT_KEYS.forEach((key) => {
    delete kept[key];
  });
  return kept;
};

const appendTo = <T>(value: unknown, entry: T): unknown[] => [...(Array.isArray(value) ? value : []), entry];

const runStep = async (
  action: string,
  params: Record<string, unknown>,
  input: ExecutePlanInput,
  context: SessionContext,
  previous: readonly ExecutionStepResult[],
  deps: ExecutorDeps
): Promise<ExecutionStepResult> => {
  if (!isToolName(action)) {
    return { step: action, success: false, params, result: null, error: `Tool '${action}' not found` };
  }

  const resolved = resolveStepParams({
    action,
    params,
    sessionId: input.sessionId,
    userId: input.userId,
    context,
    previousResults: previous,
    productLookup: deps.productLookup,
    logger: deps.logger
  });
  if (!resolved.ok) {
    return { step: action, success: false, params: resolved.params, result: null, error: resolved.error };
  }

  try {
    const result = await deps.tools[action].invoke(resolved.params, deps.toolContext);
    if (!result.ok) {
      return { step: action, success: false, params: resolved.params, result: null, error: result.error?.message ?? `${action} failed` };
    }
    return { step: action, success: true, params: resolved.params, result: result.data ?? null, error: null };
  } catch (error) {
    return { step: action, success: false, params: resolved.params, result: null, error: truncate(describeError(error), 1000) };
  }
};

/** LOAD_CONTEXT, then RESOLVE/DISPATCH/RECORD per step, then RESPOND and PERSIST. */
export const executePlan = async (input: ExecutePlanInput, deps: ExecutorDeps): Promise<ExecutionResult> => {
  const logger = deps.logger ?? consoleLogger;
  const emit = deps.onEvent ?? (() => undefined);

  let context: SessionContext = {};
  if (input.sessionContext) {
    context = { ...input.sessionContext };
  } else {
    try {
      context = await deps.sessions.get(input.userId, input.sessionId);
    } catch (error) {
      logger.warn(`[executor] could not load session context for ${input.userId}/${input.sessionId}: ${describeError(error)}`);
    }
  }

  const steps: ExecutionStepResult[] = [];
  for (const [index, step] of input.plan.steps.entries()) {
    emit({ type: "step_start", index, action: step.action });
    const outcome = await runStep(step.action, step.params, input, context, steps, deps);
    steps.push(outcome);
    if (outcome.success) context[`step_${index}_result`] = outcome.result;
    emit({ type: "step_end", index, action: step.action, ok: outcome.success, note: outcome.error ?? undefined });
  }

  let response: string;
  let responseFallback = false;
  try {
    response = await deps.responder.generate({
      userMessage: input.userMessage,
      plan: input.plan,
      steps,
      context,
      messageClass: input.messageClass
    });
  } catch (error) {
    logger.warn(`[executor] response generation failed: ${describeError(error)}`);
    response = fallbackResponse(input.plan, steps);
    responseFallback = true;
  }
  emit({ type: "responded", fallback: responseFallback });

  const historyTurn: HistoryTurn = { user: input.userMessage, intent: input.plan.intent, response };
  const traceTurn: TraceTurn = { intent: input.plan.intent, steps };
  context = boundContext(
    {
      ...withoutTurnOnlyKeys(context),
      last_message: input.userMessage,
      last_intent: input.plan.intent,
      message_history: appendTo(context.message_history, historyTurn),
      trace_history: appendTo(context.trace_history, traceTurn)
    },
    deps.limits ?? DEFAULT_HISTORY_LIMITS
  );

  let persisted = true;
  try {
    await deps.sessions.put(input.userId, input.sessionId, context);
  } catch (error) {
    persisted = false;
    logger.warn(`[executor] could not save session context for ${input.userId}/${input.sessionId}: ${describeError(error)}`);
  }
  emit({ type: "persisted", ok: persisted });

  return { response, execution_steps: steps, context, responseFallback, persisted };
};
