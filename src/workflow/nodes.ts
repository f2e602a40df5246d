import { classifyMessage } from "../agent/plan/intent.js";
import type { RepairPlanFn } from "../agent/plan/repair.js";
import type { SessionContext } from "../agent/plan/schema.js";
import { validatePlan } from "../agent/plan/validator.js";
import type { PlannerInput, PlannerOutput } from "../agent/planning/planner.js";
import {
  ACCOUNT_NOT_FOUND_REPLY,
  INVALID_PLAN_REPLY,
  UPSTREAM_FAILURE_REPLY,
  UnknownUserError
} from "../agent/runtime/errors.js";
import type { AgentEventHandler } from "../agent/runtime/events.js";
import { executePlan } from "../agent/runtime/executor.js";
import type { ResponseGenerator } from "../agent/runtime/responder.js";
import type { ToolRegistry } from "../agent/tools/registry.js";
import type { ToolRunContext } from "../agent/tools/types.js";
import type { Logger } from "../runtime/logger.js";
import type { TraceSink } from "../runtime/trace.js";
import type { HistoryLimits, PersonalizationStore, SessionStore } from "../session/types.js";
import type { Repositories } from "../store/repositories.js";
import type { TurnState } from "./state.js";

export interface PlanGenerator {
  generatePlan(input: PlannerInput): Promise<PlannerOutput>;
}

export type TurnDeps = {
  planner: PlanGenerator;
  repair?: RepairPlanFn;
  responder: ResponseGenerator;
  tools: ToolRegistry;
  repos: Repositories;
  sessions: SessionStore;
  personalization: PersonalizationStore;
  traces: TraceSink;
  limits: HistoryLimits;
  logger: Logger;
  onEvent?: AgentEventHandler;
};

export type TurnNode = (state: TurnState) => Promise<Partial<TurnState>>;

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const createTurnNodes = (deps: TurnDeps): Record<"load_context" | "plan" | "validate" | "execute" | "reject" | "record_trace", TurnNode> => {
  const toolContext: ToolRunContext = {
    repos: deps.repos,
    sessions: deps.sessions,
    personalization: deps.personalization,
    traces: deps.traces,
    logger: deps.logger
  };

  const load_context: TurnNode = async (state) => {
    const messageClass = classifyMessage(state.message);
    const trace = { ...state.trace, message_class: messageClass };

    const profile = deps.repos.users.find(state.userId);
    if (!profile) {
      const error = new UnknownUserError(state.userId);
      return { messageClass, response: ACCOUNT_NOT_FOUND_REPLY, trace: { ...trace, errors: [...trace.errors, error.message] } };
    }

    let session: SessionContext = {};
    try {
      session = await deps.sessions.get(state.userId, state.sessionId);
    } catch (error) {
      deps.logger.warn(`[turn] session context unavailable for ${state.userId}/${state.sessionId}: ${describe(error)}`);
    }

    let personalization: Record<string, unknown> = {};
    try {
      personalization = await deps.personalization.get(state.userId);
    } catch (error) {
      deps.logger.warn(`[turn] personalization unavailable for ${state.userId}: ${describe(error)}`);
    }

    return { messageClass, trace, context: { ...session, personalization, user_profile: profile } };
  };

  const plan: TurnNode = async (state) => {
    try {
      const output = await deps.planner.generatePlan({
        message: state.message,
        userId: state.userId,
        sessionId: state.sessionId,
        context: state.context
      });
      return { rawPlan: output.rawPlan, rawText: output.rawText };
    } catch (error) {
      deps.logger.error(`[turn] planner failed: ${describe(error)}`);
      return { response: UPSTREAM_FAILURE_REPLY, trace: { ...state.trace, errors: [...state.trace.errors, `planner: ${describe(error)}`] } };
    }
  };

  const validate: TurnNode = async (state) => {
    const outcome = await validatePlan({
      rawPlan: state.rawPlan,
      rawText: state.rawText,
      userMessage: state.message,
      repair: deps.repair,
      logger: deps.logger
    });
    deps.onEvent?.({
      type: "plan_validated",
      intent: outcome.plan.intent,
      stepCount: outcome.plan.steps.length,
      valid: outcome.valid,
      repaired: outcome.repaired,
      messageClass: state.messageClass
    });
    return {
      validation: outcome,
      trace: {
        ...state.trace,
        plan: outcome.plan,
        validation_passed: outcome.valid,
        validation_errors: outcome.errors,
        repair_used: outcome.repairAttempted,
        repair_reason: outcome.repairReason
      }
    };
  };

  const execute: TurnNode = async (state) => {
    if (!state.validation) return { response: INVALID_PLAN_REPLY };
    try {
      const execution = await executePlan(
        {
          plan: state.validation.plan,
          sessionId: state.sessionId,
          userId: state.userId,
          userMessage: state.message,
          sessionContext: state.context,
          messageClass: state.messageClass
        },
        {
          tools: deps.tools,
          toolContext,
          sessions: deps.sessions,
          responder: deps.responder,
          productLookup: deps.repos.products,
          limits: deps.limits,
          logger: deps.logger,
          onEvent: deps.onEvent
        }
      );
      const stepErrors = execution.execution_steps.flatMap((step) => (step.error ? [`${step.step}: ${step.error}`] : []));
      return {
        execution,
        response: execution.response,
        trace: { ...state.trace, execution_steps: execution.execution_steps, errors: [...state.trace.errors, ...stepErrors] }
      };
    } catch (error) {
      deps.logger.error(`[turn] execution failed: ${describe(error)}`);
      return { response: UPSTREAM_FAILURE_REPLY, trace: { ...state.trace, errors: [...state.trace.errors, `executor: ${describe(error)}`] } };
    }
  };

  const reject: TurnNode = async () => ({ response: INVALID_PLAN_REPLY });

  const record_trace: TurnNode = async (state) => ({
    tracePath: await deps.traces.record({
      user_id: state.userId,
      session_id: state.sessionId,
      user_message: state.message,
      response: state.response,
      ...state.trace
    })
  });

  return { load_context, plan, validate, execute, reject, record_trace };
};
