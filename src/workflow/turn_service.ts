import type { ExecutionTrace } from "../agent/plan/schema.js";
import type { AgentEventHandler } from "../agent/runtime/events.js";
import type { ResponseGenerator } from "../agent/runtime/responder.js";
import type { RepairPlanFn } from "../agent/plan/repair.js";
import { toolRegistry, type ToolRegistry } from "../agent/tools/registry.js";
import { consoleLogger, type Logger } from "../runtime/logger.js";
import type { TraceSink } from "../runtime/trace.js";
import { KeyedMutex } from "../session/lock.js";
import { DEFAULT_HISTORY_LIMITS, type HistoryLimits, type PersonalizationStore, type SessionStore } from "../session/types.js";
import type { Repositories } from "../store/repositories.js";
import { createTurnGraph, type TurnGraph } from "./graph.js";
import type { PlanGenerator } from "./nodes.js";
import { createInitialState } from "./state.js";

export type TurnServiceOptions = {
  planner: PlanGenerator;
  repair?: RepairPlanFn;
  responder: ResponseGenerator;
  repos: Repositories;
  sessions: SessionStore;
  personalization: PersonalizationStore;
  traces: TraceSink;
  tools?: ToolRegistry;
  limits?: HistoryLimits;
  logger?: Logger;
  onEvent?: AgentEventHandler;
};

export type TurnRequest = { userId: string; sessionId: string; message: string };

export type TurnResponse = {
  response: string;
  trace: ExecutionTrace;
  tracePath: string | null;
};

/** One conversational turn per call; turns for the same (user, session) run one at a time. */
export class TurnService {
  private readonly graph: TurnGraph;
  private readonly mutex = new KeyedMutex();

  constructor(options: TurnServiceOptions) {
    this.graph = createTurnGraph({
      planner: options.planner,
      repair: options.repair,
      responder: options.responder,
      tools: options.tools ?? toolRegistry,
      repos: options.repos,
      sessions: options.sessions,
      personalization: options.personalization,
      traces: options.traces,
      limits: options.limits ?? DEFAULT_HISTORY_LIMITS,
      logger: options.logger ?? consoleLogger,
      onEvent: options.onEvent
    });
  }

  async handle(request: TurnRequest): Promise<TurnResponse> {
    const key = JSON.stringify([request.userId, request.sessionId]);
    return this.mutex.run(key, async () => {
      const state = await this.graph(createInitialState(request));
      return {
        response: state.response ?? "",
        trace: state.trace,
        tracePath: state.tracePath
      };
    });
  }
}
