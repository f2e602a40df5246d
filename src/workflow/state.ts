import { Annotation } from "@langchain/langgraph";
import type { ValidationOutcome } from "../agent/plan/validator.js";
import { createEmptyTrace, type ExecutionTrace, type MessageClass, type SessionContext } from "../agent/plan/schema.js";
import type { ExecutionResult } from "../agent/runtime/executor.js";

export const TurnStateAnnotation = Annotation.Root({
  userId: Annotation<string>,
  sessionId: Annotation<string>,
  message: Annotation<string>,
  messageClass: Annotation<MessageClass>,
  context: Annotation<SessionContext>,
  rawPlan: Annotation<unknown>,
  rawText: Annotation<string>,
  validation: Annotation<ValidationOutcome | null>,
  execution: Annotation<ExecutionResult | null>,
  response: Annotation<string | null>,
  trace: Annotation<ExecutionTrace>,
  tracePath: Annotation<string | null>
});

export type TurnState = typeof TurnStateAnnotation.State;

export const createInitialState = (args: { userId: string; sessionId: string; message: string }): TurnState => ({
  userId: args.userId,
  sessionId: args.sessionId,
  message: args.message,
  messageClass: "task",
  context: {},
  rawPlan: null,
  rawText: "",
  validation: null,
  execution: null,
  response: null,
  trace: createEmptyTrace(),
  tracePath: null
});
