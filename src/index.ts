export { createRetailAgent, createStores, type RetailAgent } from "./app.js";
export { loadConfig, ConfigError, type AppConfig } from "./config/settings.js";
export { loadEnvFile } from "./config/loadEnv.js";
export {
  agentPlanSchema,
  createFallbackPlan,
  FALLBACK_INTENT,
  type AgentPlan,
  type ExecutionStepResult,
  type ExecutionTrace,
  type MessageClass,
  type PlanStep,
  type SessionContext
} from "./agent/plan/schema.js";
export { checkPlan, enforceIntent, validatePlan, type ValidationOutcome } from "./agent/plan/validator.js";
export { createPlanRepairer, assertSemanticsPreserved, capturePlanShape, type RepairPlanFn } from "./agent/plan/repair.js";
export { SemanticViolation, RepairOutputError } from "./agent/plan/errors.js";
export { classifyMessage, hasProductSignal, hasSizeSignal, inferCategory, inferGender } from "./agent/plan/intent.js";
export { Planner } from "./agent/planning/planner.js";
export { executePlan, fallbackResponse, type ExecutionResult } from "./agent/runtime/executor.js";
export { resolvePlaceholders, resolveStepParams } from "./agent/runtime/resolver.js";
export { LlmResponder, type ResponseGenerator } from "./agent/runtime/responder.js";
export type { AgentEvent } from "./agent/runtime/events.js";
export { UnknownUserError } from "./agent/runtime/errors.js";
export { TOOL_NAMES, TOOL_REQUIREMENTS, TOOL_ALLOWED_PARAMS, toolRegistry, type ToolName, type ToolRegistry } from "./agent/tools/index.js";
export { CompletionClient, type CompletionService } from "./llm/client.js";
export { LlmConfigError, LlmProviderError, LlmTimeoutError } from "./llm/errors.js";
export type { LlmProvider } from "./llm/provider.js";
export { MockProvider } from "./llm/providers/mock.js";
export { OpenAIResponsesProvider } from "./llm/providers/openai_responses.js";
export * from "./session/index.js";
export { openDatabase, seedDatabase } from "./store/database.js";
export { createRepositories, type Repositories } from "./store/repositories.js";
export { TraceRecorder, type TraceSink } from "./runtime/trace.js";
export { TurnService, type TurnRequest, type TurnResponse } from "./workflow/turn_service.js";
