import type { CompletionService } from "../../llm/client.js";
import { decodeLlmJson } from "../../llm/normalize.js";
import { REPAIR_SYSTEM_PROMPT, buildRepairPrompt } from "../planning/prompts.js";
import { RepairOutputError, SemanticViolation } from "./errors.js";
import { isRecord } from "./schema.js";

export type PlanShape = {
  stepCount: number;
  actions: Set<string>;
  intentTokens: Set<string>;
};

const intentTokens = (intent: unknown): Set<string> =>
  new Set(
    (typeof intent === "string" ? intent : "")
      .toLowerCase()
      .split(/\s+/)
      .filter((token) => token.length > 0)
  );

export const capturePlanShape = (plan: unknown): PlanShape => {
  const record = isRecord(plan) ? plan : {};
  const steps = Array.isArray(record.steps) ? record.steps : [];
  const actions = new Set<string>();
  steps.forEach((step) => {
    if (isRecord(step) && typeof step.action === "string") actions.add(step.action);
  });
  return { stepCount: steps.length, actions, intentTokens: intentTokens(record.intent) };
};

const sameSet = (a: ReadonlySet<string>, b: ReadonlySet<string>): boolean => a.size === b.size && [...a].every((item) => b.has(item));

const describe = (actions: ReadonlySet<string>): string => `[${[...actions].sort().join(", ")}]`;

/** Throws SemanticViolation when `after` lost the structure of `before`. */
export const assertSemanticsPreserved = (before: PlanShape, after: PlanShape): void => {
  if (after.stepCount !== before.stepCount) {
    throw new SemanticViolation(`step count changed from ${before.stepCount} to ${after.stepCount}`);
  }
  if (!sameSet(before.actions, after.actions)) {
    throw new SemanticViolation(`actions changed from ${describe(before.actions)} to ${describe(after.actions)}`);
  }
  if (before.intentTokens.size > 2 && ![...before.intentTokens].some((token) => after.intentTokens.has(token))) {
    throw new SemanticViolation("intent changed: no word of the original intent survived");
  }
};

// Planner bookkeeping such as _parse_error is not part of the plan the model should see.
const withoutInternalKeys = (plan: unknown): unknown =>
  isRecord(plan) ? Object.fromEntries(Object.entries(plan).filter(([key]) => !key.startsWith("_"))) : plan;

export type RepairPlanFn = (invalidPlan: unknown, originalText: string, errors: string[]) => Promise<unknown>;

/**
 * Asks the completion service to fix formatting only, then checks the answer kept
 * the step count, the action set and at least part of the intent.
 */
export const createPlanRepairer =
  (completion: CompletionService): RepairPlanFn =>
  async (invalidPlan, originalText, errors) => {
    const before = capturePlanShape(invalidPlan);
    const raw = await completion.complete(buildRepairPrompt(withoutInternalKeys(invalidPlan), originalText, errors), REPAIR_SYSTEM_PROMPT);
    const decoded = decodeLlmJson(raw);
    if (!decoded.ok) {
      throw new RepairOutputError(`repair output is not valid JSON: ${decoded.error}`, decoded.text);
    }
    if (!isRecord(decoded.value)) {
      throw new RepairOutputError("repair output is not a JSON object", decoded.text);
    }
    assertSemanticsPreserved(before, capturePlanShape(decoded.value));
    return decoded.value;
  };
