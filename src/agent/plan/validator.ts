import { consoleLogger, type Logger } from "../../runtime/logger.js";
import { tokenSet } from "../../utils/text.js";
import { TOOL_REQUIREMENTS, type ToolRequirements } from "../tools/catalog.js";
import { SemanticViolation } from "./errors.js";
import { hasProductSignal, hasSizeSignal, inferCategory, inferGender } from "./intent.js";
import type { RepairPlanFn } from "./repair.js";
import { agentPlanSchema, createFallbackPlan, isRecord, type AgentPlan, type PlanStep } from "./schema.js";

export type ValidationOutcome = {
  valid: boolean;
  plan: AgentPlan;
  errors: string[];
  /** The plan that passed is the repaired one. */
  repaired: boolean;
  repairAttempted: boolean;
  /** The structural errors that sent the plan to repair. */
  repairReason: string | null;
};

export type ValidatePlanInput = {
  rawPlan: unknown;
  rawText: string;
  userMessage: string;
  requirements?: ToolRequirements;
  repair?: RepairPlanFn;
  logger?: Logger;
};

const hasAction = (steps: unknown[], action: string): boolean =>
  steps.some((step) => isRecord(step) && step.action === action);

/**
 * Adds the steps a message obviously needs but the plan forgot: a trailing
 * check_inventory for size or stock questions, a leading recommend_products for
 * browsing. Returns the input untouched when it is not an object with a steps array.
 */
export const enforceIntent = (rawPlan: unknown, userMessage: string): unknown => {
  if (!isRecord(rawPlan) || !Array.isArray(rawPlan.steps)) return rawPlan;

  const tokens = tokenSet(userMessage);
  let steps: unknown[] = [...rawPlan.steps];
  let forceSideEffects = false;

  if (hasSizeSignal(tokens) && !hasAction(steps, "check_inventory")) {
    steps = [...steps, { action: "check_inventory", params: {} }];
  }

  if (hasProductSignal(tokens) && !hasAction(steps, "recommend_products")) {
    const gender = inferGender(tokens);
    const params: Record<string, unknown> = { category: inferCategory(tokens) };
    if (gender) params.gender = gender;
    steps = [{ action: "recommend_products", params }, ...steps];
    forceSideEffects = true;
  }

  if (steps.length === rawPlan.steps.length) return rawPlan;
  return forceSideEffects ? { ...rawPlan, steps, needs_side_effects: true } : { ...rawPlan, steps };
};

const knownActions = (requirements: ToolRequirements): string => Object.keys(requirements).sort().join(", ");

type StepCheck = { ok: true; step: PlanStep } | { ok: false; error: string };

const checkStep = (step: unknown, index: number, requirements: ToolRequirements): StepCheck => {
  if (!isRecord(step)) return { ok: false, error: `Step ${index} must be an object` };
  const action = step.action;
  if (typeof action !== "string" || action.length === 0) return { ok: false, error: `Step ${index} missing required field: action` };

  const required = requirements[action];
  if (!required) {
    return { ok: false, error: `Step ${index} has invalid action '${action}'. Available: ${knownActions(requirements)}` };
  }

  if (!("params" in step)) return { ok: false, error: `Step ${index} missing required field: params` };
  const params = step.params;
  if (!isRecord(params)) return { ok: false, error: `Step ${index} params must be an object` };

  const missing = required.filter((name) => !(name in params));
  if (missing.length > 0) {
    return { ok: false, error: `Step ${index} (action: ${action}) missing required parameters: ${missing.join(", ")}` };
  }
  return { ok: true, step: { action, params } };
};

export type PlanCheck = { ok: true; plan: AgentPlan } | { ok: false; errors: string[] };

/** Structural checks in order: object, required fields, steps, each step against the catalog. */
export const checkPlan = (value: unknown, requirements: ToolRequirements = TOOL_REQUIREMENTS): PlanCheck => {
  if (!isRecord(value)) return { ok: false, errors: ["Plan must be an object"] };

  const errors: string[] = [];
  if (typeof value._parse_error === "string") errors.push(`Planner output was not valid JSON: ${value._parse_error}`);
  (["intent", "steps", "response_style"] as const).forEach((field) => {
    if (!(field in value)) errors.push(`Missing required field: ${field}`);
  });
  if ("intent" in value && typeof value.intent !== "string") errors.push("intent must be a string");
  if ("response_style" in value && typeof value.response_style !== "string") errors.push("response_style must be a string");
  if ("needs_side_effects" in value && typeof value.needs_side_effects !== "boolean") {
    errors.push("needs_side_effects must be a boolean");
  }

  const steps: PlanStep[] = [];
  if ("steps" in value) {
    if (!Array.isArray(value.steps)) {
      errors.push("steps must be an array");
    } else {
      value.steps.forEach((step: unknown, index: number) => {
        const checked = checkStep(step, index, requirements);
        if (checked.ok) steps.push(checked.step);
        else errors.push(checked.error);
      });
    }
  }
  if (errors.length > 0) return { ok: false, errors };

  const parsed = agentPlanSchema.safeParse({
    intent: value.intent,
    steps,
    response_style: value.response_style,
    needs_side_effects: typeof value.needs_side_effects === "boolean" ? value.needs_side_effects : steps.length > 0
  });
  if (!parsed.success) {
    return { ok: false, errors: parsed.error.issues.map((issue) => issue.message) };
  }
  return { ok: true, plan: parsed.data };
};

const errorText = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Validates untrusted planner output. Structural failures go through one repair
 * round when the raw text is available; anything still invalid yields the
 * fallback plan.
 */
export const validatePlan = async (input: ValidatePlanInput): Promise<ValidationOutcome> => {
  const requirements = input.requirements ?? TOOL_REQUIREMENTS;
  const logger = input.logger ?? consoleLogger;
  const enforced = enforceIntent(input.rawPlan, input.userMessage);

  const first = checkPlan(enforced, requirements);
  if (first.ok) {
    return { valid: true, plan: first.plan, errors: [], repaired: false, repairAttempted: false, repairReason: null };
  }

  const fallback = (errors: string[], repairAttempted: boolean): ValidationOutcome => ({
    valid: false,
    plan: createFallbackPlan(),
    errors,
    repaired: false,
    repairAttempted,
    repairReason: repairAttempted ? first.errors.join("; ") : null
  });

  if (!input.repair || input.rawText.trim().length === 0) {
    return fallback(first.errors, false);
  }

  let fixed: unknown;
  try {
    fixed = await input.repair(enforced, input.rawText, first.errors);
  } catch (error) {
    const reason =
      error instanceof SemanticViolation ? `Repair violated constraints: ${error.message}` : `Repair failed: ${errorText(error)}`;
    logger.warn(`[validator] ${reason}`);
    return fallback([...first.errors, reason], true);
  }

  // Second pass has no repair, so it cannot recurse.
  const second = await validatePlan({ ...input, rawPlan: fixed, rawText: "", repair: undefined });
  if (second.valid) {
    return { ...second, repaired: true, repairAttempted: true, repairReason: first.errors.join("; ") };
  }
  return fallback([...first.errors, ...second.errors.map((error) => `Repair fix failed: ${error}`)], true);
};
