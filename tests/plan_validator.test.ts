import { describe, expect, test } from "vitest";
import { SemanticViolation } from "../src/agent/plan/errors.js";
import { createPlanRepairer } from "../src/agent/plan/repair.js";
import { FALLBACK_INTENT } from "../src/agent/plan/schema.js";
import { checkPlan, enforceIntent, validatePlan } from "../src/agent/plan/validator.js";
import { TOOL_NAMES } from "../src/agent/tools/catalog.js";
import { silentLogger } from "../src/runtime/logger.js";
import { ScriptedCompletion } from "./helpers/fixtures.js";

const orderPlan = () => ({
  intent: "check order total",
  steps: [
    { action: "get_orders", params: { user_id: "extracted_from_context" } },
    { action: "apply_offers", params: { cart: [] } }
  ],
  response_style: "concise"
});

const MISSING_TIER = "Step 1 (action: apply_offers) missing required parameters: loyalty_tier";

describe("checkPlan", () => {
  test("rejects non-objects and missing fields", () => {
    expect(checkPlan("plan")).toEqual({ ok: false, errors: ["Plan must be an object"] });
    expect(checkPlan({})).toEqual({
      ok: false,
      errors: ["Missing required field: intent", "Missing required field: steps", "Missing required field: response_style"]
    });
  });

  test("reports each bad step by index", () => {
    const result = checkPlan({
      intent: "x",
      response_style: "y",
      steps: ["nope", { params: {} }, { action: "fly", params: {} }, { action: "get_orders" }, { action: "get_orders", params: [] }]
    });
    expect(result).toEqual({
      ok: false,
      errors: [
        "Step 0 must be an object",
        "Step 1 missing required field: action",
        `Step 2 has invalid action 'fly'. Available: ${[...TOOL_NAMES].sort().join(", ")}`,
        "Step 3 missing required field: params",
        "Step 4 params must be an object"
      ]
    });
  });

  test("defaults needs_side_effects from the steps", () => {
    const result = checkPlan({ intent: "orders", steps: [{ action: "get_orders", params: { user_id: "U-1" } }], response_style: "brief" });
    expect(result.ok && result.plan.needs_side_effects).toBe(true);
  });

  test("side effects without steps are rejected", () => {
    expect(checkPlan({ intent: "x", steps: [], response_style: "y", needs_side_effects: true })).toEqual({
      ok: false,
      errors: ["needs_side_effects is true but the plan has no steps"]
    });
  });

  test("a parse-error placeholder never passes", () => {
    expect(checkPlan({ intent: "parse error", steps: [], response_style: "professional", _parse_error: "Unexpected token" })).toEqual({
      ok: false,
      errors: ["Planner output was not valid JSON: Unexpected token"]
    });
  });
});

describe("enforceIntent", () => {
  test("browsing without recommend_products gets one up front", () => {
    const raw = { intent: "browse", steps: [], response_style: "friendly", needs_side_effects: false };
    expect(enforceIntent(raw, "find me female clothing")).toEqual({
      intent: "browse",
      steps: [{ action: "recommend_products", params: { category: "Women's Fashion", gender: "female" } }],
      response_style: "friendly",
      needs_side_effects: true
    });
    expect(raw.steps).toEqual([]);
  });

  test("size questions get a trailing check_inventory", () => {
    const raw = { intent: "size", steps: [{ action: "get_user_profile", params: { user_id: "U-1" } }], response_style: "x" };
    const enforced = enforceIntent(raw, "do you have it in size M?");
    expect(enforced).toEqual({ ...raw, steps: [...raw.steps, { action: "check_inventory", params: {} }] });
  });

  test("plans that already cover the message are returned as is", () => {
    const raw = { intent: "browse", steps: [{ action: "recommend_products", params: { category: "Fashion" } }], response_style: "x" };
    expect(enforceIntent(raw, "show me jackets")).toBe(raw);
    expect(enforceIntent("not a plan", "show me jackets")).toBe("not a plan");
  });
});

describe("validatePlan", () => {
  test("valid plans pass without repair", async () => {
    const outcome = await validatePlan({ rawPlan: { ...orderPlan(), steps: [orderPlan().steps[0]] }, rawText: "{}", userMessage: "my orders" });
    expect(outcome).toMatchObject({ valid: true, errors: [], repaired: false, repairAttempted: false });
  });

  test("female clothing request yields a forced recommendation", async () => {
    const outcome = await validatePlan({
      rawPlan: { intent: "browse clothing", steps: [], response_style: "friendly", needs_side_effects: false },
      rawText: "",
      userMessage: "find me female clothing"
    });
    expect(outcome.valid).toBe(true);
    expect(outcome.plan.needs_side_effects).toBe(true);
    expect(outcome.plan.steps[0]).toEqual({ action: "recommend_products", params: { category: "Women's Fashion", gender: "female" } });
  });

  test("without a repair function invalid plans fall back", async () => {
    const outcome = await validatePlan({ rawPlan: orderPlan(), rawText: "raw", userMessage: "what is my order total" });
    expect(outcome).toEqual({
      valid: false,
      plan: { intent: FALLBACK_INTENT, steps: [], response_style: "professional", needs_side_effects: false },
      errors: [MISSING_TIER],
      repaired: false,
      repairAttempted: false,
      repairReason: null
    });
  });

  test("blank raw text skips repair", async () => {
    const completion = new ScriptedCompletion([]);
    const outcome = await validatePlan({
      rawPlan: orderPlan(),
      rawText: "  ",
      userMessage: "what is my order total",
      repair: createPlanRepairer(completion)
    });
    expect(outcome.repairAttempted).toBe(false);
    expect(completion.calls).toHaveLength(0);
  });

  test("a faithful repair is accepted", async () => {
    const fixed = { ...orderPlan(), steps: [orderPlan().steps[0], { action: "apply_offers", params: { cart: [], loyalty_tier: "silver" } }] };
    const completion = new ScriptedCompletion([JSON.stringify(fixed)]);
    const outcome = await validatePlan({
      rawPlan: orderPlan(),
      rawText: "raw planner text",
      userMessage: "what is my order total",
      repair: createPlanRepairer(completion),
      logger: silentLogger
    });
    expect(outcome).toMatchObject({ valid: true, repaired: true, repairAttempted: true, errors: [], repairReason: MISSING_TIER });
    expect(outcome.plan.steps[1].params).toEqual({ cart: [], loyalty_tier: "silver" });
  });

  test("a repair that adds a step is rejected and the fallback is used", async () => {
    const drifted = {
      ...orderPlan(),
      steps: [...orderPlan().steps, { action: "calculate_payment", params: { cart: [], discounts: {} } }]
    };
    const completion = new ScriptedCompletion([JSON.stringify(drifted)]);
    const outcome = await validatePlan({
      rawPlan: orderPlan(),
      rawText: "raw planner text",
      userMessage: "what is my order total",
      repair: createPlanRepairer(completion),
      logger: silentLogger
    });
    expect(outcome.valid).toBe(false);
    expect(outcome.plan.intent).toBe(FALLBACK_INTENT);
    expect(outcome.errors).toEqual([MISSING_TIER, "Repair violated constraints: step count changed from 2 to 3"]);
  });

  test("a repair that is still invalid is reported once", async () => {
    const completion = new ScriptedCompletion([JSON.stringify(orderPlan())]);
    const outcome = await validatePlan({
      rawPlan: orderPlan(),
      rawText: "raw planner text",
      userMessage: "what is my order total",
      repair: createPlanRepairer(completion),
      logger: silentLogger
    });
    expect(outcome.errors).toEqual([MISSING_TIER, `Repair fix failed: ${MISSING_TIER}`]);
    expect(completion.calls).toHaveLength(1);
  });

  test("repair service errors fall back", async () => {
    const outcome = await validatePlan({
      rawPlan: orderPlan(),
      rawText: "raw planner text",
      userMessage: "what is my order total",
      repair: async () => {
        throw new Error("upstream 503");
      },
      logger: silentLogger
    });
    expect(outcome.errors).toEqual([MISSING_TIER, "Repair failed: upstream 503"]);
    expect(outcome.repairAttempted).toBe(true);
  });

  test("SemanticViolation thrown by any repairer is labelled as a constraint violation", async () => {
    const outcome = await validatePlan({
      rawPlan: orderPlan(),
      rawText: "raw",
      userMessage: "what is my order total",
      repair: async () => {
        throw new SemanticViolation("actions changed");
      },
      logger: silentLogger
    });
    expect(outcome.errors[1]).toBe("Repair violated constraints: actions changed");
  });
});
