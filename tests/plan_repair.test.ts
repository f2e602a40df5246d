import { describe, expect, test } from "vitest";
import { RepairOutputError, SemanticViolation } from "../src/agent/plan/errors.js";
import { assertSemanticsPreserved, capturePlanShape, createPlanRepairer } from "../src/agent/plan/repair.js";
import { REPAIR_SYSTEM_PROMPT } from "../src/agent/planning/prompts.js";
import { ScriptedCompletion } from "./helpers/fixtures.js";

const plan = (intent: string, actions: string[]) => ({
  intent,
  steps: actions.map((action) => ({ action, params: {} })),
  response_style: "friendly"
});

describe("repair guardrails", () => {
  test("capturePlanShape reads steps, actions and intent words", () => {
    const shape = capturePlanShape(plan("Find Women Dresses", ["recommend_products", "check_inventory", "recommend_products"]));
    expect(shape.stepCount).toBe(3);
    expect([...shape.actions]).toEqual(["recommend_products", "check_inventory"]);
    expect([...shape.intentTokens]).toEqual(["find", "women", "dresses"]);
  });

  test("non-plans have an empty shape", () => {
    const shape = capturePlanShape("garbage");
    expect(shape.stepCount).toBe(0);
    expect(shape.actions.size).toBe(0);
  });

  test("renamed actions are a violation", () => {
    expect(() =>
      assertSemanticsPreserved(capturePlanShape(plan("x", ["get_orders"])), capturePlanShape(plan("x", ["get_user_profile"])))
    ).toThrow(new SemanticViolation("actions changed from [get_orders] to [get_user_profile]"));
  });

  test("an intent with no surviving word is a violation", () => {
    const before = capturePlanShape(plan("find women summer dresses", ["recommend_products"]));
    const after = capturePlanShape(plan("track my parcel", ["recommend_products"]));
    expect(() => assertSemanticsPreserved(before, after)).toThrow("intent changed: no word of the original intent survived");
  });

  test("short intents may be reworded", () => {
    const before = capturePlanShape(plan("browse", ["recommend_products"]));
    const after = capturePlanShape(plan("product browsing", ["recommend_products"]));
    expect(() => assertSemanticsPreserved(before, after)).not.toThrow();
  });
});

describe("createPlanRepairer", () => {
  test("sends the plan without internal keys and accepts fenced output", async () => {
    const completion = new ScriptedCompletion([
      '```json\n{"intent": "parse error", "steps": [], "response_style": "professional", "needs_side_effects": false}\n```'
    ]);
    const repair = createPlanRepairer(completion);
    const fixed = await repair(
      { intent: "parse error", steps: [], response_style: "professional", _parse_error: "Unexpected end of JSON input" },
      "{ broken",
      ["Planner output was not valid JSON: Unexpected end of JSON input"]
    );

    expect(fixed).toEqual({ intent: "parse error", steps: [], response_style: "professional", needs_side_effects: false });
    expect(completion.calls[0].systemPrompt).toBe(REPAIR_SYSTEM_PROMPT);
    expect(completion.calls[0].prompt).not.toContain("_parse_error");
    expect(completion.calls[0].prompt).toContain("- Planner output was not valid JSON: Unexpected end of JSON input");
  });

  test("undecodable output raises RepairOutputError", async () => {
    const repair = createPlanRepairer(new ScriptedCompletion(["sorry, I cannot help"]));
    await expect(repair(plan("x", []), "raw", [])).rejects.toThrow(RepairOutputError);
  });

  test("a JSON array is not a plan", async () => {
    const repair = createPlanRepairer(new ScriptedCompletion(["[1, 2]"]));
    await expect(repair(plan("x", []), "raw", [])).rejects.toThrow("repair output is not a JSON object");
  });

  test("dropped steps are a violation", async () => {
    const repair = createPlanRepairer(new ScriptedCompletion([JSON.stringify(plan("x", ["get_orders"]))]));
    await expect(repair(plan("x", ["get_orders", "get_user_profile"]), "raw", [])).rejects.toThrow(
      "step count changed from 2 to 1"
    );
  });
});
