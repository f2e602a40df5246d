import { describe, expect, test } from "vitest";
import type { AgentPlan, ExecutionStepResult } from "../src/agent/plan/schema.js";
import { RESPONSE_SYSTEM_PROMPT, SMALL_TALK_SYSTEM_PROMPT } from "../src/agent/planning/prompts.js";
import { CAPABILITIES_REPLY, LlmResponder, NO_RESULTS_APOLOGY, SMALL_TALK_FALLBACK, compactHistory } from "../src/agent/runtime/responder.js";
import { silentLogger } from "../src/runtime/logger.js";
import { ScriptedCompletion } from "./helpers/fixtures.js";

const plan = (intent: string): AgentPlan => ({ intent, steps: [], response_style: "friendly", needs_side_effects: false });

const inventoryStep: ExecutionStepResult = {
  step: "check_inventory",
  success: true,
  params: { product_id: "PROD-002", size: "M" },
  result: { product_id: "PROD-002", available: true, quantity: 12, location: "warehouse" },
  error: null
};

describe("LlmResponder", () => {
  test("small talk gets its own prompt", async () => {
    const completion = new ScriptedCompletion(["  Doing great, thanks!  "]);
    const responder = new LlmResponder(completion, silentLogger);
    const reply = await responder.generate({ userMessage: "hi, how are you?", plan: plan("small_talk"), steps: [], context: { last_message: "hello" } });
    expect(reply).toBe("Doing great, thanks!");
    expect(completion.calls[0].systemPrompt).toBe(SMALL_TALK_SYSTEM_PROMPT);
    expect(completion.calls[0].prompt).toContain("Previous message from this user (if any): hello");
  });

  test("small talk falls back to a fixed reply when the service fails", async () => {
    const responder = new LlmResponder(new ScriptedCompletion([new Error("timeout")]), silentLogger);
    const reply = await responder.generate({ userMessage: "hello", plan: plan("x"), steps: [], context: {}, messageClass: "small_talk" });
    expect(reply).toBe(SMALL_TALK_FALLBACK);
  });

  test("unsupported requests list what the assistant can do", async () => {
    const completion = new ScriptedCompletion([]);
    const reply = await new LlmResponder(completion).generate({
      userMessage: "book me a flight",
      plan: plan("unsupported_request"),
      steps: [],
      context: {}
    });
    expect(reply).toBe(CAPABILITIES_REPLY);
    expect(completion.calls).toHaveLength(0);
  });

  test("a task where nothing succeeded gets an apology without a completion call", async () => {
    const completion = new ScriptedCompletion([]);
    const reply = await new LlmResponder(completion).generate({
      userMessage: "show me jackets",
      plan: plan("browse"),
      steps: [{ ...inventoryStep, success: false, result: null, error: "boom" }],
      context: {}
    });
    expect(reply).toBe(NO_RESULTS_APOLOGY);
    expect(completion.calls).toHaveLength(0);
  });

  test("task replies are phrased from successful tool results", async () => {
    const completion = new ScriptedCompletion(["The shirt is in stock in M.\n"]);
    const reply = await new LlmResponder(completion).generate({
      userMessage: "is PROD-002 available in M?",
      plan: plan("check stock"),
      steps: [inventoryStep],
      context: { last_intent: "browse" }
    });
    expect(reply).toBe("The shirt is in stock in M.");
    expect(completion.calls[0].systemPrompt).toBe(RESPONSE_SYSTEM_PROMPT);
    expect(completion.calls[0].prompt).toContain("User explicitly mentioned product/sku IDs: true");
    expect(completion.calls[0].prompt).toContain('"quantity": 12');
  });

  test("task completion errors propagate to the caller", async () => {
    const responder = new LlmResponder(new ScriptedCompletion([new Error("503")]));
    await expect(
      responder.generate({ userMessage: "stock?", plan: plan("check stock"), steps: [inventoryStep], context: {} })
    ).rejects.toThrow("503");
  });
});

describe("compactHistory", () => {
  test("keeps the newest turns and clips long text", () => {
    const history = [
      { user: "first", response: "r1", intent: "a" },
      "junk",
      { user: "x".repeat(10), response: "r3", intent: "c" }
    ];
    expect(compactHistory(history, 2, 4)).toEqual([{ user: "xxxx", response: "r3", intent: "c" }]);
    expect(compactHistory(undefined)).toEqual([]);
  });
});
