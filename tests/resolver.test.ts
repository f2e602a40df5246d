import { describe, expect, test } from "vitest";
import type { ExecutionStepResult } from "../src/agent/plan/schema.js";
import { matchByName, reconcileProductId, slugify } from "../src/agent/runtime/fuzzy.js";
import { INVENTORY_INFERENCE_ERROR, resolvePlaceholders, resolveStepParams } from "../src/agent/runtime/resolver.js";
import type { ProductLookup } from "../src/store/repositories.js";
import { createCapturingLogger, createSeededDb } from "./helpers/fixtures.js";

const recommended: ExecutionStepResult = {
  step: "recommend_products",
  success: true,
  params: { category: "Men's Fashion" },
  result: [
    { product_id: "PROD-002", name: "Men's Shirt", category: "Men's Fashion", base_price: 349 },
    { product_id: "PROD-004", name: "Men's Oxford Shirt", category: "Men's Fashion", base_price: 1249 }
  ],
  error: null
};

const base = { sessionId: "S-1", userId: "U-100", context: {}, previousResults: [recommended] };

describe("resolvePlaceholders", () => {
  test("fills ids by key, then context, then marker name", () => {
    const resolved = resolvePlaceholders(
      {
        user_id: "extracted_from_context",
        session_id: "{{session_id}}",
        context: { owner: "{{user_id}}" },
        last_intent: "extracted_from_context",
        note: "{{coupon}}",
        tags: ["extracted_from_context", 3],
        toString: "extracted_from_context",
        quantity: 2
      },
      { sessionId: "S-1", userId: "U-100" },
      { last_intent: "browse" }
    );
    expect(resolved).toEqual({
      user_id: "U-100",
      session_id: "S-1",
      context: { owner: "U-100" },
      last_intent: "browse",
      note: "{{coupon}}",
      tags: ["extracted_from_context", 3],
      toString: "extracted_from_context",
      quantity: 2
    });
  });

  test("does not mutate its input", () => {
    const params = { user_id: "{{user_id}}" };
    resolvePlaceholders(params, { sessionId: "S-1", userId: "U-100" }, {});
    expect(params).toEqual({ user_id: "{{user_id}}" });
  });
});

describe("resolveStepParams for check_inventory", () => {
  test("a recommended product name becomes its id and the name is dropped", () => {
    const outcome = resolveStepParams({ ...base, action: "check_inventory", params: { product_name: "Men's Shirt", size: "M" } });
    expect(outcome).toEqual({ ok: true, params: { product_id: "PROD-002", size: "M" } });
  });

  test("resolving resolved params changes nothing", () => {
    const first = resolveStepParams({ ...base, action: "check_inventory", params: { product_name: "oxford", size: "L" } });
    expect(first.params).toEqual({ product_id: "PROD-004", size: "L" });
    const second = resolveStepParams({ ...base, action: "check_inventory", params: first.params });
    expect(second).toEqual(first);
  });

  test("without a name the first recommendation is used", () => {
    const outcome = resolveStepParams({ ...base, action: "check_inventory", params: {} });
    expect(outcome.params).toEqual({ product_id: "PROD-002" });
  });

  test("recommendations from the previous turn are used when this run has none", () => {
    const outcome = resolveStepParams({
      ...base,
      previousResults: [],
      context: { trace_history: [{ intent: "old", steps: [] }, { intent: "browse", steps: [recommended] }] },
      action: "check_inventory",
      params: { size: "S" }
    });
    expect(outcome.params).toEqual({ product_id: "PROD-002", size: "S" });
  });

  test("made-up ids are reconciled against recommendations", () => {
    const bySlug = resolveStepParams({ ...base, action: "check_inventory", params: { product_id: "PROD-mens-oxford-shirt" } });
    expect(bySlug.params).toEqual({ product_id: "PROD-004" });
    const unknown = resolveStepParams({ ...base, action: "check_inventory", params: { product_id: "PROD-999" } });
    expect(unknown.params).toEqual({ product_id: "PROD-002" });
  });

  test("names outside the recommendations go through the product lookup", () => {
    const { repos } = createSeededDb();
    const outcome = resolveStepParams({
      ...base,
      previousResults: [],
      action: "check_inventory",
      params: { product_name: "women's wrap dress" },
      productLookup: repos.products
    });
    expect(outcome).toEqual({ ok: true, params: { product_id: "PROD-003" } });
  });

  test("nothing to go on is an error, never a guess", () => {
    const logger = createCapturingLogger();
    const failing: ProductLookup = {
      findByExactName: () => {
        throw new Error("database is locked");
      },
      findByNameLike: () => undefined
    };
    const outcome = resolveStepParams({
      ...base,
      previousResults: [],
      action: "check_inventory",
      params: { product_name: "mystery item", size: "M" },
      productLookup: failing,
      logger
    });
    expect(outcome).toEqual({ ok: false, params: { size: "M" }, error: INVENTORY_INFERENCE_ERROR });
    expect(logger.lines).toEqual(['warn [resolver] product lookup failed for "mystery item": database is locked']);
  });

  test("an id placeholder nothing could fill is not dispatched", () => {
    const sentinel = resolveStepParams({
      ...base,
      previousResults: [],
      action: "check_inventory",
      params: { product_id: "extracted_from_context", size: "M" }
    });
    expect(sentinel).toEqual({ ok: false, params: { size: "M" }, error: INVENTORY_INFERENCE_ERROR });

    const marker = resolveStepParams({ ...base, previousResults: [], action: "check_inventory", params: { product_id: "{{product_id}}" } });
    expect(marker).toEqual({ ok: false, params: {}, error: INVENTORY_INFERENCE_ERROR });
  });

  test("an unfilled id placeholder falls back to the recommendations", () => {
    const sentinel = resolveStepParams({ ...base, action: "check_inventory", params: { product_id: "extracted_from_context", size: "M" } });
    expect(sentinel).toEqual({ ok: true, params: { product_id: "PROD-002", size: "M" } });

    const marker = resolveStepParams({
      ...base,
      action: "check_inventory",
      params: { sku: "{{sku}}", product_id: "{{product_id}}", product_name: "oxford" }
    });
    expect(marker).toEqual({ ok: true, params: { product_id: "PROD-004" } });
  });

  test("an id placeholder filled from context is kept", () => {
    const outcome = resolveStepParams({
      ...base,
      context: { product_id: "PROD-004" },
      action: "check_inventory",
      params: { product_id: "{{product_id}}" }
    });
    expect(outcome).toEqual({ ok: true, params: { product_id: "PROD-004" } });
  });

  test("an explicit sku is kept as given", () => {
    const outcome = resolveStepParams({ ...base, action: "check_inventory", params: { sku: "SKU-001", product_id: "PROD-777" } });
    expect(outcome.params).toEqual({ sku: "SKU-001", product_id: "PROD-777" });
  });
});

describe("resolveStepParams for other tools", () => {
  test("recommend_products picks up gender from personalization and drops unknown params", () => {
    const outcome = resolveStepParams({
      ...base,
      context: { personalization: { gender: "female" } },
      action: "recommend_products",
      params: { category: "Fashion", color: "red" }
    });
    expect(outcome.params).toEqual({ category: "Fashion", gender: "female" });
  });

  test("an explicit gender wins over personalization", () => {
    const outcome = resolveStepParams({
      ...base,
      context: { personalization: { gender: "female" } },
      action: "recommend_products",
      params: { category: "Fashion", gender: "male" }
    });
    expect(outcome.params).toEqual({ category: "Fashion", gender: "male" });
  });

  test("placeholders resolve for user tools", () => {
    const outcome = resolveStepParams({ ...base, action: "get_orders", params: { user_id: "extracted_from_context" } });
    expect(outcome).toEqual({ ok: true, params: { user_id: "U-100" } });
  });
});

describe("fuzzy matching", () => {
  test("slugify strips the id prefix and punctuation", () => {
    expect(slugify("PROD-Men's Shirt")).toBe("mens-shirt");
    expect(slugify("Women’s  Wrap Dress!")).toBe("womens-wrap-dress");
  });

  test("matchByName prefers exact names over containment", () => {
    const items = [
      { product_id: "PROD-004", name: "Men's Oxford Shirt" },
      { product_id: "PROD-002", name: "Men's Shirt" }
    ];
    expect(matchByName(items, "men's shirt")?.product_id).toBe("PROD-002");
    expect(matchByName(items, "Oxford")?.product_id).toBe("PROD-004");
    expect(matchByName(items, "  ")).toBeUndefined();
  });

  test("reconcileProductId keeps known ids and passes through when nothing was recommended", () => {
    const items = [{ product_id: "PROD-002", name: "Men's Shirt" }];
    expect(reconcileProductId("prod-002", items)).toBe("PROD-002");
    expect(reconcileProductId("PROD-123", [])).toBe("PROD-123");
  });
});
