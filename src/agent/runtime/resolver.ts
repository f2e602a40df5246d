import { consoleLogger, type Logger } from "../../runtime/logger.js";
import type { ProductLookup } from "../../store/repositories.js";
import { readStepResults, isRecord, type ExecutionStepResult, type SessionContext } from "../plan/schema.js";
import { TOOL_ALLOWED_PARAMS, isToolName } from "../tools/catalog.js";
import { matchByName, reconcileProductId, type RecommendedItem } from "./fuzzy.js";

export const CONTEXT_PLACEHOLDER = "extracted_from_context";

const TEMPLATE_MARKER = /^\{\{\s*([^{}\s]+)\s*\}\}$/;

export const INVENTORY_INFERENCE_ERROR = "Cannot infer product_id for check_inventory; re-run recommend_products first.";

export type Identity = { sessionId: string; userId: string };

const substitute = (key: string, value: string, identity: Identity, context: SessionContext): unknown => {
  const marker = TEMPLATE_MARKER.exec(value);
  if (value !== CONTEXT_PLACEHOLDER && !marker) return value;

  const lowerKey = key.toLowerCase();
  if (lowerKey.includes("session")) return identity.sessionId;
  if (lowerKey.includes("user")) return identity.userId;
  if (Object.hasOwn(context, key)) return context[key];
  if (marker) {
    const name = marker[1].toLowerCase();
    if (name.includes("session")) return identity.sessionId;
    if (name.includes("user")) return identity.userId;
  }
  return value;
};

const resolveValue = (key: string, value: unknown, identity: Identity, context: SessionContext): unknown => {
  if (typeof value === "string") return substitute(key, value, identity, context);
  if (Array.isArray(value)) return value.map((item) => resolveValue(key, item, identity, context));
  if (isRecord(value)) return resolvePlaceholders(value, identity, context);
  return value;
};

/** Replaces placeholder strings at any depth; arrays inherit their key. Returns a new mapping. */
export const resolvePlaceholders = (
  params: Record<string, unknown>,
  identity: Identity,
  context: SessionContext
): Record<string, unknown> =>
  Object.fromEntries(Object.entries(params).map(([key, value]) => [key, resolveValue(key, value, identity, context)]));

const toItems = (value: unknown): RecommendedItem[] => {
  if (!Array.isArray(value)) return [];
  return value.flatMap((item) =>
    isRecord(item) && typeof item.product_id === "string" && typeof item.name === "string"
      ? [{ product_id: item.product_id, name: item.name }]
      : []
  );
};

const recommendationLists = (steps: readonly ExecutionStepResult[]): RecommendedItem[][] =>
  [...steps]
    .reverse()
    .filter((step) => step.step === "recommend_products" && step.success)
    .map((step) => toItems(step.result))
    .filter((items) => items.length > 0);

/** Newest first: this run's results, then the previous turn's trace. */
export const collectRecommendations = (
  previousResults: readonly ExecutionStepResult[],
  context: SessionContext
): RecommendedItem[][] => {
  const lists = recommendationLists(previousResults);
  const history = context.trace_history;
  if (Array.isArray(history) && history.length > 0) {
    const lastTurn: unknown = history[history.length - 1];
    if (isRecord(lastTurn)) lists.push(...recommendationLists(readStepResults(lastTurn.steps)));
  }
  return lists;
};

const nonEmptyString = (value: unknown): value is string => typeof value === "string" && value.trim().length > 0;

const isUnresolvedPlaceholder = (value: string): boolean => value === CONTEXT_PLACEHOLDER || TEMPLATE_MARKER.test(value);

/** A placeholder nothing could fill is no identifier at all. */
const withoutUnresolvedIds = (params: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(
    Object.entries(params).filter(
      ([key, value]) => !((key === "product_id" || key === "sku") && typeof value === "string" && isUnresolvedPlaceholder(value))
    )
  );

const lookupByName = (lookup: ProductLookup | undefined, name: string, logger: Logger): string | undefined => {
  if (!lookup) return undefined;
  try {
    return (lookup.findByExactName(name) ?? lookup.findByNameLike(name))?.product_id;
  } catch (error) {
    logger.warn(`[resolver] product lookup failed for "${name}": ${error instanceof Error ? error.message : String(error)}`);
    return undefined;
  }
};

export type ResolveStepInput = {
  action: string;
  params: Record<string, unknown>;
  sessionId: string;
  userId: string;
  context: SessionContext;
  previousResults: readonly ExecutionStepResult[];
  productLookup?: ProductLookup;
  logger?: Logger;
};

export type ResolveOutcome = { ok: true; params: Record<string, unknown> } | { ok: false; params: Record<string, unknown>; error: string };

const applyAllowList = (action: string, params: Record<string, unknown>): Record<string, unknown> => {
  if (!isToolName(action)) return params;
  const allowed = new Set(TOOL_ALLOWED_PARAMS[action]);
  return Object.fromEntries(Object.entries(params).filter(([key]) => allowed.has(key)));
};

const resolveInventoryTarget = (supplied: Record<string, unknown>, input: ResolveStepInput, logger: Logger): ResolveOutcome => {
  const params = withoutUnresolvedIds(supplied);
  const lists = collectRecommendations(input.previousResults, input.context);
  const items = lists.flat();

  if (nonEmptyString(params.product_id) || nonEmptyString(params.sku)) {
    if (nonEmptyString(params.product_id) && !nonEmptyString(params.sku)) {
      return { ok: true, params: { ...params, product_id: reconcileProductId(params.product_id, items) } };
    }
    return { ok: true, params };
  }

  const name = nonEmptyString(params.product_name) ? params.product_name : nonEmptyString(params.name) ? params.name : undefined;
  const productId =
    name !== undefined ? (matchByName(items, name)?.product_id ?? lookupByName(input.productLookup, name, logger)) : lists[0]?.[0]?.product_id;

  if (productId === undefined) return { ok: false, params, error: INVENTORY_INFERENCE_ERROR };
  return { ok: true, params: { ...params, product_id: productId } };
};

/**
 * Produces the parameters a step is dispatched with. Deterministic, never mutates
 * its input, and running it on its own output changes nothing.
 */
export const resolveStepParams = (input: ResolveStepInput): ResolveOutcome => {
  const logger = input.logger ?? consoleLogger;
  let params = resolvePlaceholders(input.params, { sessionId: input.sessionId, userId: input.userId }, input.context);

  if (input.action === "recommend_products" && !nonEmptyString(params.gender)) {
    const personalization = input.context.personalization;
    if (isRecord(personalization) && nonEmptyString(personalization.gender)) {
      params = { ...params, gender: personalization.gender };
    }
  }

  if (input.action === "check_inventory") {
    const outcome = resolveInventoryTarget(params, input, logger);
    if (!outcome.ok) return { ...outcome, params: applyAllowList(input.action, outcome.params) };
    params = outcome.params;
  }

  return { ok: true, params: applyAllowList(input.action, params) };
};
