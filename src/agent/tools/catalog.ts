export const TOOL_NAMES = [
  "get_session_context",
  "save_session_context",
  "get_user_profile",
  "update_user_name",
  "update_personalization",
  "get_orders",
  "check_inventory",
  "recommend_products",
  "apply_offers",
  "calculate_payment",
  "get_fulfillment_options",
  "log_execution_trace"
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

const TOOL_NAME_SET: ReadonlySet<string> = new Set(TOOL_NAMES);

export const isToolName = (value: unknown): value is ToolName => typeof value === "string" && TOOL_NAME_SET.has(value);

/** Parameters a step must carry for the plan to validate. */
export const TOOL_REQUIREMENTS: Readonly<Record<ToolName, readonly string[]>> = {
  get_session_context: ["user_id", "session_id"],
  save_session_context: ["user_id", "session_id", "context"],
  get_user_profile: ["user_id"],
  update_user_name: ["user_id", "name"],
  update_personalization: ["user_id", "insights"],
  get_orders: ["user_id"],
  // product_id or sku, but the resolver can infer either from earlier recommendations
  check_inventory: [],
  recommend_products: ["category"],
  apply_offers: ["cart", "loyalty_tier"],
  calculate_payment: ["cart", "discounts"],
  get_fulfillment_options: ["location"],
  log_execution_trace: ["trace"]
};

/** Parameters that survive resolution; anything else is dropped before dispatch. */
export const TOOL_ALLOWED_PARAMS: Readonly<Record<ToolName, readonly string[]>> = {
  ...TOOL_REQUIREMENTS,
  check_inventory: ["product_id", "sku", "size"],
  recommend_products: ["category", "gender", "price_range", "limit"]
};

export type ToolRequirements = Readonly<Record<string, readonly string[]>>;
