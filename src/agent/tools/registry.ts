import { TOOL_ALLOWED_PARAMS, TOOL_REQUIREMENTS, type ToolName } from "./catalog.js";
import { toolPackage as applyOffers } from "./apply_offers/index.js";
import { toolPackage as calculatePayment } from "./calculate_payment/index.js";
import { toolPackage as checkInventory } from "./check_inventory/index.js";
import { toolPackage as getFulfillmentOptions } from "./get_fulfillment_options/index.js";
import { toolPackage as getOrders } from "./get_orders/index.js";
import { toolPackage as getSessionContext } from "./get_session_context/index.js";
import { toolPackage as getUserProfile } from "./get_user_profile/index.js";
import { toolPackage as logExecutionTrace } from "./log_execution_trace/index.js";
import { toolPackage as recommendProducts } from "./recommend_products/index.js";
import { toolPackage as saveSessionContext } from "./save_session_context/index.js";
import { toolPackage as updatePersonalization } from "./update_personalization/index.js";
import { toolPackage as updateUserName } from "./update_user_name/index.js";
import type { ToolPackage, ToolSpec } from "./types.js";
import { fail, summarizeZodIssues } from "./util.js";

export type ToolRegistry = Readonly<Record<ToolName, ToolSpec>>;

export const toToolSpec = <TInput>(pkg: ToolPackage<TInput>): ToolSpec => ({
  name: pkg.manifest.name,
  description: pkg.manifest.description,
  required: TOOL_REQUIREMENTS[pkg.manifest.name],
  allowed: TOOL_ALLOWED_PARAMS[pkg.manifest.name],
  sideEffects: pkg.manifest.safety.sideEffects,
  invoke: async (params, ctx) => {
    const parsed = pkg.manifest.inputSchema.safeParse(params);
    if (!parsed.success) {
      return fail("TOOL_INPUT_INVALID", `Invalid input for ${pkg.manifest.name}: ${summarizeZodIssues(parsed.error)}`);
    }
    return pkg.runtime.run(parsed.data, ctx);
  }
});

export const createToolRegistry = (): ToolRegistry => ({
  get_session_context: toToolSpec(getSessionContext),
  save_session_context: toToolSpec(saveSessionContext),
  get_user_profile: toToolSpec(getUserProfile),
  update_user_name: toToolSpec(updateUserName),
  update_personalization: toToolSpec(updatePersonalization),
  get_orders: toToolSpec(getOrders),
  check_inventory: toToolSpec(checkInventory),
  recommend_products: toToolSpec(recommendProducts),
  apply_offers: toToolSpec(applyOffers),
  calculate_payment: toToolSpec(calculatePayment),
  get_fulfillment_options: toToolSpec(getFulfillmentOptions),
  log_execution_trace: toToolSpec(logExecutionTrace)
});

/** Built once; tools are stateless and read their collaborators from the run context. */
export const toolRegistry: ToolRegistry = createToolRegistry();
