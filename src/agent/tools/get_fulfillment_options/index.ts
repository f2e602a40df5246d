import { z } from "zod";
import type { ToolPackage } from "../types.js";
import { ok } from "../util.js";

const inputSchema = z.object({ location: z.string() });

export type FulfillmentOption = {
  type: string;
  description: string;
  cost: number;
  estimated_days: number;
  min_order?: number;
};

const PICKUP_KEYWORDS = ["store", "pickup", "near"];

export const fulfillmentOptionsFor = (location: string): FulfillmentOption[] => {
  const options: FulfillmentOption[] = [
    { type: "standard_delivery", description: "Standard delivery (5-7 business days)", cost: 5.99, estimated_days: 5 },
    { type: "express_delivery", description: "Express delivery (2-3 business days)", cost: 12.99, estimated_days: 2 },
    {
      type: "free_standard_delivery",
      description: "Free standard delivery (orders over 50)",
      cost: 0,
      estimated_days: 5,
      min_order: 50
    }
  ];
  const lowered = location.toLowerCase();
  if (PICKUP_KEYWORDS.some((keyword) => lowered.includes(keyword))) {
    options.push({ type: "store_pickup", description: "Store pickup (available next day)", cost: 0, estimated_days: 1 });
  }
  return options;
};

export const toolPackage: ToolPackage<z.infer<typeof inputSchema>> = {
  manifest: {
    name: "get_fulfillment_options",
    description: "Delivery and pickup options for a location.",
    inputSchema,
    safety: { sideEffects: "none" }
  },
  runtime: {
    run: async (input) => ok(fulfillmentOptionsFor(input.location))
  }
};
