import { z } from "zod";
import { cartSchema, cartSubtotal } from "../cart.js";
import type { ToolPackage } from "../types.js";
import { ok, roundMoney } from "../util.js";

const inputSchema = z.object({
  cart: cartSchema,
  loyalty_tier: z.string().min(1)
});

export const TIER_DISCOUNTS: Readonly<Record<string, number>> = {
  bronze: 0,
  silver: 0.05,
  gold: 0.1,
  platinum: 0.15
};

export const BULK_THRESHOLD = 1000;
export const BULK_RATE = 0.1;

export type Discount = {
  type: "loyalty_tier" | "bulk";
  description: string;
  percentage: number;
  amount: number;
};

export type OfferSummary = {
  discounts: Discount[];
  total_discount: number;
  discount_percentage: number;
  subtotal: number;
};

const capitalize = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();

export const computeOffers = (subtotal: number, loyaltyTier: string): OfferSummary => {
  const tierRate = TIER_DISCOUNTS[loyaltyTier.toLowerCase()] ?? 0;
  const discounts: Discount[] = [];

  if (tierRate > 0) {
    discounts.push({
      type: "loyalty_tier",
      description: `${capitalize(loyaltyTier)} member discount`,
      percentage: roundMoney(tierRate * 100),
      amount: roundMoney(subtotal * tierRate)
    });
  }
  if (subtotal > BULK_THRESHOLD) {
    discounts.push({
      type: "bulk",
      description: `Bulk order discount (10% off orders over ${BULK_THRESHOLD})`,
      percentage: roundMoney(BULK_RATE * 100),
      amount: roundMoney(subtotal * BULK_RATE)
    });
  }

  return {
    discounts,
    total_discount: roundMoney(discounts.reduce((sum, discount) => sum + discount.amount, 0)),
    discount_percentage: roundMoney(tierRate * 100),
    subtotal: roundMoney(subtotal)
  };
};

export const toolPackage: ToolPackage<z.infer<typeof inputSchema>> = {
  manifest: {
    name: "apply_offers",
    description: "Loyalty-tier and bulk discounts for a cart of {product_id, quantity, price} items.",
    inputSchema,
    safety: { sideEffects: "none" }
  },
  runtime: {
    run: async (input) => ok(computeOffers(cartSubtotal(input.cart), input.loyalty_tier))
  }
};
