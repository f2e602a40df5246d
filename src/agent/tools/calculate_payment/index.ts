import { z } from "zod";
import { cartSchema, cartSubtotal } from "../cart.js";
import type { ToolPackage } from "../types.js";
import { ok, roundMoney } from "../util.js";

const inputSchema = z.object({
  cart: cartSchema,
  discounts: z.object({ total_discount: z.number().nonnegative().default(0) }).passthrough()
});

export const TAX_RATE = 0.1;
export const CURRENCY = "INR";

export const toolPackage: ToolPackage<z.infer<typeof inputSchema>> = {
  manifest: {
    name: "calculate_payment",
    description: "Final payable amount for a cart after the discounts returned by apply_offers, plus tax.",
    inputSchema,
    safety: { sideEffects: "none" }
  },
  runtime: {
    run: async (input) => {
      const subtotal = cartSubtotal(input.cart);
      const totalDiscount = Math.min(input.discounts.total_discount, subtotal);
      const afterDiscount = subtotal - totalDiscount;
      const tax = afterDiscount * TAX_RATE;
      return ok({
        subtotal: roundMoney(subtotal),
        total_discount: roundMoney(totalDiscount),
        amount_after_discount: roundMoney(afterDiscount),
        tax_rate: TAX_RATE * 100,
        tax: roundMoney(tax),
        final_amount: roundMoney(afterDiscount + tax),
        currency: CURRENCY
      });
    }
  }
};
