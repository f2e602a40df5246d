import { z } from "zod";

export const cartItemSchema = z
  .object({
    product_id: z.string().optional(),
    quantity: z.number().int().positive().default(1),
    price: z.number().nonnegative().default(0)
  })
  .passthrough();

export const cartSchema = z.array(cartItemSchema);

export type Cart = z.infer<typeof cartSchema>;

export const cartSubtotal = (cart: Cart): number => cart.reduce((sum, item) => sum + item.price * item.quantity, 0);
