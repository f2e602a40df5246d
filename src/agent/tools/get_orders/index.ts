import { z } from "zod";
import type { ToolPackage } from "../types.js";
import { ok } from "../util.js";

const inputSchema = z.object({ user_id: z.string().min(1) });

export const toolPackage: ToolPackage<z.infer<typeof inputSchema>> = {
  manifest: {
    name: "get_orders",
    description: "List a user's orders, newest first.",
    inputSchema,
    safety: { sideEffects: "none" }
  },
  runtime: {
    run: async (input, ctx) => ok(ctx.repos.orders.byUser(input.user_id))
  }
};
