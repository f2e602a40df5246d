import { z } from "zod";
import type { ToolPackage } from "../types.js";
import { ok } from "../util.js";

const inputSchema = z.object({ user_id: z.string().min(1) });

export const GUEST_PROFILE = { name: "Guest", loyalty_tier: "bronze" } as const;

export const toolPackage: ToolPackage<z.infer<typeof inputSchema>> = {
  manifest: {
    name: "get_user_profile",
    description: "Look up a user's name and loyalty tier; unknown users get the guest profile.",
    inputSchema,
    safety: { sideEffects: "none" }
  },
  runtime: {
    run: async (input, ctx) => {
      const user = ctx.repos.users.find(input.user_id);
      return ok(user ?? { user_id: input.user_id, ...GUEST_PROFILE });
    }
  }
};
