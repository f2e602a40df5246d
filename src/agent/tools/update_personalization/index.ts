import { z } from "zod";
import type { ToolPackage } from "../types.js";
import { ok } from "../util.js";

const inputSchema = z.object({
  user_id: z.string().min(1),
  insights: z.record(z.unknown())
});

export const toolPackage: ToolPackage<z.infer<typeof inputSchema>> = {
  manifest: {
    name: "update_personalization",
    description: "Merge learned preferences (gender, preferred_size, style_preferences, ...) into the user's personalization record.",
    inputSchema,
    safety: { sideEffects: "memory" }
  },
  runtime: {
    run: async (input, ctx) => ok(await ctx.personalization.update(input.user_id, input.insights))
  }
};
