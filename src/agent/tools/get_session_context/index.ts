import { z } from "zod";
import type { ToolPackage } from "../types.js";
import { ok } from "../util.js";

const inputSchema = z.object({
  user_id: z.string().min(1),
  session_id: z.string().min(1)
});

export const toolPackage: ToolPackage<z.infer<typeof inputSchema>> = {
  manifest: {
    name: "get_session_context",
    description: "Read the stored conversational context for a user's session.",
    inputSchema,
    safety: { sideEffects: "none" }
  },
  runtime: {
    run: async (input, ctx) => ok(await ctx.sessions.get(input.user_id, input.session_id))
  }
};
