import { z } from "zod";
import type { ToolPackage } from "../types.js";
import { ok } from "../util.js";

const inputSchema = z.object({
  user_id: z.string().min(1),
  session_id: z.string().min(1),
  context: z.record(z.unknown())
});

export const toolPackage: ToolPackage<z.infer<typeof inputSchema>> = {
  manifest: {
    name: "save_session_context",
    description: "Overwrite the stored context of a user's session (history is bounded on write).",
    inputSchema,
    safety: { sideEffects: "memory" }
  },
  runtime: {
    run: async (input, ctx) => {
      await ctx.sessions.put(input.user_id, input.session_id, input.context);
      return ok({ saved: true });
    }
  }
};
