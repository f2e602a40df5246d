import { z } from "zod";
import type { ToolPackage } from "../types.js";
import { fail, ok } from "../util.js";

const inputSchema = z.object({
  user_id: z.string().min(1),
  name: z.string().trim().min(1, "name must be a non-empty string")
});

export const toolPackage: ToolPackage<z.infer<typeof inputSchema>> = {
  manifest: {
    name: "update_user_name",
    description: "Change how the user is addressed.",
    inputSchema,
    safety: { sideEffects: "db" }
  },
  runtime: {
    run: async (input, ctx) => {
      const changes = ctx.repos.users.updateName(input.user_id, input.name);
      if (changes === 0) {
        return fail("USER_NOT_FOUND", `User '${input.user_id}' does not exist`);
      }
      return ok(ctx.repos.users.find(input.user_id));
    }
  }
};
