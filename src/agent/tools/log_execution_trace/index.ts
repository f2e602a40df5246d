import { z } from "zod";
import type { ToolPackage } from "../types.js";
import { fail, ok } from "../util.js";

const inputSchema = z.object({ trace: z.record(z.unknown()) });

export const toolPackage: ToolPackage<z.infer<typeof inputSchema>> = {
  manifest: {
    name: "log_execution_trace",
    description: "Write a trace record to the explainability log.",
    inputSchema,
    safety: { sideEffects: "fs" }
  },
  runtime: {
    run: async (input, ctx) => {
      const path = await ctx.traces.record(input.trace);
      return path === null ? fail("TRACE_WRITE_FAILED", "Execution trace could not be written") : ok({ logged: true });
    }
  }
};
