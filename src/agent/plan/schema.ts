import { z } from "zod";

export const planStepSchema = z.object({
  action: z.string().min(1),
  params: z.record(z.unknown())
});

export type PlanStep = z.infer<typeof planStepSchema>;

export const agentPlanSchema = z
  .object({
    intent: z.string(),
    steps: z.array(planStepSchema),
    response_style: z.string(),
    needs_side_effects: z.boolean()
  })
  .superRefine((value, ctx) => {
    if (value.needs_side_effects && value.steps.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "needs_side_effects is true but the plan has no steps",
        path: ["steps"]
      });
    }
  });

export type AgentPlan = z.infer<typeof agentPlanSchema>;

export const FALLBACK_INTENT = "validation failed";

export const createFallbackPlan = (): AgentPlan => ({
  intent: FALLBACK_INTENT,
  steps: [],
  response_style: "professional",
  needs_side_effects: false
});

export type ExecutionStepResult = {
  step: string;
  success: boolean;
  params: Record<string, unknown>;
  result: unknown;
  error: string | null;
};

export type MessageClass = "small_talk" | "ambiguous" | "task";

export type ExecutionTrace = {
  plan: AgentPlan | null;
  validation_passed: boolean;
  validation_errors: string[];
  repair_used: boolean;
  repair_reason: string | null;
  message_class: MessageClass | null;
  execution_steps: ExecutionStepResult[];
  errors: string[];
};

export const createEmptyTrace = (): ExecutionTrace => ({
  plan: null,
  validation_passed: false,
  validation_errors: [],
  repair_used: false,
  repair_reason: null,
  message_class: null,
  execution_steps: [],
  errors: []
});

/** Per (user, session) conversational state; open-ended because tools and steps add keys. */
export type SessionContext = Record<string, unknown>;

export type HistoryTurn = { user: string; intent: string; response: string };

export type TraceTurn = { intent: string; steps: ExecutionStepResult[] };

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const executionStepResultSchema = z.object({
  step: z.string(),
  success: z.boolean(),
  params: z.record(z.unknown()).default({}),
  result: z.unknown(),
  error: z.string().nullable().default(null)
});

/** Reads step results back out of persisted context; malformed entries are dropped. */
export const readStepResults = (value: unknown): ExecutionStepResult[] => {
  if (!Array.isArray(value)) return [];
  return value.flatMap((item) => {
    const parsed = executionStepResultSchema.safeParse(item);
    return parsed.success ? [{ ...parsed.data, result: parsed.data.result ?? null }] : [];
  });
};
