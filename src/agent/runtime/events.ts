import type { MessageClass } from "../plan/schema.js";

export type AgentEvent =
  | { type: "plan_validated"; intent: string; stepCount: number; valid: boolean; repaired: boolean; messageClass: MessageClass }
  | { type: "step_start"; index: number; action: string }
  | { type: "step_end"; index: number; action: string; ok: boolean; note?: string }
  | { type: "responded"; fallback: boolean }
  | { type: "persisted"; ok: boolean };

export type AgentEventHandler = (event: AgentEvent) => void;
