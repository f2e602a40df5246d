import type { SessionContext } from "../agent/plan/schema.js";
import { DEFAULT_HISTORY_LIMITS, type HistoryLimits } from "./types.js";

const STEP_KEY = /^step_(\d+)_result$/;

const stepIndex = (key: string): number => {
  const match = STEP_KEY.exec(key);
  return match ? Number(match[1]) : -1;
};

/**
 * Returns a copy with `message_history` and `trace_history` trimmed to their newest
 * entries, and only the highest-numbered `step_N_result` keys kept.
 */
export const boundContext = (context: SessionContext, limits: HistoryLimits = DEFAULT_HISTORY_LIMITS): SessionContext => {
  const bounded: SessionContext = { ...context };

  const history = bounded.message_history;
  if (Array.isArray(history)) {
    bounded.message_history = limits.maxMessages > 0 ? history.slice(-limits.maxMessages) : [];
  }

  const traces = bounded.trace_history;
  if (Array.isArray(traces)) {
    bounded.trace_history = limits.maxTraces > 0 ? traces.slice(-limits.maxTraces) : [];
  }

  const stepKeys = Object.keys(bounded)
    .filter((key) => STEP_KEY.test(key))
    .sort((a, b) => stepIndex(a) - stepIndex(b));
  if (stepKeys.length > limits.maxMessages) {
    stepKeys.slice(0, stepKeys.length - limits.maxMessages).forEach((key) => {
      delete bounded[key];
    });
  }

  return bounded;
};
