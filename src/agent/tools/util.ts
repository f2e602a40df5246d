import type { z } from "zod";
import type { ToolResult } from "./types.js";

export const summarizeZodIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");

export const ok = (data: unknown): ToolResult => ({ ok: true, data });

export const fail = (code: string, message: string, detail?: string): ToolResult => ({
  ok: false,
  error: detail === undefined ? { code, message } : { code, message, detail }
});

export const roundMoney = (value: number): number => Math.round(value * 100) / 100;
