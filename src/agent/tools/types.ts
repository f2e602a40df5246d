import type { z } from "zod";
import type { Logger } from "../../runtime/logger.js";
import type { TraceSink } from "../../runtime/trace.js";
import type { PersonalizationStore, SessionStore } from "../../session/types.js";
import type { Repositories } from "../../store/repositories.js";
import type { ToolName } from "./catalog.js";

export type ToolResult = {
  ok: boolean;
  data?: unknown;
  error?: { code: string; message: string; detail?: string };
};

export type ToolRunContext = {
  repos: Repositories;
  sessions: SessionStore;
  personalization: PersonalizationStore;
  traces: TraceSink;
  logger: Logger;
};

export type ToolManifest<TInput = unknown> = {
  name: ToolName;
  description: string;
  // Input side left open so schemas with defaults and transforms fit.
  inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  safety: {
    sideEffects: "none" | "db" | "memory" | "fs";
  };
};

export type ToolRuntime<TInput = unknown> = {
  run: (input: TInput, ctx: ToolRunContext) => Promise<ToolResult>;
};

export type ToolPackage<TInput = unknown> = {
  manifest: ToolManifest<TInput>;
  runtime: ToolRuntime<TInput>;
};

/** Registry entry: the input is validated inside `invoke`, so callers pass raw params. */
export type ToolSpec = {
  name: ToolName;
  description: string;
  required: readonly string[];
  allowed: readonly string[];
  sideEffects: ToolManifest["safety"]["sideEffects"];
  invoke: (params: Record<string, unknown>, ctx: ToolRunContext) => Promise<ToolResult>;
};
