import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ToolRunContext } from "../../src/agent/tools/types.js";
import type { CompletionService } from "../../src/llm/client.js";
import type { Logger } from "../../src/runtime/logger.js";
import type { TraceSink } from "../../src/runtime/trace.js";
import { InMemoryPersonalizationStore, InMemorySessionStore } from "../../src/session/memory_store.js";
import { openDatabase, seedDatabase, type RetailDatabase } from "../../src/store/database.js";
import { createRepositories, type Repositories } from "../../src/store/repositories.js";

export const createSeededDb = (): { db: RetailDatabase; repos: Repositories } => {
  const db = openDatabase(":memory:");
  seedDatabase(db);
  return { db, repos: createRepositories(db) };
};

export const createTempDir = (prefix = "retail-agent-"): Promise<string> => mkdtemp(join(tmpdir(), prefix));

export class MemoryTraceSink implements TraceSink {
  readonly traces: Record<string, unknown>[] = [];

  async record(trace: Record<string, unknown>): Promise<string | null> {
    this.traces.push(trace);
    return `memory://trace/${this.traces.length}`;
  }
}

export const createCapturingLogger = (): Logger & { lines: string[] } => {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(`info ${message}`),
    warn: (message) => lines.push(`warn ${message}`),
    error: (message) => lines.push(`error ${message}`)
  };
};

export const createToolContext = (repos: Repositories): ToolRunContext & {
  sessions: InMemorySessionStore;
  personalization: InMemoryPersonalizationStore;
  traces: MemoryTraceSink;
} => ({
  repos,
  sessions: new InMemorySessionStore(),
  personalization: new InMemoryPersonalizationStore(),
  traces: new MemoryTraceSink(),
  logger: createCapturingLogger()
});

type ScriptedReply = string | Error | ((prompt: string, systemPrompt?: string) => string);

/** CompletionService double: replays replies in order and records every prompt. */
export class ScriptedCompletion implements CompletionService {
  readonly calls: Array<{ prompt: string; systemPrompt?: string }> = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[]) {
    this.replies = [...replies];
  }

  async complete(prompt: string, systemPrompt?: string): Promise<string> {
    this.calls.push({ prompt, systemPrompt });
    const next = this.replies.shift();
    if (next === undefined) throw new Error("ScriptedCompletion replies exhausted");
    if (next instanceof Error) throw next;
    return typeof next === "function" ? next(prompt, systemPrompt) : next;
  }
}
