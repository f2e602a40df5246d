import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { isRecord, type SessionContext } from "../agent/plan/schema.js";
import { consoleLogger, type Logger } from "../runtime/logger.js";
import { boundContext } from "./bound.js";
import {
  DEFAULT_HISTORY_LIMITS,
  type ClearStatus,
  type HistoryLimits,
  type Personalization,
  type PersonalizationStore,
  type SessionAdmin,
  type UserMemory
} from "./types.js";

const fileNameFor = (userId: string): string => `${encodeURIComponent(userId)}.json`;

const isMissing = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/** Reads a JSON object; a missing file is `undefined`, a corrupt one is logged and also `undefined`. */
const readJsonRecord = async (path: string, logger: Logger): Promise<Record<string, unknown> | undefined> => {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (isMissing(error)) return undefined;
    throw error;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    if (isRecord(parsed)) return parsed;
    logger.warn(`[memory] ignoring non-object content in ${path}`);
  } catch (error) {
    logger.warn(`[memory] ignoring corrupt file ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return undefined;
};

const removeFile = async (path: string): Promise<ClearStatus> => {
  try {
    await rm(path);
    return { status: "cleared" };
  } catch (error) {
    if (isMissing(error)) return { status: "not_found" };
    throw error;
  }
};

/** One JSON document per user: `{ user_id, sessions: { [sessionId]: context } }`. */
export class FileSessionStore implements SessionAdmin {
  constructor(
    private readonly dir: string,
    private readonly limits: HistoryLimits = DEFAULT_HISTORY_LIMITS,
    private readonly logger: Logger = consoleLogger
  ) {}

  async get(userId: string, sessionId: string): Promise<SessionContext> {
    const memory = await this.getUserMemory(userId);
    return memory.sessions[sessionId] ?? {};
  }

  async put(userId: string, sessionId: string, context: SessionContext): Promise<void> {
    const memory = await this.getUserMemory(userId);
    memory.sessions[sessionId] = boundContext(context, this.limits);
    await this.write(userId, memory);
  }

  async getUserMemory(userId: string): Promise<UserMemory> {
    const raw = await readJsonRecord(this.pathFor(userId), this.logger);
    const sessions: Record<string, SessionContext> = {};
    if (raw && isRecord(raw.sessions)) {
      Object.entries(raw.sessions).forEach(([sessionId, context]) => {
        if (isRecord(context)) sessions[sessionId] = context;
      });
    }
    return { user_id: userId, sessions };
  }

  async clearSession(userId: string, sessionId: string): Promise<ClearStatus> {
    const memory = await this.getUserMemory(userId);
    if (!(sessionId in memory.sessions)) return { status: "not_found" };
    delete memory.sessions[sessionId];
    await this.write(userId, memory);
    return { status: "cleared" };
  }

  async clearUser(userId: string): Promise<ClearStatus> {
    return removeFile(this.pathFor(userId));
  }

  private pathFor(userId: string): string {
    return join(this.dir, fileNameFor(userId));
  }

  private async write(userId: string, memory: UserMemory): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await writeFile(this.pathFor(userId), JSON.stringify(memory, null, 2), "utf8");
  }
}

/** Longer-lived per-user attributes (gender, preferred size, style), kept apart from sessions. */
export class FilePersonalizationStore implements PersonalizationStore {
  constructor(
    private readonly dir: string,
    private readonly logger: Logger = consoleLogger
  ) {}

  async get(userId: string): Promise<Personalization> {
    return (await readJsonRecord(this.pathFor(userId), this.logger)) ?? {};
  }

  async update(userId: string, insights: Personalization): Promise<Personalization> {
    const current = await this.get(userId);
    if (Object.keys(insights).length === 0) return current;
    const merged = { ...current, ...insights };
    await mkdir(this.dir, { recursive: true });
    await writeFile(this.pathFor(userId), JSON.stringify(merged, null, 2), "utf8");
    return merged;
  }

  async clear(userId: string): Promise<ClearStatus> {
    return removeFile(this.pathFor(userId));
  }

  private pathFor(userId: string): string {
    return join(this.dir, fileNameFor(userId));
  }
}
