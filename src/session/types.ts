import type { SessionContext } from "../agent/plan/schema.js";

export interface SessionStore {
  /** Missing records read as `{}`. */
  get(userId: string, sessionId: string): Promise<SessionContext>;
  put(userId: string, sessionId: string, context: SessionContext): Promise<void>;
}

export type UserMemory = {
  user_id: string;
  sessions: Record<string, SessionContext>;
};

export type ClearStatus = { status: "cleared" | "not_found" };

/** Administrative surface used by the CLI. */
export interface SessionAdmin extends SessionStore {
  getUserMemory(userId: string): Promise<UserMemory>;
  clearSession(userId: string, sessionId: string): Promise<ClearStatus>;
  clearUser(userId: string): Promise<ClearStatus>;
}

export type Personalization = Record<string, unknown>;

export interface PersonalizationStore {
  get(userId: string): Promise<Personalization>;
  /** Shallow merge; returns the merged record. */
  update(userId: string, insights: Personalization): Promise<Personalization>;
  clear(userId: string): Promise<ClearStatus>;
}

export type HistoryLimits = {
  maxMessages: number;
  maxTraces: number;
};

export const DEFAULT_HISTORY_LIMITS: HistoryLimits = { maxMessages: 10, maxTraces: 5 };
