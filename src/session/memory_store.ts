import type { SessionContext } from "../agent/plan/schema.js";
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

const clone = <T>(value: T): T => structuredClone(value);

export class InMemorySessionStore implements SessionAdmin {
  private readonly users = new Map<string, Map<string, SessionContext>>();

  constructor(private readonly limits: HistoryLimits = DEFAULT_HISTORY_LIMITS) {}

  async get(userId: string, sessionId: string): Promise<SessionContext> {
    const context = this.users.get(userId)?.get(sessionId);
    return context ? clone(context) : {};
  }

  async put(userId: string, sessionId: string, context: SessionContext): Promise<void> {
    const sessions = this.users.get(userId) ?? new Map<string, SessionContext>();
    sessions.set(sessionId, clone(boundContext(context, this.limits)));
    this.users.set(userId, sessions);
  }

  async getUserMemory(userId: string): Promise<UserMemory> {
    const sessions = this.users.get(userId);
    return { user_id: userId, sessions: sessions ? clone(Object.fromEntries(sessions)) : {} };
  }

  async clearSession(userId: string, sessionId: string): Promise<ClearStatus> {
    return { status: this.users.get(userId)?.delete(sessionId) ? "cleared" : "not_found" };
  }

  async clearUser(userId: string): Promise<ClearStatus> {
    return { status: this.users.delete(userId) ? "cleared" : "not_found" };
  }
}

export class InMemoryPersonalizationStore implements PersonalizationStore {
  private readonly records = new Map<string, Personalization>();

  async get(userId: string): Promise<Personalization> {
    return clone(this.records.get(userId) ?? {});
  }

  async update(userId: string, insights: Personalization): Promise<Personalization> {
    const merged = { ...(this.records.get(userId) ?? {}), ...insights };
    this.records.set(userId, merged);
    return clone(merged);
  }

  async clear(userId: string): Promise<ClearStatus> {
    return { status: this.records.delete(userId) ? "cleared" : "not_found" };
  }
}
