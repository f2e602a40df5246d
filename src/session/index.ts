export { boundContext } from "./bound.js";
export { FilePersonalizationStore, FileSessionStore } from "./file_store.js";
export { KeyedMutex } from "./lock.js";
export { InMemoryPersonalizationStore, InMemorySessionStore } from "./memory_store.js";
export type {
  ClearStatus,
  HistoryLimits,
  Personalization,
  PersonalizationStore,
  SessionAdmin,
  SessionStore,
  UserMemory
} from "./types.js";
export { DEFAULT_HISTORY_LIMITS } from "./types.js";
