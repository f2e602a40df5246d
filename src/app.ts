import { join } from "node:path";
import { createPlanRepairer } from "./agent/plan/repair.js";
import { Planner } from "./agent/planning/planner.js";
import type { AgentEventHandler } from "./agent/runtime/events.js";
import { LlmResponder } from "./agent/runtime/responder.js";
import type { AppConfig } from "./config/settings.js";
import { createCompletionClient, getProviderFromConfig } from "./llm/index.js";
import type { LlmProvider } from "./llm/provider.js";
import { consoleLogger, type Logger } from "./runtime/logger.js";
import { TraceRecorder } from "./runtime/trace.js";
import { FilePersonalizationStore, FileSessionStore } from "./session/file_store.js";
import { openDatabase, seedDatabase, type RetailDatabase } from "./store/database.js";
import { createRepositories, type Repositories } from "./store/repositories.js";
import { TurnService } from "./workflow/turn_service.js";

export type RetailAgent = {
  service: TurnService;
  db: RetailDatabase;
  repos: Repositories;
  sessions: FileSessionStore;
  personalization: FilePersonalizationStore;
  close(): void;
};

export type CreateRetailAgentOptions = {
  config: AppConfig;
  /** Defaults to the provider the configuration describes. */
  provider?: LlmProvider;
  logger?: Logger;
  onEvent?: AgentEventHandler;
  seed?: boolean;
};

export const createStores = (config: AppConfig, logger: Logger = consoleLogger) => ({
  sessions: new FileSessionStore(config.memoryDir, config.history, logger),
  personalization: new FilePersonalizationStore(join(config.memoryDir, "users"), logger)
});

export const createRetailAgent = (options: CreateRetailAgentOptions): RetailAgent => {
  const logger = options.logger ?? consoleLogger;
  const provider = options.provider ?? getProviderFromConfig(options.config);
  const completion = createCompletionClient(provider, options.config, logger);

  const db = openDatabase(options.config.dbPath);
  if (options.seed ?? true) seedDatabase(db);
  const repos = createRepositories(db);
  const { sessions, personalization } = createStores(options.config, logger);

  const service = new TurnService({
    planner: new Planner(completion),
    repair: createPlanRepairer(completion),
    responder: new LlmResponder(completion, logger),
    repos,
    sessions,
    personalization,
    traces: new TraceRecorder(options.config.traceDir, logger),
    limits: options.config.history,
    logger,
    onEvent: options.onEvent
  });

  return { service, db, repos, sessions, personalization, close: () => db.close() };
};
