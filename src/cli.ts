#!/usr/bin/env node
/**
 * Run examples:
 * - `npm run dev -- init-db`
 * - `npm run dev -- chat --user U-100 --session web "find me female clothing"`
 * - `npm run dev -- chat --user U-100 --session web` (interactive)
 * - `npm run dev -- session show --user U-100 --session web`
 * - `npm run dev -- memory --user U-100`
 *
 * Env: OPENAI_API_KEY (required for chat), OPENAI_BASE_URL, OPENAI_MODEL, DB_PATH, MEMORY_DIR, TRACE_DIR.
 */
import process from "node:process";
import chalk from "chalk";
import prompts from "prompts";
import { createRetailAgent, createStores } from "./app.js";
import { parseCliArgs, USAGE, type CliCommand } from "./cli/args.js";
import { createChatUI } from "./cli/ui/chat.js";
import { loadEnvFile } from "./config/loadEnv.js";
import { ConfigError, loadConfig, type AppConfig } from "./config/settings.js";
import { LlmConfigError } from "./llm/errors.js";
import { openDatabase, seedDatabase } from "./store/database.js";

const runInitDb = (config: AppConfig): void => {
  const db = openDatabase(config.dbPath);
  try {
    const inserted = seedDatabase(db);
    console.log(`Database ready at ${config.dbPath}`);
    Object.entries(inserted).forEach(([table, count]) => {
      console.log(`- ${table}: ${count === 0 ? "kept existing rows" : `seeded ${count}`}`);
    });
  } finally {
    db.close();
  }
};

const runChat = async (config: AppConfig, command: Extract<CliCommand, { kind: "chat" }>): Promise<void> => {
  const ui = createChatUI({ userId: command.userId, sessionId: command.sessionId });
  const agent = createRetailAgent({ config, onEvent: ui.onEvent });

  const turn = async (message: string): Promise<void> => {
    ui.reset();
    const result = await agent.service.handle({ userId: command.userId, sessionId: command.sessionId, message });
    ui.showReply(result.response);
    if (result.tracePath) console.log(chalk.gray(`trace: ${result.tracePath}`));
  };

  try {
    if (command.message) {
      await turn(command.message);
      return;
    }

    console.log(chalk.gray("Type a message, or an empty line to quit."));
    while (true) {
      const answer = await prompts({ type: "text", name: "message", message: "You" });
      const message = String(answer.message ?? "").trim();
      if (!message) break;
      await turn(message);
    }
  } finally {
    agent.close();
  }
};

const runAdmin = async (config: AppConfig, command: Extract<CliCommand, { kind: "session-show" | "session-clear" | "memory" }>): Promise<void> => {
  const { sessions, personalization } = createStores(config);
  switch (command.kind) {
    case "session-show":
      console.log(JSON.stringify(await sessions.get(command.userId, command.sessionId), null, 2));
      return;
    case "session-clear": {
      const result = await sessions.clearSession(command.userId, command.sessionId);
      console.log(`Session ${command.sessionId}: ${result.status}`);
      return;
    }
    case "memory":
      console.log(
        JSON.stringify(
          { ...(await sessions.getUserMemory(command.userId)), personalization: await personalization.get(command.userId) },
          null,
          2
        )
      );
      return;
  }
};

const main = async (): Promise<void> => {
  loadEnvFile();
  const command = parseCliArgs(process.argv.slice(2));

  if (command.kind === "help") {
    if (command.error) console.error(chalk.red(command.error));
    console.error(USAGE);
    process.exitCode = command.error ? 1 : 0;
    return;
  }

  try {
    const config = loadConfig();
    if (command.kind === "init-db") {
      runInitDb(config);
      return;
    }
    if (command.kind === "chat") {
      await runChat(config, command);
      return;
    }
    await runAdmin(config, command);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error("Configuration is invalid:");
      error.issues.forEach((issue) => console.error(`- ${issue}`));
      process.exitCode = 1;
      return;
    }
    if (error instanceof LlmConfigError) {
      console.error(error.message);
      process.exitCode = 1;
      return;
    }
    if (error instanceof Error) {
      console.error(error.message);
      process.exitCode = 2;
      return;
    }

    console.error("Unknown error");
    process.exitCode = 2;
  }
};

void main();
