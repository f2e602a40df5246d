import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { parseCliArgs } from "../src/cli/args.js";
import { loadEnvFile, parseEnvText } from "../src/config/loadEnv.js";
import { ConfigError, loadConfig } from "../src/config/settings.js";

describe("loadConfig", () => {
  test("defaults resolve against the working directory", () => {
    expect(loadConfig({}, "/srv/shop")).toEqual({
      llm: { apiKey: undefined, baseUrl: undefined, model: "gpt-4.1-mini", timeoutMs: 15000, maxRetries: 1, retryDelayMs: 500 },
      dbPath: "/srv/shop/var/retail.db",
      memoryDir: "/srv/shop/var/memory",
      traceDir: "/srv/shop/var/traces",
      history: { maxMessages: 10, maxTraces: 5 }
    });
  });

  test("reads overrides and treats blank values as unset", () => {
    const config = loadConfig(
      { OPENAI_API_KEY: "test-secret", OPENAI_MODEL: "", LLM_TIMEOUT_MS: "2500", DB_PATH: ":memory:", MAX_MESSAGE_HISTORY: "4" },
      "/srv/shop"
    );
    expect(config.llm).toMatchObject({ apiKey: "test-secret", model: "gpt-4.1-mini", timeoutMs: 2500 });
    expect(config.dbPath).toBe(":memory:");
    expect(config.history.maxMessages).toBe(4);
  });

  test("collects every invalid setting", () => {
    let caught: unknown;
    try {
      loadConfig({ LLM_MAX_RETRIES: "3", OPENAI_BASE_URL: "not a url" }, "/srv/shop");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError ? caught.issues : []).toEqual([
      "OPENAI_BASE_URL: Invalid url",
      "LLM_MAX_RETRIES: Number must be less than or equal to 1"
    ]);
  });
});

describe("env file", () => {
  test("parseEnvText skips comments and unquotes values", () => {
    expect(parseEnvText("# comment\nexport OPENAI_MODEL='gpt-test'\nDB_PATH=\"./data/shop.db\"\nbroken\n")).toEqual([
      { key: "OPENAI_MODEL", value: "gpt-test" },
      { key: "DB_PATH", value: "./data/shop.db" }
    ]);
  });

  test("loadEnvFile never overrides values already set", async () => {
    const dir = await mkdtemp(join(tmpdir(), "retail-env-"));
    await writeFile(join(dir, ".env"), "OPENAI_MODEL=gpt-test\nDB_PATH=./data/shop.db\n", "utf8");
    const target: NodeJS.ProcessEnv = { DB_PATH: "/keep/me.db" };
    expect(loadEnvFile(join(dir, ".env"), target)).toEqual(["OPENAI_MODEL"]);
    expect(target).toEqual({ DB_PATH: "/keep/me.db", OPENAI_MODEL: "gpt-test" });
    expect(loadEnvFile(join(dir, "missing.env"), target)).toEqual([]);
  });
});

describe("parseCliArgs", () => {
  test("chat joins the message and defaults the session", () => {
    expect(parseCliArgs(["chat", "-u", "U-100", "find", "me", "jeans"])).toEqual({
      kind: "chat",
      userId: "U-100",
      sessionId: "default",
      message: "find me jeans"
    });
    expect(parseCliArgs(["chat", "--user", "U-100", "--session", "web"])).toEqual({
      kind: "chat",
      userId: "U-100",
      sessionId: "web",
      message: undefined
    });
  });

  test("session and memory commands", () => {
    expect(parseCliArgs(["session", "show", "--user", "U-1", "--session", "web"])).toEqual({ kind: "session-show", userId: "U-1", sessionId: "web" });
    expect(parseCliArgs(["session", "clear", "-u", "U-1", "-s", "web"])).toEqual({ kind: "session-clear", userId: "U-1", sessionId: "web" });
    expect(parseCliArgs(["memory", "-u", "U-1"])).toEqual({ kind: "memory", userId: "U-1" });
    expect(parseCliArgs(["init-db"])).toEqual({ kind: "init-db" });
  });

  test("usage errors", () => {
    expect(parseCliArgs([])).toEqual({ kind: "help" });
    expect(parseCliArgs(["chat", "hello"])).toEqual({ kind: "help", error: "chat requires --user <id>" });
    expect(parseCliArgs(["session", "drop", "-u", "U-1", "-s", "web"])).toEqual({ kind: "help", error: "unknown session action: drop" });
    expect(parseCliArgs(["deploy"])).toEqual({ kind: "help", error: "unknown command: deploy" });
  });
});
