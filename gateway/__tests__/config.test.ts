import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, realpath, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { loadConfigFromEnv } from "../config.js";
import { createExecutor } from "../bootstrap.js";

test("defaults apply when the environment is empty", () => {
  const config = loadConfigFromEnv({});
  assert.deepEqual(config, {
    transport: "stdio",
    port: 8787,
    defaultTimeoutSeconds: 30,
    historyLimit: 50,
    historyOutputChars: 500,
    maxOutputBytes: 1024 * 1024,
    shell: undefined,
    startDirectory: undefined,
    extraDenyPatterns: [],
    gatewayApiKey: "",
    rateLimitPerMinute: 60,
    maxBodyBytes: 1024 * 1024,
    logLevel: "info",
  });
});

test("environment values are parsed and invalid numbers fall back", () => {
  const config = loadConfigFromEnv({
    TERMINAL_TRANSPORT: "HTTP",
    PORT: "9000",
    TERMINAL_DEFAULT_TIMEOUT_S: "abc",
    TERMINAL_HISTORY_LIMIT: "12.7",
    TERMINAL_SHELL: " /bin/bash ",
    TERMINAL_DENY_PATTERNS: "git push --force; npm publish ;;",
    GATEWAY_API_KEY: "test-secret",
    LOG_LEVEL: "WARNING",
  });
  assert.equal(config.transport, "http");
  assert.equal(config.port, 9000);
  assert.equal(config.defaultTimeoutSeconds, 30);
  assert.equal(config.historyLimit, 12);
  assert.equal(config.shell, "/bin/bash");
  assert.deepEqual(config.extraDenyPatterns, ["git push --force", "npm publish"]);
  assert.equal(config.gatewayApiKey, "test-secret");
  assert.equal(config.logLevel, "warn");
  assert.equal(loadConfigFromEnv({ TERMINAL_TRANSPORT: "grpc" }).transport, "stdio");
  assert.equal(loadConfigFromEnv({ TERMINAL_DEFAULT_TIMEOUT_S: "3000000" }).defaultTimeoutSeconds, 30);
});

test("createExecutor applies the start directory and configured deny patterns", async (t) => {
  const dir = await realpath(await mkdtemp(path.join(os.tmpdir(), "terminal-boot-")));
  t.after(() => rm(dir, { recursive: true, force: true }));

  const executor = await createExecutor({
    ...loadConfigFromEnv({}),
    startDirectory: dir,
    extraDenyPatterns: ["forbidden-word"],
    historyLimit: 2,
  });
  assert.equal(executor.getCurrentDirectory(), dir);
  assert.equal(executor.historyLimit, 2);
  await assert.rejects(executor.execute("echo forbidden-word"), { code: "BLOCKED" });
});

test("createExecutor keeps the process directory when the start directory is missing", async () => {
  const executor = await createExecutor({ ...loadConfigFromEnv({}), startDirectory: "/definitely/not/here" });
  assert.equal(executor.getCurrentDirectory(), path.resolve(process.cwd()));
});
