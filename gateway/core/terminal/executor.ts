import { access, appendFile, mkdir, readdir, stat, writeFile } from "node:fs/promises";
import { constants as fsConstants, type Dirent, type Stats } from "node:fs";
import os from "node:os";
import path from "node:path";
import { CommandDenylist } from "../policy/denylist.js";
import { TerminalError, errnoCode, fromFsError } from "../../lib/errors.js";
import { createLogger, type Logger } from "../../lib/log.js";
import { resolveAgainst } from "./paths.js";
import { MAX_TIMEOUT_SECONDS, runShellCommand, type ShellRunOutcome } from "./process.js";
import { SessionLock, SessionState, type HistoryEntry, type HistoryOutcome } from "./session.js";

export interface CommandResult {
  command: string;
  cwd: string;
  success: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
  elapsedMs: number;
  truncated: boolean;
}

export interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
}

export type WriteMode = "overwrite" | "append";

export interface WriteFileResult {
  path: string;
  bytesWritten: number;
  mode: WriteMode;
}

export interface ExecuteOptions {
  timeoutSeconds?: number;
  workingDirectory?: string;
}

export interface CommandExecutorOptions {
  initialDirectory?: string;
  historyLimit?: number;
  historyOutputChars?: number;
  defaultTimeoutSeconds?: number;
  maxOutputBytes?: number;
  shell?: string;
  denylist?: CommandDenylist;
  homeDir?: string;
  logger?: Logger;
}

const DEFAULT_HISTORY_LIMIT = 50;
const DEFAULT_HISTORY_OUTPUT_CHARS = 500;
const DEFAULT_TIMEOUT_SECONDS = 30;
const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;
const DEFAULT_HISTORY_COUNT = 10;

// 126: found but not executable, 127: not found. Both come from the shell.
const SHELL_SPAWN_FAILURE_CODES = new Set([126, 127]);

function preview(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}…` : text;
}

function combineOutput(stdout: string, stderr: string): string {
  if (!stderr) return stdout;
  if (!stdout) return stderr;
  return `${stdout}${stdout.endsWith("\n") ? "" : "\n"}${stderr}`;
}

async function assertDirectory(target: string): Promise<void> {
  let info: Stats;
  try {
    info = await stat(target);
  } catch (error) {
    throw fromFsError(error, target);
  }
  if (!info.isDirectory()) {
    throw new TerminalError("NOT_A_DIRECTORY", `not a directory: ${target}`);
  }
  try {
    await access(target, fsConstants.R_OK | fsConstants.X_OK);
  } catch {
    throw new TerminalError("ACCESS_DENIED", `permission denied: ${target}`);
  }
}

async function isDirectoryEntry(dir: string, name: string, linkOrDir: { isDirectory(): boolean; isSymbolicLink(): boolean }): Promise<boolean> {
  if (!linkOrDir.isSymbolicLink()) return linkOrDir.isDirectory();
  try {
    return (await stat(path.join(dir, name))).isDirectory();
  } catch {
    return false; // dangling link
  }
}

/**
 * Runs shell commands on behalf of a remote caller and keeps the session
 * they share: working directory and history log.
 */
export class CommandExecutor {
  private readonly session: SessionState;
  private readonly lock = new SessionLock();
  private readonly denylist: CommandDenylist;
  private readonly historyOutputChars: number;
  private readonly maxOutputBytes: number;
  private readonly shell?: string;
  private readonly homeDir: string;
  private readonly log: Logger;
  readonly defaultTimeoutSeconds: number;

  constructor(options: CommandExecutorOptions = {}) {
    this.session = new SessionState({
      initialDirectory: path.resolve(options.initialDirectory ?? process.cwd()),
      historyLimit: options.historyLimit ?? DEFAULT_HISTORY_LIMIT,
    });
    this.denylist = options.denylist ?? new CommandDenylist();
    this.historyOutputChars = options.historyOutputChars ?? DEFAULT_HISTORY_OUTPUT_CHARS;
    this.defaultTimeoutSeconds = options.defaultTimeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
    this.maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    this.shell = options.shell;
    this.homeDir = options.homeDir ?? os.homedir();
    this.log = options.logger ?? createLogger("terminal");
  }

  get historyLimit(): number {
    return this.session.historyLimit;
  }

  get historySize(): number {
    return this.session.historySize;
  }

  getCurrentDirectory(): string {
    return this.session.currentDirectory;
  }

  async execute(command: string, options: ExecuteOptions = {}): Promise<CommandResult> {
    if (!command.trim()) {
      throw new TerminalError("INVALID_INPUT", "command must be a non-empty string");
    }
    const timeoutSeconds = options.timeoutSeconds ?? this.defaultTimeoutSeconds;
    if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0) {
      throw new TerminalError("INVALID_INPUT", `timeout must be a positive number of seconds, got ${timeoutSeconds}`);
    }
    if (timeoutSeconds > MAX_TIMEOUT_SECONDS) {
      throw new TerminalError("INVALID_INPUT", `timeout must be at most ${MAX_TIMEOUT_SECONDS} seconds, got ${timeoutSeconds}`);
    }

    const denied = this.denylist.inspectCommand(command);
    if (denied) {
      this.log.warn("command blocked", { command, rule: denied.rule_id });
      throw new TerminalError("BLOCKED", `command blocked by policy: ${denied.description}`, { ...denied });
    }

    const { workingDirectory } = options;
    const cwd = await this.lock.run(() =>
      workingDirectory === undefined
        ? this.session.currentDirectory
        : resolveAgainst(this.session.currentDirectory, workingDirectory, this.homeDir),
    );

    const startedAt = Date.now();
    const outcome = await runShellCommand(command, {
      cwd,
      timeoutMs: Math.ceil(timeoutSeconds * 1000),
      maxOutputBytes: this.maxOutputBytes,
      shell: this.shell,
    });
    const elapsedMs = Date.now() - startedAt;

    await this.remember(command, cwd, outcome);
    this.log.info("command finished", { command, cwd, outcome: outcome.kind, elapsedMs });

    switch (outcome.kind) {
      case "timeout":
        throw new TerminalError("TIMEOUT", `command timed out after ${timeoutSeconds}s`, {
          timeoutSeconds,
          pid: outcome.pid,
        });
      case "spawn_error":
        throw new TerminalError("SPAWN_FAILURE", `${outcome.error.message} (cwd: ${cwd})`);
      case "exited":
        if (SHELL_SPAWN_FAILURE_CODES.has(outcome.exitCode)) {
          const reason = outcome.stderr.trim() || `shell exited with code ${outcome.exitCode}`;
          throw new TerminalError("SPAWN_FAILURE", reason, { exitCode: outcome.exitCode });
        }
        return {
          command,
          cwd,
          success: outcome.exitCode === 0,
          exitCode: outcome.exitCode,
          stdout: outcome.stdout,
          stderr: outcome.stderr,
          elapsedMs,
          truncated: outcome.truncated,
        };
    }
  }

  async changeDirectory(rawPath: string): Promise<string> {
    return this.lock.run(async () => {
      const target = resolveAgainst(this.session.currentDirectory, rawPath, this.homeDir);
      await assertDirectory(target);
      this.session.setCurrentDirectory(target);
      this.log.debug("working directory changed", { cwd: target });
      return target;
    });
  }

  async listDirectory(rawPath = "."): Promise<DirectoryEntry[]> {
    return this.lock.run(async () => {
      const target = resolveAgainst(this.session.currentDirectory, rawPath, this.homeDir);
      await assertDirectory(target);
      let dirents: Dirent[];
      try {
        dirents = await readdir(target, { withFileTypes: true });
      } catch (error) {
        throw fromFsError(error, target);
      }
      const entries = await Promise.all(
        dirents.map(async (d) => ({ name: d.name, isDirectory: await isDirectoryEntry(target, d.name, d) })),
      );
      return entries.sort((a, b) => {
        if (a.isDirectory !== b.isDirectory) return a.isDirectory ? -1 : 1;
        return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
      });
    });
  }

  getHistory(count = DEFAULT_HISTORY_COUNT): HistoryEntry[] {
    return this.session.recent(count);
  }

  async writeFile(rawPath: string, content: string, mode: WriteMode = "overwrite"): Promise<WriteFileResult> {
    if (mode !== "overwrite" && mode !== "append") {
      throw new TerminalError("INVALID_INPUT", `unknown write mode: ${String(mode)}`);
    }
    if (!rawPath.trim()) {
      throw new TerminalError("INVALID_INPUT", "path must be a non-empty string");
    }
    return this.lock.run(async () => {
      const target = resolveAgainst(this.session.currentDirectory, rawPath, this.homeDir);
      const parent = path.dirname(target);
      try {
        await mkdir(parent, { recursive: true });
      } catch (error) {
        if (errnoCode(error) === "EEXIST") {
          throw new TerminalError("NOT_A_DIRECTORY", `not a directory: ${parent}`);
        }
        throw fromFsError(error, parent);
      }
      const body = content && !content.endsWith("\n") ? `${content}\n` : content;
      try {
        if (mode === "append") await appendFile(target, body, "utf8");
        else await writeFile(target, body, "utf8");
      } catch (error) {
        throw fromFsError(error, target);
      }
      this.log.info("file written", { path: target, mode });
      return { path: target, bytesWritten: Buffer.byteLength(body, "utf8"), mode };
    });
  }

  private async remember(command: string, cwd: string, outcome: ShellRunOutcome): Promise<void> {
    let exitCode: number | null = null;
    let status: HistoryOutcome;
    let output = "";
    switch (outcome.kind) {
      case "timeout":
        status = "timeout";
        break;
      case "spawn_error":
        status = "spawn_failure";
        output = outcome.error.message;
        break;
      case "exited":
        exitCode = outcome.exitCode;
        output = combineOutput(outcome.stdout, outcome.stderr);
        status = SHELL_SPAWN_FAILURE_CODES.has(exitCode) ? "spawn_failure" : exitCode === 0 ? "ok" : "failed";
        break;
    }
    await this.lock.run(() =>
      this.session.record({
        command,
        timestamp: new Date().toISOString(),
        cwd,
        exitCode,
        outcome: status,
        output: preview(output, this.historyOutputChars),
      }),
    );
  }
}
