import { spawn, type ChildProcessByStdio } from "node:child_process";
import os from "node:os";
import type { Readable } from "node:stream";
import { errnoCode } from "../../lib/errors.js";
import { createLogger } from "../../lib/log.js";

const log = createLogger("terminal");

export interface ShellRunOptions {
  cwd: string;
  timeoutMs: number;
  maxOutputBytes: number;
  /** Shell binary; `undefined` means the platform default (`/bin/sh`). */
  shell?: string;
}

export type ShellRunOutcome =
  | { kind: "exited"; exitCode: number; stdout: string; stderr: string; truncated: boolean }
  | { kind: "timeout"; pid: number | undefined }
  | { kind: "spawn_error"; error: Error };

/** setTimeout cannot schedule past 2^31-1 ms. */
export const MAX_TIMEOUT_SECONDS = Math.floor((2 ** 31 - 1) / 1000);

const ANSI_ESCAPE = /\x1b\[[0-9;?]*[A-Za-z]/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_ESCAPE, "");
}

function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) return -1;
  const known = Object.entries(os.constants.signals).find(([name]) => name === signal);
  return known ? 128 + Number(known[1]) : -1;
}

/** Length of `data` without a trailing multi-byte UTF-8 sequence that was cut short. */
export function completeUtf8Length(data: Buffer): number {
  let lead = data.length - 1;
  while (lead >= 0 && data.length - lead <= 3 && ((data[lead] ?? 0) & 0xc0) === 0x80) lead--;
  if (lead < 0) return data.length;
  const byte = data[lead] ?? 0;
  const width = byte >= 0xf0 ? 4 : byte >= 0xe0 ? 3 : byte >= 0xc0 ? 2 : 1;
  return lead + width > data.length ? lead : data.length;
}

class CappedBuffer {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  constructor(private readonly maxBytes: number) {}

  push(chunk: Buffer): void {
    const room = this.maxBytes - this.size;
    if (room <= 0) {
      this.truncated = true;
      return;
    }
    const slice = chunk.length > room ? chunk.subarray(0, room) : chunk;
    if (slice.length < chunk.length) this.truncated = true;
    this.chunks.push(slice);
    this.size += slice.length;
  }

  toString(): string {
    const data = Buffer.concat(this.chunks);
    const kept = this.truncated ? data.subarray(0, completeUtf8Length(data)) : data;
    return stripAnsi(kept.toString("utf8"));
  }
}

/** Kills the child's whole process group so grandchildren die with it. */
function killProcessGroup(pid: number | undefined, fallback: () => void): void {
  if (pid === undefined || process.platform === "win32") {
    fallback();
    return;
  }
  try {
    process.kill(-pid, "SIGKILL");
  } catch (error) {
    if (errnoCode(error) !== "ESRCH") {
      log.warn("process group kill failed, killing child only", { pid, error: (error as Error).message });
    }
    fallback();
  }
}

/**
 * Runs one command line through the shell. Never rejects: spawn errors and
 * timeouts come back as outcomes so the caller can record them.
 */
export function runShellCommand(command: string, options: ShellRunOptions): Promise<ShellRunOutcome> {
  return new Promise<ShellRunOutcome>((resolve) => {
    let settled = false;
    let timedOut = false;
    const finish = (outcome: ShellRunOutcome): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(outcome);
    };

    const stdout = new CappedBuffer(options.maxOutputBytes);
    const stderr = new CappedBuffer(options.maxOutputBytes);

    let child: ChildProcessByStdio<null, Readable, Readable>;
    try {
      child = spawn(command, {
        cwd: options.cwd,
        shell: options.shell ?? true,
        detached: process.platform !== "win32",
        stdio: ["ignore", "pipe", "pipe"],
        env: process.env,
        windowsHide: true,
      });
    } catch (error) {
      // Argument validation (e.g. NUL bytes) throws before any process exists.
      resolve({ kind: "spawn_error", error: error instanceof Error ? error : new Error(String(error)) });
      return;
    }

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    const settleTimeout = (): void => {
      child.stdout.destroy();
      child.stderr.destroy();
      finish({ kind: "timeout", pid: child.pid });
    };

    const timer = setTimeout(() => {
      timedOut = true;
      killProcessGroup(child.pid, () => {
        child.kill("SIGKILL");
      });
      // The shell may already be gone while a background job holds the pipes.
      if (child.exitCode !== null || child.signalCode !== null) settleTimeout();
    }, options.timeoutMs);

    child.once("error", (error) => {
      finish({ kind: "spawn_error", error });
    });

    // After a kill a stray grandchild may still hold the pipes open, so the
    // timeout path settles on "exit" rather than waiting for "close".
    child.once("exit", () => {
      if (timedOut) settleTimeout();
    });

    child.once("close", (code, signal) => {
      if (timedOut) return;
      finish({
        kind: "exited",
        exitCode: code ?? signalExitCode(signal),
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        truncated: stdout.truncated || stderr.truncated,
      });
    });
  });
}
