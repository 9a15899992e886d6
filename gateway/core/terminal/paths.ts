import os from "node:os";
import path from "node:path";

/** Strips the quoting and whitespace callers tend to wrap paths in. */
export function cleanPathInput(raw: string): string {
  return raw.replace(/^["\s]+|["\s]+$/g, "");
}

export function expandHome(input: string, homeDir: string = os.homedir()): string {
  if (input === "~") return homeDir;
  if (input.startsWith("~/")) return path.join(homeDir, input.slice(2));
  return input;
}

/**
 * Resolves a user-supplied path against the session directory.
 * An empty input means the session directory itself.
 */
export function resolveAgainst(cwd: string, raw: string, homeDir?: string): string {
  const cleaned = cleanPathInput(raw);
  if (!cleaned) return cwd;
  return path.resolve(cwd, expandHome(cleaned, homeDir));
}
