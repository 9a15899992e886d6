import type { CommandResult, DirectoryEntry, WriteFileResult } from "./executor.js";
import type { HistoryEntry } from "./session.js";

export function formatCommandResult(result: CommandResult): string {
  const status = result.success ? "succeeded" : "failed";
  let text = `Command ${status} with exit code ${result.exitCode} in ${result.elapsedMs} ms\n`;
  text += `Directory: ${result.cwd}\n`;
  if (result.stdout) text += `\nOutput:\n${result.stdout}`;
  if (result.stderr) text += `${text.endsWith("\n") ? "" : "\n"}\nErrors:\n${result.stderr}`;
  if (result.truncated) text += `${text.endsWith("\n") ? "" : "\n"}\n(output truncated)`;
  return text;
}

export function formatHistoryLine(entry: HistoryEntry, index: number): string {
  const status = entry.exitCode === null ? entry.outcome : `exit ${entry.exitCode}`;
  return `${index + 1}. ${entry.timestamp} (${status}) ${entry.cwd}$ ${entry.command}`;
}

export function formatHistoryLines(entries: HistoryEntry[]): string[] {
  return entries.map(formatHistoryLine);
}

export function formatHistory(entries: HistoryEntry[]): string {
  if (entries.length === 0) return "No command execution history.";
  return `Recent ${entries.length} command history:\n\n${formatHistoryLines(entries).join("\n")}`;
}

export function formatDirectoryListing(directory: string, entries: DirectoryEntry[]): string {
  if (entries.length === 0) return `Contents of ${directory}:\n(empty directory)`;
  const lines = entries.map((e) => (e.isDirectory ? `[DIR]  ${e.name}/` : `[FILE] ${e.name}`));
  return `Contents of ${directory}:\n${lines.join("\n")}`;
}

export function formatWriteResult(result: WriteFileResult): string {
  const verb = result.mode === "append" ? "Appended" : "Wrote";
  return `${verb} ${result.bytesWritten} bytes to ${result.path}`;
}
