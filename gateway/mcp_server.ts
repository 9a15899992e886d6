import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { buildPublicError } from "./lib/errors.js";
import { createLogger } from "./lib/log.js";
import type { CommandExecutor } from "./core/terminal/executor.js";
import { MAX_TIMEOUT_SECONDS } from "./core/terminal/process.js";
import {
  formatCommandResult,
  formatDirectoryListing,
  formatHistory,
  formatWriteResult,
} from "./core/terminal/format.js";

const log = createLogger("mcp");

export const MCP_SERVER_NAME = "terminal-gateway";
export const MCP_SERVER_VERSION = "0.1.0";

function textResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }] };
}

function errorResult(error: unknown): CallToolResult {
  const publicError = buildPublicError(error, "tool call failed", "INTERNAL");
  return { content: [{ type: "text", text: `Error [${publicError.code}]: ${publicError.message}` }], isError: true };
}

async function guarded(tool: string, run: () => Promise<string> | string): Promise<CallToolResult> {
  try {
    return textResult(await run());
  } catch (error) {
    log.debug("tool call failed", { tool, error: (error as Error).message });
    return errorResult(error);
  }
}

export function createMcpServer(executor: CommandExecutor): McpServer {
  const server = new McpServer({ name: MCP_SERVER_NAME, version: MCP_SERVER_VERSION });

  server.tool(
    "execute_command",
    "Run a shell command in the session's working directory and return its exit code, stdout and stderr.",
    {
      command: z.string().min(1).describe("Command line to run through the shell."),
      timeout: z.number().positive().max(MAX_TIMEOUT_SECONDS).optional().describe(`Timeout in seconds (default ${executor.defaultTimeoutSeconds}).`),
      working_directory: z.string().optional().describe("Run in this directory instead of the session directory."),
    },
    async ({ command, timeout, working_directory }) =>
      guarded("execute_command", async () => {
        const result = await executor.execute(command, { timeoutSeconds: timeout, workingDirectory: working_directory });
        return formatCommandResult(result);
      }),
  );

  server.tool(
    "get_command_history",
    "Get recent command execution history, most recent first.",
    { count: z.number().int().optional().describe("Number of entries to return (default 10).") },
    async ({ count }) => guarded("get_command_history", () => formatHistory(executor.getHistory(count))),
  );

  server.tool("get_current_directory", "Get the session's current working directory.", async () =>
    guarded("get_current_directory", () => executor.getCurrentDirectory()),
  );

  server.tool(
    "change_directory",
    "Change the session's working directory. Relative paths resolve against the current one; ~ expands to home.",
    { path: z.string().min(1).describe("Directory to switch to.") },
    async ({ path }) =>
      guarded("change_directory", async () => `Working directory is now ${await executor.changeDirectory(path)}`),
  );

  server.tool(
    "list_directory",
    "List files and subdirectories of a directory, directories first.",
    { path: z.string().optional().describe("Directory to list (default: current directory).") },
    async ({ path }) =>
      guarded("list_directory", async () => {
        const target = path ?? ".";
        const entries = await executor.listDirectory(target);
        const shown = target === "." ? executor.getCurrentDirectory() : target;
        return formatDirectoryListing(shown, entries);
      }),
  );

  server.tool(
    "write_file",
    "Write text to a file, creating parent directories as needed.",
    {
      path: z.string().min(1).describe("File to write."),
      content: z.string().describe("Text content."),
      mode: z.enum(["overwrite", "append"]).optional().describe("overwrite (default) or append."),
    },
    async ({ path, content, mode }) =>
      guarded("write_file", async () => formatWriteResult(await executor.writeFile(path, content, mode))),
  );

  return server;
}
