#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfigFromEnv } from "./config.js";
import { createExecutor } from "./bootstrap.js";
import { createApp } from "./create_app.js";
import { createMcpServer } from "./mcp_server.js";
import { createLogger, setLogLevel } from "./lib/log.js";

const log = createLogger("gateway");

async function main(): Promise<void> {
    const config = loadConfigFromEnv();
    setLogLevel(config.logLevel);
    const executor = await createExecutor(config);

    if (config.transport === "http") {
        const { server, shutdown } = createApp(config, executor);
        server.listen(config.port, () => {
            log.info(`terminal gateway listening on :${config.port}`, { cwd: executor.getCurrentDirectory() });
        });
        const stop = (): void => {
            shutdown().then(
                () => process.exit(0),
                (error: unknown) => {
                    log.error("shutdown failed", { error: (error as Error).message });
                    process.exit(1);
                },
            );
        };
        process.once("SIGINT", stop);
        process.once("SIGTERM", stop);
        return;
    }

    const server = createMcpServer(executor);
    await server.connect(new StdioServerTransport());
    log.info("terminal-gateway MCP server ready", { cwd: executor.getCurrentDirectory() });
}

main().catch((error: unknown) => {
    log.error("fatal", { error: error instanceof Error ? error.stack ?? error.message : String(error) });
    process.exit(1);
});
