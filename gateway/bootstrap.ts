import type { AppConfig } from "./config.js";
import { CommandDenylist } from "./core/policy/denylist.js";
import { CommandExecutor } from "./core/terminal/executor.js";
import { buildPublicError } from "./lib/errors.js";
import { createLogger } from "./lib/log.js";

const log = createLogger("gateway");

/** Builds the session executor from config; a bad start directory is logged, not fatal. */
export async function createExecutor(config: AppConfig): Promise<CommandExecutor> {
    const executor = new CommandExecutor({
        defaultTimeoutSeconds: config.defaultTimeoutSeconds,
        historyLimit: config.historyLimit,
        historyOutputChars: config.historyOutputChars,
        maxOutputBytes: config.maxOutputBytes,
        shell: config.shell,
        denylist: new CommandDenylist(config.extraDenyPatterns),
    });
    if (config.startDirectory) {
        try {
            await executor.changeDirectory(config.startDirectory);
        } catch (error) {
            const { code, message } = buildPublicError(error, "invalid start directory", "INVALID_INPUT");
            log.warn(`TERMINAL_START_DIR ignored (${code}): ${message}`);
        }
    }
    return executor;
}
