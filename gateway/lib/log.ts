/**
 * Console logger tagged per component. Everything goes to stderr: on the
 * stdio transport stdout belongs to the MCP stream.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
    const value = (raw ?? "").trim().toLowerCase();
    if (value === "warning") return "warn";
    return isLogLevel(value) ? value : fallback;
}

let threshold: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

export interface Logger {
    debug(message: string, fields?: Record<string, unknown>): void;
    info(message: string, fields?: Record<string, unknown>): void;
    warn(message: string, fields?: Record<string, unknown>): void;
    error(message: string, fields?: Record<string, unknown>): void;
}

export function createLogger(tag: string): Logger {
    const write = (level: LogLevel, message: string, fields?: Record<string, unknown>): void => {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
        const suffix = fields && Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : "";
        console.error(`${new Date().toISOString()} ${level.toUpperCase()} [${tag}] ${message}${suffix}`);
    };
    return {
        debug: (message, fields) => write("debug", message, fields),
        info: (message, fields) => write("info", message, fields),
        warn: (message, fields) => write("warn", message, fields),
        error: (message, fields) => write("error", message, fields),
    };
}
