import { MAX_TIMEOUT_SECONDS } from "./core/terminal/process.js";
import { createLogger, parseLogLevel, type LogLevel } from "./lib/log.js";

const log = createLogger("config");

export type TransportKind = "stdio" | "http";

export interface AppConfig {
    transport: TransportKind;
    port: number;
    defaultTimeoutSeconds: number;
    historyLimit: number;
    historyOutputChars: number;
    maxOutputBytes: number;
    shell?: string;
    startDirectory?: string;
    extraDenyPatterns: string[];
    gatewayApiKey: string;
    rateLimitPerMinute: number;
    maxBodyBytes: number;
    logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function parsePositiveIntEnv(env: Env, name: string, fallback: number, max = Number.MAX_SAFE_INTEGER): number {
    const raw = env[name];
    if (!raw || !raw.trim()) return fallback;
    const parsed = Number(raw);
    if (!Number.isFinite(parsed) || parsed <= 0 || parsed > max) {
        log.warn(`${name}=${raw} is invalid, falling back to ${fallback}`);
        return fallback;
    }
    return Math.floor(parsed);
}

function optionalString(env: Env, name: string): string | undefined {
    const raw = env[name]?.trim();
    return raw ? raw : undefined;
}

function parseTransport(raw: string | undefined): TransportKind {
    const value = (raw ?? "").trim().toLowerCase();
    if (!value || value === "stdio") return "stdio";
    if (value === "http") return "http";
    log.warn(`TERMINAL_TRANSPORT=${raw} is invalid, falling back to stdio`);
    return "stdio";
}

export function loadConfigFromEnv(env: Env = process.env): AppConfig {
    return {
        transport: parseTransport(env.TERMINAL_TRANSPORT),
        port: parsePositiveIntEnv(env, "PORT", 8787),
        defaultTimeoutSeconds: parsePositiveIntEnv(env, "TERMINAL_DEFAULT_TIMEOUT_S", 30, MAX_TIMEOUT_SECONDS),
        historyLimit: parsePositiveIntEnv(env, "TERMINAL_HISTORY_LIMIT", 50),
        historyOutputChars: parsePositiveIntEnv(env, "TERMINAL_HISTORY_OUTPUT_CHARS", 500),
        maxOutputBytes: parsePositiveIntEnv(env, "TERMINAL_MAX_OUTPUT_BYTES", 1024 * 1024),
        shell: optionalString(env, "TERMINAL_SHELL"),
        startDirectory: optionalString(env, "TERMINAL_START_DIR"),
        extraDenyPatterns: (env.TERMINAL_DENY_PATTERNS ?? "")
            .split(";")
            .map((segment) => segment.trim())
            .filter((segment) => segment.length > 0),
        gatewayApiKey: env.GATEWAY_API_KEY ?? "",
        rateLimitPerMinute: parsePositiveIntEnv(env, "RATE_LIMIT_PER_MINUTE", 60),
        maxBodyBytes: parsePositiveIntEnv(env, "MAX_BODY_BYTES", 1024 * 1024),
        logLevel: parseLogLevel(env.LOG_LEVEL),
    };
}
