import { createServer, type Server } from "node:http";
import { Router, json } from "./lib/router.js";
import { createLogger } from "./lib/log.js";
import type { AppConfig } from "./config.js";
import type { CommandExecutor } from "./core/terminal/executor.js";

// Routes
import { healthzRoute } from "./routes/health.js";
import {
    changeDirectoryRoute,
    currentDirectoryRoute,
    executeRoute,
    historyRoute,
    listDirectoryRoute,
    writeFileRoute,
} from "./routes/terminal.js";

// Middleware
import { createAuthMiddleware } from "./core/middleware/auth.js";
import { RateLimiter, getRateLimitKey } from "./core/middleware/rate_limit.js";

const log = createLogger("gateway");

export type HttpAppConfig = Pick<AppConfig, "gatewayApiKey" | "rateLimitPerMinute" | "maxBodyBytes">;

export function createApp(config: HttpAppConfig, executor: CommandExecutor): { server: Server; shutdown: () => Promise<void> } {
    if (!config.gatewayApiKey) log.warn("GATEWAY_API_KEY is empty: API authentication is disabled (all requests allowed)");

    const authCheck = createAuthMiddleware(config.gatewayApiKey, ["/healthz"]);

    // Only spawning endpoints are rate limited.
    const rateLimiter = new RateLimiter({ maxRequests: config.rateLimitPerMinute, windowMs: 60_000 });
    const rateLimitedPaths = new Set(["/api/terminal/execute"]);

    const router = new Router();
    router.get("/healthz", healthzRoute(executor));
    router.post("/api/terminal/execute", executeRoute(executor, config.maxBodyBytes));
    router.get("/api/terminal/history", historyRoute(executor));
    router.get("/api/terminal/cwd", currentDirectoryRoute(executor));
    router.post("/api/terminal/cd", changeDirectoryRoute(executor, config.maxBodyBytes));
    router.get("/api/terminal/ls", listDirectoryRoute(executor));
    router.post("/api/terminal/files", writeFileRoute(executor, config.maxBodyBytes));

    const server = createServer(async (req, res) => {
        const authResult = authCheck(req);
        if (!authResult.ok) {
            json(res, 401, { ok: false, error: authResult.error, error_code: "AUTH_REQUIRED" });
            return;
        }

        const pathname = new URL(req.url ?? "/", "http://localhost").pathname;
        if (rateLimitedPaths.has(pathname)) {
            const result = rateLimiter.check(getRateLimitKey(req));
            if (!result.allowed) {
                json(res, 429, { ok: false, error: "rate limit exceeded", error_code: "RATE_LIMITED", retry_after_ms: result.retryAfterMs });
                return;
            }
        }

        try {
            const handled = await router.handle(req, res);
            if (!handled) json(res, 404, { ok: false, error: "not found", error_code: "NOT_FOUND" });
        } catch (error) {
            log.error("unhandled route error", { path: pathname, error: (error as Error).message });
            if (!res.headersSent) json(res, 500, { ok: false, error: "internal error", error_code: "INTERNAL" });
        }
    });

    let isShuttingDown = false;
    async function shutdown(): Promise<void> {
        if (isShuttingDown) return;
        isShuttingDown = true;
        log.info("shutting down gracefully…");
        rateLimiter.stop();
        await new Promise<void>((resolve) => {
            const force = setTimeout(() => {
                log.warn("force closing after timeout");
                server.closeAllConnections();
                resolve();
            }, 10_000);
            force.unref();
            server.close(() => {
                clearTimeout(force);
                resolve();
            });
        });
        log.info("shutdown complete");
    }

    return { server, shutdown };
}
