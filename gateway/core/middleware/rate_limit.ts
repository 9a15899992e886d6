import type { IncomingMessage } from "node:http";

/**
 * In-memory sliding window rate limiter.
 * Tracks request counts per key (API key prefix or remote IP) within a window.
 */
export interface RateLimitConfig {
    /** Maximum requests per window. Default: 60 */
    maxRequests: number;
    /** Window duration in milliseconds. Default: 60_000 */
    windowMs: number;
}

export type RateLimitResult = { allowed: true } | { allowed: false; retryAfterMs: number };

interface WindowEntry {
    timestamps: number[];
}

export class RateLimiter {
    private readonly config: RateLimitConfig;
    private readonly buckets = new Map<string, WindowEntry>();
    private cleanupTimer: NodeJS.Timeout | undefined;

    constructor(config: Partial<RateLimitConfig> = {}, private readonly now: () => number = Date.now) {
        this.config = {
            maxRequests: config.maxRequests ?? 60,
            windowMs: config.windowMs ?? 60_000,
        };
        this.cleanupTimer = setInterval(() => this.cleanup(), 5 * 60_000);
        this.cleanupTimer.unref();
    }

    /** Checks a request against the window and records it when allowed. */
    check(key: string): RateLimitResult {
        const now = this.now();
        const windowStart = now - this.config.windowMs;
        let entry = this.buckets.get(key);
        if (!entry) {
            entry = { timestamps: [] };
            this.buckets.set(key, entry);
        }
        entry.timestamps = entry.timestamps.filter((t) => t > windowStart);
        const oldestInWindow = entry.timestamps[0];
        if (oldestInWindow !== undefined && entry.timestamps.length >= this.config.maxRequests) {
            return { allowed: false, retryAfterMs: Math.max(0, oldestInWindow + this.config.windowMs - now) };
        }
        entry.timestamps.push(now);
        return { allowed: true };
    }

    private cleanup(): void {
        const cutoff = this.now() - this.config.windowMs;
        for (const [key, entry] of this.buckets) {
            entry.timestamps = entry.timestamps.filter((t) => t > cutoff);
            if (entry.timestamps.length === 0) this.buckets.delete(key);
        }
    }

    stop(): void {
        if (this.cleanupTimer) {
            clearInterval(this.cleanupTimer);
            this.cleanupTimer = undefined;
        }
    }
}

/** Uses the bearer token prefix when present, otherwise the remote IP. */
export function getRateLimitKey(req: IncomingMessage): string {
    const authHeader = req.headers.authorization;
    const match = authHeader?.match(/^Bearer\s+(.+)$/i);
    if (match?.[1]) return `key:${match[1].slice(0, 8)}`;
    const forwarded = req.headers["x-forwarded-for"];
    const ip = typeof forwarded === "string" ? forwarded.split(",")[0]?.trim() : req.socket.remoteAddress;
    return `ip:${ip || "unknown"}`;
}
