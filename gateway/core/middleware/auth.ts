import type { IncomingMessage } from "node:http";

export interface AuthResult {
    ok: boolean;
    error?: string;
}

export type AuthCheck = (req: IncomingMessage) => AuthResult;

/**
 * Bearer-token check for the HTTP control plane.
 * An empty key disables auth: every request is allowed.
 */
export function createAuthMiddleware(gatewayApiKey: string, publicPaths: string[]): AuthCheck {
    const publicSet = new Set(publicPaths);
    return (req) => {
        if (!gatewayApiKey) return { ok: true };

        const pathname = new URL(req.url ?? "/", "http://localhost").pathname;
        if (publicSet.has(pathname)) return { ok: true };

        const authHeader = req.headers.authorization;
        if (!authHeader) return { ok: false, error: "Authorization header is required" };
        const match = authHeader.match(/^Bearer\s+(.+)$/i);
        if (!match) return { ok: false, error: "Authorization header must use Bearer scheme" };
        if (match[1] !== gatewayApiKey) return { ok: false, error: "Invalid API key" };
        return { ok: true };
    };
}
