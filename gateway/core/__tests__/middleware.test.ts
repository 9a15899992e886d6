import test from "node:test";
import assert from "node:assert/strict";
import { IncomingMessage } from "node:http";
import { Socket } from "node:net";
import { createAuthMiddleware } from "../middleware/auth.js";
import { RateLimiter, getRateLimitKey } from "../middleware/rate_limit.js";

function makeRequest(url: string, headers: Record<string, string> = {}): IncomingMessage {
  const req = new IncomingMessage(new Socket());
  req.url = url;
  req.headers = headers;
  return req;
}

test("auth is disabled when no key is configured", () => {
  const check = createAuthMiddleware("", ["/healthz"]);
  assert.deepEqual(check(makeRequest("/api/terminal/cwd")), { ok: true });
});

test("auth requires a matching bearer token except on public paths", () => {
  const check = createAuthMiddleware("test-secret", ["/healthz"]);
  assert.deepEqual(check(makeRequest("/healthz")), { ok: true });
  assert.deepEqual(check(makeRequest("/api/terminal/cwd")), { ok: false, error: "Authorization header is required" });
  assert.deepEqual(check(makeRequest("/api/terminal/cwd", { authorization: "Basic abc" })), {
    ok: false,
    error: "Authorization header must use Bearer scheme",
  });
  assert.deepEqual(check(makeRequest("/api/terminal/cwd", { authorization: "Bearer wrong" })), { ok: false, error: "Invalid API key" });
  assert.deepEqual(check(makeRequest("/api/terminal/cwd?x=1", { authorization: "Bearer test-secret" })), { ok: true });
});

test("rate limiter allows up to the limit and reports retry delay", () => {
  let now = 1_000;
  const limiter = new RateLimiter({ maxRequests: 2, windowMs: 1_000 }, () => now);
  try {
    assert.deepEqual(limiter.check("k"), { allowed: true });
    now += 100;
    assert.deepEqual(limiter.check("k"), { allowed: true });
    now += 100;
    assert.deepEqual(limiter.check("k"), { allowed: false, retryAfterMs: 800 });
    assert.deepEqual(limiter.check("other"), { allowed: true });
    now += 801;
    assert.deepEqual(limiter.check("k"), { allowed: true });
  } finally {
    limiter.stop();
  }
});

test("rate limit key prefers the bearer token, then forwarded ip", () => {
  assert.equal(getRateLimitKey(makeRequest("/", { authorization: "Bearer test-secret-value" })), "key:test-sec");
  assert.equal(getRateLimitKey(makeRequest("/", { "x-forwarded-for": "10.0.0.1, 10.0.0.2" })), "ip:10.0.0.1");
  assert.equal(getRateLimitKey(makeRequest("/")), "ip:unknown");
});
