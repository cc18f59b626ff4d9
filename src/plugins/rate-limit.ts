import fp from "fastify-plugin";
import type { FastifyPluginCallback } from "fastify";

type RunWindow = { used: number; closesAt: number };

export type RateCheck = { ok: true; remaining: number; retryAfterSec: 0 } | { ok: false; remaining: 0; retryAfterSec: number };

/**
 * Fixed-window run allowance per client and bucket, plus one in-flight run per workflow
 * session. Closed windows are dropped on the next check.
 */
export class InMemoryRunLimiter {
  private windows = new Map<string, RunWindow>();
  private activeSessions = new Set<string>();

  constructor(private readonly clock: () => number = Date.now) {}

  check(client: string, bucket: string, limit: number, windowMs: number): RateCheck {
    const now = this.clock();
    this.dropClosedWindows(now);

    const key = `${bucket}:${client}`;
    const window = this.windows.get(key) ?? { used: 0, closesAt: now + windowMs };
    this.windows.set(key, window);

    if (window.used >= limit) {
      return { ok: false, remaining: 0, retryAfterSec: Math.ceil((window.closesAt - now) / 1000) };
    }
    window.used += 1;
    return { ok: true, remaining: limit - window.used, retryAfterSec: 0 };
  }

  /** Windows still open as of the last check. */
  openWindows() {
    return this.windows.size;
  }

  acquireSession(sessionId: string) {
    if (this.activeSessions.has(sessionId)) return false;
    this.activeSessions.add(sessionId);
    return true;
  }

  releaseSession(sessionId: string) {
    this.activeSessions.delete(sessionId);
  }

  private dropClosedWindows(now: number) {
    for (const [key, window] of this.windows) {
      if (now >= window.closesAt) {
        this.windows.delete(key);
      }
    }
  }
}

declare module "fastify" {
  interface FastifyInstance {
    runLimiter: InMemoryRunLimiter;
  }
}

export type RateLimitPluginOptions = {
  limiter?: InMemoryRunLimiter;
};

const rateLimitPlugin: FastifyPluginCallback<RateLimitPluginOptions> = (app, opts, done) => {
  app.decorate("runLimiter", opts.limiter ?? new InMemoryRunLimiter());
  done();
};

export default fp(rateLimitPlugin, { name: "rate-limit" });
