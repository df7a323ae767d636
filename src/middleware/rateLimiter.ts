/**
 * Rate limiting middleware using express-rate-limit.
 *
 * express-rate-limit handles the HTTP side (RateLimit-* and Retry-After
 * headers, the 429 response); the counting is delegated to an AdmissionGate
 * through a custom store, which gives a true sliding window instead of the
 * default fixed bucket.
 *
 * Per-IP isolation model:
 *   - Uses req.ip as the rate limit key so each client IP gets its own window.
 *   - When TRUST_PROXY=true is set in env (which calls app.set("trust proxy", 1)
 *     in app.ts), req.ip is derived from the X-Forwarded-For header.
 *   - ipKeyGenerator collapses IPv6 addresses to /56 subnets to prevent bypass.
 *
 * A rejected request never reaches the route handlers, so it never costs an
 * upstream call.
 */

import rateLimit, { ipKeyGenerator } from "express-rate-limit";
import type { ClientRateLimitInfo, RateLimitRequestHandler, Store } from "express-rate-limit";
import { Request, Response } from "express";
import { AdmissionGate } from "../services/admissionGate";
import { monitoringService } from "../services/monitoringService";
import { logger } from "../config/logger";

/**
 * express-rate-limit store backed by an AdmissionGate.
 *
 * The gate does not record rejected requests, so a rejection is reported to
 * express-rate-limit as one hit over the limit rather than as a real count.
 */
export class AdmissionGateStore implements Store {
  readonly localKeys = true;

  constructor(private readonly gate: AdmissionGate) {}

  increment(key: string): ClientRateLimitInfo {
    const decision = this.gate.admit(key);

    return {
      totalHits: decision.allowed ? decision.count : this.gate.limit + 1,
      resetTime: new Date(decision.resetAt),
    };
  }

  get(key: string): ClientRateLimitInfo | undefined {
    const count = this.gate.count(key);
    if (count === 0) return undefined;
    return { totalHits: count, resetTime: undefined };
  }

  decrement(key: string): void {
    this.gate.release(key);
  }

  resetKey(key: string): void {
    this.gate.reset(key);
  }

  resetAll(): void {
    this.gate.reset();
  }

  shutdown(): void {
    this.gate.stop();
  }
}

function describeWindow(windowMs: number): string {
  if (windowMs === 60_000) return "minute";
  if (windowMs % 60_000 === 0) return `${windowMs / 60_000} minutes`;
  return `${Math.round(windowMs / 1000)} seconds`;
}

/**
 * Build the admission middleware for the image API.
 * Each call creates its own store; express-rate-limit refuses to share one.
 */
export function createRateLimiter(gate: AdmissionGate): RateLimitRequestHandler {
  const windowLabel = describeWindow(gate.windowMs);

  return rateLimit({
    windowMs: gate.windowMs,
    limit: gate.limit,
    standardHeaders: true, // Return rate limit info in RateLimit-* headers
    legacyHeaders: false, // Disable X-RateLimit-* headers
    store: new AdmissionGateStore(gate),
    keyGenerator: (req: Request) => ipKeyGenerator(req.ip || "unknown"),
    handler: (req: Request, res: Response) => {
      const retryAfterHeader = Number(res.getHeader("Retry-After"));
      const retryAfter = Number.isFinite(retryAfterHeader)
        ? retryAfterHeader
        : Math.ceil(gate.windowMs / 1000);

      monitoringService.recordRateLimited();
      logger.warn("rateLimiter", "Request rejected by admission gate", {
        requestId: req.requestId,
        ip: req.ip,
        path: req.originalUrl,
        retryAfter,
      });

      res.status(429).json({
        success: false,
        error: "Rate limit exceeded",
        message: `Maximum ${gate.limit} requests per ${windowLabel} allowed`,
        code: "RATE_LIMIT_EXCEEDED",
        retry_after: retryAfter,
      });
    },
  });
}
