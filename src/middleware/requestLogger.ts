import crypto from "crypto";
import { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger";
import { monitoringService } from "../services/monitoringService";

/**
 * Request logging middleware with request ID correlation.
 *
 * Assigns a unique UUID to each request (available as req.requestId and
 * X-Request-Id response header), then logs structured data on response finish:
 *   - requestId, method, path, statusCode, durationMs, clientIp
 *
 * Responses with status >= 400 are logged at warn level.
 */
function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const requestId = crypto.randomUUID();
  const start = process.hrtime.bigint();

  req.requestId = requestId;

  // Set response header so clients can correlate
  res.setHeader("X-Request-Id", requestId);

  res.on("finish", () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1e6;

    monitoringService.recordRequest(durationMs);

    const extra = {
      requestId,
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      durationMs: Math.round(durationMs * 100) / 100,
      clientIp: req.ip,
    };
    const message = `${req.method} ${req.originalUrl} ${res.statusCode}`;

    if (res.statusCode >= 400) {
      logger.warn("http", message, extra);
    } else {
      logger.info("http", message, extra);
    }
  });

  next();
}

export { requestLogger };
