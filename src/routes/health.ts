/**
 * Health check endpoint.
 *
 * Liveness probe: always answers 200 while the process is up. Upstream
 * reachability and the in-memory metrics are reported, not enforced.
 *
 * Response shape:
 *   {
 *     status: "ok",
 *     timestamp: string,
 *     version: string,
 *     uptime: number,
 *     upstream: { provider: string, status: "healthy" | "unhealthy" },
 *     metrics: { requestCount, errorCount, avgResponseTimeMs, ... }
 *   }
 */

import { Router, Request, Response } from "express";
import { monitoringService } from "../services/monitoringService";

export const SERVICE_NAME = "image-gateway";
export const SERVICE_VERSION = "1.0.0";

export interface UpstreamProbe {
  readonly providerName: string;
  checkStatus(): Promise<boolean>;
}

export function createHealthRouter(upstream: UpstreamProbe): Router {
  const healthRouter = Router();

  healthRouter.get("/", async (_req: Request, res: Response) => {
    const healthy = await upstream.checkStatus();

    res.status(200).json({
      status: "ok",
      timestamp: new Date().toISOString(),
      version: SERVICE_VERSION,
      uptime: process.uptime(),
      upstream: {
        provider: upstream.providerName,
        status: healthy ? "healthy" : "unhealthy",
      },
      metrics: monitoringService.getMetrics(),
    });
  });

  return healthRouter;
}
