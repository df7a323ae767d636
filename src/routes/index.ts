/**
 * API Route Index
 *
 * Versioned routes are mounted under /api/v1 (set in app.ts). /health and /
 * live outside the rate limiter and are mounted by app.ts directly.
 *
 * ┌──────────────────────────────────────────────┬────────┬─────────────────────────────────────────┐
 * │ Endpoint                                     │ Method │ Description                             │
 * ├──────────────────────────────────────────────┼────────┼─────────────────────────────────────────┤
 * │ /api/v1/images/generate                      │ POST   │ Text-to-image                           │
 * │ /api/v1/images/generate-from-references      │ POST   │ Prompt + reference images               │
 * │ /api/v1/images/edit                          │ POST   │ Edit an image, optional mask            │
 * │ /api/v1/images/variations                    │ POST   │ Variations of an image                  │
 * └──────────────────────────────────────────────┴────────┴─────────────────────────────────────────┘
 *
 * Every /api/v1 route is rate limited per client IP.
 * Error responses follow the shape: { success: false, error, message, code, details?, request_id? }
 */

import { Router, type RequestHandler } from "express";
import { createImagesRouter, type ImagesRouterOptions } from "./images";

export interface ApiRouterOptions extends ImagesRouterOptions {
  rateLimiter: RequestHandler;
}

export function createApiRouter(options: ApiRouterOptions): Router {
  const router = Router();

  router.use(options.rateLimiter);

  // Images (generate, references, edit, variations)
  router.use("/images", createImagesRouter(options));

  return router;
}
