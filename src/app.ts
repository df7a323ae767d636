import "express-async-errors"; // Must be imported before any route handlers
import express, { Request, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import * as path from "path";
import { createApiRouter } from "./routes/index";
import { createHealthRouter, SERVICE_NAME, SERVICE_VERSION } from "./routes/health";
import { errorHandler } from "./middleware/errorHandler";
import { requestLogger } from "./middleware/requestLogger";
import { createRateLimiter } from "./middleware/rateLimiter";
import { env, type EnvConfig } from "./config/env";
import { AdmissionGate } from "./services/admissionGate";
import { ImageService } from "./services/imageService";
import { ImageSourceResolver } from "./services/imageSource";
import { ImageStorage } from "./services/imageStorage";
import { createImageProvider, ImageOrchestrator } from "./services/imageGeneration";
import type { ImageGenerationProvider } from "./services/imageGeneration";
import type { FailureEnvelope } from "./models/imageResponse";

export interface AppDependencies {
  gate: AdmissionGate;
  orchestrator: ImageOrchestrator;
  imageService: ImageService;
  config: Pick<
    EnvConfig,
    "TRUST_PROXY" | "CORS_ORIGIN" | "JSON_BODY_LIMIT" | "MAX_FILE_SIZE" | "MAX_REFERENCE_IMAGES"
  >;
}

/**
 * Wire the services from configuration. Tests pass their own provider
 * and override any setting.
 */
export function buildDependencies(
  config: EnvConfig = env,
  provider: ImageGenerationProvider = createImageProvider(config.IMAGE_PROVIDER, config)
): AppDependencies {
  const gate = new AdmissionGate({ limit: config.RATE_LIMIT_PER_MINUTE, windowMs: config.RATE_LIMIT_WINDOW_MS });

  const orchestrator = new ImageOrchestrator({
    provider,
    defaults: { size: config.DEFAULT_IMAGE_SIZE, quality: config.DEFAULT_IMAGE_QUALITY },
    maxRetries: config.UPSTREAM_MAX_RETRIES,
    retryBaseDelayMs: config.UPSTREAM_RETRY_BASE_DELAY_MS,
  });

  const resolver = new ImageSourceResolver({
    maxBytes: config.MAX_FILE_SIZE,
    allowedFormats: config.ALLOWED_IMAGE_FORMATS,
    fetchTimeoutMs: config.URL_FETCH_TIMEOUT_MS,
    blockPrivateAddresses: config.BLOCK_PRIVATE_URLS,
  });

  const storage = new ImageStorage({ outputDir: path.resolve(config.GENERATED_IMAGES_DIR) });

  return {
    gate,
    orchestrator,
    imageService: new ImageService({ orchestrator, storage, resolver }),
    config,
  };
}

export function createApp(deps: AppDependencies): express.Express {
  const { config } = deps;
  const app = express();

  // Trust proxy headers (X-Forwarded-For, etc.) when running behind nginx/load balancer.
  // Required for accurate client identity in the admission gate and request logging.
  if (config.TRUST_PROXY) {
    app.set("trust proxy", 1);
  }

  // Security headers
  app.use(helmet());

  app.use(cors({ origin: config.CORS_ORIGIN }));

  // Body parsing; base64 images make JSON bodies large
  app.use(express.json({ limit: config.JSON_BODY_LIMIT }));
  app.use(express.urlencoded({ extended: true, limit: config.JSON_BODY_LIMIT }));

  // Request logging
  app.use(requestLogger);

  // Service info and liveness, outside the rate limiter
  app.get("/", (_req: Request, res: Response) => {
    res.json({
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      health: "/health",
      endpoints: [
        "POST /api/v1/images/generate",
        "POST /api/v1/images/generate-from-references",
        "POST /api/v1/images/edit",
        "POST /api/v1/images/variations",
      ],
    });
  });
  app.use("/health", createHealthRouter(deps.orchestrator));

  // API routes (rate limited)
  app.use(
    "/api/v1",
    createApiRouter({
      rateLimiter: createRateLimiter(deps.gate),
      imageService: deps.imageService,
      maxFileSize: config.MAX_FILE_SIZE,
      maxReferenceImages: config.MAX_REFERENCE_IMAGES,
    })
  );

  // Catch-all 404 for any /api route that was not matched above
  app.use("/api", (req: Request, res: Response) => {
    const body: FailureEnvelope = {
      success: false,
      error: `No route for ${req.method} ${req.originalUrl}`,
      message: "Not found",
      code: "NOT_FOUND",
      request_id: req.requestId,
    };
    res.status(404).json(body);
  });

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}
