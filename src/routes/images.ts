/**
 * Image routes, mounted at /api/v1/images behind the rate limiter.
 *
 * POST /generate                  text-to-image (JSON)
 * POST /generate-from-references  prompt + 1..N reference images (JSON or multipart)
 * POST /edit                      edit one image, optional mask (JSON or multipart)
 * POST /variations                variations of one image (JSON or multipart)
 *
 * Handlers parse the body and delegate to ImageService; errors reach the
 * error handler through express-async-errors.
 */

import { Router, Request, Response } from "express";
import { logger } from "../config/logger";
import {
  parseEditRequest,
  parseGenerateRequest,
  parseReferenceRequest,
  parseVariationRequest,
  type ImageRequestDraft,
} from "../models/imageRequest";
import { createUploadMiddleware, filesOf } from "../middleware/upload";
import type { ImageService } from "../services/imageService";

export interface ImagesRouterOptions {
  imageService: ImageService;
  maxFileSize: number;
  maxReferenceImages: number;
}

export function createImagesRouter(options: ImagesRouterOptions): Router {
  const { imageService, maxReferenceImages } = options;
  const upload = createUploadMiddleware({ maxFileSize: options.maxFileSize, maxReferenceImages });
  const imagesRouter = Router();

  const run = async (req: Request, res: Response, draft: ImageRequestDraft): Promise<void> => {
    logger.info("images", `${draft.operation} request`, {
      requestId: req.requestId,
      model: draft.options.model,
      n: draft.options.n,
    });
    const envelope = await imageService.execute(draft);
    res.status(200).json(envelope);
  };

  // -------------------------------------------------------------------------
  // POST /generate
  // -------------------------------------------------------------------------

  imagesRouter.post("/generate", async (req: Request, res: Response): Promise<void> => {
    await run(req, res, parseGenerateRequest(req.body));
  });

  // -------------------------------------------------------------------------
  // POST /generate-from-references
  // -------------------------------------------------------------------------

  imagesRouter.post(
    "/generate-from-references",
    upload.referenceFields,
    async (req: Request, res: Response): Promise<void> => {
      const draft = parseReferenceRequest(req.body, filesOf(req.files), maxReferenceImages);
      await run(req, res, draft);
    }
  );

  // -------------------------------------------------------------------------
  // POST /edit
  // -------------------------------------------------------------------------

  imagesRouter.post("/edit", upload.editFields, async (req: Request, res: Response): Promise<void> => {
    await run(req, res, parseEditRequest(req.body, filesOf(req.files)));
  });

  // -------------------------------------------------------------------------
  // POST /variations
  // -------------------------------------------------------------------------

  imagesRouter.post("/variations", upload.imageField, async (req: Request, res: Response): Promise<void> => {
    await run(req, res, parseVariationRequest(req.body, filesOf(req.files)));
  });

  return imagesRouter;
}
