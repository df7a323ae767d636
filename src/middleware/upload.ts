/**
 * Multipart upload handling (multer, in-memory storage).
 *
 * Files stay in memory and are handed to the image source resolver as
 * buffers. Size and count limits are enforced by multer; its errors are
 * mapped to the failure envelope in errorHandler.
 */

import multer from "multer";
import type { RequestHandler } from "express";
import type { UploadedFiles } from "../models/imageRequest";

export interface UploadLimits {
  maxFileSize: number;
  maxReferenceImages: number;
}

export interface UploadMiddleware {
  /** `image` only (variations) */
  imageField: RequestHandler;
  /** `image` and optional `mask` (edit) */
  editFields: RequestHandler;
  /** `reference_images`, with or without the `[]` suffix */
  referenceFields: RequestHandler;
}

export function createUploadMiddleware(limits: UploadLimits): UploadMiddleware {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: limits.maxFileSize, files: limits.maxReferenceImages + 2 },
  });

  return {
    imageField: upload.fields([{ name: "image", maxCount: 1 }]),
    editFields: upload.fields([
      { name: "image", maxCount: 1 },
      { name: "mask", maxCount: 1 },
    ]),
    referenceFields: upload.fields([
      { name: "reference_images", maxCount: limits.maxReferenceImages },
      { name: "reference_images[]", maxCount: limits.maxReferenceImages },
    ]),
  };
}

/**
 * Uploaded files keyed by field name. JSON requests have none.
 * `reference_images[]` is folded into `reference_images`.
 */
export function filesOf(files: Express.Request["files"]): UploadedFiles {
  if (!files || Array.isArray(files)) {
    return {};
  }
  const result: UploadedFiles = { ...files };
  const bracketed = files["reference_images[]"];
  if (bracketed) {
    result.reference_images = [...(files.reference_images ?? []), ...bracketed];
  }
  return result;
}
