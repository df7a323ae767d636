/**
 * Request parsing for the image endpoints.
 *
 * Bodies arrive as JSON or as multipart forms (where every field is a
 * string), so numbers and booleans are coerced before validation. Every
 * problem is collected and reported in one ValidationError.
 *
 * The result is an ImageRequestDraft: the operation with its parameters and
 * the image inputs still as unresolved ImageSources.
 */

import { ValidationError, type FieldError } from "../errors";
import type { ImageSource } from "../services/imageSource";
import {
  IMAGE_MODELS,
  IMAGE_QUALITIES,
  IMAGE_SIZES,
  OUTPUT_FORMATS,
  isImageModel,
  isImageQuality,
  isImageSize,
  isOutputFormat,
  type ImageModel,
  type ImageQuality,
  type ImageSize,
  type OutputFormat,
} from "../services/imageGeneration/types";

export const MAX_IMAGES_PER_REQUEST = 10;
/** `n` cap for reference generation */
export const MAX_IMAGES_FROM_REFERENCES = 5;
export const DEFAULT_MAX_REFERENCE_IMAGES = 5;

export interface RequestOptions {
  model: ImageModel;
  size?: ImageSize;
  quality?: ImageQuality;
  n: number;
  responseFormat: OutputFormat;
  saveToDisk: boolean;
}

export type ImageRequestDraft =
  | { operation: "generate"; options: RequestOptions; prompt: string }
  | { operation: "edit"; options: RequestOptions; prompt: string; image: ImageSource; mask?: ImageSource }
  | { operation: "vary"; options: RequestOptions; image: ImageSource }
  | {
      operation: "generate_from_references";
      options: RequestOptions;
      prompt: string;
      references: ImageSource[];
    };

/** A multer file, reduced to what the parser needs. */
export interface UploadedFile {
  buffer: Buffer;
  mimetype: string;
  originalname: string;
}

export type UploadedFiles = Record<string, UploadedFile[] | undefined>;

type Body = Record<string, unknown>;

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

class FieldReader {
  readonly errors: FieldError[] = [];

  constructor(private readonly body: Body) {}

  private fail(field: string, message: string): undefined {
    this.errors.push({ field, message });
    return undefined;
  }

  optionalString(field: string): string | undefined {
    const value = this.body[field];
    if (value === undefined || value === null || value === "") return undefined;
    if (typeof value !== "string") return this.fail(field, "must be a string");
    return value;
  }

  prompt(field = "prompt"): string {
    const value = this.optionalString(field);
    if (value === undefined || value.trim() === "") {
      if (!this.errors.some((e) => e.field === field)) {
        this.fail(field, "is required");
      }
      return "";
    }
    return value.trim();
  }

  integer(field: string, fallback: number, min: number, max: number): number {
    const raw = this.body[field];
    if (raw === undefined || raw === null || raw === "") return fallback;
    const value = typeof raw === "string" ? Number(raw.trim()) : raw;
    if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
      this.fail(field, `must be an integer between ${min} and ${max}`);
      return fallback;
    }
    return value;
  }

  boolean(field: string, fallback: boolean): boolean {
    const raw = this.body[field];
    if (raw === undefined || raw === null || raw === "") return fallback;
    if (typeof raw === "boolean") return raw;
    if (typeof raw === "string") {
      const normalized = raw.trim().toLowerCase();
      if (normalized === "true" || normalized === "1") return true;
      if (normalized === "false" || normalized === "0") return false;
    }
    this.fail(field, "must be true or false");
    return fallback;
  }

  oneOf<T extends string>(
    field: string,
    allowed: readonly T[],
    guard: (value: unknown) => value is T
  ): T | undefined {
    const raw = this.optionalString(field);
    if (raw === undefined) return undefined;
    const value = raw.trim().toLowerCase();
    if (!guard(value)) {
      return this.fail(field, `must be one of: ${allowed.join(", ")}`);
    }
    return value;
  }

  /** Array field, or a comma-separated string from a form. */
  stringList(field: string): string[] {
    const raw = this.body[field];
    if (raw === undefined || raw === null || raw === "") return [];
    const items = Array.isArray(raw) ? raw : typeof raw === "string" ? raw.split(",") : null;
    if (items === null) {
      this.fail(field, "must be an array of strings or a comma-separated string");
      return [];
    }
    const strings: string[] = [];
    for (const item of items) {
      if (typeof item !== "string") {
        this.fail(field, "must contain only strings");
        return [];
      }
      if (item.trim() !== "") strings.push(item.trim());
    }
    return strings;
  }

  /** A single image given as a file, a URL field or a base64 field. */
  imageSource(files: UploadedFiles, fileField: string, urlField: string, b64Field: string): ImageSource | undefined {
    const file = files[fileField]?.[0];
    const url = this.optionalString(urlField);
    const b64 = this.optionalString(b64Field);

    const given = [file, url, b64].filter((x) => x !== undefined).length;
    if (given > 1) {
      return this.fail(fileField, `provide only one of ${fileField} (file), ${urlField} or ${b64Field}`);
    }
    if (file) {
      return { kind: "upload", buffer: file.buffer, mimeType: file.mimetype, filename: file.originalname };
    }
    if (url !== undefined) return { kind: "url", url: url.trim() };
    if (b64 !== undefined) return { kind: "base64", data: b64, filename: fileField };
    return undefined;
  }

  options(defaultModel: ImageModel, maxN: number): RequestOptions {
    return {
      model: this.oneOf("model", IMAGE_MODELS, isImageModel) ?? defaultModel,
      size: this.oneOf("size", IMAGE_SIZES, isImageSize),
      quality: this.oneOf("quality", IMAGE_QUALITIES, isImageQuality),
      n: this.integer("n", 1, 1, maxN),
      responseFormat: this.oneOf("response_format", OUTPUT_FORMATS, isOutputFormat) ?? "png",
      saveToDisk: this.boolean("save_to_disk", true),
    };
  }

  done(): void {
    if (this.errors.length > 0) {
      throw new ValidationError(this.errors);
    }
  }
}

function asBody(value: unknown): Body {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
}

// ---------------------------------------------------------------------------
// Parsers, one per endpoint
// ---------------------------------------------------------------------------

export function parseGenerateRequest(rawBody: unknown): ImageRequestDraft {
  const reader = new FieldReader(asBody(rawBody));
  const prompt = reader.prompt();
  const options = reader.options("dall-e-3", MAX_IMAGES_PER_REQUEST);
  reader.done();
  return { operation: "generate", options, prompt };
}

export function parseEditRequest(rawBody: unknown, files: UploadedFiles = {}): ImageRequestDraft {
  const reader = new FieldReader(asBody(rawBody));
  const prompt = reader.prompt();
  const options = reader.options("dall-e-2", MAX_IMAGES_PER_REQUEST);
  const image = reader.imageSource(files, "image", "image_url", "image_b64");
  const mask = reader.imageSource(files, "mask", "mask_url", "mask_b64");
  if (!image && !reader.errors.some((e) => e.field === "image")) {
    reader.errors.push({ field: "image", message: "an image file, image_url or image_b64 is required" });
  }
  reader.done();
  if (!image) {
    throw new ValidationError([{ field: "image", message: "is required" }]);
  }
  return { operation: "edit", options, prompt, image, mask };
}

export function parseVariationRequest(rawBody: unknown, files: UploadedFiles = {}): ImageRequestDraft {
  const reader = new FieldReader(asBody(rawBody));
  const options = reader.options("dall-e-2", MAX_IMAGES_PER_REQUEST);
  const image = reader.imageSource(files, "image", "image_url", "image_b64");
  if (!image && !reader.errors.some((e) => e.field === "image")) {
    reader.errors.push({ field: "image", message: "an image file, image_url or image_b64 is required" });
  }
  reader.done();
  if (!image) {
    throw new ValidationError([{ field: "image", message: "is required" }]);
  }
  return { operation: "vary", options, image };
}

export function parseReferenceRequest(
  rawBody: unknown,
  files: UploadedFiles = {},
  maxReferences = DEFAULT_MAX_REFERENCE_IMAGES
): ImageRequestDraft {
  const reader = new FieldReader(asBody(rawBody));
  const prompt = reader.prompt();
  const options = reader.options("gpt-image-1", MAX_IMAGES_FROM_REFERENCES);

  const references: ImageSource[] = [
    ...reader.stringList("image_urls").map((url): ImageSource => ({ kind: "url", url })),
    ...reader.stringList("images_b64").map(
      (data, i): ImageSource => ({ kind: "base64", data, filename: `reference_${i}` })
    ),
    ...(files.reference_images ?? []).map(
      (file): ImageSource => ({
        kind: "upload",
        buffer: file.buffer,
        mimeType: file.mimetype,
        filename: file.originalname,
      })
    ),
  ];

  if (references.length === 0) {
    reader.errors.push({
      field: "image_urls",
      message: "at least one reference image is required (image_urls, images_b64 or reference_images)",
    });
  } else if (references.length > maxReferences) {
    reader.errors.push({
      field: "image_urls",
      message: `at most ${maxReferences} reference images are allowed (got ${references.length})`,
    });
  }

  reader.done();
  return { operation: "generate_from_references", options, prompt, references };
}
