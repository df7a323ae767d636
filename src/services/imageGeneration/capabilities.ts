/**
 * Model capability matrix.
 *
 * One row per model: which operations it accepts and which parameter values
 * the upstream API takes for it. Adding a model means adding a row here and
 * to IMAGE_MODELS.
 */

import { CapabilityError } from "../../errors";
import { IMAGE_MODELS } from "./types";
import type {
  ImageModel,
  ImageOperation,
  ImageQuality,
  ImageSize,
  OutputFormat,
} from "./types";

export interface ModelCapabilities {
  operations: readonly ImageOperation[];
  /** Accepts a mask alongside an edit */
  inpainting: boolean;
  sizes: readonly ImageSize[];
  qualities: readonly ImageQuality[];
  outputFormats: readonly OutputFormat[];
  /** Images the upstream produces per call; larger batches are fanned out */
  maxImagesPerCall: number;
  maxPromptLength: number;
  defaultSize: ImageSize;
  defaultQuality: ImageQuality;
}

export const MODEL_CAPABILITIES: Record<ImageModel, ModelCapabilities> = {
  "dall-e-2": {
    operations: ["generate", "edit", "vary"],
    inpainting: true,
    sizes: ["256x256", "512x512", "1024x1024"],
    qualities: ["standard"],
    outputFormats: ["png"],
    maxImagesPerCall: 10,
    maxPromptLength: 1000,
    defaultSize: "1024x1024",
    defaultQuality: "standard",
  },
  "dall-e-3": {
    operations: ["generate"],
    inpainting: false,
    sizes: ["1024x1024", "1792x1024", "1024x1792"],
    qualities: ["standard", "hd"],
    outputFormats: ["png"],
    maxImagesPerCall: 1,
    maxPromptLength: 4000,
    defaultSize: "1024x1024",
    defaultQuality: "standard",
  },
  "gpt-image-1": {
    operations: ["generate", "edit", "generate_from_references"],
    inpainting: false,
    sizes: ["1024x1024", "1536x1024", "1024x1536", "auto"],
    qualities: ["low", "medium", "high", "auto"],
    outputFormats: ["png", "jpeg", "webp"],
    maxImagesPerCall: 10,
    maxPromptLength: 32000,
    defaultSize: "1024x1024",
    defaultQuality: "auto",
  },
};

const OPERATION_LABELS: Record<ImageOperation, string> = {
  generate: "Image generation",
  edit: "Image edits",
  vary: "Variations",
  generate_from_references: "Reference-based generation",
};

/** Everything needed to decide whether a request can be served, without its image bytes. */
export interface CapabilityQuery {
  operation: ImageOperation;
  model: ImageModel;
  size?: ImageSize;
  quality?: ImageQuality;
  responseFormat: OutputFormat;
  hasMask?: boolean;
  promptLength?: number;
}

/** Models that support an operation, in IMAGE_MODELS order. */
export function modelsSupporting(operation: ImageOperation): ImageModel[] {
  return IMAGE_MODELS.filter((model) => MODEL_CAPABILITIES[model].operations.includes(operation));
}

/**
 * Throw CapabilityError if the model cannot serve the request as described.
 * Runs before any image is fetched or any upstream call is made.
 */
export function validateCapabilities(query: CapabilityQuery): void {
  const caps = MODEL_CAPABILITIES[query.model];
  const label = OPERATION_LABELS[query.operation];

  if (!caps.operations.includes(query.operation)) {
    throw new CapabilityError(
      `${label} ${label.endsWith("s") ? "are" : "is"} not supported by ${query.model}. ` +
        `Supported models: ${modelsSupporting(query.operation).join(", ")}`
    );
  }

  if (query.hasMask && !caps.inpainting) {
    throw new CapabilityError(
      `Masks (inpainting) are not supported by ${query.model}. ` +
        `Supported models: ${modelsSupporting("edit").filter((m) => MODEL_CAPABILITIES[m].inpainting).join(", ")}`
    );
  }

  if (query.size !== undefined && !caps.sizes.includes(query.size)) {
    throw new CapabilityError(
      `Size ${query.size} is not supported by ${query.model}. Supported sizes: ${caps.sizes.join(", ")}`
    );
  }

  if (query.quality !== undefined && !caps.qualities.includes(query.quality)) {
    throw new CapabilityError(
      `Quality "${query.quality}" is not supported by ${query.model}. ` +
        `Supported qualities: ${caps.qualities.join(", ")}`
    );
  }

  if (!caps.outputFormats.includes(query.responseFormat)) {
    throw new CapabilityError(
      `Output format "${query.responseFormat}" is not supported by ${query.model}. ` +
        `Supported formats: ${caps.outputFormats.join(", ")}`
    );
  }

  if (query.promptLength !== undefined && query.promptLength > caps.maxPromptLength) {
    throw new CapabilityError(
      `Prompt is ${query.promptLength} characters; ${query.model} accepts at most ${caps.maxPromptLength}`
    );
  }
}

export interface SettingDefaults {
  size: string;
  quality: string;
}

/**
 * Fill in omitted size and quality. Configured defaults win when the model
 * supports them; otherwise the model's own default is used.
 */
export function resolveSettings(
  model: ImageModel,
  size: ImageSize | undefined,
  quality: ImageQuality | undefined,
  defaults: SettingDefaults
): { size: ImageSize; quality: ImageQuality } {
  const caps = MODEL_CAPABILITIES[model];

  const configuredSize = caps.sizes.find((s) => s === defaults.size);
  const configuredQuality = caps.qualities.find((q) => q === defaults.quality);

  return {
    size: size ?? configuredSize ?? caps.defaultSize,
    quality: quality ?? configuredQuality ?? caps.defaultQuality,
  };
}
