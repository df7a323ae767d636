/**
 * Upstream orchestrator.
 *
 * Turns a GenerationRequest into provider calls:
 *   1. validate the request against the capability matrix (no network yet)
 *   2. fill in size/quality defaults
 *   3. call the provider once, or fan out in parallel when the model makes
 *      fewer images per call than were requested (dall-e-3 makes one)
 *   4. collect what came back, ordered by index, with one failure entry per
 *      missing image
 *
 * Transient failures (network, timeout, 429, 5xx) are retried at most
 * `maxRetries` times with exponential backoff. No idempotency key is sent, so
 * a retry after an upstream timeout can bill twice; maxRetries defaults to 0.
 * Content-policy rejections are terminal.
 */

import { AppError, UpstreamError, ValidationError } from "../../errors";
import { logger } from "../../config/logger";
import {
  MODEL_CAPABILITIES,
  resolveSettings,
  validateCapabilities,
  type SettingDefaults,
} from "./capabilities";
import type {
  BatchFailure,
  DispatchResult,
  GenerationRequest,
  ImageGenerationProvider,
  ImageQuality,
  ImageSize,
  ProviderBatch,
  UpstreamImageResult,
} from "./types";

export interface ImageOrchestratorOptions {
  provider: ImageGenerationProvider;
  /** Configured DEFAULT_IMAGE_SIZE / DEFAULT_IMAGE_QUALITY */
  defaults: SettingDefaults;
  /** Extra attempts on transient failures (0 or 1) */
  maxRetries?: number;
  /** Delay before the first retry; doubles on each further attempt */
  retryBaseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/** Prompt sent upstream for reference-conditioned generation. */
export function buildReferencePrompt(prompt: string, referenceCount: number): string {
  if (referenceCount === 1) {
    return (
      `Create a new image based on this reference: ${prompt}. ` +
      "Use the style, composition, and visual elements from the reference image as inspiration " +
      "while generating the requested scene."
    );
  }
  return (
    `Create a new image combining elements from ${referenceCount} reference images: ${prompt}. ` +
    "Synthesize the visual styles, color palettes, and artistic elements from all references " +
    "into a cohesive artwork."
  );
}

/** Split n images into per-call batch sizes. */
function splitBatches(n: number, perCall: number): number[] {
  const sizes: number[] = [];
  for (let remaining = n; remaining > 0; remaining -= perCall) {
    sizes.push(Math.min(perCall, remaining));
  }
  return sizes;
}

function toUpstreamError(error: unknown): UpstreamError {
  if (error instanceof UpstreamError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new UpstreamError(`Image provider failed: ${message}`);
}

interface CallSettings {
  size: ImageSize;
  quality: ImageQuality;
  prompt?: string;
}

export class ImageOrchestrator {
  private readonly provider: ImageGenerationProvider;
  private readonly defaults: SettingDefaults;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: ImageOrchestratorOptions) {
    this.provider = options.provider;
    this.defaults = options.defaults;
    this.maxRetries = Math.min(Math.max(options.maxRetries ?? 0, 0), 1);
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 500;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  get providerName(): string {
    return this.provider.name;
  }

  /** Delegates to the provider's connectivity probe. */
  checkStatus(): Promise<boolean> {
    return this.provider.checkStatus();
  }

  async dispatch(request: GenerationRequest): Promise<DispatchResult> {
    this.assertWellFormed(request);

    validateCapabilities({
      operation: request.operation,
      model: request.model,
      size: request.size,
      quality: request.quality,
      responseFormat: request.responseFormat,
      hasMask: request.operation === "edit" && request.mask !== undefined,
      promptLength: request.operation === "vary" ? undefined : request.prompt.length,
    });

    const { size, quality } = resolveSettings(request.model, request.size, request.quality, this.defaults);
    const upstreamPrompt =
      request.operation === "generate_from_references"
        ? buildReferencePrompt(request.prompt, request.references.length)
        : request.operation === "vary"
          ? undefined
          : request.prompt;

    const settings: CallSettings = { size, quality, prompt: upstreamPrompt };
    const perCall = MODEL_CAPABILITIES[request.model].maxImagesPerCall;
    const batchSizes = splitBatches(request.n, perCall);

    logger.info("orchestrator", `Dispatching ${request.operation} to ${this.provider.name}`, {
      model: request.model,
      n: request.n,
      calls: batchSizes.length,
      size,
      quality,
    });

    const images: UpstreamImageResult[] = [];
    const failures: BatchFailure[] = [];

    if (batchSizes.length === 1) {
      // Single round trip: a failure here fails the whole request
      const batch = await this.withRetry(() => this.callProvider(request, settings, request.n));
      this.collect(batch, 0, request.n, images, failures);
    } else {
      const settled = await Promise.allSettled(
        batchSizes.map((count) => this.withRetry(() => this.callProvider(request, settings, count)))
      );

      let offset = 0;
      const errors: UpstreamError[] = [];
      for (const [slot, outcome] of settled.entries()) {
        const count = batchSizes[slot];
        if (outcome.status === "fulfilled") {
          this.collect(outcome.value, offset, count, images, failures);
        } else {
          const error = toUpstreamError(outcome.reason);
          errors.push(error);
          for (let i = 0; i < count; i++) {
            failures.push({ index: offset + i, code: error.code, message: error.message });
          }
        }
        offset += count;
      }

      if (images.length === 0 && errors.length > 0) {
        throw errors[0];
      }
    }

    if (images.length === 0) {
      throw new UpstreamError("Image provider returned no images.");
    }

    images.sort((a, b) => a.index - b.index);

    if (failures.length > 0) {
      logger.warn("orchestrator", "Partial batch", {
        model: request.model,
        requested: request.n,
        returned: images.length,
        failures: failures.map((f) => f.code),
      });
    }

    return { requested: request.n, images, failures, size, quality, upstreamPrompt };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private assertWellFormed(request: GenerationRequest): void {
    if (!Number.isInteger(request.n) || request.n < 1) {
      throw new ValidationError([{ field: "n", message: "n must be an integer of at least 1" }]);
    }
    if (request.operation !== "vary" && request.prompt.trim() === "") {
      throw new ValidationError([{ field: "prompt", message: "prompt is required" }]);
    }
    if (request.operation === "generate_from_references" && request.references.length === 0) {
      throw new ValidationError([
        { field: "image_urls", message: "At least one reference image is required" },
      ]);
    }
  }

  private callProvider(request: GenerationRequest, settings: CallSettings, n: number): Promise<ProviderBatch> {
    const { size, quality } = settings;
    const base = { model: request.model, size, quality, n, outputFormat: request.responseFormat };

    switch (request.operation) {
      case "generate":
        return this.provider.generate({ ...base, prompt: settings.prompt ?? request.prompt });
      case "edit":
        return this.provider.edit({
          ...base,
          prompt: settings.prompt ?? request.prompt,
          images: [request.image],
          mask: request.mask,
        });
      case "vary":
        return this.provider.createVariation({ model: request.model, image: request.image, size, n });
      case "generate_from_references":
        return this.provider.edit({
          ...base,
          prompt: settings.prompt ?? request.prompt,
          images: request.references,
        });
    }
  }

  /** Index the images of one provider batch, with one failure per missing image. */
  private collect(
    batch: ProviderBatch,
    offset: number,
    expected: number,
    images: UpstreamImageResult[],
    failures: BatchFailure[]
  ): void {
    const received = batch.images.slice(0, expected);
    received.forEach((image, i) => {
      images.push({ index: offset + i, b64Json: image.b64Json, revisedPrompt: image.revisedPrompt });
    });

    for (let i = received.length; i < expected; i++) {
      failures.push({
        index: offset + i,
        code: "MISSING_IMAGES",
        message: `Provider returned ${received.length} of ${expected} requested image(s)`,
      });
    }
  }

  private async withRetry(call: () => Promise<ProviderBatch>): Promise<ProviderBatch> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await call();
      } catch (error: unknown) {
        const upstream = toUpstreamError(error);
        const retryable = upstream.transient && !upstream.contentPolicy && attempt < this.maxRetries;
        if (!retryable) {
          throw error instanceof AppError ? error : upstream;
        }

        const delayMs = this.retryBaseDelayMs * 2 ** attempt;
        logger.warn("orchestrator", "Transient upstream failure, retrying", {
          attempt: attempt + 1,
          delayMs,
          error: upstream.message,
        });
        await this.sleep(delayMs);
      }
    }
  }
}
