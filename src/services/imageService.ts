/**
 * Image service.
 *
 * Runs one image request end to end: capability check, image source
 * resolution, upstream dispatch, persistence, and assembly of the success
 * envelope. Routes only parse the body and hand over an ImageRequestDraft.
 *
 * Saving to disk is best effort. A failed write is reported on the image and
 * in `warnings`; the base64 data is still returned.
 */

import { UpstreamError } from "../errors";
import { logger } from "../config/logger";
import { monitoringService } from "./monitoringService";
import { validateCapabilities } from "./imageGeneration/capabilities";
import type { ImageOrchestrator } from "./imageGeneration/orchestrator";
import type {
  BinaryImage,
  DispatchResult,
  GenerationRequest,
  UpstreamImageResult,
} from "./imageGeneration/types";
import type { ImageSource, ImageSourceResolver } from "./imageSource";
import type { ImageStorage } from "./imageStorage";
import type { ImageRequestDraft } from "../models/imageRequest";
import type { ImageResult, ImageSuccessEnvelope, RequestParams } from "../models/imageResponse";

export interface ImageServiceOptions {
  orchestrator: ImageOrchestrator;
  storage: ImageStorage;
  resolver: ImageSourceResolver;
  /** Clock for the batch timestamp */
  now?: () => Date;
}

export class ImageService {
  private readonly orchestrator: ImageOrchestrator;
  private readonly storage: ImageStorage;
  private readonly resolver: ImageSourceResolver;
  private readonly now: () => Date;

  constructor(options: ImageServiceOptions) {
    this.orchestrator = options.orchestrator;
    this.storage = options.storage;
    this.resolver = options.resolver;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Reject requests the selected model cannot serve, before any image is
   * downloaded or decoded.
   */
  preflight(draft: ImageRequestDraft): void {
    validateCapabilities({
      operation: draft.operation,
      model: draft.options.model,
      size: draft.options.size,
      quality: draft.options.quality,
      responseFormat: draft.options.responseFormat,
      hasMask: draft.operation === "edit" && draft.mask !== undefined,
      promptLength: draft.operation === "vary" ? undefined : draft.prompt.length,
    });
  }

  async execute(draft: ImageRequestDraft): Promise<ImageSuccessEnvelope> {
    this.preflight(draft);

    const request = await this.resolve(draft);

    let result: DispatchResult;
    try {
      result = await this.orchestrator.dispatch(request);
    } catch (err: unknown) {
      if (err instanceof UpstreamError) {
        monitoringService.recordUpstreamFailure();
      }
      throw err;
    }

    if (result.failures.length > 0) {
      monitoringService.recordUpstreamFailure(result.failures.length);
    }

    const images = request.saveToDisk
      ? await this.persistAll(result.images, request)
      : result.images.map((image) => this.toImageResult(image));

    monitoringService.recordImagesGenerated(images.length);

    const warnings = [
      ...result.failures.map((f) => `Image ${f.index} failed: ${f.message}`),
      ...images
        .filter((image) => image.persistence_error !== undefined)
        .map((image) => `Image ${image.index} was not saved to disk: ${image.persistence_error}`),
    ];

    const envelope: ImageSuccessEnvelope = {
      success: true,
      message: this.successMessage(request, images.length),
      images,
      request_params: this.requestParams(request, result),
    };
    if (warnings.length > 0) {
      envelope.warnings = warnings;
    }
    return envelope;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async resolve(draft: ImageRequestDraft): Promise<GenerationRequest> {
    const { options } = draft;

    switch (draft.operation) {
      case "generate":
        return { ...options, operation: "generate", prompt: draft.prompt };

      case "edit": {
        const [image, mask] = await Promise.all([
          this.resolver.resolve(draft.image),
          draft.mask ? this.resolver.resolve(draft.mask) : Promise.resolve(undefined),
        ]);
        return { ...options, operation: "edit", prompt: draft.prompt, image, mask };
      }

      case "vary":
        return { ...options, operation: "vary", image: await this.resolver.resolve(draft.image) };

      case "generate_from_references": {
        const references: BinaryImage[] = await Promise.all(
          draft.references.map((source) => this.resolver.resolve(source))
        );
        const referenceUrls = draft.references
          .filter((source): source is Extract<ImageSource, { kind: "url" }> => source.kind === "url")
          .map((source) => source.url);
        return {
          ...options,
          operation: "generate_from_references",
          prompt: draft.prompt,
          references,
          referenceUrls: referenceUrls.length > 0 ? referenceUrls : undefined,
        };
      }
    }
  }

  private async persistAll(results: UpstreamImageResult[], request: GenerationRequest): Promise<ImageResult[]> {
    const batchTimestamp = this.now();

    const settled = await Promise.allSettled(
      results.map((image) => this.storage.persist(image, batchTimestamp, request.responseFormat))
    );

    return settled.map((outcome, i) => {
      const image = results[i];
      if (outcome.status === "fulfilled") {
        return this.toImageResult(image, outcome.value.filename, outcome.value.filePath);
      }

      const message = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
      monitoringService.recordPersistenceFailure();
      logger.error("imageService", "Failed to save generated image", { index: image.index, error: message });
      return { ...this.toImageResult(image), persistence_error: message };
    });
  }

  private toImageResult(image: UpstreamImageResult, filename?: string, filePath?: string): ImageResult {
    const result: ImageResult = {
      index: image.index,
      b64_json: image.b64Json,
      revised_prompt: image.revisedPrompt ?? null,
    };
    if (filename !== undefined && filePath !== undefined) {
      result.filename = filename;
      result.file_path = filePath;
    }
    return result;
  }

  private successMessage(request: GenerationRequest, returned: number): string {
    const count = returned < request.n ? `${returned} of ${request.n}` : String(returned);

    switch (request.operation) {
      case "generate":
        return `Successfully generated ${count} image(s)`;
      case "edit":
        return `Successfully edited image (${count} result(s))`;
      case "vary":
        return `Successfully created ${count} variation(s)`;
      case "generate_from_references":
        return `Successfully generated ${count} image(s) using ${request.references.length} reference(s)`;
    }
  }

  private requestParams(request: GenerationRequest, result: DispatchResult): RequestParams {
    const params: RequestParams = {
      model: request.model,
      size: result.size,
      quality: result.quality,
      n: request.n,
      response_format: request.responseFormat,
      save_to_disk: request.saveToDisk,
    };

    switch (request.operation) {
      case "generate":
        params.prompt = request.prompt;
        break;
      case "edit":
        params.prompt = request.prompt;
        params.has_mask = request.mask !== undefined;
        break;
      case "vary":
        break;
      case "generate_from_references":
        params.original_prompt = request.prompt;
        params.enhanced_prompt = result.upstreamPrompt;
        params.reference_count = request.references.length;
        if (request.referenceUrls) {
          params.reference_urls = request.referenceUrls;
        }
        break;
    }
    return params;
  }
}
