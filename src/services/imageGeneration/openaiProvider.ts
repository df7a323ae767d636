/**
 * OpenAI image generation provider.
 *
 * Calls the OpenAI Images API directly via fetch (no SDK dependency):
 *   - POST /images/generations  (JSON)
 *   - POST /images/edits        (multipart; also used for reference images)
 *   - POST /images/variations   (multipart)
 *   - GET  /models              (connectivity probe)
 *
 * dall-e models are asked for base64 output; gpt-image-1 always answers in
 * base64 and takes an output_format instead. Every call carries a timeout.
 */

import { UpstreamError } from "../../errors";
import { logger } from "../../config/logger";
import type {
  BinaryImage,
  ImageGenerationProvider,
  ProviderBatch,
  ProviderEditParams,
  ProviderGenerateParams,
  ProviderImage,
  ProviderVariationParams,
} from "./types";

/** Shape of the Images API response */
interface OpenAIImagesResponse {
  created?: number;
  data?: Array<{
    b64_json?: string;
    url?: string;
    revised_prompt?: string;
  }>;
}

interface ApiRequest {
  method: "GET" | "POST";
  /** JSON string or multipart form */
  body?: string | FormData;
}

interface ApiResponse {
  status: number;
  statusText: string;
  text: string;
}

/** Shape of the OpenAI API error response */
interface OpenAIErrorResponse {
  error?: {
    message?: string;
    type?: string;
    code?: string | null;
  };
}

export interface OpenAIImageProviderOptions {
  apiKey: string;
  baseUrl?: string;
  /** Timeout for each API call in milliseconds */
  timeoutMs?: number;
  /** Timeout for the connectivity probe in milliseconds */
  probeTimeoutMs?: number;
}

const CONTENT_POLICY_CODES = new Set(["content_policy_violation", "moderation_blocked"]);

function isGptImageModel(model: string): boolean {
  return model.startsWith("gpt-image");
}

function toBlob(image: BinaryImage): Blob {
  return new Blob([new Uint8Array(image.data)], { type: image.mimeType });
}

export class OpenAIImageProvider implements ImageGenerationProvider {
  readonly name = "openai";
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly probeTimeoutMs: number;

  constructor(options: OpenAIImageProviderOptions) {
    this.apiKey = options.apiKey.trim();
    this.baseUrl = (options.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.probeTimeoutMs = options.probeTimeoutMs ?? 5_000;
  }

  async generate(params: ProviderGenerateParams): Promise<ProviderBatch> {
    const prompt = params.prompt.trim();
    if (!prompt) {
      throw new UpstreamError("Image generation prompt must not be empty.");
    }

    const body: Record<string, unknown> = {
      model: params.model,
      prompt,
      n: params.n,
      size: params.size,
    };

    if (isGptImageModel(params.model)) {
      body.quality = params.quality;
      body.output_format = params.outputFormat;
    } else {
      body.response_format = "b64_json";
      // dall-e-2 has a single quality tier and rejects anything but "standard"
      if (params.model === "dall-e-3") {
        body.quality = params.quality;
      }
    }

    const response = await this.request("/images/generations", {
      method: "POST",
      body: JSON.stringify(body),
    });

    return this.parseBatch(response);
  }

  async edit(params: ProviderEditParams): Promise<ProviderBatch> {
    if (params.images.length === 0) {
      throw new UpstreamError("An edit needs at least one input image.");
    }

    const form = new FormData();
    form.append("model", params.model);
    form.append("prompt", params.prompt);
    form.append("n", String(params.n));
    form.append("size", params.size);

    // gpt-image-1 takes several images as image[]; dall-e-2 takes exactly one
    const imageField = params.images.length > 1 ? "image[]" : "image";
    for (const image of params.images) {
      form.append(imageField, toBlob(image), image.filename);
    }
    if (params.mask) {
      form.append("mask", toBlob(params.mask), params.mask.filename);
    }

    if (isGptImageModel(params.model)) {
      form.append("quality", params.quality);
      form.append("output_format", params.outputFormat);
    } else {
      form.append("response_format", "b64_json");
    }

    const response = await this.request("/images/edits", { method: "POST", body: form });
    return this.parseBatch(response);
  }

  async createVariation(params: ProviderVariationParams): Promise<ProviderBatch> {
    const form = new FormData();
    form.append("model", params.model);
    form.append("image", toBlob(params.image), params.image.filename);
    form.append("n", String(params.n));
    form.append("size", params.size);
    form.append("response_format", "b64_json");

    const response = await this.request("/images/variations", { method: "POST", body: form });
    return this.parseBatch(response);
  }

  async checkStatus(): Promise<boolean> {
    if (!this.apiKey) {
      return false;
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.probeTimeoutMs);
    try {
      const response = await fetch(`${this.baseUrl}/models`, {
        headers: { Authorization: `Bearer ${this.apiKey}` },
        signal: controller.signal,
      });
      await response.body?.cancel();
      return response.ok;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn("openai", "Connectivity probe failed", { error: message });
      return false;
    } finally {
      clearTimeout(timer);
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async request(path: string, init: ApiRequest): Promise<ApiResponse> {
    if (!this.apiKey) {
      throw new UpstreamError(
        "OpenAI API key not configured. Set OPENAI_API_KEY in your .env file or environment, " +
          "or use IMAGE_PROVIDER=mock for development.",
        { notConfigured: true }
      );
    }

    const headers: Record<string, string> = { Authorization: `Bearer ${this.apiKey}` };
    if (typeof init.body === "string") {
      headers["Content-Type"] = "application/json";
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    // The timeout covers reading the body, not just the response headers
    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method: init.method,
        headers,
        body: init.body,
        signal: controller.signal,
      });
      const apiResponse: ApiResponse = {
        status: response.status,
        statusText: response.statusText,
        text: await response.text(),
      };

      if (apiResponse.status < 200 || apiResponse.status >= 300) {
        this.handleErrorResponse(apiResponse);
      }
      return apiResponse;
    } catch (error: unknown) {
      if (error instanceof UpstreamError) throw error;
      if (controller.signal.aborted) {
        throw new UpstreamError(`OpenAI API request timed out after ${this.timeoutMs}ms`, {
          transient: true,
          timedOut: true,
        });
      }
      const message = error instanceof Error ? error.message : "Unknown network error";
      throw new UpstreamError(`OpenAI API request failed (network error): ${message}`, {
        transient: true,
      });
    } finally {
      clearTimeout(timer);
    }
  }

  private async parseBatch(response: ApiResponse): Promise<ProviderBatch> {
    let json: OpenAIImagesResponse;
    try {
      json = JSON.parse(response.text) as OpenAIImagesResponse;
    } catch {
      throw new UpstreamError("OpenAI API returned a response that is not valid JSON.", {
        status: response.status,
      });
    }

    if (!json || !Array.isArray(json.data)) {
      throw new UpstreamError("OpenAI API returned an unexpected response: no image data in response.", {
        status: response.status,
      });
    }

    // A failed download drops that image only; the orchestrator reports the shortfall
    const images: ProviderImage[] = [];
    const downloadErrors: UpstreamError[] = [];
    for (const item of json.data) {
      let b64Json = item.b64_json;
      if (!b64Json && item.url) {
        try {
          b64Json = await this.downloadAsBase64(item.url);
        } catch (error: unknown) {
          if (!(error instanceof UpstreamError)) throw error;
          logger.warn("openai", "Dropping image whose download failed", { error: error.message });
          downloadErrors.push(error);
          continue;
        }
      }
      if (!b64Json) {
        logger.warn("openai", "Skipping image entry without data");
        continue;
      }
      images.push({ b64Json, revisedPrompt: item.revised_prompt || undefined });
    }

    if (images.length === 0 && downloadErrors.length > 0) {
      throw downloadErrors[0];
    }

    return { created: json.created, images };
  }

  /** Some endpoints may answer with short-lived URLs instead of base64. */
  private async downloadAsBase64(url: string): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(url, { signal: controller.signal });
      if (!response.ok) {
        throw new UpstreamError(
          `Failed to download generated image: HTTP ${response.status} ${response.statusText}`.trim(),
          { status: response.status, transient: response.status >= 500 }
        );
      }
      return Buffer.from(await response.arrayBuffer()).toString("base64");
    } catch (error: unknown) {
      if (error instanceof UpstreamError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new UpstreamError(`Failed to download generated image: ${message}`, {
        transient: true,
        timedOut: controller.signal.aborted,
      });
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Parse and throw a descriptive error from a non-OK OpenAI API response.
   */
  private handleErrorResponse(response: ApiResponse): never {
    const statusLine = `HTTP ${response.status} ${response.statusText}`.trim();
    let errorMessage: string;
    let errorCode: string | null | undefined;

    try {
      const errorJson = JSON.parse(response.text) as OpenAIErrorResponse;
      errorMessage = errorJson.error?.message || statusLine;
      errorCode = errorJson.error?.code;
    } catch {
      errorMessage = statusLine;
    }

    const status = response.status;

    if (errorCode && CONTENT_POLICY_CODES.has(errorCode)) {
      throw new UpstreamError(`OpenAI rejected the request under its content policy: ${errorMessage}`, {
        status,
        contentPolicy: true,
      });
    }

    switch (status) {
      case 401:
        throw new UpstreamError(
          `OpenAI API authentication failed: ${errorMessage}. Check that your OPENAI_API_KEY is valid.`,
          { status }
        );
      case 429:
        throw new UpstreamError(
          `OpenAI API rate limit exceeded: ${errorMessage}. Please wait before retrying or check your usage limits.`,
          { status, transient: true }
        );
      case 400:
        throw new UpstreamError(`OpenAI API request rejected: ${errorMessage}`, { status });
      default:
        throw new UpstreamError(`OpenAI API error (HTTP ${status}): ${errorMessage}`, {
          status,
          transient: status >= 500,
        });
    }
  }
}
