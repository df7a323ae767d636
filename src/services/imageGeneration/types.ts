/**
 * Image generation domain types.
 *
 * The upstream provider sits behind the ImageGenerationProvider interface so
 * the orchestrator (and its tests) never depend on a concrete API client.
 */

export const IMAGE_MODELS = ["dall-e-2", "dall-e-3", "gpt-image-1"] as const;
export type ImageModel = (typeof IMAGE_MODELS)[number];

export const IMAGE_SIZES = [
  "256x256",
  "512x512",
  "1024x1024",
  "1536x1024",
  "1024x1536",
  "1792x1024",
  "1024x1792",
  "auto",
] as const;
export type ImageSize = (typeof IMAGE_SIZES)[number];

export const IMAGE_QUALITIES = ["standard", "hd", "low", "medium", "high", "auto"] as const;
export type ImageQuality = (typeof IMAGE_QUALITIES)[number];

/** File format of the returned image; also the extension used on disk. */
export const OUTPUT_FORMATS = ["png", "jpeg", "webp"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export type ImageOperation = "generate" | "edit" | "vary" | "generate_from_references";

export function isImageModel(value: unknown): value is ImageModel {
  return typeof value === "string" && IMAGE_MODELS.some((item) => item === value);
}

export function isImageSize(value: unknown): value is ImageSize {
  return typeof value === "string" && IMAGE_SIZES.some((item) => item === value);
}

export function isImageQuality(value: unknown): value is ImageQuality {
  return typeof value === "string" && IMAGE_QUALITIES.some((item) => item === value);
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === "string" && OUTPUT_FORMATS.some((item) => item === value);
}

// ---------------------------------------------------------------------------
// Input images
// ---------------------------------------------------------------------------

export type SourceImageFormat = "png" | "jpeg" | "webp" | "gif";

/** An input image after resolution: validated bytes, never re-encoded. */
export interface BinaryImage {
  data: Buffer;
  format: SourceImageFormat;
  mimeType: string;
  filename: string;
  bytes: number;
  source: "url" | "upload" | "base64";
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

interface BaseGenerationRequest {
  model: ImageModel;
  /** Omitted values are filled from configuration or the model's defaults */
  size?: ImageSize;
  quality?: ImageQuality;
  n: number;
  responseFormat: OutputFormat;
  saveToDisk: boolean;
}

export interface GenerateRequest extends BaseGenerationRequest {
  operation: "generate";
  prompt: string;
}

export interface EditRequest extends BaseGenerationRequest {
  operation: "edit";
  prompt: string;
  image: BinaryImage;
  mask?: BinaryImage;
}

export interface VaryRequest extends BaseGenerationRequest {
  operation: "vary";
  image: BinaryImage;
}

export interface ReferenceGenerationRequest extends BaseGenerationRequest {
  operation: "generate_from_references";
  prompt: string;
  references: BinaryImage[];
  /** Source URLs, echoed back in request_params when the references came from URLs */
  referenceUrls?: string[];
}

export type GenerationRequest =
  | GenerateRequest
  | EditRequest
  | VaryRequest
  | ReferenceGenerationRequest;

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

/** One image returned by the provider. */
export interface UpstreamImageResult {
  index: number;
  b64Json: string;
  revisedPrompt?: string;
}

/** A missing image (or failed fan-out slot) in an otherwise answered batch. */
export interface BatchFailure {
  /** Result index that has no image */
  index: number;
  code: string;
  message: string;
}

export interface DispatchResult {
  requested: number;
  images: UpstreamImageResult[];
  failures: BatchFailure[];
  /** Size and quality actually sent upstream */
  size: ImageSize;
  quality: ImageQuality;
  /** Prompt actually sent upstream (differs for reference generation) */
  upstreamPrompt?: string;
}

// ---------------------------------------------------------------------------
// Provider interface
// ---------------------------------------------------------------------------

export interface ProviderGenerateParams {
  model: ImageModel;
  prompt: string;
  size: ImageSize;
  quality: ImageQuality;
  n: number;
  outputFormat: OutputFormat;
}

export interface ProviderEditParams extends ProviderGenerateParams {
  /** One image for a plain edit, several for reference generation */
  images: BinaryImage[];
  mask?: BinaryImage;
}

export interface ProviderVariationParams {
  model: ImageModel;
  image: BinaryImage;
  size: ImageSize;
  n: number;
}

export interface ProviderImage {
  b64Json: string;
  revisedPrompt?: string;
}

export interface ProviderBatch {
  created?: number;
  images: ProviderImage[];
}

export interface ImageGenerationProvider {
  /** Human-readable name of this provider (e.g. "mock", "openai") */
  readonly name: string;

  generate(params: ProviderGenerateParams): Promise<ProviderBatch>;

  edit(params: ProviderEditParams): Promise<ProviderBatch>;

  createVariation(params: ProviderVariationParams): Promise<ProviderBatch>;

  /** Lightweight reachability probe; never throws. */
  checkStatus(): Promise<boolean>;
}
