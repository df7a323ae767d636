/**
 * Response envelopes returned by the image endpoints.
 *
 * Field names are snake_case on the wire.
 */

import type { ImageQuality, ImageSize, OutputFormat } from "../services/imageGeneration/types";

export interface ImageResult {
  index: number;
  b64_json: string;
  /** Set when the image was saved to disk */
  filename?: string;
  file_path?: string;
  /** Set instead of filename/file_path when saving failed */
  persistence_error?: string;
  revised_prompt: string | null;
}

export interface RequestParams {
  model: string;
  prompt?: string;
  size: ImageSize;
  quality: ImageQuality;
  n: number;
  response_format: OutputFormat;
  save_to_disk: boolean;
  // edit
  has_mask?: boolean;
  // generate_from_references
  original_prompt?: string;
  enhanced_prompt?: string;
  reference_count?: number;
  reference_urls?: string[];
}

export interface ImageSuccessEnvelope {
  success: true;
  message: string;
  images: ImageResult[];
  request_params: RequestParams;
  warnings?: string[];
}

export interface FailureEnvelope {
  success: false;
  error: string;
  message: string;
  code: string;
  details?: Array<{ field: string; message: string }>;
  request_id?: string;
  retry_after?: number;
}
