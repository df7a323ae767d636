/**
 * Mock image generation provider.
 *
 * Returns a placeholder 1x1 PNG for every requested image so the API can be
 * exercised end to end without an OpenAI key. dall-e-3 requests get a
 * revised prompt, mirroring the real API.
 */

import type {
  ImageGenerationProvider,
  ProviderBatch,
  ProviderEditParams,
  ProviderGenerateParams,
  ProviderVariationParams,
} from "./types";

/** A transparent 1x1 PNG. */
export const PLACEHOLDER_PNG_BASE64 =
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==";

function placeholderBatch(n: number, revisedPrompt?: string): ProviderBatch {
  return {
    created: Math.floor(Date.now() / 1000),
    images: Array.from({ length: n }, () => ({
      b64Json: PLACEHOLDER_PNG_BASE64,
      revisedPrompt,
    })),
  };
}

export class MockImageProvider implements ImageGenerationProvider {
  readonly name = "mock";

  async generate(params: ProviderGenerateParams): Promise<ProviderBatch> {
    const revised = params.model === "dall-e-3" ? `Placeholder rendering of: ${params.prompt}` : undefined;
    return placeholderBatch(params.n, revised);
  }

  async edit(params: ProviderEditParams): Promise<ProviderBatch> {
    return placeholderBatch(params.n);
  }

  async createVariation(params: ProviderVariationParams): Promise<ProviderBatch> {
    return placeholderBatch(params.n);
  }

  async checkStatus(): Promise<boolean> {
    return true;
  }
}
