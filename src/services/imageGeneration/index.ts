/**
 * Image generation service: factory and re-exports.
 *
 * Provides a factory function that returns the configured image generation
 * provider based on the IMAGE_PROVIDER env variable.
 */

import { env, type EnvConfig } from "../../config/env";
import { MockImageProvider } from "./mockProvider";
import { OpenAIImageProvider } from "./openaiProvider";
import type { ImageGenerationProvider } from "./types";

export type { ImageGenerationProvider };
export { ImageOrchestrator } from "./orchestrator";
export type { ImageOrchestratorOptions } from "./orchestrator";

/**
 * Create an image generation provider by name.
 *
 * @param providerName - The provider to instantiate ("mock", "openai")
 * @param config - Source of the OpenAI key, base URL and timeout
 * @throws Error if the provider name is not recognized
 */
export function createImageProvider(
  providerName: string,
  config: Pick<EnvConfig, "OPENAI_API_KEY" | "OPENAI_BASE_URL" | "UPSTREAM_TIMEOUT_MS"> = env
): ImageGenerationProvider {
  switch (providerName.toLowerCase()) {
    case "mock":
      return new MockImageProvider();

    case "openai":
      return new OpenAIImageProvider({
        apiKey: config.OPENAI_API_KEY,
        baseUrl: config.OPENAI_BASE_URL,
        timeoutMs: config.UPSTREAM_TIMEOUT_MS,
      });

    default:
      throw new Error(
        `Unknown image provider: "${providerName}". ` +
          `Supported providers: mock, openai. ` +
          `Set IMAGE_PROVIDER in your environment or .env file.`
      );
  }
}
