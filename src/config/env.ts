/**
 * Centralized environment configuration.
 * Validates environment variables at startup and exports typed config.
 * Import this module early to fail fast on malformed configuration.
 */

import dotenv from "dotenv";
import * as path from "path";
import { IMAGE_SIZES, isImageSize } from "../services/imageGeneration/types";

// Auto-load .env from the project root
dotenv.config({ path: path.resolve(__dirname, "../../.env") });

interface EnvConfig {
  /** OpenAI API key for the upstream image provider */
  OPENAI_API_KEY: string;
  /** Base URL of the OpenAI REST API (default: https://api.openai.com/v1) */
  OPENAI_BASE_URL: string;
  /** Upstream provider: openai or mock (default: openai) */
  IMAGE_PROVIDER: string;
  /** Server port (default: 8000) */
  PORT: number;
  /** Node environment (default: development) */
  NODE_ENV: string;
  /** Minimum log level: debug, info, warn, error (default: info) */
  LOG_LEVEL: string;
  /** Optional file that receives a copy of every log line */
  LOG_FILE: string;
  /** CORS origin (default: *) */
  CORS_ORIGIN: string;
  /** Whether to trust proxy headers (e.g. X-Forwarded-For) when behind nginx/load balancer (default: false) */
  TRUST_PROXY: boolean;
  /** Largest accepted input image in bytes, for uploads, URLs and base64 alike (default: 50000000) */
  MAX_FILE_SIZE: number;
  /** Input image formats accepted by the resolver (default: png,jpg,jpeg,webp) */
  ALLOWED_IMAGE_FORMATS: string[];
  /** Size used when a request omits one and the model supports it (default: 1024x1024) */
  DEFAULT_IMAGE_SIZE: string;
  /** Quality used when a request omits one and the model supports it (default: standard) */
  DEFAULT_IMAGE_QUALITY: string;
  /** Requests admitted per client per window (default: 60) */
  RATE_LIMIT_PER_MINUTE: number;
  /** Sliding window length in milliseconds (default: 60000) */
  RATE_LIMIT_WINDOW_MS: number;
  /** Output directory for persisted images (default: generated-images) */
  GENERATED_IMAGES_DIR: string;
  /** Maximum reference images per reference generation (default: 5) */
  MAX_REFERENCE_IMAGES: number;
  /** Timeout for each upstream provider call in milliseconds (default: 120000) */
  UPSTREAM_TIMEOUT_MS: number;
  /** Timeout for downloading a referenced image URL in milliseconds (default: 30000) */
  URL_FETCH_TIMEOUT_MS: number;
  /** Extra attempts on transient upstream failures, 0 or 1 (default: 0) */
  UPSTREAM_MAX_RETRIES: number;
  /** Backoff before the first retry in milliseconds, doubled per attempt (default: 500) */
  UPSTREAM_RETRY_BASE_DELAY_MS: number;
  /** Refuse image URLs that resolve to private or loopback addresses (default: true) */
  BLOCK_PRIVATE_URLS: boolean;
  /** express.json body size limit (default: 70mb) */
  JSON_BODY_LIMIT: string;
}

const KNOWN_PROVIDERS = ["openai", "mock"];

function readFlag(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  return raw === "true" || raw === "1";
}

function readList(name: string, fallback: string): string[] {
  return (process.env[name] || fallback)
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

/**
 * Load and validate environment configuration.
 * Throws a descriptive error listing every malformed variable.
 */
function loadEnvConfig(): EnvConfig {
  const problems: string[] = [];

  const readInt = (name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number => {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === "") {
      return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
      problems.push(`${name} must be an integer between ${min} and ${max} (got "${raw}")`);
      return fallback;
    }
    return value;
  };

  const config: EnvConfig = {
    OPENAI_API_KEY: process.env.OPENAI_API_KEY || "",
    OPENAI_BASE_URL: (process.env.OPENAI_BASE_URL || "https://api.openai.com/v1").replace(/\/+$/, ""),
    IMAGE_PROVIDER: (process.env.IMAGE_PROVIDER || "openai").toLowerCase(),
    PORT: readInt("PORT", 8000, 1, 65535),
    NODE_ENV: process.env.NODE_ENV || "development",
    LOG_LEVEL: (process.env.LOG_LEVEL || "info").toLowerCase(),
    LOG_FILE: process.env.LOG_FILE || "",
    CORS_ORIGIN: process.env.CORS_ORIGIN || "*",
    TRUST_PROXY: readFlag("TRUST_PROXY", false),
    MAX_FILE_SIZE: readInt("MAX_FILE_SIZE", 50_000_000, 1),
    ALLOWED_IMAGE_FORMATS: readList("ALLOWED_IMAGE_FORMATS", "png,jpg,jpeg,webp"),
    DEFAULT_IMAGE_SIZE: process.env.DEFAULT_IMAGE_SIZE || "1024x1024",
    DEFAULT_IMAGE_QUALITY: (process.env.DEFAULT_IMAGE_QUALITY || "standard").toLowerCase(),
    RATE_LIMIT_PER_MINUTE: readInt("RATE_LIMIT_PER_MINUTE", 60, 1),
    RATE_LIMIT_WINDOW_MS: readInt("RATE_LIMIT_WINDOW_MS", 60_000, 1),
    GENERATED_IMAGES_DIR: process.env.GENERATED_IMAGES_DIR || "generated-images",
    MAX_REFERENCE_IMAGES: readInt("MAX_REFERENCE_IMAGES", 5, 1, 16),
    UPSTREAM_TIMEOUT_MS: readInt("UPSTREAM_TIMEOUT_MS", 120_000, 1),
    URL_FETCH_TIMEOUT_MS: readInt("URL_FETCH_TIMEOUT_MS", 30_000, 1),
    UPSTREAM_MAX_RETRIES: readInt("UPSTREAM_MAX_RETRIES", 0, 0, 1),
    UPSTREAM_RETRY_BASE_DELAY_MS: readInt("UPSTREAM_RETRY_BASE_DELAY_MS", 500, 0),
    BLOCK_PRIVATE_URLS: readFlag("BLOCK_PRIVATE_URLS", true),
    JSON_BODY_LIMIT: process.env.JSON_BODY_LIMIT || "70mb",
  };

  if (!KNOWN_PROVIDERS.includes(config.IMAGE_PROVIDER)) {
    problems.push(`IMAGE_PROVIDER must be one of: ${KNOWN_PROVIDERS.join(", ")} (got "${config.IMAGE_PROVIDER}")`);
  }

  if (!isImageSize(config.DEFAULT_IMAGE_SIZE)) {
    problems.push(`DEFAULT_IMAGE_SIZE must be one of: ${IMAGE_SIZES.join(", ")} (got "${config.DEFAULT_IMAGE_SIZE}")`);
  }

  if (config.ALLOWED_IMAGE_FORMATS.length === 0) {
    problems.push("ALLOWED_IMAGE_FORMATS must list at least one format");
  }

  if (problems.length > 0) {
    const message = [
      "",
      "=== Invalid Environment Configuration ===",
      "",
      ...problems.map((p) => `  - ${p}`),
      "",
      "Fix these variables in your .env file or environment.",
      "See .env.example for reference.",
      "",
    ].join("\n");

    throw new Error(message);
  }

  return config;
}

// Validate and export config as a singleton
const env = loadEnvConfig();

/**
 * Returns true when an OpenAI API key is configured.
 */
function isOpenAIConfigured(): boolean {
  return env.OPENAI_API_KEY.trim().length > 0;
}

export { env, isOpenAIConfigured, loadEnvConfig };
export type { EnvConfig };
