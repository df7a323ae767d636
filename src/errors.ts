/**
 * Application error types.
 *
 * Every error the request pipeline raises on purpose extends AppError, which
 * carries the HTTP status, a machine-readable code and a short summary. The
 * error handler turns them into the failure envelope:
 *
 *   { success: false, error: err.message, message: err.summary, code }
 */

export interface FieldError {
  field: string;
  message: string;
}

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly summary: string;

  constructor(message: string, statusCode: number, code: string, summary: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.summary = summary;
  }
}

/** Malformed request: missing or invalid fields. No upstream call is made. */
export class ValidationError extends AppError {
  readonly details: FieldError[];

  constructor(details: FieldError[], message = "Validation failed") {
    super(
      details.length > 0 ? details.map((d) => `${d.field}: ${d.message}`).join("; ") : message,
      400,
      "VALIDATION_ERROR",
      message
    );
    this.details = details;
  }
}

/** The selected model cannot perform the requested operation or parameter. */
export class CapabilityError extends AppError {
  constructor(message: string) {
    super(message, 400, "UNSUPPORTED_CAPABILITY", "The selected model does not support this request");
  }
}

// ---------------------------------------------------------------------------
// Image source resolution
// ---------------------------------------------------------------------------

export class ResolutionError extends AppError {
  constructor(
    message: string,
    statusCode = 400,
    code = "IMAGE_RESOLUTION_FAILED",
    summary = "Could not read the supplied image"
  ) {
    super(message, statusCode, code, summary);
  }
}

/** A remote image URL could not be downloaded (timeout, non-2xx, too large, blocked). */
export class ImageFetchError extends ResolutionError {
  constructor(message: string) {
    super(message, 422, "IMAGE_FETCH_FAILED", "Could not download the referenced image");
  }
}

export class UnsupportedImageFormatError extends ResolutionError {
  constructor(message: string) {
    super(message, 415, "UNSUPPORTED_IMAGE_FORMAT", "Unsupported image format");
  }
}

export class ImageDecodeError extends ResolutionError {
  constructor(message: string) {
    super(message, 400, "INVALID_BASE64_IMAGE", "Could not decode the base64 image");
  }
}

export class ImageTooLargeError extends ResolutionError {
  constructor(message: string) {
    super(message, 413, "IMAGE_TOO_LARGE", "Image exceeds the maximum file size");
  }
}

// ---------------------------------------------------------------------------
// Upstream provider
// ---------------------------------------------------------------------------

export interface UpstreamErrorOptions {
  /** HTTP status returned by the provider, when there was a response */
  status?: number;
  /** Network error, timeout, 429 or 5xx: the same call may succeed later */
  transient?: boolean;
  /** Rejected by the provider's content policy; never retried */
  contentPolicy?: boolean;
  timedOut?: boolean;
  notConfigured?: boolean;
}

function upstreamHttpStatus(options: UpstreamErrorOptions): number {
  if (options.notConfigured) return 503;
  if (options.contentPolicy) return 400;
  if (options.timedOut) return 504;
  return 502;
}

function upstreamCode(options: UpstreamErrorOptions): string {
  if (options.notConfigured) return "UPSTREAM_NOT_CONFIGURED";
  if (options.contentPolicy) return "CONTENT_POLICY_VIOLATION";
  if (options.timedOut) return "UPSTREAM_TIMEOUT";
  if (options.status === 401 || options.status === 403) return "UPSTREAM_AUTH_FAILED";
  if (options.status === 429) return "UPSTREAM_RATE_LIMITED";
  return "UPSTREAM_ERROR";
}

/** The provider call failed after any allowed retries. */
export class UpstreamError extends AppError {
  readonly status?: number;
  readonly transient: boolean;
  readonly contentPolicy: boolean;

  constructor(message: string, options: UpstreamErrorOptions = {}) {
    super(message, upstreamHttpStatus(options), upstreamCode(options), "Image provider request failed");
    this.status = options.status;
    this.transient = options.transient ?? false;
    this.contentPolicy = options.contentPolicy ?? false;
  }
}

/** Writing a generated image to disk failed. Recovered locally, never sent as a failure response. */
export class PersistenceError extends AppError {
  readonly filePath?: string;

  constructor(message: string, filePath?: string) {
    super(message, 500, "PERSISTENCE_FAILED", "Failed to save image to disk");
    this.filePath = filePath;
  }
}
