/**
 * Image source resolver.
 *
 * Normalizes the three ways a client can hand us an input image (remote URL,
 * multipart upload, base64 string) into a BinaryImage. Bytes are validated and
 * passed through untouched; any resizing or re-encoding is left to the
 * upstream provider.
 */

import dns from "dns/promises";
import net from "net";
import {
  ImageDecodeError,
  ImageFetchError,
  ImageTooLargeError,
  UnsupportedImageFormatError,
} from "../errors";
import { logger } from "../config/logger";
import type { BinaryImage, SourceImageFormat } from "./imageGeneration/types";

export type ImageSource =
  | { kind: "url"; url: string }
  | { kind: "upload"; buffer: Buffer; mimeType: string; filename: string }
  | { kind: "base64"; data: string; filename?: string };

export interface ImageSourceResolverOptions {
  /** Largest accepted image in bytes */
  maxBytes: number;
  /** Allowed formats, e.g. ["png", "jpg", "jpeg", "webp"] */
  allowedFormats: readonly string[];
  /** Timeout for downloading a URL, including headers and body */
  fetchTimeoutMs: number;
  /** Refuse URLs whose host resolves to loopback, private or link-local addresses */
  blockPrivateAddresses?: boolean;
}

const MAX_REDIRECTS = 3;

const MIME_TYPES: Record<SourceImageFormat, string> = {
  png: "image/png",
  jpeg: "image/jpeg",
  webp: "image/webp",
  gif: "image/gif",
};

// ---------------------------------------------------------------------------
// Format detection
// ---------------------------------------------------------------------------

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

/** Identify an image from its magic bytes. */
export function sniffImageFormat(data: Buffer): SourceImageFormat | null {
  if (data.length >= 8 && data.subarray(0, 8).equals(PNG_SIGNATURE)) {
    return "png";
  }
  if (data.length >= 3 && data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff) {
    return "jpeg";
  }
  if (
    data.length >= 12 &&
    data.toString("ascii", 0, 4) === "RIFF" &&
    data.toString("ascii", 8, 12) === "WEBP"
  ) {
    return "webp";
  }
  if (data.length >= 6) {
    const header = data.toString("ascii", 0, 6);
    if (header === "GIF87a" || header === "GIF89a") {
      return "gif";
    }
  }
  return null;
}

/** Map a MIME type (or bare extension) to a known format. */
export function formatFromMimeType(mimeType: string): SourceImageFormat | null {
  const normalized = mimeType.split(";")[0].trim().toLowerCase().replace(/^image\//, "");
  switch (normalized) {
    case "png":
      return "png";
    case "jpg":
    case "jpeg":
    case "pjpeg":
      return "jpeg";
    case "webp":
      return "webp";
    case "gif":
      return "gif";
    default:
      return null;
  }
}

// ---------------------------------------------------------------------------
// Base64
// ---------------------------------------------------------------------------

const DATA_URI_RE = /^data:([^;,]+)?(?:;[^,]*)?;base64,/i;
const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Strictly decode a base64 payload, with or without a data URI prefix.
 * Buffer.from(..., "base64") silently skips invalid characters, so the
 * alphabet and padding are checked first.
 */
export function decodeBase64Image(input: string): { data: Buffer; declaredMimeType?: string } {
  let payload = input.trim();
  let declaredMimeType: string | undefined;

  const prefix = DATA_URI_RE.exec(payload);
  if (prefix) {
    declaredMimeType = prefix[1]?.toLowerCase();
    payload = payload.slice(prefix[0].length);
  } else if (payload.startsWith("data:")) {
    throw new ImageDecodeError("Data URI must be base64 encoded (expected \";base64,\")");
  }

  payload = payload.replace(/\s+/g, "");

  if (payload.length === 0) {
    throw new ImageDecodeError("Base64 image data is empty");
  }
  if (payload.length % 4 !== 0 || !BASE64_RE.test(payload)) {
    throw new ImageDecodeError("Base64 image data is malformed");
  }

  return { data: Buffer.from(payload, "base64"), declaredMimeType };
}

// ---------------------------------------------------------------------------
// Private address checks
// ---------------------------------------------------------------------------

function isPrivateIpv4(address: string): boolean {
  const parts = address.split(".").map((x) => Number(x));
  if (parts.length !== 4 || parts.some((n) => Number.isNaN(n) || n < 0 || n > 255)) return false;
  if (parts[0] === 10) return true;
  if (parts[0] === 172 && parts[1] >= 16 && parts[1] <= 31) return true;
  if (parts[0] === 192 && parts[1] === 168) return true;
  if (parts[0] === 169 && parts[1] === 254) return true;
  if (parts[0] === 127) return true;
  if (parts[0] === 0) return true;
  return false;
}

const MAPPED_PREFIX_RE = /^(?:::|(?:0{1,4}:){5})ffff:/;

/**
 * IPv4 address inside an IPv4-mapped IPv6 address (::ffff:0:0/96). The URL
 * parser rewrites `[::ffff:127.0.0.1]` to `[::ffff:7f00:1]`, so both the
 * dotted and the hex tail are accepted.
 */
function mappedIpv4(address: string): string | null {
  const prefix = MAPPED_PREFIX_RE.exec(address);
  if (!prefix) return null;
  const tail = address.slice(prefix[0].length);
  if (net.isIPv4(tail)) return tail;

  const groups = tail.split(":");
  if (groups.length !== 2 || !groups.every((g) => /^[0-9a-f]{1,4}$/.test(g))) return null;
  const [high, low] = groups.map((g) => parseInt(g, 16));
  return [high >> 8, high & 0xff, low >> 8, low & 0xff].join(".");
}

function isPrivateIpv6(address: string): boolean {
  const a = address.toLowerCase();
  if (a === "::1" || a === "::") return true;
  if (MAPPED_PREFIX_RE.test(a)) {
    const v4 = mappedIpv4(a);
    return v4 === null || isPrivateIpv4(v4);
  }
  if (/^fe[89ab]/.test(a)) return true;
  if (a.startsWith("fc") || a.startsWith("fd")) return true;
  return false;
}

export function isPrivateAddress(address: string): boolean {
  const family = net.isIP(address);
  if (family === 4) return isPrivateIpv4(address);
  if (family === 6) return isPrivateIpv6(address);
  return false;
}

async function assertPublicHost(hostname: string): Promise<void> {
  const host = hostname.replace(/^\[|\]$/g, "");
  if (net.isIP(host)) {
    if (isPrivateAddress(host)) {
      throw new ImageFetchError(`Blocked private address: ${host}`);
    }
    return;
  }

  let records: { address: string }[];
  try {
    records = await dns.lookup(host, { all: true });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ImageFetchError(`DNS resolution failed for ${host}: ${message}`);
  }

  for (const record of records) {
    if (isPrivateAddress(record.address)) {
      throw new ImageFetchError(`Blocked private address for ${host}: ${record.address}`);
    }
  }
}

/** Reject early if the signal fires before the promise settles. */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new Error("Aborted"));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error("Aborted"));
    signal.addEventListener("abort", onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

function parseImageUrl(url: string, base?: URL): URL {
  let parsed: URL;
  try {
    parsed = new URL(url, base);
  } catch {
    throw new ImageFetchError(`Invalid image URL: ${url}`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ImageFetchError(`Only http and https image URLs are allowed (got ${parsed.protocol})`);
  }
  return parsed;
}

function filenameFromPath(pathname: string): string {
  const last = pathname.split("/").pop() || "";
  try {
    return decodeURIComponent(last) || "image";
  } catch {
    return last || "image";
  }
}

// ---------------------------------------------------------------------------
// Resolver
// ---------------------------------------------------------------------------

export class ImageSourceResolver {
  private readonly allowed: Set<SourceImageFormat>;

  constructor(private readonly options: ImageSourceResolverOptions) {
    this.allowed = new Set(
      options.allowedFormats
        .map((f) => formatFromMimeType(f))
        .filter((f): f is SourceImageFormat => f !== null)
    );
  }

  async resolve(source: ImageSource): Promise<BinaryImage> {
    switch (source.kind) {
      case "url":
        return this.resolveUrl(source.url);
      case "upload":
        return this.resolveUpload(source.buffer, source.mimeType, source.filename);
      case "base64":
        return this.resolveBase64(source.data, source.filename);
    }
  }

  /**
   * Download an image. Redirects are followed by hand, up to MAX_REDIRECTS,
   * so every hop gets the private-address check. One timeout spans every hop,
   * DNS lookups included.
   */
  async resolveUrl(url: string): Promise<BinaryImage> {
    const { maxBytes, fetchTimeoutMs } = this.options;
    let current = parseImageUrl(url);
    const visited = new Set<string>();
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), fetchTimeoutMs);

    try {
      for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
        visited.add(current.toString());

        if (this.options.blockPrivateAddresses) {
          try {
            await abortable(assertPublicHost(current.hostname), controller.signal);
          } catch (err) {
            if (err instanceof ImageFetchError) throw err;
            throw this.fetchFailure(url, err, controller.signal.aborted);
          }
        }

        let response: Response;
        try {
          response = await fetch(current.toString(), {
            headers: { Accept: "image/*,*/*;q=0.8" },
            redirect: "manual",
            signal: controller.signal,
          });
        } catch (err) {
          throw this.fetchFailure(url, err, controller.signal.aborted);
        }

        if (response.status >= 300 && response.status < 400) {
          const location = response.headers.get("location");
          await response.body?.cancel();
          if (!location) {
            throw new ImageFetchError(`Redirect (${response.status}) from ${current} has no Location header`);
          }
          const next = parseImageUrl(location, current);
          if (visited.has(next.toString())) {
            throw new ImageFetchError(`Redirect loop detected for ${url}`);
          }
          logger.debug("imageSource", "Following redirect", { from: current.toString(), to: next.toString() });
          current = next;
          continue;
        }

        if (!response.ok) {
          await response.body?.cancel();
          throw new ImageFetchError(`Image download failed for ${url}: HTTP ${response.status} ${response.statusText}`.trim());
        }

        const contentLength = Number(response.headers.get("content-length"));
        if (Number.isFinite(contentLength) && contentLength > maxBytes) {
          await response.body?.cancel();
          throw new ImageFetchError(`Image at ${url} is ${contentLength} bytes; the limit is ${maxBytes}`);
        }

        const data = await this.readCapped(response, url, controller.signal);
        const declared = response.headers.get("content-type") ?? "";
        const filename = filenameFromPath(current.pathname);

        logger.debug("imageSource", "Downloaded image", { url, bytes: data.length, redirects: hop });

        return this.toBinaryImage(data, declared, filename, "url");
      }

      throw new ImageFetchError(`Too many redirects for ${url} (more than ${MAX_REDIRECTS})`);
    } finally {
      clearTimeout(timer);
    }
  }

  resolveUpload(buffer: Buffer, mimeType: string, filename: string): BinaryImage {
    if (buffer.length > this.options.maxBytes) {
      throw new ImageTooLargeError(
        `Uploaded file "${filename}" is ${buffer.length} bytes; the limit is ${this.options.maxBytes}`
      );
    }
    return this.toBinaryImage(buffer, mimeType, filename, "upload");
  }

  resolveBase64(input: string, filename = "image"): BinaryImage {
    const { data, declaredMimeType } = decodeBase64Image(input);
    if (data.length > this.options.maxBytes) {
      throw new ImageTooLargeError(
        `Decoded image is ${data.length} bytes; the limit is ${this.options.maxBytes}`
      );
    }
    return this.toBinaryImage(data, declaredMimeType ?? "", filename, "base64");
  }

  /** Read the body with a hard cap; Content-Length can be absent or wrong. */
  private async readCapped(response: Response, url: string, signal: AbortSignal): Promise<Buffer> {
    const { maxBytes } = this.options;
    if (!response.body) {
      return Buffer.alloc(0);
    }

    const reader = response.body.getReader();
    const chunks: Buffer[] = [];
    let total = 0;

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        total += value.byteLength;
        if (total > maxBytes) {
          await reader.cancel();
          throw new ImageFetchError(`Image at ${url} exceeds the limit of ${maxBytes} bytes`);
        }
        chunks.push(Buffer.from(value));
      }
    } catch (err) {
      if (err instanceof ImageFetchError) throw err;
      throw this.fetchFailure(url, err, signal.aborted);
    }

    return Buffer.concat(chunks, total);
  }

  private fetchFailure(url: string, err: unknown, timedOut: boolean): ImageFetchError {
    if (timedOut) {
      return new ImageFetchError(`Image download timed out after ${this.options.fetchTimeoutMs}ms: ${url}`);
    }
    const message = err instanceof Error ? err.message : String(err);
    return new ImageFetchError(`Image download failed for ${url}: ${message}`);
  }

  private toBinaryImage(
    data: Buffer,
    declaredMimeType: string,
    filename: string,
    source: BinaryImage["source"]
  ): BinaryImage {
    if (data.length === 0) {
      throw new UnsupportedImageFormatError(`Image "${filename}" is empty`);
    }

    const format = sniffImageFormat(data) ?? formatFromMimeType(declaredMimeType);
    if (!format) {
      throw new UnsupportedImageFormatError(
        `Could not recognize "${filename}" as an image` +
          (declaredMimeType ? ` (declared ${declaredMimeType})` : "")
      );
    }
    if (!this.allowed.has(format)) {
      throw new UnsupportedImageFormatError(
        `Image format "${format}" is not allowed. Allowed formats: ${[...this.allowed].join(", ")}`
      );
    }

    return {
      data,
      format,
      mimeType: MIME_TYPES[format],
      filename,
      bytes: data.length,
      source,
    };
  }
}
