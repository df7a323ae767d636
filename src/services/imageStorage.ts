/**
 * Image storage service.
 *
 * Persists generated images to local disk as
 * `generated_{YYYYMMDD_HHMMSS}_{index}.{ext}`.
 *
 * Bytes are first written to a hidden temp file in the output directory and
 * then hard-linked to the final name. link() fails with EEXIST instead of
 * overwriting, so a name taken by another batch in the same second gets a
 * `-2`, `-3`, ... suffix on the index part. Readers never see a partial file.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { randomUUID } from "crypto";
import { PersistenceError } from "../errors";
import { logger } from "../config/logger";
import type { OutputFormat, UpstreamImageResult } from "./imageGeneration/types";

export interface PersistedImage {
  filename: string;
  /** Output directory joined with the filename */
  filePath: string;
}

export interface ImageStorageOptions {
  outputDir: string;
}

/** Suffix attempts before giving up on a free filename. */
const MAX_NAME_ATTEMPTS = 100;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** Local-time `YYYYMMDD_HHMMSS`. */
export function formatBatchTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function buildFilename(timestamp: string, index: number, format: OutputFormat, attempt = 1): string {
  const indexPart = attempt > 1 ? `${index}-${attempt}` : String(index);
  return `generated_${timestamp}_${indexPart}.${format}`;
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export class ImageStorage {
  readonly outputDir: string;

  constructor(options: ImageStorageOptions) {
    this.outputDir = options.outputDir;
  }

  async persist(result: UpstreamImageResult, batchTimestamp: Date, format: OutputFormat): Promise<PersistedImage> {
    const data = Buffer.from(result.b64Json, "base64");
    const timestamp = formatBatchTimestamp(batchTimestamp);
    const tempPath = path.join(this.outputDir, `.tmp-${randomUUID()}`);

    try {
      await fs.mkdir(this.outputDir, { recursive: true });
      await this.writeTemp(tempPath, data);

      for (let attempt = 1; attempt <= MAX_NAME_ATTEMPTS; attempt++) {
        const filename = buildFilename(timestamp, result.index, format, attempt);
        const filePath = path.join(this.outputDir, filename);
        try {
          await fs.link(tempPath, filePath);
        } catch (err: unknown) {
          if (errorCode(err) === "EEXIST") continue;
          throw err;
        }

        logger.info("imageStorage", `Saved image as ${filename}`, { filePath, bytes: data.length });
        return { filename, filePath };
      }

      throw new PersistenceError(
        `No free filename for index ${result.index} after ${MAX_NAME_ATTEMPTS} attempts`
      );
    } catch (err: unknown) {
      if (err instanceof PersistenceError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new PersistenceError(`Failed to save image ${result.index}: ${message}`, this.outputDir);
    } finally {
      await fs.rm(tempPath, { force: true }).catch((err: unknown) => {
        logger.warn("imageStorage", "Could not remove temp file", {
          tempPath,
          error: err instanceof Error ? err.message : String(err),
        });
      });
    }
  }

  private async writeTemp(tempPath: string, data: Buffer): Promise<void> {
    const handle = await fs.open(tempPath, "wx");
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
  }
}
