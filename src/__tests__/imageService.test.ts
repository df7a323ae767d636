import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { CapabilityError, PersistenceError } from "../errors";
import { ImageOrchestrator } from "../services/imageGeneration/orchestrator";
import { ImageService } from "../services/imageService";
import { ImageSourceResolver } from "../services/imageSource";
import { ImageStorage, type PersistedImage } from "../services/imageStorage";
import { monitoringService } from "../services/monitoringService";
import type { OutputFormat, UpstreamImageResult } from "../services/imageGeneration/types";
import { FakeImageProvider, PNG_BYTES, batchOf } from "./fakeProvider";

const BATCH_TIME = new Date(2026, 9, 18, 12, 0, 0);

/** Fails to save the image with the given index, saves the rest normally. */
class FlakyStorage extends ImageStorage {
  constructor(outputDir: string, private readonly failIndex: number) {
    super({ outputDir });
  }

  async persist(result: UpstreamImageResult, batchTimestamp: Date, format: OutputFormat): Promise<PersistedImage> {
    if (result.index === this.failIndex) {
      throw new PersistenceError("disk full");
    }
    return super.persist(result, batchTimestamp, format);
  }
}

let tmpDir: string;
let provider: FakeImageProvider;

function service(storage: ImageStorage = new ImageStorage({ outputDir: tmpDir })): ImageService {
  return new ImageService({
    orchestrator: new ImageOrchestrator({ provider, defaults: { size: "1024x1024", quality: "standard" } }),
    storage,
    resolver: new ImageSourceResolver({
      maxBytes: 1024,
      allowedFormats: ["png", "jpeg", "webp"],
      fetchTimeoutMs: 1000,
      blockPrivateAddresses: false,
    }),
    now: () => BATCH_TIME,
  });
}

const options = {
  model: "dall-e-2" as const,
  n: 1,
  responseFormat: "png" as const,
  saveToDisk: true,
};

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "image-service-"));
  provider = new FakeImageProvider();
  monitoringService.resetMetrics();
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe("ImageService.execute", () => {
  it("builds the success envelope and saves every image", async () => {
    const envelope = await service().execute({
      operation: "generate",
      options: { ...options, n: 2 },
      prompt: "two apples",
    });

    expect(envelope.success).toBe(true);
    expect(envelope.message).toBe("Successfully generated 2 image(s)");
    expect(envelope.warnings).toBeUndefined();
    expect(envelope.images.map((i) => i.filename)).toEqual([
      "generated_20261018_120000_0.png",
      "generated_20261018_120000_1.png",
    ]);
    expect(envelope.images[1].file_path).toBe(path.join(tmpDir, "generated_20261018_120000_1.png"));
    expect(envelope.images[0].revised_prompt).toBeNull();
    expect(envelope.request_params).toEqual({
      model: "dall-e-2",
      prompt: "two apples",
      size: "1024x1024",
      quality: "standard",
      n: 2,
      response_format: "png",
      save_to_disk: true,
    });
    expect(monitoringService.getMetrics().imagesGenerated).toBe(2);
  });

  it("still returns an image whose file could not be written", async () => {
    const envelope = await service(new FlakyStorage(tmpDir, 0)).execute({
      operation: "generate",
      options: { ...options, n: 2 },
      prompt: "two apples",
    });

    expect(envelope.success).toBe(true);
    expect(envelope.images).toHaveLength(2);

    const [failed, saved] = envelope.images;
    expect(failed.b64_json).toBe(Buffer.from("img-0").toString("base64"));
    expect(failed.persistence_error).toBe("disk full");
    expect(failed.filename).toBeUndefined();
    expect(saved.b64_json).toBe(Buffer.from("img-1").toString("base64"));
    expect(saved.filename).toBe("generated_20261018_120000_1.png");
    expect(envelope.warnings).toEqual(["Image 0 was not saved to disk: disk full"]);
    expect(monitoringService.getMetrics().persistenceFailureCount).toBe(1);
  });

  it("skips the disk when save_to_disk is false", async () => {
    const envelope = await service().execute({
      operation: "generate",
      options: { ...options, saveToDisk: false },
      prompt: "an apple",
    });

    expect(envelope.images[0].filename).toBeUndefined();
    expect(await fs.readdir(tmpDir)).toEqual([]);
  });

  it("notes a partial batch in the message and warnings", async () => {
    provider.respondWith(async () => batchOf(1));

    const envelope = await service().execute({
      operation: "generate",
      options: { ...options, n: 3, saveToDisk: false },
      prompt: "three pears",
    });

    expect(envelope.message).toBe("Successfully generated 1 of 3 image(s)");
    expect(envelope.warnings).toEqual([
      "Image 1 failed: Provider returned 1 of 3 requested image(s)",
      "Image 2 failed: Provider returned 1 of 3 requested image(s)",
    ]);
  });

  it("rejects variations on dall-e-3 before resolving the image", async () => {
    await expect(
      service().execute({
        operation: "vary",
        options: { ...options, model: "dall-e-3" },
        image: { kind: "url", url: "https://images.example.com/never-fetched.png" },
      })
    ).rejects.toBeInstanceOf(CapabilityError);
    expect(provider.calls).toHaveLength(0);
  });

  it("echoes mask use for edits", async () => {
    const source = { kind: "base64" as const, data: PNG_BYTES.toString("base64") };

    const envelope = await service().execute({
      operation: "edit",
      options: { ...options, saveToDisk: false },
      prompt: "add a hat",
      image: source,
      mask: source,
    });

    expect(envelope.message).toBe("Successfully edited image (1 result(s))");
    expect(envelope.request_params.has_mask).toBe(true);
  });

  it("echoes the original and enhanced prompt for reference generation", async () => {
    const envelope = await service().execute({
      operation: "generate_from_references",
      options: { ...options, model: "gpt-image-1", saveToDisk: false },
      prompt: "a robot",
      references: [
        { kind: "base64", data: PNG_BYTES.toString("base64") },
        { kind: "upload", buffer: PNG_BYTES, mimeType: "image/png", filename: "ref.png" },
      ],
    });

    expect(envelope.message).toBe("Successfully generated 1 image(s) using 2 reference(s)");
    expect(envelope.request_params.original_prompt).toBe("a robot");
    expect(envelope.request_params.enhanced_prompt).toMatch(/^Create a new image combining elements from 2/);
    expect(envelope.request_params.reference_count).toBe(2);
    expect(envelope.request_params.reference_urls).toBeUndefined();
    expect(envelope.request_params.quality).toBe("auto");
  });
});
