import { describe, it, expect } from "vitest";
import { CapabilityError, UpstreamError, ValidationError } from "../errors";
import { ImageOrchestrator, buildReferencePrompt } from "../services/imageGeneration/orchestrator";
import type { BinaryImage, GenerationRequest } from "../services/imageGeneration/types";
import { FakeImageProvider, PNG_BYTES, batchOf } from "./fakeProvider";

const image: BinaryImage = {
  data: PNG_BYTES,
  format: "png",
  mimeType: "image/png",
  filename: "input.png",
  bytes: PNG_BYTES.length,
  source: "upload",
};

function orchestrator(provider: FakeImageProvider, maxRetries = 0): { orch: ImageOrchestrator; sleeps: number[] } {
  const sleeps: number[] = [];
  const orch = new ImageOrchestrator({
    provider,
    defaults: { size: "1024x1024", quality: "standard" },
    maxRetries,
    retryBaseDelayMs: 100,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
  return { orch, sleeps };
}

function generate(overrides: Partial<Extract<GenerationRequest, { operation: "generate" }>> = {}): GenerationRequest {
  return {
    operation: "generate",
    model: "dall-e-2",
    prompt: "a lighthouse at dusk",
    n: 1,
    responseFormat: "png",
    saveToDisk: false,
    ...overrides,
  };
}

describe("ImageOrchestrator.dispatch", () => {
  it("makes one call for dall-e-2 and indexes the images in order", async () => {
    const provider = new FakeImageProvider();
    const { orch } = orchestrator(provider);

    const result = await orch.dispatch(generate({ n: 3 }));

    expect(provider.calls).toHaveLength(1);
    expect(result.images.map((i) => i.index)).toEqual([0, 1, 2]);
    expect(result.failures).toEqual([]);
    expect(result.size).toBe("1024x1024");
    expect(result.quality).toBe("standard");
  });

  it("fans dall-e-3 out into single-image calls and sorts by index", async () => {
    const provider = new FakeImageProvider(async (call, callNumber) => {
      // Later calls finish first
      await new Promise((resolve) => setTimeout(resolve, (3 - callNumber) * 5));
      return batchOf(1, `call${callNumber}`, "revised");
    });
    const { orch } = orchestrator(provider);

    const result = await orch.dispatch(generate({ model: "dall-e-3", n: 3 }));

    expect(provider.calls).toHaveLength(3);
    expect(provider.calls.every((c) => c.params.n === 1)).toBe(true);
    expect(result.images.map((i) => i.index)).toEqual([0, 1, 2]);
    expect(result.images[2].b64Json).toBe(Buffer.from("call2-0").toString("base64"));
    expect(result.images[0].revisedPrompt).toBe("revised");
  });

  it("keeps the images of successful slots when one fan-out slot fails", async () => {
    const provider = new FakeImageProvider(async (_call, callNumber) => {
      if (callNumber === 1) throw new UpstreamError("boom", { status: 400 });
      return batchOf(1);
    });
    const { orch } = orchestrator(provider);

    const result = await orch.dispatch(generate({ model: "dall-e-3", n: 3 }));

    expect(result.images.map((i) => i.index)).toEqual([0, 2]);
    expect(result.failures).toEqual([{ index: 1, code: "UPSTREAM_ERROR", message: "boom" }]);
  });

  it("throws when every fan-out slot fails", async () => {
    const provider = new FakeImageProvider(async () => {
      throw new UpstreamError("quota", { status: 429 });
    });
    const { orch } = orchestrator(provider);

    await expect(orch.dispatch(generate({ model: "dall-e-3", n: 2 }))).rejects.toMatchObject({
      code: "UPSTREAM_RATE_LIMITED",
    });
  });

  it("reports a shortfall when the provider returns fewer images", async () => {
    const provider = new FakeImageProvider(async () => batchOf(1));
    const { orch } = orchestrator(provider);

    const result = await orch.dispatch(generate({ n: 2 }));

    expect(result.images).toHaveLength(1);
    expect(result.failures).toEqual([
      { index: 1, code: "MISSING_IMAGES", message: "Provider returned 1 of 2 requested image(s)" },
    ]);
  });

  it("rejects a mask on dall-e-3 without calling the provider", async () => {
    const provider = new FakeImageProvider();
    const { orch } = orchestrator(provider);

    const request: GenerationRequest = {
      operation: "edit",
      model: "dall-e-3",
      prompt: "add a moon",
      image,
      mask: image,
      n: 1,
      responseFormat: "png",
      saveToDisk: false,
    };

    await expect(orch.dispatch(request)).rejects.toBeInstanceOf(CapabilityError);
    expect(provider.calls).toHaveLength(0);
  });

  it("rejects variations on dall-e-3 without calling the provider", async () => {
    const provider = new FakeImageProvider();
    const { orch } = orchestrator(provider);

    await expect(
      orch.dispatch({ operation: "vary", model: "dall-e-3", image, n: 1, responseFormat: "png", saveToDisk: false })
    ).rejects.toBeInstanceOf(CapabilityError);
    expect(provider.calls).toHaveLength(0);
  });

  it("rejects an empty prompt and n below 1", async () => {
    const { orch } = orchestrator(new FakeImageProvider());

    await expect(orch.dispatch(generate({ prompt: "  " }))).rejects.toBeInstanceOf(ValidationError);
    await expect(orch.dispatch(generate({ n: 0 }))).rejects.toBeInstanceOf(ValidationError);
  });

  it("sends reference images as one edit with the enhanced prompt", async () => {
    const provider = new FakeImageProvider();
    const { orch } = orchestrator(provider);

    const result = await orch.dispatch({
      operation: "generate_from_references",
      model: "gpt-image-1",
      prompt: "a cat in a spacesuit",
      references: [image, image],
      n: 1,
      responseFormat: "webp",
      saveToDisk: false,
    });

    expect(provider.calls).toHaveLength(1);
    const call = provider.calls[0];
    expect(call.method).toBe("edit");
    if (call.method === "edit") {
      expect(call.params.images).toHaveLength(2);
      expect(call.params.prompt).toBe(buildReferencePrompt("a cat in a spacesuit", 2));
      expect(call.params.quality).toBe("auto");
      expect(call.params.outputFormat).toBe("webp");
    }
    expect(result.upstreamPrompt).toBe(buildReferencePrompt("a cat in a spacesuit", 2));
  });

  it("passes the mask through on dall-e-2 edits", async () => {
    const provider = new FakeImageProvider();
    const { orch } = orchestrator(provider);

    await orch.dispatch({
      operation: "edit",
      model: "dall-e-2",
      prompt: "add a moon",
      image,
      mask: image,
      n: 1,
      responseFormat: "png",
      saveToDisk: false,
    });

    const call = provider.calls[0];
    expect(call.method).toBe("edit");
    if (call.method === "edit") {
      expect(call.params.mask).toBe(image);
      expect(call.params.images).toEqual([image]);
    }
  });
});

describe("ImageOrchestrator retries", () => {
  it("does not retry by default", async () => {
    const provider = new FakeImageProvider(async () => {
      throw new UpstreamError("server error", { status: 500, transient: true });
    });
    const { orch } = orchestrator(provider);

    await expect(orch.dispatch(generate())).rejects.toThrow("server error");
    expect(provider.calls).toHaveLength(1);
  });

  it("retries a transient failure once with backoff", async () => {
    const provider = new FakeImageProvider(async (call, callNumber) => {
      if (callNumber === 0) throw new UpstreamError("server error", { status: 503, transient: true });
      return batchOf(call.params.n);
    });
    const { orch, sleeps } = orchestrator(provider, 1);

    const result = await orch.dispatch(generate());

    expect(provider.calls).toHaveLength(2);
    expect(sleeps).toEqual([100]);
    expect(result.images).toHaveLength(1);
  });

  it("gives up after the single retry", async () => {
    const provider = new FakeImageProvider(async () => {
      throw new UpstreamError("server error", { status: 503, transient: true });
    });
    const { orch } = orchestrator(provider, 1);

    await expect(orch.dispatch(generate())).rejects.toThrow("server error");
    expect(provider.calls).toHaveLength(2);
  });

  it("never retries a content policy rejection", async () => {
    const provider = new FakeImageProvider(async () => {
      throw new UpstreamError("blocked", { status: 400, contentPolicy: true });
    });
    const { orch } = orchestrator(provider, 1);

    await expect(orch.dispatch(generate())).rejects.toMatchObject({ code: "CONTENT_POLICY_VIOLATION" });
    expect(provider.calls).toHaveLength(1);
  });

  it("wraps unexpected provider errors as UpstreamError", async () => {
    const provider = new FakeImageProvider(async () => {
      throw new TypeError("socket hang up");
    });
    const { orch } = orchestrator(provider);

    await expect(orch.dispatch(generate())).rejects.toThrow("Image provider failed: socket hang up");
  });
});

describe("buildReferencePrompt", () => {
  it("words a single reference differently from several", () => {
    expect(buildReferencePrompt("a fox", 1)).toMatch(/^Create a new image based on this reference: a fox\. /);
    expect(buildReferencePrompt("a fox", 3)).toMatch(
      /^Create a new image combining elements from 3 reference images: a fox\. /
    );
  });
});
