import { describe, it, expect, vi, afterEach } from "vitest";
import {
  ImageDecodeError,
  ImageFetchError,
  ImageTooLargeError,
  UnsupportedImageFormatError,
} from "../errors";
import {
  ImageSourceResolver,
  decodeBase64Image,
  formatFromMimeType,
  isPrivateAddress,
  sniffImageFormat,
} from "../services/imageSource";
import { PNG_BYTES } from "./fakeProvider";

const { lookup } = vi.hoisted(() => ({ lookup: vi.fn() }));
vi.mock("dns/promises", () => ({ default: { lookup } }));

const JPEG_BYTES = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10]);
const GIF_BYTES = Buffer.from("GIF89a-test");

function resolver(overrides: Partial<ConstructorParameters<typeof ImageSourceResolver>[0]> = {}) {
  return new ImageSourceResolver({
    maxBytes: 1024,
    allowedFormats: ["png", "jpg", "jpeg", "webp"],
    fetchTimeoutMs: 1000,
    blockPrivateAddresses: false,
    ...overrides,
  });
}

function stubFetch(body: Buffer, init: ResponseInit = {}) {
  const fetchMock = vi.fn(async () => new Response(new Uint8Array(body), init));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
  lookup.mockReset();
});

describe("sniffImageFormat", () => {
  it("recognizes magic bytes", () => {
    expect(sniffImageFormat(PNG_BYTES)).toBe("png");
    expect(sniffImageFormat(JPEG_BYTES)).toBe("jpeg");
    expect(sniffImageFormat(GIF_BYTES)).toBe("gif");
    expect(sniffImageFormat(Buffer.from("RIFF\x00\x00\x00\x00WEBPVP8 ", "latin1"))).toBe("webp");
    expect(sniffImageFormat(Buffer.from("hello"))).toBeNull();
  });
});

describe("formatFromMimeType", () => {
  it("maps MIME types and bare extensions", () => {
    expect(formatFromMimeType("image/jpg")).toBe("jpeg");
    expect(formatFromMimeType("image/png; charset=binary")).toBe("png");
    expect(formatFromMimeType("webp")).toBe("webp");
    expect(formatFromMimeType("application/pdf")).toBeNull();
  });
});

describe("decodeBase64Image", () => {
  it("strips a data URI prefix and keeps its MIME type", () => {
    const encoded = `data:image/png;base64,${PNG_BYTES.toString("base64")}`;
    const { data, declaredMimeType } = decodeBase64Image(encoded);

    expect(data.equals(PNG_BYTES)).toBe(true);
    expect(declaredMimeType).toBe("image/png");
  });

  it("rejects characters outside the base64 alphabet", () => {
    expect(() => decodeBase64Image("abc$")).toThrow(ImageDecodeError);
  });

  it("rejects a payload with bad padding length", () => {
    expect(() => decodeBase64Image("abcde")).toThrow("Base64 image data is malformed");
  });

  it("rejects an empty payload", () => {
    expect(() => decodeBase64Image("data:image/png;base64,")).toThrow("Base64 image data is empty");
  });
});

describe("isPrivateAddress", () => {
  it("flags loopback, private and link-local ranges", () => {
    expect(isPrivateAddress("127.0.0.1")).toBe(true);
    expect(isPrivateAddress("10.1.2.3")).toBe(true);
    expect(isPrivateAddress("172.20.0.1")).toBe(true);
    expect(isPrivateAddress("192.168.1.1")).toBe(true);
    expect(isPrivateAddress("169.254.169.254")).toBe(true);
    expect(isPrivateAddress("::1")).toBe(true);
    expect(isPrivateAddress("::ffff:10.0.0.1")).toBe(true);
    expect(isPrivateAddress("fe80::1")).toBe(true);
    expect(isPrivateAddress("8.8.8.8")).toBe(false);
    expect(isPrivateAddress("172.32.0.1")).toBe(false);
  });

  it("reads IPv4-mapped addresses in dotted and hex form", () => {
    expect(isPrivateAddress("::ffff:7f00:1")).toBe(true);
    expect(isPrivateAddress("::ffff:a9fe:a9fe")).toBe(true);
    expect(isPrivateAddress("0:0:0:0:0:ffff:7f00:1")).toBe(true);
    expect(isPrivateAddress("::ffff:808:808")).toBe(false);
    expect(isPrivateAddress("::ffff:8.8.8.8")).toBe(false);
  });
});

describe("ImageSourceResolver", () => {
  it("yields identical bytes for the same image from a URL and from base64", async () => {
    stubFetch(PNG_BYTES, { headers: { "content-type": "image/png" } });
    const r = resolver();

    const fromUrl = await r.resolve({ kind: "url", url: "https://images.example.com/cat.png" });
    const fromBase64 = await r.resolve({ kind: "base64", data: PNG_BYTES.toString("base64") });

    expect(fromUrl.data.equals(fromBase64.data)).toBe(true);
    expect(fromUrl.data.equals(PNG_BYTES)).toBe(true);
    expect(fromUrl.format).toBe("png");
    expect(fromUrl.filename).toBe("cat.png");
    expect(fromUrl.source).toBe("url");
    expect(fromBase64.source).toBe("base64");
  });

  it("fails with ImageFetchError on a non-2xx response", async () => {
    stubFetch(Buffer.from("missing"), { status: 404, statusText: "Not Found" });

    await expect(resolver().resolveUrl("https://images.example.com/gone.png")).rejects.toThrow(
      "Image download failed for https://images.example.com/gone.png: HTTP 404 Not Found"
    );
  });

  it("fails when the download exceeds the size limit", async () => {
    stubFetch(Buffer.concat([PNG_BYTES, Buffer.alloc(2048)]));

    await expect(resolver().resolveUrl("https://images.example.com/big.png")).rejects.toBeInstanceOf(
      ImageFetchError
    );
  });

  it("refuses non-http schemes without fetching", async () => {
    const fetchMock = stubFetch(PNG_BYTES);

    await expect(resolver().resolveUrl("file:///etc/passwd")).rejects.toThrow(
      "Only http and https image URLs are allowed (got file:)"
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("refuses literal private addresses when blocking is on", async () => {
    const fetchMock = stubFetch(PNG_BYTES);

    await expect(
      resolver({ blockPrivateAddresses: true }).resolveUrl("http://127.0.0.1/admin.png")
    ).rejects.toThrow("Blocked private address: 127.0.0.1");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("refuses a bracketed IPv4-mapped loopback URL", async () => {
    const fetchMock = stubFetch(PNG_BYTES);

    await expect(
      resolver({ blockPrivateAddresses: true }).resolveUrl("http://[::ffff:127.0.0.1]/a.png")
    ).rejects.toThrow("Blocked private address: ::ffff:7f00:1");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("refuses a host name that resolves to a private address", async () => {
    lookup.mockResolvedValue([{ address: "10.0.0.5", family: 4 }]);
    const fetchMock = stubFetch(PNG_BYTES);

    await expect(
      resolver({ blockPrivateAddresses: true }).resolveUrl("https://images.internal.test/a.png")
    ).rejects.toThrow("Blocked private address for images.internal.test: 10.0.0.5");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("checks the address again on every redirect hop", async () => {
    const fetchMock = vi.fn(
      async (_url: string | URL | Request, _init?: RequestInit) =>
        new Response(null, { status: 302, headers: { location: "http://169.254.169.254/latest/meta-data" } })
    );
    vi.stubGlobal("fetch", fetchMock);

    await expect(
      resolver({ blockPrivateAddresses: true }).resolveUrl("http://93.184.216.34/a.png")
    ).rejects.toThrow("Blocked private address: 169.254.169.254");

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://93.184.216.34/a.png");
    expect(init?.redirect).toBe("manual");
  });

  it("follows a redirect to a public host", async () => {
    const fetchMock = vi
      .fn(async (_url: string | URL | Request, _init?: RequestInit) => new Response(new Uint8Array(PNG_BYTES)))
      .mockImplementationOnce(
        async () => new Response(null, { status: 302, headers: { location: "/final/cat.png" } })
      );
    vi.stubGlobal("fetch", fetchMock);

    const result = await resolver().resolveUrl("https://images.example.com/start.png");

    expect(result.data.equals(PNG_BYTES)).toBe(true);
    expect(result.filename).toBe("cat.png");
    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      "https://images.example.com/start.png",
      "https://images.example.com/final/cat.png",
    ]);
  });

  it("stops on a redirect loop", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        async () =>
          new Response(null, { status: 302, headers: { location: "https://images.example.com/loop.png" } })
      )
    );

    await expect(resolver().resolveUrl("https://images.example.com/loop.png")).rejects.toThrow(
      "Redirect loop detected for https://images.example.com/loop.png"
    );
  });

  it("counts name resolution against the download timeout", async () => {
    lookup.mockImplementation(() => new Promise(() => {}));
    const fetchMock = stubFetch(PNG_BYTES);

    await expect(
      resolver({ blockPrivateAddresses: true, fetchTimeoutMs: 20 }).resolveUrl("https://slow-dns.example.com/a.png")
    ).rejects.toThrow("Image download timed out after 20ms: https://slow-dns.example.com/a.png");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("accepts an upload and reports the sniffed format", () => {
    const result = resolver().resolveUpload(JPEG_BYTES, "application/octet-stream", "photo.bin");

    expect(result.format).toBe("jpeg");
    expect(result.mimeType).toBe("image/jpeg");
    expect(result.bytes).toBe(JPEG_BYTES.length);
  });

  it("rejects an upload over the size limit", () => {
    expect(() => resolver({ maxBytes: 4 }).resolveUpload(PNG_BYTES, "image/png", "a.png")).toThrow(
      ImageTooLargeError
    );
  });

  it("rejects a format outside the allowed set", () => {
    expect(() => resolver().resolveUpload(GIF_BYTES, "image/gif", "anim.gif")).toThrow(
      UnsupportedImageFormatError
    );
  });

  it("rejects bytes that are not an image", () => {
    expect(() => resolver().resolveBase64(Buffer.from("plain text").toString("base64"))).toThrow(
      'Could not recognize "image" as an image'
    );
  });
});
