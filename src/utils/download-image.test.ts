import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { downloadImage } from "./download-image";
import type { DownloadOptions } from "./download-image";
import { fileExists } from "./fs";
import { Logger } from "./logger";
import { sleep } from "./sleep";

vi.mock("./sleep", () => ({ sleep: vi.fn(() => Promise.resolve()) }));

const IMAGE_URL = "https://cdn.example.com/images/anime/10/47347.jpg";

type ResponseBody = ConstructorParameters<typeof Response>[0];

function abortError(): Error {
  return Object.assign(new Error("This operation was aborted"), {
    name: "AbortError",
  });
}

function waitFor(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

function imageResponse(
  body: ResponseBody,
  init: { status?: number; contentType?: string } = {},
): Response {
  return new Response(body, {
    status: init.status ?? 200,
    headers: { "content-type": init.contentType ?? "image/jpeg" },
  });
}

describe("downloadImage", () => {
  const fetchMock = vi.fn<typeof fetch>();
  let dir: string;
  let outputPath: string;
  let options: DownloadOptions;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "download-image-"));
    outputPath = join(dir, "poster.jpg");
    options = {
      attempts: 3,
      retryDelay: 1000,
      timeout: 15000,
      headers: { "User-Agent": "test-agent" },
      logger: new Logger("silent"),
    };
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    fetchMock.mockReset();
    vi.mocked(sleep).mockClear();
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the body to disk", async () => {
    fetchMock.mockResolvedValueOnce(imageResponse("poster-bytes"));

    expect(await downloadImage(IMAGE_URL, outputPath, options)).toBe(true);
    expect(await readFile(outputPath, "utf-8")).toBe("poster-bytes");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(
      IMAGE_URL,
      expect.objectContaining({ headers: { "User-Agent": "test-agent" } }),
    );
    expect(sleep).not.toHaveBeenCalled();
  });

  it("matches the content type case-insensitively", async () => {
    fetchMock.mockResolvedValueOnce(
      imageResponse("poster-bytes", { contentType: "Image/WEBP" }),
    );

    expect(await downloadImage(IMAGE_URL, outputPath, options)).toBe(true);
  });

  it("makes exactly three attempts when every response fails", async () => {
    fetchMock.mockImplementation(async () =>
      imageResponse("not found", { status: 404, contentType: "text/plain" }),
    );

    expect(await downloadImage(IMAGE_URL, outputPath, options)).toBe(false);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(vi.mocked(sleep).mock.calls).toEqual([[1000], [1000]]);
    expect(await fileExists(outputPath)).toBe(false);
  });

  it("rejects responses that are not images", async () => {
    fetchMock.mockImplementation(async () =>
      imageResponse("<html></html>", { contentType: "text/html" }),
    );

    expect(await downloadImage(IMAGE_URL, outputPath, options)).toBe(false);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(await fileExists(outputPath)).toBe(false);
  });

  it("removes empty files and retries", async () => {
    fetchMock
      .mockResolvedValueOnce(imageResponse(""))
      .mockResolvedValueOnce(imageResponse("poster-bytes"));

    expect(await downloadImage(IMAGE_URL, outputPath, options)).toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(await readFile(outputPath, "utf-8")).toBe("poster-bytes");
  });

  it("leaves no file when every body is empty", async () => {
    fetchMock.mockImplementation(async () => imageResponse(""));

    expect(await downloadImage(IMAGE_URL, outputPath, options)).toBe(false);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(await fileExists(outputPath)).toBe(false);
  });

  it("recovers from a transport error", async () => {
    fetchMock
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(imageResponse("poster-bytes"));

    expect(await downloadImage(IMAGE_URL, outputPath, options)).toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(vi.mocked(sleep).mock.calls).toEqual([[1000]]);
  });

  it("deletes a partial file when the stream breaks", async () => {
    async function* brokenBody(): AsyncGenerator<Uint8Array> {
      yield new TextEncoder().encode("part");
      throw new Error("connection reset");
    }
    fetchMock.mockImplementation(async () => imageResponse(brokenBody()));

    expect(await downloadImage(IMAGE_URL, outputPath, options)).toBe(false);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(await fileExists(outputPath)).toBe(false);
  });

  it("honours a single attempt", async () => {
    fetchMock.mockImplementation(async () =>
      imageResponse("gone", { status: 500, contentType: "text/plain" }),
    );

    expect(
      await downloadImage(IMAGE_URL, outputPath, { ...options, attempts: 1 }),
    ).toBe(false);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("gives up on a server that never answers", async () => {
    fetchMock.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(abortError()));
        }),
    );

    expect(
      await downloadImage(IMAGE_URL, outputPath, { ...options, timeout: 30 }),
    ).toBe(false);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(await fileExists(outputPath)).toBe(false);
  });

  it("keeps a slow transfer alive while chunks keep arriving", async () => {
    fetchMock.mockImplementation(async (_input, init) => {
      async function* slowBody(): AsyncGenerator<Uint8Array> {
        for (let chunk = 0; chunk < 4; chunk++) {
          await waitFor(40);
          if (init?.signal?.aborted) throw abortError();
          yield new TextEncoder().encode("poster");
        }
      }
      return imageResponse(slowBody());
    });

    expect(
      await downloadImage(IMAGE_URL, outputPath, { ...options, timeout: 100 }),
    ).toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(await readFile(outputPath, "utf-8")).toBe("poster".repeat(4));
  });
});
